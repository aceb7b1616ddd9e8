/**
 * Shared HTTP plumbing for platform adapters: non-2xx → PlatformHttpError,
 * JSON bodies validated with zod.
 */
import type { z } from 'zod';
import { PlatformHttpError, ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Platform } from './types.js';

export async function request(platform: Platform, url: string, init: RequestInit = {}): Promise<Response> {
  const res = await fetch(url, init);
  if (!res.ok) {
    const body = await res.text().catch(() => '');
    logger.warn('Platform request failed', { platform, method: init.method ?? 'GET', status: res.status });
    throw new PlatformHttpError(platform, res.status, body);
  }
  return res;
}

type Schema<O> = z.ZodType<O, z.ZodTypeDef, unknown>;

export async function parseJson<O>(platform: Platform, res: Response, schema: Schema<O>): Promise<O> {
  const body: unknown = await res.json().catch(() => null);
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ProviderError(platform, `Unexpected ${platform} response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
  }
  return parsed.data;
}

export async function requestJson<O>(
  platform: Platform,
  url: string,
  init: RequestInit,
  schema: Schema<O>,
): Promise<O> {
  return parseJson(platform, await request(platform, url, init), schema);
}

export function withQuery(base: string, params: Record<string, string>): string {
  const url = new URL(base);
  for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);
  return url.toString();
}
