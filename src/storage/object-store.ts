/**
 * Object storage — Cloudinary when configured, local disk otherwise.
 *
 * Cloudinary uploads are `authenticated` resources; `fetchableUrl` turns one
 * into a time-limited signed download URL for platforms that pull by URL.
 *
 * Without Cloudinary credentials, bytes land under TEMP_DIR/storage and the
 * returned URL is a placeholder on storage.example.com. The pipeline can still
 * render from those files, but a placeholder is never handed to a platform.
 */
import { v2 as cloudinary, type UploadApiResponse } from 'cloudinary';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, extname, join } from 'node:path';
import { env, STORAGE } from '../config.js';
import { ProviderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

type ResourceType = 'image' | 'video' | 'raw';

// ── Configuration ─────────────────────────────────────────────────────────────

let configured: boolean | null = null;

export function isStorageConfigured(): boolean {
  if (configured === null) {
    configured = Boolean(env.CLOUDINARY_CLOUD_NAME && env.CLOUDINARY_API_KEY && env.CLOUDINARY_API_SECRET);
    if (configured) {
      cloudinary.config({
        cloud_name: env.CLOUDINARY_CLOUD_NAME,
        api_key:    env.CLOUDINARY_API_KEY,
        api_secret: env.CLOUDINARY_API_SECRET,
        secure:     true,
      });
    } else {
      logger.warn('Cloudinary not configured — storing objects locally with placeholder URLs');
    }
  }
  return configured;
}

export function isPlaceholderUrl(url: string | null | undefined): boolean {
  return !url || url.startsWith(`${STORAGE.placeholderBase}/`);
}

function placeholderUrl(key: string): string {
  return `${STORAGE.placeholderBase}/${key}`;
}

function localPath(key: string): string {
  return join(env.TEMP_DIR, 'storage', key);
}

function resourceTypeFor(contentType: string): ResourceType {
  if (contentType.startsWith('image/')) return 'image';
  if (contentType.startsWith('video/') || contentType.startsWith('audio/')) return 'video';
  return 'raw';
}

// ── Upload ────────────────────────────────────────────────────────────────────

function uploadBuffer(bytes: Buffer, publicId: string, resourceType: ResourceType): Promise<UploadApiResponse> {
  return new Promise((resolve, reject) => {
    const stream = cloudinary.uploader.upload_stream(
      { public_id: publicId, resource_type: resourceType, type: 'authenticated', overwrite: true },
      (error, result) => {
        if (error) reject(new ProviderError('storage', `Cloudinary upload failed: ${error.message}`));
        else if (!result) reject(new ProviderError('storage', 'Cloudinary upload returned no result'));
        else resolve(result);
      },
    );
    stream.end(bytes);
  });
}

/**
 * Store bytes under `key` (e.g. `episodes/<id>/scene_01.mp3`) and return the
 * URL recorded on the Asset.
 */
export async function storeObject(key: string, bytes: Buffer, contentType: string): Promise<string> {
  if (!isStorageConfigured()) {
    const path = localPath(key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes);
    return placeholderUrl(key);
  }

  const resourceType = resourceTypeFor(contentType);
  // Cloudinary keeps the extension inside the public id only for raw files
  const stem = resourceType === 'raw' ? key : key.slice(0, key.length - extname(key).length);
  const publicId = `${STORAGE.folder}/${stem}`;
  const result = await withRetry(() => uploadBuffer(bytes, publicId, resourceType), {
    maxAttempts: 3,
    baseDelayMs: 2_000,
  });
  logger.debug('Storage: uploaded', { key, bytes: bytes.length, url: result.secure_url });
  return result.secure_url;
}

// ── Fetchable URLs ────────────────────────────────────────────────────────────

// cloud, resource type, public id path; the optional `s--…--` signature and `v123` version are dropped
const AUTHENTICATED_URL =
  /^https:\/\/res\.cloudinary\.com\/([^/]+)\/(image|video|raw)\/authenticated\/(?:s--[^/]+--\/)?(?:v\d+\/)?(.+)$/;

/**
 * URL a third party can GET for `ttlSeconds`. Authenticated Cloudinary URLs
 * are signed; anything else (public URLs, placeholders) is returned as is.
 */
export function fetchableUrl(url: string, ttlSeconds: number = STORAGE.urlTtlSeconds): string {
  if (isPlaceholderUrl(url) || !isStorageConfigured()) return url;
  const match = AUTHENTICATED_URL.exec(url);
  if (!match || match[1] !== env.CLOUDINARY_CLOUD_NAME) return url;

  const resourceType = match[2] ?? 'video';
  const path = match[3] ?? '';
  const ext = extname(path);
  const [publicId, format] = resourceType === 'raw' || !ext
    ? [path, '']
    : [path.slice(0, -ext.length), ext.slice(1)];

  return cloudinary.utils.private_download_url(publicId, format, {
    resource_type: resourceType,
    type:          'authenticated',
    expires_at:    Math.floor(Date.now() / 1000) + ttlSeconds,
  });
}

// ── Download ──────────────────────────────────────────────────────────────────

export async function downloadObject(url: string): Promise<Buffer> {
  if (isPlaceholderUrl(url)) {
    const key = url.slice(STORAGE.placeholderBase.length + 1);
    return readFile(localPath(key));
  }
  const res = await fetch(fetchableUrl(url));
  if (!res.ok) {
    throw new ProviderError('storage', `Download failed: HTTP ${res.status} for ${url}`);
  }
  return Buffer.from(await res.arrayBuffer());
}
