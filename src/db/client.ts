/**
 * Database client — thin generic CRUD over Supabase (PostgREST).
 *
 * Rows come back as plain records; each table module validates them with its
 * own zod schema. `dbUpdateWhere` is the compare-and-swap primitive the
 * episode lease is built on: it returns null when no row matched.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type DbRow = Record<string, unknown>;
export type FilterValue = string | number | boolean | null;
export type DbFilters = Record<string, FilterValue>;

export interface SelectOptions {
  orderBy?: string;
  ascending?: boolean;
  limit?: number;
}

// ─── Supabase singleton ───────────────────────────────────────────────────────

let _supabase: SupabaseClient | null = null;

function getSupabase(): SupabaseClient {
  if (!_supabase) {
    _supabase = createClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_KEY, {
      auth: { persistSession: false },
    });
  }
  return _supabase;
}

/** Raw client for one-off checks (scripts/check-env.ts). */
export function supabase(): SupabaseClient {
  return getSupabase();
}

function dbError(op: string, table: string, message: string): Error {
  logger.error(`DB ${op} failed`, { table, message });
  return new Error(`DB ${op} on ${table} failed: ${message}`);
}

// ─── Generic CRUD helpers ─────────────────────────────────────────────────────

export async function dbInsert(table: string, data: DbRow): Promise<DbRow> {
  const { data: result, error } = await getSupabase()
    .from(table)
    .insert(data)
    .select()
    .single();
  if (error) throw dbError('INSERT', table, error.message);
  return result;
}

export async function dbSelect(
  table: string,
  filters: DbFilters = {},
  options: SelectOptions = {},
): Promise<DbRow[]> {
  let q = getSupabase().from(table).select('*');
  for (const [k, v] of Object.entries(filters)) {
    q = v === null ? q.is(k, null) : q.eq(k, v);
  }
  if (options.orderBy) q = q.order(options.orderBy, { ascending: options.ascending ?? true });
  if (options.limit !== undefined) q = q.limit(options.limit);
  const { data, error } = await q;
  if (error) throw dbError('SELECT', table, error.message);
  return data ?? [];
}

export async function dbSelectIn(
  table: string,
  column: string,
  values: readonly string[],
  filters: DbFilters = {},
): Promise<DbRow[]> {
  if (values.length === 0) return [];
  let q = getSupabase().from(table).select('*').in(column, [...values]);
  for (const [k, v] of Object.entries(filters)) {
    q = v === null ? q.is(k, null) : q.eq(k, v);
  }
  const { data, error } = await q;
  if (error) throw dbError('SELECT', table, error.message);
  return data ?? [];
}

export async function dbUpdate(table: string, id: string, data: DbRow): Promise<DbRow> {
  const { data: result, error } = await getSupabase()
    .from(table)
    .update({ ...data, updated_at: new Date().toISOString() })
    .eq('id', id)
    .select()
    .single();
  if (error) throw dbError('UPDATE', table, error.message);
  return result;
}

/**
 * Conditional UPDATE: applies `data` only where every column in `match`
 * equals the given value. Returns the updated row, or null if none matched.
 */
export async function dbUpdateWhere(table: string, match: DbFilters, data: DbRow): Promise<DbRow | null> {
  let q = getSupabase()
    .from(table)
    .update({ ...data, updated_at: new Date().toISOString() });
  for (const [k, v] of Object.entries(match)) {
    q = v === null ? q.is(k, null) : q.eq(k, v);
  }
  const { data: rows, error } = await q.select();
  if (error) throw dbError('UPDATE', table, error.message);
  return rows?.[0] ?? null;
}
