/**
 * In-memory stand-in for `db/client.ts`. Tests swap it in with
 *   vi.mock('../db/client.js', () => import('./helpers/memory-db.js'))
 * and drive it through `resetDb` / `seedRow` / `rowsOf`.
 */
import type { DbFilters, DbRow, SelectOptions } from '../../db/client.js';

const tables = new Map<string, DbRow[]>();
let sequence = 0;

function table(name: string): DbRow[] {
  let rows = tables.get(name);
  if (!rows) {
    rows = [];
    tables.set(name, rows);
  }
  return rows;
}

function matches(row: DbRow, filters: DbFilters): boolean {
  return Object.entries(filters).every(([k, v]) => (v === null ? row[k] == null : row[k] === v));
}

function compare(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a ?? '').localeCompare(String(b ?? ''));
}

// ── Test controls ─────────────────────────────────────────────────────────────

export function resetDb(): void {
  tables.clear();
  sequence = 0;
}

/** Inserts a row as-is (plus an id and timestamps when missing). */
export function seedRow(name: string, row: DbRow): DbRow {
  const now = new Date().toISOString();
  const stored: DbRow = {
    id: `${name}-${++sequence}`,
    created_at: now,
    updated_at: now,
    ...structuredClone(row),
  };
  table(name).push(stored);
  return structuredClone(stored);
}

export function rowsOf(name: string): DbRow[] {
  return structuredClone(table(name));
}

// ── client.ts surface ─────────────────────────────────────────────────────────

export function supabase(): never {
  throw new Error('supabase() is not available in tests');
}

export async function dbInsert(name: string, data: DbRow): Promise<DbRow> {
  return seedRow(name, data);
}

export async function dbSelect(name: string, filters: DbFilters = {}, options: SelectOptions = {}): Promise<DbRow[]> {
  let rows = table(name).filter(r => matches(r, filters));
  if (options.orderBy) {
    const key = options.orderBy;
    const dir = options.ascending === false ? -1 : 1;
    rows = [...rows].sort((a, b) => dir * compare(a[key], b[key]));
  }
  if (options.limit !== undefined) rows = rows.slice(0, options.limit);
  return structuredClone(rows);
}

export async function dbSelectIn(
  name: string,
  column: string,
  values: readonly string[],
  filters: DbFilters = {},
): Promise<DbRow[]> {
  const wanted = new Set(values);
  return structuredClone(table(name).filter(r => {
    const value = r[column];
    return typeof value === 'string' && wanted.has(value) && matches(r, filters);
  }));
}

export async function dbUpdate(name: string, id: string, data: DbRow): Promise<DbRow> {
  const row = table(name).find(r => r['id'] === id);
  if (!row) throw new Error(`DB UPDATE on ${name} failed: no row ${id}`);
  Object.assign(row, structuredClone(data), { updated_at: new Date().toISOString() });
  return structuredClone(row);
}

export async function dbUpdateWhere(name: string, match: DbFilters, data: DbRow): Promise<DbRow | null> {
  const row = table(name).find(r => matches(r, match));
  if (!row) return null;
  Object.assign(row, structuredClone(data), { updated_at: new Date().toISOString() });
  return structuredClone(row);
}
