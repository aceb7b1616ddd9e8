/**
 * Durable task broker on SQLite (better-sqlite3).
 *
 * Delivery is at-least-once with late acknowledgement: a claimed task holds a
 * lease token until `complete` or `fail` is called with that token. A worker
 * that dies mid-task lets the lease expire, and the task is claimed again
 * (counting as a new attempt). Failed attempts are re-queued with exponential
 * backoff until `max_attempts`, then parked as `dead`.
 */
import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { computeBackoffMs } from '../utils/retry.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export const TaskStatusSchema = z.enum(['queued', 'running', 'done', 'dead']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

interface TaskRow {
  id: string;
  name: string;
  payload: string;
  status: string;
  attempts: number;
  max_attempts: number;
  run_at: number;
  lease_token: string | null;
  lease_until: number | null;
  last_error: string | null;
  created_at: number;
  updated_at: number;
}

export interface TaskRecord {
  id: string;
  name: string;
  payload: unknown;
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  runAt: Date;
  leaseUntil: Date | null;
  lastError: string | null;
}

export interface ClaimedTask extends TaskRecord {
  leaseToken: string;
}

export interface EnqueueOptions {
  /** Earliest dispatch time; omitted or past ⇒ immediately due. */
  runAt?: Date;
  maxAttempts?: number;
}

export type FailOutcome =
  | { outcome: 'retried'; nextRunAt: Date; backoffMs: number }
  | { outcome: 'dead' }
  | { outcome: 'stale' };

export interface BrokerOptions {
  filename: string;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  now?: () => number;
}

// ── Schema ────────────────────────────────────────────────────────────────────

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id            TEXT    PRIMARY KEY,
    name          TEXT    NOT NULL,
    payload       TEXT    NOT NULL,
    status        TEXT    NOT NULL DEFAULT 'queued',
    attempts      INTEGER NOT NULL DEFAULT 0,
    max_attempts  INTEGER NOT NULL,
    run_at        INTEGER NOT NULL,
    lease_token   TEXT,
    lease_until   INTEGER,
    last_error    TEXT,
    created_at    INTEGER NOT NULL,
    updated_at    INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS tasks_due_idx ON tasks (status, run_at);
`;

// ── Broker ────────────────────────────────────────────────────────────────────

export class TaskBroker {
  private readonly db: Database.Database;
  private readonly now: () => number;

  constructor(private readonly opts: BrokerOptions) {
    if (opts.filename !== ':memory:') mkdirSync(dirname(opts.filename), { recursive: true });
    this.db = new Database(opts.filename);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
    this.now = opts.now ?? Date.now;
  }

  enqueue(name: string, payload: unknown, options: EnqueueOptions = {}): string {
    const id = randomUUID();
    const now = this.now();
    const runAt = Math.max(now, options.runAt?.getTime() ?? now);
    this.db.prepare<[string, string, string, number, number, number, number]>(`
      INSERT INTO tasks (id, name, payload, max_attempts, run_at, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(id, name, JSON.stringify(payload), options.maxAttempts ?? this.opts.maxAttempts, runAt, now, now);
    return id;
  }

  /**
   * Claims the oldest due task: queued and past `run_at`, or running with an
   * expired lease. Expired tasks that already used their last attempt are
   * parked as dead instead of being handed out again.
   */
  claimNext(leaseMs: number): ClaimedTask | null {
    const now = this.now();
    const leaseToken = randomUUID();
    const selectDue = this.db.prepare<[number, number], TaskRow>(`
      SELECT * FROM tasks
      WHERE (status = 'queued' AND run_at <= ?)
         OR (status = 'running' AND lease_until <= ?)
      ORDER BY run_at ASC, rowid ASC
      LIMIT 1
    `);
    const markRunning = this.db.prepare<[string, number, number, string]>(`
      UPDATE tasks
      SET status = 'running', attempts = attempts + 1, lease_token = ?, lease_until = ?, updated_at = ?
      WHERE id = ?
    `);
    const markExpiredDead = this.db.prepare<[number, string]>(`
      UPDATE tasks
      SET status = 'dead', lease_token = NULL, lease_until = NULL,
          last_error = COALESCE(last_error, 'lease expired on final attempt'), updated_at = ?
      WHERE id = ?
    `);

    const claim = this.db.transaction((): TaskRow | undefined => {
      for (;;) {
        const row = selectDue.get(now, now);
        if (!row) return undefined;
        if (row.status === 'running' && row.attempts >= row.max_attempts) {
          markExpiredDead.run(now, row.id);
          continue;
        }
        markRunning.run(leaseToken, now + leaseMs, now, row.id);
        return this.getRow(row.id);
      }
    });

    const row = claim();
    return row ? { ...toRecord(row), leaseToken } : null;
  }

  /** Heartbeat. False when the lease was lost (expired and re-claimed). */
  extendLease(id: string, leaseToken: string, leaseMs: number): boolean {
    const now = this.now();
    const res = this.db.prepare<[number, number, string, string]>(`
      UPDATE tasks SET lease_until = ?, updated_at = ?
      WHERE id = ? AND lease_token = ? AND status = 'running'
    `).run(now + leaseMs, now, id, leaseToken);
    return res.changes === 1;
  }

  /** Late ack. False when the lease is stale; the task then belongs to someone else. */
  complete(id: string, leaseToken: string): boolean {
    const res = this.db.prepare<[number, string, string]>(`
      UPDATE tasks SET status = 'done', lease_token = NULL, lease_until = NULL, updated_at = ?
      WHERE id = ? AND lease_token = ? AND status = 'running'
    `).run(this.now(), id, leaseToken);
    return res.changes === 1;
  }

  fail(id: string, leaseToken: string, error: string, retryable: boolean): FailOutcome {
    const now = this.now();
    const settle = this.db.transaction((): FailOutcome => {
      const row = this.getRow(id);
      if (!row || row.status !== 'running' || row.lease_token !== leaseToken) return { outcome: 'stale' };

      if (retryable && row.attempts < row.max_attempts) {
        const backoffMs = computeBackoffMs(row.attempts, this.opts.backoffBaseMs, this.opts.backoffMaxMs);
        this.db.prepare<[number, string, number, string]>(`
          UPDATE tasks
          SET status = 'queued', run_at = ?, last_error = ?, lease_token = NULL, lease_until = NULL, updated_at = ?
          WHERE id = ?
        `).run(now + backoffMs, error, now, id);
        return { outcome: 'retried', nextRunAt: new Date(now + backoffMs), backoffMs };
      }

      this.db.prepare<[string, number, string]>(`
        UPDATE tasks
        SET status = 'dead', last_error = ?, lease_token = NULL, lease_until = NULL, updated_at = ?
        WHERE id = ?
      `).run(error, now, id);
      return { outcome: 'dead' };
    });
    return settle();
  }

  get(id: string): TaskRecord | null {
    const row = this.getRow(id);
    return row ? toRecord(row) : null;
  }

  list(status?: TaskStatus): TaskRecord[] {
    const rows = status
      ? this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE status = ? ORDER BY run_at, rowid').all(status)
      : this.db.prepare<[], TaskRow>('SELECT * FROM tasks ORDER BY run_at, rowid').all();
    return rows.map(toRecord);
  }

  stats(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { queued: 0, running: 0, done: 0, dead: 0 };
    const rows = this.db
      .prepare<[], { status: string; n: number }>('SELECT status, COUNT(*) AS n FROM tasks GROUP BY status')
      .all();
    for (const row of rows) {
      const status = TaskStatusSchema.safeParse(row.status);
      if (status.success) counts[status.data] = row.n;
    }
    return counts;
  }

  close(): void {
    this.db.close();
  }

  private getRow(id: string): TaskRow | undefined {
    return this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
  }
}

function toRecord(row: TaskRow): TaskRecord {
  const payload: unknown = JSON.parse(row.payload);
  return {
    id:          row.id,
    name:        row.name,
    payload,
    status:      TaskStatusSchema.parse(row.status),
    attempts:    row.attempts,
    maxAttempts: row.max_attempts,
    runAt:       new Date(row.run_at),
    leaseUntil:  row.lease_until === null ? null : new Date(row.lease_until),
    lastError:   row.last_error,
  };
}
