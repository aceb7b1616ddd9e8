import { env } from '../config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const REDACTED_KEYS = /token|secret|api_?key|password|authorization/i;

/** Errors serialize to `{}` under JSON.stringify; flatten them and hide credentials. */
function sanitize(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (REDACTED_KEYS.test(key) && typeof value === 'string') {
      out[key] = '[redacted]';
    } else if (value instanceof Error) {
      out[key] = { name: value.name, message: value.message };
    } else {
      out[key] = value;
    }
  }
  return out;
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVELS[level] < LEVELS[env.LOG_LEVEL]) return;
  const ts = new Date().toISOString();
  const clean = meta ? sanitize(meta) : undefined;
  const out = env.LOG_FORMAT === 'json'
    ? JSON.stringify({ timestamp: ts, level, message, ...clean })
    : clean ? `[${ts}] [${level.toUpperCase()}] ${message} ${JSON.stringify(clean)}`
            : `[${ts}] [${level.toUpperCase()}] ${message}`;
  if (level === 'error') process.stderr.write(out + '\n');
  else process.stdout.write(out + '\n');
}

export const logger = {
  debug: (msg: string, meta?: LogMeta) => log('debug', msg, meta),
  info:  (msg: string, meta?: LogMeta) => log('info',  msg, meta),
  warn:  (msg: string, meta?: LogMeta) => log('warn',  msg, meta),
  error: (msg: string, meta?: LogMeta) => log('error', msg, meta),
};
