/*
 * Structured logger with redaction and LOG_LEVEL support.
 * Emits single-line JSON so batch runs can be grepped or shipped as-is.
 */

type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type EmitLevel = Exclude<Level, 'silent'>;

const LEVELS: Record<EmitLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const KNOWN_LEVELS: readonly Level[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLevel(value: string): value is Level {
  return KNOWN_LEVELS.some((level) => level === value);
}

function currentLevel(): Level {
  const lvl = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(lvl) ? lvl : 'info';
}

function levelEnabled(lvl: EmitLevel): boolean {
  const cur = currentLevel();
  if (cur === 'silent') return false;
  return LEVELS[lvl] >= LEVELS[cur];
}

// Provider credentials end up in request configs and error payloads
const SENSITIVE_KEYS = new Set([
  'authorization',
  'apikey',
  'api_key',
  'x-api-key',
  'token',
  'accesstoken',
  'secret',
  'password',
]);

function isObject(val: unknown): val is Record<string, unknown> {
  return !!val && typeof val === 'object' && !Array.isArray(val);
}

export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    if (/^Bearer\s+/i.test(value)) return 'Bearer [REDACTED]';
    if (/^sk-[A-Za-z0-9_-]{8,}$/.test(value)) return '[REDACTED_KEY]';
  }
  return value;
}

export function redactObject(input: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) {
    if (SENSITIVE_KEYS.has(k.toLowerCase())) {
      out[k] = '[REDACTED]';
    } else if (isObject(v)) {
      out[k] = redactObject(v);
    } else if (Array.isArray(v)) {
      out[k] = v.map((i) => (isObject(i) ? redactObject(i) : redactValue(i)));
    } else {
      out[k] = redactValue(v);
    }
  }
  return out;
}

function normalizeContext(ctx: unknown): Record<string, unknown> | undefined {
  if (ctx == null) return undefined;
  if (ctx instanceof Error) return { error: ctx.message, errorName: ctx.name };
  if (isObject(ctx)) return ctx;
  return { value: ctx };
}

function write(level: EmitLevel, msg: string, bindings: Record<string, unknown>, ctx?: unknown): void {
  if (!levelEnabled(level)) return;
  const normalized = normalizeContext(ctx);
  const payload = redactObject({
    level,
    msg,
    timestamp: new Date().toISOString(),
    ...bindings,
    ...normalized,
  });
  const line = JSON.stringify(payload);
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

export interface Logger {
  debug(msg: string, ctx?: unknown): void;
  info(msg: string, ctx?: unknown): void;
  warn(msg: string, ctx?: unknown): void;
  error(msg: string, ctx?: unknown): void;
  /** Returns a logger that stamps `bindings` on every record. */
  child(bindings: Record<string, unknown>): Logger;
}

function createLogger(bindings: Record<string, unknown>): Logger {
  return {
    debug: (msg, ctx) => write('debug', msg, bindings, ctx),
    info: (msg, ctx) => write('info', msg, bindings, ctx),
    warn: (msg, ctx) => write('warn', msg, bindings, ctx),
    error: (msg, ctx) => write('error', msg, bindings, ctx),
    child: (extra) => createLogger({ ...bindings, ...extra }),
  };
}

export const logger: Logger = createLogger({});

export type { Level };
