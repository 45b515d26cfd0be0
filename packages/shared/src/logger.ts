import pino from 'pino';

const REDACTED_KEYS = new Set([
  'password',
  'passwordhash',
  'token',
  'accesstoken',
  'refreshtoken',
  'secret',
  'email',
  'ip',
  'ipaddress',
  'remoteaddress',
  'deviceinfo',
  'invitecode',
  'authorization',
  'cookie',
  'content',
  'body',
]);

function isRedactedKey(key: string): boolean {
  return REDACTED_KEYS.has(key.toLowerCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

export function sanitize(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isRedactedKey(key)) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = sanitize(value);
    } else if (Array.isArray(value)) {
      result[key] = value.map((item) => (isPlainObject(item) ? sanitize(item) : item));
    } else {
      result[key] = value;
    }
  }
  return result;
}

export interface SafeLogger {
  info(meta: Record<string, unknown>, msg: string): void;
  warn(meta: Record<string, unknown>, msg: string): void;
  error(meta: Record<string, unknown>, msg: string): void;
  debug(meta: Record<string, unknown>, msg: string): void;
  fatal(meta: Record<string, unknown>, msg: string): void;
  child(bindings: Record<string, unknown>): SafeLogger;
}

function wrapPino(logger: pino.Logger): SafeLogger {
  return {
    info(meta, msg) {
      logger.info(sanitize(meta), msg);
    },
    warn(meta, msg) {
      logger.warn(sanitize(meta), msg);
    },
    error(meta, msg) {
      logger.error(sanitize(meta), msg);
    },
    debug(meta, msg) {
      logger.debug(sanitize(meta), msg);
    },
    fatal(meta, msg) {
      logger.fatal(sanitize(meta), msg);
    },
    child(bindings) {
      return wrapPino(logger.child(sanitize(bindings)));
    },
  };
}

export function createLogger(opts: { name: string; level?: string }): SafeLogger {
  const pinoInstance = pino({
    name: opts.name,
    level: opts.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  return wrapPino(pinoInstance);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
