export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;
export type LogSink = (line: string) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SILENT_VALUES = new Set(['silent', 'off', 'none', '0']);

/**
 * SEQPROBE_LOG_LEVEL, then LOG_LEVEL. `null` means silent; anything
 * unrecognized falls back to info.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | null {
  const raw = String(env.SEQPROBE_LOG_LEVEL ?? env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (SILENT_VALUES.has(raw)) return null;
  return raw === 'debug' || raw === 'warn' || raw === 'error' ? raw : 'info';
}

export function serializeError(e: unknown): { name?: string; message?: string; code?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (!(e instanceof Error)) return { message: String(e) };
  const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
  return { name: e.name, message: e.message, ...(code ? { code } : {}), stack: e.stack };
}

// Query terms are bigints, which JSON.stringify rejects.
function encodeRecord(rec: LogFields): string {
  return JSON.stringify(rec, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
  /** Runs `fn` and logs one record with its outcome and duration. */
  span<T>(name: string, fields: LogFields, fn: () => Promise<T>): Promise<T>;
}

export interface LoggerOptions {
  /** Defaults to the level from the environment; `null` silences the logger. */
  level?: LogLevel | null;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * JSON-lines logger on stderr, so stdout stays reserved for command output.
 */
export function createLogger(baseFields: LogFields = {}, options: LoggerOptions = {}): Logger {
  const level = options.level !== undefined ? options.level : resolveLogLevel();
  const threshold = level ? LEVEL_RANK[level] : Infinity;
  const sink = options.sink ?? stderrSink;

  const emit = (lvl: LogLevel, msg: string, fields?: LogFields) => {
    if (LEVEL_RANK[lvl] < threshold) return;
    sink(encodeRecord({ ts: new Date().toISOString(), level: lvl, msg, ...baseFields, ...fields }));
  };

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }, { level, sink }),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        emit('info', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        emit('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };
}
