import type { SourceKind } from './matching/types';

/**
 * Base class for every error the probe raises on purpose.
 *
 * `code` is the machine-readable reason surfaced by the CLI.
 */
export class SeqProbeError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'SeqProbeError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Malformed query text or identifier. Fatal, never retried.
 */
export class ParseError extends SeqProbeError {
  public readonly token?: string;

  constructor(message: string, token?: string) {
    super(message, 'parse_error', token === undefined ? undefined : { token });
    this.name = 'ParseError';
    this.token = token;
  }
}

/**
 * Invalid combination of tunables, rejected before any provider is invoked.
 */
export class ConfigError extends SeqProbeError {
  public readonly option: string;

  constructor(option: string, message: string, value?: unknown) {
    super(message, 'config_error', { option, value });
    this.name = 'ConfigError';
    this.option = option;
  }
}

export type ProviderErrorKind = 'network' | 'rate_limited' | 'malformed';

/**
 * A candidate source failed. The pipeline degrades this to "no candidates"
 * unless strict provider failures were requested.
 */
export class ProviderError extends SeqProbeError {
  public readonly kind: ProviderErrorKind;
  public readonly source: SourceKind;

  constructor(source: SourceKind, kind: ProviderErrorKind, message: string, context?: Record<string, unknown>) {
    super(message, 'provider_error', { source, kind, ...context });
    this.name = 'ProviderError';
    this.kind = kind;
    this.source = source;
  }
}

export function isSeqProbeError(e: unknown): e is SeqProbeError {
  return e instanceof SeqProbeError;
}

/**
 * The offline dump could not be read. Raised while loading, before the
 * engine runs.
 */
export class OfflineIndexError extends SeqProbeError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(message, 'offline_index_failed', { path });
    this.name = 'OfflineIndexError';
    this.path = path;
  }
}
