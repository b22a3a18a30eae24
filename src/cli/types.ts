import { z } from 'zod';
import { isSeqProbeError } from '../core/errors';
import { createLogger, serializeError } from '../core/log';

/**
 * Successful command output. Printed to stdout as JSON, or as `textOutput`
 * verbatim when a handler renders for humans.
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  textOutput?: string;
  [key: string]: unknown;
}

/**
 * Failed command output, printed to stderr. `reason` is the stable code
 * scripts branch on; `hint` says what to change.
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/**
 * A handler bound to the schema that validates its raw Commander options.
 */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function defineHandler<TInput>(
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>
): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

/** 0 on success, 2 for a handled failure, 1 for bad arguments or a crash. */
export const ExitCodes = {
  OK: 0,
  INTERNAL: 1,
  HANDLED: 2,
} as const;

interface RunMeta {
  command: string;
  timestamp: string;
  duration_ms: number;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v), 2);
}

function emitResult(result: CLIResult | CLIError, meta: RunMeta): number {
  if (!result.ok) {
    process.stderr.write(`${toJson({ ...result, ...meta })}\n`);
    return ExitCodes.HANDLED;
  }
  if (typeof result.textOutput === 'string') {
    console.log(result.textOutput);
  } else {
    console.log(toJson({ ...result, ...meta }));
  }
  return ExitCodes.OK;
}

function validationFailure(e: z.ZodError, meta: RunMeta): CLIError {
  return error(ErrorReasons.VALIDATION_ERROR, {
    message: 'Invalid command arguments',
    ...meta,
    errors: e.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message, code: issue.code })),
    hint: ErrorHints.VALIDATION_ERROR,
  });
}

/**
 * Look up the handler registered under `commandKey`, run it on the raw
 * Commander input and exit with the matching code.
 *
 * ```typescript
 * .action(async (terms, options) => {
 *   await executeHandler('probe', { terms, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry.js');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();
  const meta = (): RunMeta => ({ command: commandKey, timestamp, duration_ms: Date.now() - startedAt });

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(toJson(error(ErrorReasons.UNKNOWN_COMMAND, {
      command: commandKey,
      timestamp,
      hint: 'Run "seqprobe --help" to see available commands',
    })));
    process.exit(ExitCodes.INTERNAL);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  let exitCode: number;
  try {
    exitCode = emitResult(await handler.run(rawInput), meta());
  } catch (e) {
    if (e instanceof z.ZodError) {
      console.error(toJson(validationFailure(e, meta())));
    } else {
      log.error(commandKey, { ok: false, err: serializeError(e) });
      console.error(toJson(error(ErrorReasons.INTERNAL_ERROR, {
        message: e instanceof Error ? e.message : String(e),
        ...meta(),
        hint: 'An unexpected error occurred. Check logs for details.',
      })));
    }
    exitCode = ExitCodes.INTERNAL;
  }
  process.exit(exitCode);
}

export function success(data: Record<string, unknown>): CLIResult {
  return { ok: true, ...data };
}

export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return { ok: false, reason, ...details };
}

const HINT_BY_CODE: Record<string, string> = {
  parse_error: 'Terms must be base-10 integers separated by commas or spaces, e.g. "1,2,3,6,11,23"',
  config_error: 'Check --max-hits, --min-match-len and that at least one source is enabled',
  provider_error: 'Retry later, or use --no-online with --offline-stripped',
  offline_index_failed: 'Check the --offline-stripped path; plain and .gz dumps are accepted',
};

/**
 * Turn an error raised on purpose into a CLIError carrying its code.
 * Anything else is rethrown and reported as internal.
 */
export function errorFromException(e: unknown): CLIError {
  if (!isSeqProbeError(e)) throw e;
  const hint = HINT_BY_CODE[e.code];
  return error(e.code, {
    message: e.message,
    ...(e.context ? { details: e.context } : {}),
    ...(hint ? { hint } : {}),
  });
}

export const ErrorReasons = {
  UNKNOWN_COMMAND: 'unknown_command',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  PARSE_ERROR: 'parse_error',
  CONFIG_ERROR: 'config_error',
  PROVIDER_ERROR: 'provider_error',
  OFFLINE_INDEX_FAILED: 'offline_index_failed',
  MISSING_TERMS: 'missing_terms',
} as const;

export const ErrorHints = {
  VALIDATION_ERROR: 'Check command syntax with --help',
  MISSING_TERMS: 'Provide TERMS or --terms-file',
} as const;
