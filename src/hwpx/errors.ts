/**
 * HWPX Error Handling
 *
 * Centralised error class and async error-wrapping utility.
 *
 * @module hwpx/errors
 */

export class HwpxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HwpxError';
    Error.captureStackTrace?.(this, HwpxError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export enum HwpxErrorCode {
  // configuration
  CONFIG_INVALID = 'CONFIG_INVALID',
  // model consistency
  DANGLING_REFERENCE = 'DANGLING_REFERENCE',
  TABLE_GRID_MISMATCH = 'TABLE_GRID_MISMATCH',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  // serialization
  UNKNOWN_BLOCK_KIND = 'UNKNOWN_BLOCK_KIND',
  UNKNOWN_RUN_KIND = 'UNKNOWN_RUN_KIND',
  // I/O and packaging
  INPUT_READ_FAILED = 'INPUT_READ_FAILED',
  IMAGE_READ_FAILED = 'IMAGE_READ_FAILED',
  PACKAGE_FAILED = 'PACKAGE_FAILED',
  UNSAFE_ENTRY_PATH = 'UNSAFE_ENTRY_PATH',
  MALFORMED_XML = 'MALFORMED_XML',
}

/** Wrap an async operation: re-throws existing HwpxErrors, wraps everything else. */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  errorCode: HwpxErrorCode | string,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof HwpxError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new HwpxError(message, errorCode, {
      ...context,
      originalError: error instanceof Error ? error.stack : String(error),
    });
  }
}

/** Fatal defect for a discriminated-union member no branch handled. */
export function unreachable(value: never, code: HwpxErrorCode, what: string): never {
  const received: unknown = value;
  const kind =
    typeof received === 'object' && received !== null && 'kind' in received
      ? String(received.kind)
      : String(received);
  throw new HwpxError(`Unrecognized ${what}: ${kind}`, code, { kind });
}
