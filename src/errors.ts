import { WHEELWRIGHT_REPORT_SCHEMA_VERSION } from './reportSchema.js';

/** Stable wheel error codes. */
export type WheelErrorCode =
  | 'WHEEL_MALFORMED_METADATA'
  | 'WHEEL_MALFORMED_RECORD'
  | 'WHEEL_INVALID_FILENAME'
  | 'WHEEL_INVALID_TAG'
  | 'WHEEL_INVALID_PATH'
  | 'WHEEL_INVALID_METADATA'
  | 'WHEEL_INVALID_LAYOUT'
  | 'WHEEL_INVALID_LICENSE'
  | 'WHEEL_UNSUPPORTED_DIGEST'
  | 'WHEEL_UNSUPPORTED_VERSION'
  | 'WHEEL_FILENAME_MISMATCH'
  | 'WHEEL_ARCHIVE_CORRUPT'
  | 'WHEEL_LIMIT_EXCEEDED'
  | 'WHEEL_INTEGRITY_VIOLATION';

/** Non-fatal wheel warning codes. */
export type WheelWarningCode = 'WHEEL_NEWER_MINOR_VERSION';

/** Non-fatal warning produced while opening a wheel. */
export type WheelWarning = {
  code: string;
  message: string;
  entryName?: string;
};

/** A single difference between a RECORD manifest and the stored files. */
export type Discrepancy =
  | { kind: 'MissingFile'; path: string }
  | { kind: 'UnlistedFile'; path: string }
  | { kind: 'SizeMismatch'; path: string; expected: number; actual: number }
  | { kind: 'DigestMismatch'; path: string; algorithm: string; expected: string; actual: string };

type WheelErrorOptions = {
  entryName?: string | undefined;
  line?: number | undefined;
  context?: Record<string, string> | undefined;
  cause?: unknown;
};

const BASE_CONTEXT_SHADOW_KEYS: readonly string[] = ['schemaVersion', 'name', 'code', 'message', 'hint', 'context'];

/** Drop context keys that would collide with top-level report keys. */
export function sanitizeErrorContext(
  context: Record<string, string> | undefined,
  topLevelShadowKeys: readonly string[] = []
): Record<string, string> {
  if (!context) return {};
  const disallowed = new Set<string>([...BASE_CONTEXT_SHADOW_KEYS, ...topLevelShadowKeys]);
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (!disallowed.has(key)) sanitized[key] = value;
  }
  return sanitized;
}

/** Error thrown for wheel parsing, validation, and build failures. */
export class WheelError extends Error {
  /** Machine-readable error code. */
  readonly code: WheelErrorCode;
  /** Archive path the error relates to, if any. */
  readonly entryName?: string | undefined;
  /** 1-based line number inside the offending text document, if any. */
  readonly line?: number | undefined;
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(code: WheelErrorCode, message: string, options?: WheelErrorOptions) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'WheelError';
    this.code = code;
    this.entryName = options?.entryName;
    this.line = options?.line;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: WheelErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    line?: number;
  } {
    const topLevelShadowKeys: string[] = [];
    if (this.entryName !== undefined) topLevelShadowKeys.push('entryName');
    if (this.line !== undefined) topLevelShadowKeys.push('line');
    return {
      schemaVersion: WHEELWRIGHT_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context: sanitizeErrorContext(this.context, topLevelShadowKeys),
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.line !== undefined ? { line: this.line } : {})
    };
  }
}

/**
 * Raised when stored files disagree with the RECORD manifest.
 *
 * Carries every discrepancy found, ordered by path.
 */
export class IntegrityError extends WheelError {
  readonly discrepancies: readonly Discrepancy[];

  constructor(discrepancies: readonly Discrepancy[], options?: { context?: Record<string, string> }) {
    super('WHEEL_INTEGRITY_VIOLATION', describeDiscrepancies(discrepancies), {
      context: {
        ...options?.context,
        discrepancies: String(discrepancies.length)
      }
    });
    this.name = 'IntegrityError';
    this.discrepancies = [...discrepancies];
  }
}

/** One human-readable line per discrepancy. */
export function formatDiscrepancy(discrepancy: Discrepancy): string {
  switch (discrepancy.kind) {
    case 'MissingFile':
      return `${discrepancy.path}: listed in RECORD but not present`;
    case 'UnlistedFile':
      return `${discrepancy.path}: present but not listed in RECORD`;
    case 'SizeMismatch':
      return `${discrepancy.path}: size ${discrepancy.actual} does not match recorded ${discrepancy.expected}`;
    case 'DigestMismatch':
      return `${discrepancy.path}: ${discrepancy.algorithm} digest ${discrepancy.actual} does not match recorded ${discrepancy.expected}`;
    default: {
      const exhaustive: never = discrepancy;
      return exhaustive;
    }
  }
}

function describeDiscrepancies(discrepancies: readonly Discrepancy[]): string {
  const noun = discrepancies.length === 1 ? 'discrepancy' : 'discrepancies';
  const lines = discrepancies.map((item) => `  ${formatDiscrepancy(item)}`);
  return [`RECORD verification failed with ${discrepancies.length} ${noun}:`, ...lines].join('\n');
}
