import { sanitizeErrorContext } from '../errors.js';
import { WHEELWRIGHT_REPORT_SCHEMA_VERSION } from '../reportSchema.js';

/** Stable ZIP container error codes. */
export type ZipErrorCode =
  | 'ZIP_EOCD_NOT_FOUND'
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_NAME_COLLISION'
  | 'ZIP_UNSUPPORTED_METHOD'
  | 'ZIP_UNSUPPORTED_FEATURE'
  | 'ZIP_UNSUPPORTED_ENCRYPTION'
  | 'ZIP_BAD_DATA'
  | 'ZIP_BAD_CRC'
  | 'ZIP_ZIP64_REQUIRED'
  | 'ZIP_LIMIT_EXCEEDED'
  | 'ZIP_TRUNCATED'
  | 'ZIP_INVALID_SIGNATURE'
  | 'ZIP_INVALID_NAME';

/** Error thrown for ZIP parsing, validation, and write failures. */
export class ZipError extends Error {
  /** Machine-readable error code. */
  readonly code: ZipErrorCode;
  /** Entry name related to the error, if available. */
  readonly entryName?: string | undefined;
  /** Compression method related to the error, if available. */
  readonly method?: number | undefined;
  /** Offset (in bytes) related to the error, if available. */
  readonly offset?: number | undefined;
  override readonly cause?: unknown;
  /** Additional context for serialization. */
  readonly context?: Record<string, string> | undefined;

  constructor(
    code: ZipErrorCode,
    message: string,
    options?: {
      entryName?: string | undefined;
      method?: number | undefined;
      offset?: number | undefined;
      context?: Record<string, string> | undefined;
      cause?: unknown;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ZipError';
    this.code = code;
    this.entryName = options?.entryName;
    this.method = options?.method;
    this.offset = options?.offset;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization with schemaVersion "1". */
  toJSON(): {
    schemaVersion: string;
    name: string;
    code: ZipErrorCode;
    message: string;
    hint: string;
    context: Record<string, string>;
    entryName?: string;
    method?: number;
    offset?: number;
  } {
    const topLevelShadowKeys: string[] = [];
    if (this.entryName !== undefined) topLevelShadowKeys.push('entryName');
    if (this.method !== undefined) topLevelShadowKeys.push('method');
    if (this.offset !== undefined) topLevelShadowKeys.push('offset');
    return {
      schemaVersion: WHEELWRIGHT_REPORT_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context: sanitizeErrorContext(this.context, topLevelShadowKeys),
      ...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
      ...(this.method !== undefined ? { method: this.method } : {}),
      ...(this.offset !== undefined ? { offset: this.offset } : {})
    };
  }
}

/** Non-fatal ZIP warning codes. */
export type ZipWarningCode =
  | 'ZIP_MULTIPLE_EOCD'
  | 'ZIP_BAD_EOCD'
  | 'ZIP_BAD_CENTRAL_DIRECTORY'
  | 'ZIP_BAD_CRC'
  | 'ZIP_INVALID_ENCODING';

/** Non-fatal warning produced while parsing ZIP structures. */
export type ZipWarning = {
  code: ZipWarningCode;
  message: string;
  entryName?: string;
};
