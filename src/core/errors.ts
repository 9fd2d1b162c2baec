/**
 * Structured error codes and helpers for consistent failure reporting
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - VALIDATION: Operator input errors (fatal, raised before any network work)
 * - CONFIG: Configuration file errors (fatal)
 * - LOOKUP: Registration lookup errors (absorbed per candidate)
 * - OUTPUT: Report destination errors (fatal)
 */

export const ErrorCode = {
  // Validation
  VALIDATION_INVALID_DOMAIN: 'VALIDATION_INVALID_DOMAIN',
  VALIDATION_INVALID_OPTION: 'VALIDATION_INVALID_OPTION',

  // Configuration
  CONFIG_INVALID_DICTIONARY: 'CONFIG_INVALID_DICTIONARY',

  // Lookup
  LOOKUP_REQUEST_INVALID: 'LOOKUP_REQUEST_INVALID',
  LOOKUP_FAILED: 'LOOKUP_FAILED',
  LOOKUP_NOT_FOUND: 'LOOKUP_NOT_FOUND',
  LOOKUP_PARSE_FAILED: 'LOOKUP_PARSE_FAILED',

  // Output
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Error carrying a stable code and optional structured details
 */
export class LookalikeError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'LookalikeError';
    this.code = code;
    this.details = options?.details;
  }
}

export function isLookalikeError(err: unknown, code?: ErrorCodeType): err is LookalikeError {
  return err instanceof LookalikeError && (code === undefined || err.code === code);
}

/**
 * Common errors
 */
export const Errors = {
  invalidDomain: (input: string) =>
    new LookalikeError(ErrorCode.VALIDATION_INVALID_DOMAIN, `could not parse ${input}`, {
      details: { input },
    }),

  invalidOption: (option: string, expected: string) =>
    new LookalikeError(ErrorCode.VALIDATION_INVALID_OPTION, `Invalid ${option}. ${expected}`, {
      details: { option, expected },
    }),

  invalidDictionary: (source: string, reason: string, cause?: unknown) =>
    new LookalikeError(ErrorCode.CONFIG_INVALID_DICTIONARY, `Invalid dictionary ${source}: ${reason}`, {
      details: { source },
      cause,
    }),

  lookupRequestInvalid: (domain: string) =>
    new LookalikeError(ErrorCode.LOOKUP_REQUEST_INVALID, `Cannot build whois request for '${domain}'`, {
      details: { domain },
    }),

  lookupFailed: (domain: string, cause?: unknown) =>
    new LookalikeError(ErrorCode.LOOKUP_FAILED, `Whois lookup failed for ${domain}`, {
      details: { domain },
      cause,
    }),

  lookupNotFound: () =>
    new LookalikeError(ErrorCode.LOOKUP_NOT_FOUND, 'Whois response reports no matching domain'),

  lookupParseFailed: (reason: string) =>
    new LookalikeError(ErrorCode.LOOKUP_PARSE_FAILED, `Whois response could not be parsed: ${reason}`),

  outputWriteFailed: (path: string, cause?: unknown) =>
    new LookalikeError(ErrorCode.OUTPUT_WRITE_FAILED, `error writing ${path}`, {
      details: { path },
      cause,
    }),
} as const;
