/**
 * Error Classification and Structured Error Handling
 *
 * Search failures are classified into categories that decide how they are
 * logged and whether they surface to the caller. Only invalid requests
 * propagate out of a search; everything else is absorbed per provider or
 * per offer.
 */

import { ZodError, type ZodIssue } from 'zod'

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'validation' // Caller sent an invalid request or config
  | 'timeout' // A provider or rate service exceeded its budget
  | 'external' // Provider / rate service / network failure
  | 'data' // Unparseable price, unknown currency, malformed offer
  | 'internal' // Unexpected bug

/**
 * Structured error information for logging
 */
export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isRetryable: boolean
  details?: Record<string, unknown>
  originalError?: Error
}

export const ERROR_CODES = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  INVALID_CONFIG: 'INVALID_CONFIG',
  PROVIDER_TIMEOUT: 'PROVIDER_TIMEOUT',
  PROVIDER_FAILED: 'PROVIDER_FAILED',
  PROVIDER_REGISTRATION: 'PROVIDER_REGISTRATION',
  NETWORK_ERROR: 'NETWORK_ERROR',
  OPERATION_TIMEOUT: 'OPERATION_TIMEOUT',
  PRICE_UNPARSEABLE: 'PRICE_UNPARSEABLE',
  CURRENCY_CONVERSION_FAILED: 'CURRENCY_CONVERSION_FAILED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Base class for errors raised by this package.
 */
export abstract class SearchError extends Error {
  abstract readonly code: ErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export interface RequestIssue {
  path: string
  message: string
}

function toRequestIssues(issues: ZodIssue[]): RequestIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/**
 * The one failure a caller of `search` can observe.
 */
export class InvalidSearchRequestError extends SearchError {
  readonly code = ERROR_CODES.INVALID_REQUEST
  readonly issues: RequestIssue[]

  constructor(issues: RequestIssue[]) {
    super(`Invalid search request: ${issues.map((i) => `${i.path || 'request'}: ${i.message}`).join('; ')}`)
    this.issues = issues
  }

  static fromZod(error: ZodError): InvalidSearchRequestError {
    return new InvalidSearchRequestError(toRequestIssues(error.issues))
  }
}

export class ConfigError extends SearchError {
  readonly code = ERROR_CODES.INVALID_CONFIG
  readonly issues: RequestIssue[]

  constructor(issues: RequestIssue[]) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`)
    this.issues = issues
  }

  static fromZod(error: ZodError): ConfigError {
    return new ConfigError(toRequestIssues(error.issues))
  }
}

export class ProviderTimeoutError extends SearchError {
  readonly code = ERROR_CODES.PROVIDER_TIMEOUT

  constructor(
    readonly provider: string,
    readonly timeoutMs: number
  ) {
    super(`Provider '${provider}' timed out after ${timeoutMs}ms`)
  }
}

export class ProviderFetchError extends SearchError {
  readonly code = ERROR_CODES.PROVIDER_FAILED
  readonly statusCode?: number

  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(`Provider '${provider}' failed: ${message}`, { cause: options?.cause })
    this.statusCode = options?.statusCode
  }
}

export class ProviderRegistrationError extends SearchError {
  readonly code = ERROR_CODES.PROVIDER_REGISTRATION
}

export class PriceParseError extends SearchError {
  readonly code = ERROR_CODES.PRICE_UNPARSEABLE

  constructor(readonly rawPrice: string) {
    super(`Could not parse price '${rawPrice}'`)
  }
}

export class CurrencyConversionError extends SearchError {
  readonly code = ERROR_CODES.CURRENCY_CONVERSION_FAILED

  constructor(
    readonly from: string,
    readonly to: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot convert ${from} to ${to}: ${reason}`, options)
  }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
])

function readErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Classify an error into a structured format
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ZodError) {
    return {
      category: 'validation',
      code: ERROR_CODES.INVALID_REQUEST,
      message: 'Validation failed',
      isRetryable: false,
      details: { issues: toRequestIssues(error.issues) },
      originalError: error,
    }
  }

  if (error instanceof InvalidSearchRequestError || error instanceof ConfigError) {
    return {
      category: 'validation',
      code: error.code,
      message: error.message,
      isRetryable: false,
      details: { issues: error.issues },
      originalError: error,
    }
  }

  if (error instanceof ProviderTimeoutError) {
    return {
      category: 'timeout',
      code: error.code,
      message: error.message,
      isRetryable: true,
      details: { provider: error.provider, timeoutMs: error.timeoutMs },
      originalError: error,
    }
  }

  if (error instanceof PriceParseError || error instanceof CurrencyConversionError) {
    return {
      category: 'data',
      code: error.code,
      message: error.message,
      isRetryable: false,
      originalError: error,
    }
  }

  if (error instanceof ProviderFetchError) {
    return {
      category: 'external',
      code: error.code,
      message: error.message,
      isRetryable: true,
      details: { provider: error.provider, statusCode: error.statusCode },
      originalError: error,
    }
  }

  if (error instanceof Error) {
    const errorCode = readErrorCode(error)
    if (errorCode && NETWORK_ERROR_CODES.has(errorCode)) {
      const isTimeout = errorCode === 'ETIMEDOUT'
      return {
        category: isTimeout ? 'timeout' : 'external',
        code: isTimeout ? ERROR_CODES.OPERATION_TIMEOUT : ERROR_CODES.NETWORK_ERROR,
        message: `Network error: ${errorCode}`,
        isRetryable: true,
        details: { errorCode },
        originalError: error,
      }
    }

    const lowered = error.message.toLowerCase()
    if (error.name === 'AbortError' || lowered.includes('timeout') || lowered.includes('timed out')) {
      return {
        category: 'timeout',
        code: ERROR_CODES.OPERATION_TIMEOUT,
        message: error.message,
        isRetryable: true,
        originalError: error,
      }
    }

    return {
      category: 'internal',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
      originalError: error,
    }
  }

  return {
    category: 'internal',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}

/**
 * Format a classified error for logging
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_retryable: classified.isRetryable,
    ...(classified.details && { error_details: classified.details }),
    ...(classified.originalError && {
      error_name: classified.originalError.name,
    }),
  }
}
