import type { Optional } from "./type/utils"

/**
 * Error raised when a resource (a lock, a connection) could not be obtained in
 * the time allowed
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number

  constructor(message: string, timeoutMs: number, options?: ErrorOptions) {
    super(message, options)
    this.name = "TimeoutError"
    this.timeoutMs = timeoutMs
  }
}

/**
 * Type guard for {@link TimeoutError}
 *
 * @param error The error to inspect
 * @returns True if the error is a {@link TimeoutError}
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError
}

/**
 * Try to extract the message field of the error
 *
 * @param error The error object to extract from
 * @returns The error message if it exists or undefined
 */
export function getErrorMessage(error: unknown): Optional<string> {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message
  }

  return
}

/**
 * Try to extract the `code` field some errors (node, pg) carry
 *
 * @param error The error object to extract from
 * @returns The code if it is a string or undefined
 */
export function getErrorCode(error: unknown): Optional<string> {
  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code
  }

  return
}
