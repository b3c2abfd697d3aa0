import type { Optional } from "./type/utils.js"

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
 * Try to extract the `code` field that node and most drivers attach to errors
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

/**
 * Render anything that was thrown as a message suitable for a report
 *
 * @param error The thrown value
 * @returns The message or the string form of the value
 */
export function describeError(error: unknown): string {
  return getErrorMessage(error) ?? String(error)
}
