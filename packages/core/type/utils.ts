/**
 * Type helpers used throughout the packages
 */

/**
 * Represents a value that may not be present
 */
export type Optional<T = unknown> = T | undefined
