import { Schema } from 'effect'

// CLI-specific errors using Schema.TaggedError pattern
// ============================================

/**
 * Error for an operator argument that names no known operator
 */
export class InvalidOperatorError extends Schema.TaggedError<InvalidOperatorError>()('InvalidOperatorError', {
  operator: Schema.String,
  message: Schema.String,
}) {}

/**
 * Error for a --standard/--from/--to value that names no registered standard
 */
export class InvalidStandardError extends Schema.TaggedError<InvalidStandardError>()('InvalidStandardError', {
  value: Schema.String,
  message: Schema.String,
}) {}
