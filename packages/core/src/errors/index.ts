import { Schema } from 'effect'

// ============================================
// Configuration Errors
// ============================================

/** What a ConfigurationError rejected */
export const ConfigurationErrorKind = Schema.Literal('standard', 'unit', 'ambiguous-unit')
export type ConfigurationErrorKind = typeof ConfigurationErrorKind.Type

/**
 * Unknown standard or unit symbol, or a text value carrying a unit suffix
 * while a unit was also passed explicitly.
 */
export class ConfigurationError extends Schema.TaggedError<ConfigurationError>()('ConfigurationError', {
  kind: ConfigurationErrorKind,
  value: Schema.String,
  message: Schema.String,
}) {}

// ============================================
// Parse Errors
// ============================================

/**
 * Text that matches no numeric/suffix pattern.
 * `fragment` is the part that failed to read as a number.
 */
export class ParseError extends Schema.TaggedError<ParseError>()('ParseError', {
  input: Schema.String,
  fragment: Schema.String,
  message: Schema.String,
}) {}

/**
 * A value that does not fit in a finite number.
 */
export class OverflowError extends Schema.TaggedError<OverflowError>()('OverflowError', {
  input: Schema.String,
  message: Schema.String,
}) {}

// ============================================
// Algebra Errors
// ============================================

export class TypeMismatchError extends Schema.TaggedError<TypeMismatchError>()('TypeMismatchError', {
  operation: Schema.String,
  left: Schema.String,
  right: Schema.String,
  message: Schema.String,
}) {}

export class DivisionByZeroError extends Schema.TaggedError<DivisionByZeroError>()('DivisionByZeroError', {
  operation: Schema.String,
  message: Schema.String,
}) {}

// ============================================
// Union Types for Convenience
// ============================================

export const ParseFailure = Schema.Union(ParseError, OverflowError)
export type ParseFailure = typeof ParseFailure.Type

export const ConstructionError = Schema.Union(ConfigurationError, ParseError, OverflowError)
export type ConstructionError = typeof ConstructionError.Type

export const AlgebraError = Schema.Union(TypeMismatchError, OverflowError, DivisionByZeroError)
export type AlgebraError = typeof AlgebraError.Type

export const QuantityError = Schema.Union(
  ConfigurationError,
  ParseError,
  OverflowError,
  TypeMismatchError,
  DivisionByZeroError,
)
export type QuantityError = typeof QuantityError.Type
