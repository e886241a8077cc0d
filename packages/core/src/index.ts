// @bytewise/core - byte quantities under the decimal, binary and legacy standards

// Errors
export * from './errors/index.js'

// Standards and parsing
export * from './standard/Standard.js'
export * from './parse/parse.js'

// Quantities
export * from './quantity/ByteQuantity.js'
export * from './quantity/schema.js'
export * from './format/format.js'

// Arithmetic and comparison
export * as Algebra from './algebra/algebra.js'
export type { Operand, Operator } from './algebra/algebra.js'
