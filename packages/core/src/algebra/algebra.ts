import { Either, Equal, Order } from 'effect'
import { dual } from 'effect/Function'
import { type AlgebraError, DivisionByZeroError, OverflowError, TypeMismatchError } from '../errors/index.js'
import { type ByteQuantity, isByteQuantity, withMagnitude } from '../quantity/ByteQuantity.js'

// ============================================
// Types
// ============================================

export type Operator = 'add' | 'subtract' | 'multiply' | 'divide' | 'floorDivide' | 'modulo' | 'power'

/** A plain number is read as already expressed in the other operand's unit */
export type Operand = ByteQuantity | number

type Result = Either.Either<ByteQuantity, AlgebraError>

type BinaryOperation = {
  (that: Operand): (self: ByteQuantity) => Result
  (self: ByteQuantity, that: Operand): Result
}

type Comparison<A> = {
  (that: ByteQuantity): (self: ByteQuantity) => Either.Either<A, TypeMismatchError>
  (self: ByteQuantity, that: ByteQuantity): Either.Either<A, TypeMismatchError>
}

export const operatorSymbols: Record<Operator, string> = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
  floorDivide: '//',
  modulo: '%',
  power: '**',
}

// Modulo takes the sign of the divisor
const floorMod = (a: number, b: number): number => {
  const r = a % b
  return r !== 0 && (r < 0) !== (b < 0) ? r + b : r
}

// Floor of the quotient of a - (a mod b), so 1 // 0.1 is 9 where Math.floor(1 / 0.1) is 10
const floorDiv = (a: number, b: number): number => {
  const mod = a % b
  let quotient = (a - mod) / b
  if (mod !== 0 && (mod < 0) !== (b < 0)) quotient -= 1
  const floored = Math.floor(quotient)
  return quotient - floored > 0.5 ? floored + 1 : floored
}

const compute: Record<Operator, (a: number, b: number) => number> = {
  add: (a, b) => a + b,
  subtract: (a, b) => a - b,
  multiply: (a, b) => a * b,
  divide: (a, b) => a / b,
  floorDivide: floorDiv,
  modulo: floorMod,
  power: (a, b) => a ** b,
}

const describe = (operand: unknown): string => {
  if (isByteQuantity(operand)) return `${operand.toString()} (${operand.standard.name})`
  if (typeof operand === 'number') return String(operand)
  return typeof operand
}

const mismatch = (operation: string, left: unknown, right: unknown, reason: string): TypeMismatchError =>
  new TypeMismatchError({
    operation,
    left: describe(left),
    right: describe(right),
    message: `unsupported operands for ${operation}: '${describe(left)}' and '${describe(right)}' (${reason})`,
  })

// ============================================
// Operand resolution
// ============================================

/** `that` in bytes, rescaled to the exponent of `self` */
const rescale = (operation: string, self: ByteQuantity, that: ByteQuantity): Either.Either<number, TypeMismatchError> =>
  Equal.equals(self.standard, that.standard)
    ? Either.right(that.byteEquivalent / self.exponent)
    : Either.left(mismatch(operation, self, that, 'different standards'))

const finiteNumber = (
  operation: string,
  left: unknown,
  right: unknown,
  value: number,
): Either.Either<number, TypeMismatchError> =>
  Number.isFinite(value) ? Either.right(value) : Either.left(mismatch(operation, left, right, 'not a finite number'))

/**
 * Apply `op` to two plain magnitudes and wrap the result in the unit and
 * standard of `carrier`.
 */
const finish = (op: Operator, carrier: ByteQuantity, a: number, b: number): Result => {
  const symbol = operatorSymbols[op]
  const dividesByZero =
    ((op === 'divide' || op === 'floorDivide' || op === 'modulo') && b === 0) || (op === 'power' && a === 0 && b < 0)
  if (dividesByZero) {
    return Either.left(new DivisionByZeroError({ operation: symbol, message: `${a} ${symbol} ${b}: division by zero` }))
  }
  const magnitude = compute[op](a, b)
  if (Number.isNaN(magnitude)) {
    return Either.left(
      new TypeMismatchError({
        operation: symbol,
        left: String(a),
        right: String(b),
        message: `${a} ${symbol} ${b} is not a real number`,
      }),
    )
  }
  if (!Number.isFinite(magnitude)) {
    return Either.left(new OverflowError({ input: `${a} ${symbol} ${b}`, message: `<${a} ${symbol} ${b}> is too big!` }))
  }
  return Either.right(withMagnitude(carrier, magnitude))
}

const forward = (op: Operator, self: ByteQuantity, that: unknown): Result => {
  const symbol = operatorSymbols[op]
  if (isByteQuantity(that)) {
    return Either.flatMap(rescale(symbol, self, that), (b) => finish(op, self, self.magnitude, b))
  }
  if (typeof that === 'number') {
    return Either.flatMap(finiteNumber(symbol, self, that, that), (b) => finish(op, self, self.magnitude, b))
  }
  return Either.left(mismatch(symbol, self, that, 'not a quantity or a number'))
}

/**
 * Apply an operator whatever side the quantity is on.
 *
 * - quantity on the left: the result keeps its unit and standard; a quantity
 *   on the right must share the standard and is rescaled to the left unit
 * - number on the left, quantity on the right: `left op right.magnitude`, in
 *   the unit and standard of the right operand
 * - anything else is a TypeMismatchError
 */
export const applyOperator = (op: Operator, left: Operand, right: Operand): Result => {
  if (isByteQuantity(left)) {
    return forward(op, left, right)
  }
  const symbol = operatorSymbols[op]
  if (typeof left === 'number' && isByteQuantity(right)) {
    const carrier = right
    return Either.flatMap(finiteNumber(symbol, left, right, left), (a) => finish(op, carrier, a, carrier.magnitude))
  }
  return Either.left(mismatch(symbol, left, right, 'no quantity operand'))
}

const binary = (op: Operator): BinaryOperation =>
  dual(2, (self: ByteQuantity, that: Operand): Result => forward(op, self, that))

export const add: BinaryOperation = binary('add')
export const subtract: BinaryOperation = binary('subtract')
export const multiply: BinaryOperation = binary('multiply')
/** Real division */
export const divide: BinaryOperation = binary('divide')
/** Division rounded toward negative infinity */
export const floorDivide: BinaryOperation = binary('floorDivide')
export const modulo: BinaryOperation = binary('modulo')
export const power: BinaryOperation = binary('power')

/** Sum of quantities, in the unit and standard of the first one */
export const sum = (quantities: ReadonlyArray<ByteQuantity>): Result => {
  const [first, ...rest] = quantities
  if (first === undefined) {
    return Either.left(
      new TypeMismatchError({ operation: 'sum', left: 'nothing', right: 'nothing', message: 'cannot sum no quantities' }),
    )
  }
  return rest.reduce<Result>((acc, quantity) => Either.flatMap(acc, (total) => add(total, quantity)), Either.right(first))
}

// ============================================
// Unary operations
// ============================================

export const negate = (self: ByteQuantity): ByteQuantity => withMagnitude(self, -self.magnitude)

export const absolute = (self: ByteQuantity): ByteQuantity => withMagnitude(self, Math.abs(self.magnitude))

export const floor = (self: ByteQuantity): ByteQuantity => withMagnitude(self, Math.floor(self.magnitude))

export const ceil = (self: ByteQuantity): ByteQuantity => withMagnitude(self, Math.ceil(self.magnitude))

export const truncate = (self: ByteQuantity): ByteQuantity => withMagnitude(self, Math.trunc(self.magnitude))

/** Round the magnitude to `digits` decimals, halves to even */
export const round = (self: ByteQuantity, digits = 0): ByteQuantity => {
  const factor = 10 ** digits
  if (factor === 0) return withMagnitude(self, 0)
  const scaled = self.magnitude * factor
  // Past the double's precision there are no digits left to drop
  if (!Number.isFinite(scaled)) return withMagnitude(self, self.magnitude)
  const rounded = Math.abs(scaled % 1) === 0.5 ? 2 * Math.round(scaled / 2) : Math.round(scaled)
  return withMagnitude(self, rounded / factor)
}

// ============================================
// Comparison
// ============================================

const byteOrder = (
  operation: string,
  self: ByteQuantity,
  that: unknown,
): Either.Either<-1 | 0 | 1, TypeMismatchError> => {
  if (!isByteQuantity(that)) {
    return Either.left(mismatch(operation, self, that, 'not a quantity'))
  }
  if (!Equal.equals(self.standard, that.standard)) {
    return Either.left(mismatch(operation, self, that, 'different standards'))
  }
  return Either.right(Order.number(self.byteEquivalent, that.byteEquivalent))
}

const comparison = <A>(operation: string, f: (order: -1 | 0 | 1) => A): Comparison<A> =>
  dual(2, (self: ByteQuantity, that: ByteQuantity) => Either.map(byteOrder(operation, self, that), f))

export const compare: Comparison<-1 | 0 | 1> = comparison('compare', (order) => order)
export const lessThan: Comparison<boolean> = comparison('<', (order) => order < 0)
export const lessThanOrEqualTo: Comparison<boolean> = comparison('<=', (order) => order <= 0)
export const greaterThan: Comparison<boolean> = comparison('>', (order) => order > 0)
export const greaterThanOrEqualTo: Comparison<boolean> = comparison('>=', (order) => order >= 0)

/** Same standard and same byte equivalent; false for anything else */
export const equals = (self: ByteQuantity, that: unknown): boolean => Equal.equals(self, that)

export const notEquals = (self: ByteQuantity, that: unknown): boolean => !equals(self, that)
