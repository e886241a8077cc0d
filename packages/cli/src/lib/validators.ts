import {
  Algebra,
  ByteQuantity,
  type ConstructionError,
  type Operand,
  type Operator,
  type Standard,
  StandardName,
  fromName,
  readNumber,
} from '@bytewise/core'
import { Effect, Option, Schema } from 'effect'
import { InvalidOperatorError, InvalidStandardError } from '../errors.js'
import { CliConfigService } from '../services/config.js'

/**
 * CLI boundary validators.
 * Turn raw argument text into library values before any command logic runs.
 */

const operators: ReadonlyArray<Operator> = ['add', 'subtract', 'multiply', 'divide', 'floorDivide', 'modulo', 'power']

/** Validate a standard name from CLI input */
export const validateStandard = (value: string): Effect.Effect<Standard, InvalidStandardError> =>
  Schema.decodeUnknown(StandardName)(value).pipe(
    Effect.map(fromName),
    Effect.mapError(
      () =>
        new InvalidStandardError({
          value,
          message: `Unknown standard "${value}" (expected one of ${StandardName.literals.join(', ')})`,
        }),
    ),
  )

/** The standard named on the command line, or the configured default */
export const resolveStandard = (
  option: Option.Option<string>,
): Effect.Effect<Standard, InvalidStandardError, CliConfigService> =>
  Option.match(option, {
    onNone: () => Effect.map(CliConfigService, (config) => fromName(config.standard)),
    onSome: validateStandard,
  })

/** Validate a quantity string such as "1.5MiB" */
export const validateQuantity = (text: string, standard: Standard): Effect.Effect<ByteQuantity, ConstructionError> =>
  ByteQuantity.make(text, undefined, standard)

/** A calc operand: plain numbers stay numbers, anything else must be a quantity */
export const validateOperand = (text: string, standard: Standard): Effect.Effect<Operand, ConstructionError> =>
  Option.match(readNumber(text), {
    onNone: () => Effect.map(validateQuantity(text, standard), (quantity): Operand => quantity),
    onSome: (n) => Effect.succeed<Operand>(n),
  })

/** Validate an operator given by symbol ("//") or by name ("floorDivide") */
export const validateOperator = (text: string): Effect.Effect<Operator, InvalidOperatorError> => {
  const found = operators.find((op) => op === text || Algebra.operatorSymbols[op] === text)
  return found === undefined
    ? Effect.fail(
        new InvalidOperatorError({
          operator: text,
          message: `Unknown operator "${text}" (expected one of ${operators.map((op) => Algebra.operatorSymbols[op]).join(' ')})`,
        }),
      )
    : Effect.succeed(found)
}
