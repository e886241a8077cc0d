/**
 * Calc command. Applies one arithmetic operator to two operands.
 *
 * Usage: bytewise calc 1GiB / 256MiB
 *        bytewise calc 2 '*' 3TiB
 */
import { Args, Command } from '@effect/cli'
import { type AlgebraError, Algebra, type Operand, type Operator, isByteQuantity } from '@bytewise/core'
import { Effect } from 'effect'
import { CalcDisplay, type CalcRow } from '../lib/display-schemas.js'
import { formatOption, standardOption } from '../lib/options.js'
import { error, output } from '../lib/output.js'
import { resolveStandard, validateOperand, validateOperator } from '../lib/validators.js'

const leftArg = Args.text({ name: 'left' }).pipe(Args.withDescription('Quantity or number'))
const operatorArg = Args.text({ name: 'operator' }).pipe(Args.withDescription('One of + - * / // % ** (quote * and **)'))
const rightArg = Args.text({ name: 'right' }).pipe(Args.withDescription('Quantity or number'))

const describeOperand = (operand: Operand): string => (isByteQuantity(operand) ? operand.toString() : String(operand))

export const calculate = (op: Operator, left: Operand, right: Operand): Effect.Effect<CalcRow, AlgebraError> =>
  Effect.gen(function* () {
    const result = yield* Algebra.applyOperator(op, left, right)
    yield* Effect.logDebug('applied operator').pipe(Effect.annotateLogs({ operator: op, result: result.toString() }))
    return {
      expression: `${describeOperand(left)} ${Algebra.operatorSymbols[op]} ${describeOperand(right)}`,
      result: result.toString(),
      bytes: result.byteEquivalent,
      standard: result.standard.name,
    }
  })

export const calcCommand = Command.make(
  'calc',
  {
    left: leftArg,
    operator: operatorArg,
    right: rightArg,
    standard: standardOption('standard', 'Standard the operands are written in'),
    format: formatOption,
  },
  ({ left, operator, right, standard, format }) =>
    Effect.gen(function* () {
      const resolved = yield* resolveStandard(standard)
      const op = yield* validateOperator(operator)
      const row = yield* calculate(op, yield* validateOperand(left, resolved), yield* validateOperand(right, resolved))
      yield* output(row, format, CalcDisplay)
    }).pipe(
      Effect.tapError((e) => error(e.message)),
      Effect.annotateLogs({ command: 'calc' }),
    ),
).pipe(Command.withDescription('Apply an arithmetic operator to quantities'))
