/**
 * Compare command. Orders two quantities of the same standard.
 *
 * Usage: bytewise compare 1MiB 1000KiB
 */
import { Args, Command } from '@effect/cli'
import { Algebra, type ByteQuantity, type TypeMismatchError } from '@bytewise/core'
import { Effect } from 'effect'
import { ComparisonDisplay, type ComparisonRow, type Relation } from '../lib/display-schemas.js'
import { formatOption, standardOption } from '../lib/options.js'
import { error, output } from '../lib/output.js'
import { resolveStandard, validateQuantity } from '../lib/validators.js'

const relation = (order: -1 | 0 | 1): Relation => (order < 0 ? '<' : order > 0 ? '>' : '=')

export const compareQuantities = (
  left: ByteQuantity,
  right: ByteQuantity,
): Effect.Effect<ComparisonRow, TypeMismatchError> =>
  Effect.map(Algebra.compare(left, right), (order) => ({
    left: left.toString(),
    relation: relation(order),
    right: right.toString(),
  }))

export const compareCommand = Command.make(
  'compare',
  {
    left: Args.text({ name: 'left' }).pipe(Args.withDescription('Quantity on the left')),
    right: Args.text({ name: 'right' }).pipe(Args.withDescription('Quantity on the right')),
    standard: standardOption('standard', 'Standard both quantities are written in'),
    format: formatOption,
  },
  ({ left, right, standard, format }) =>
    Effect.gen(function* () {
      const resolved = yield* resolveStandard(standard)
      const row = yield* compareQuantities(yield* validateQuantity(left, resolved), yield* validateQuantity(right, resolved))
      yield* Effect.logDebug('compared quantities').pipe(Effect.annotateLogs({ relation: row.relation }))
      yield* output(row, format, ComparisonDisplay)
    }).pipe(
      Effect.tapError((e) => error(e.message)),
      Effect.annotateLogs({ command: 'compare' }),
    ),
).pipe(Command.withDescription('Compare two quantities'))
