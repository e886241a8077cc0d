/**
 * Convert command. Re-expresses a quantity in another standard or unit.
 *
 * Usage: bytewise convert 3MiB --to decimal --unit kB
 */
import { Args, Command, Options } from '@effect/cli'
import { type ConstructionError, type Standard, convert } from '@bytewise/core'
import { Effect, Option } from 'effect'
import { ConversionDisplay, type ConversionRow } from '../lib/display-schemas.js'
import { formatOption, standardOption } from '../lib/options.js'
import { error, output } from '../lib/output.js'
import { resolveStandard, validateQuantity } from '../lib/validators.js'

const textArg = Args.text({ name: 'text' }).pipe(Args.withDescription('Quantity to convert (e.g., "3MiB")'))

const unitOption = Options.text('unit').pipe(
  Options.withAlias('u'),
  Options.optional,
  Options.withDescription('Target unit; defaults to the unit nearest the current one'),
)

export interface ConversionRequest {
  readonly text: string
  readonly from: Standard
  readonly to: Standard
  readonly unit: Option.Option<string>
}

export const convertQuantity = (request: ConversionRequest): Effect.Effect<ConversionRow, ConstructionError> =>
  Effect.gen(function* () {
    const quantity = yield* validateQuantity(request.text, request.from)
    const converted = yield* convert(quantity, request.to, Option.getOrUndefined(request.unit))
    yield* Effect.logDebug('converted quantity').pipe(
      Effect.annotateLogs({ from: request.from.name, to: request.to.name, unit: converted.unit }),
    )
    return {
      input: quantity.toString(),
      from: request.from.name,
      result: converted.toString(),
      to: request.to.name,
      bytes: converted.byteEquivalent,
    }
  })

export const convertCommand = Command.make(
  'convert',
  {
    text: textArg,
    from: standardOption('from', 'Standard the input is written in'),
    to: standardOption('to', 'Standard to convert to'),
    unit: unitOption,
    format: formatOption,
  },
  ({ text, from, to, unit, format }) =>
    Effect.gen(function* () {
      const request: ConversionRequest = {
        text,
        from: yield* resolveStandard(from),
        to: yield* resolveStandard(to),
        unit,
      }
      const row = yield* convertQuantity(request)
      yield* output(row, format, ConversionDisplay)
    }).pipe(
      Effect.tapError((e) => error(e.message)),
      Effect.annotateLogs({ command: 'convert' }),
    ),
).pipe(Command.withDescription('Convert a quantity to another standard or unit'))
