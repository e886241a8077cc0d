/**
 * Parse command. Shows how a quantity string breaks down into bytes and unit.
 *
 * Usage: bytewise parse 1.5MiB --standard binary
 */
import { Args, Command } from '@effect/cli'
import { type ParseFailure, type Standard, parseQuantityString } from '@bytewise/core'
import { Effect } from 'effect'
import { ParsedDisplay, type ParsedRow } from '../lib/display-schemas.js'
import { formatOption, standardOption } from '../lib/options.js'
import { error, output } from '../lib/output.js'
import { resolveStandard } from '../lib/validators.js'

const textArg = Args.text({ name: 'text' }).pipe(Args.withDescription('Quantity string (e.g., "1.5MiB", "1024")'))

/**
 * Parse `text` under `standard` into a display row.
 */
export const parseQuantity = (text: string, standard: Standard): Effect.Effect<ParsedRow, ParseFailure> =>
  Effect.gen(function* () {
    const parsed = yield* parseQuantityString(text, standard)
    yield* Effect.logDebug('parsed quantity').pipe(
      Effect.annotateLogs({ rawBytes: parsed.rawBytes, unit: parsed.unit, hadSuffix: parsed.hadSuffix }),
    )
    return {
      input: text,
      bytes: parsed.rawBytes,
      unit: parsed.unit,
      suffix: parsed.hadSuffix,
      standard: standard.name,
    }
  })

export const parseCommand = Command.make(
  'parse',
  {
    text: textArg,
    standard: standardOption('standard', 'Standard to parse with (decimal, binary, legacy)'),
    format: formatOption,
  },
  ({ text, standard, format }) =>
    Effect.gen(function* () {
      const resolved = yield* resolveStandard(standard)
      const row = yield* parseQuantity(text, resolved)
      yield* output(row, format, ParsedDisplay)
    }).pipe(
      Effect.tapError((e) => error(e.message)),
      Effect.annotateLogs({ command: 'parse' }),
    ),
).pipe(Command.withDescription('Parse a quantity string into bytes'))
