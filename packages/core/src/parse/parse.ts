import { Either, Option } from 'effect'
import { OverflowError, ParseError, type ParseFailure } from '../errors/index.js'
import type { Standard } from '../standard/Standard.js'

// ============================================
// Types
// ============================================

export interface ParsedQuantity {
  /** Byte count, truncated toward zero */
  readonly rawBytes: number
  /** Detected unit, or the base symbol when the text had no suffix */
  readonly unit: string
  readonly hadSuffix: boolean
}

// ============================================
// Numeric literals
// ============================================

const INTEGER = /^\d+$/
const DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/
const INFINITE = /^([+-]?)(?:inf|infinity)$/i

/**
 * Read a numeric literal: digits only, or a decimal with optional sign,
 * fraction and exponent. Surrounding whitespace is allowed on decimals.
 */
export const readNumber = (fragment: string): Option.Option<number> => {
  if (INTEGER.test(fragment)) return Option.some(Number(fragment))
  const trimmed = fragment.trim()
  if (DECIMAL.test(trimmed)) return Option.some(Number(trimmed))
  const infinite = INFINITE.exec(trimmed)
  if (infinite) return Option.some(infinite[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY)
  return Option.none()
}

const scale = (
  input: string,
  fragment: string,
  exponent: number,
): Either.Either<number, ParseFailure> =>
  Option.match(readNumber(fragment), {
    onNone: () =>
      Either.left(
        new ParseError({
          input,
          fragment,
          message: `string <${input}>: wrong value: <${fragment}>`,
        }),
      ),
    onSome: (amount) => {
      const rawBytes = Math.trunc(amount * exponent)
      return Number.isFinite(rawBytes)
        ? Either.right(rawBytes)
        : Either.left(new OverflowError({ input, message: `<${fragment}> is too big!` }))
    },
  })

// ============================================
// Parser
// ============================================

/**
 * Parse a textual quantity such as "1.5MiB" or "1024" against a standard.
 *
 * Symbols are tried from the largest exponent down, so "KB" wins over "B" in
 * the legacy standard. Text without a known suffix is read as a bare number of
 * base units.
 */
export const parseQuantityString = (text: string, standard: Standard): Either.Either<ParsedQuantity, ParseFailure> => {
  for (const unit of [...standard.symbols].reverse()) {
    if (text.length > unit.length && text.endsWith(unit)) {
      const exponent = standard.exponents.get(unit) ?? 1
      return scale(text, text.slice(0, -unit.length), exponent).pipe(
        Either.map((rawBytes) => ({ rawBytes, unit, hadSuffix: true })),
      )
    }
  }

  return scale(text, text, 1).pipe(
    Either.map((rawBytes) => ({ rawBytes, unit: standard.baseSymbol, hadSuffix: false })),
    Either.mapLeft((error) =>
      error._tag === 'ParseError'
        ? new ParseError({ input: text, fragment: text, message: `wrong value: <${text}>` })
        : error,
    ),
  )
}
