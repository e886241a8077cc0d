import { Either, Equal, Hash, Inspectable, Option } from 'effect'
import {
  ConfigurationError,
  type ConstructionError,
  OverflowError,
  ParseError,
  type ParseFailure,
} from '../errors/index.js'
import { formatMagnitude } from '../format/format.js'
import { parseQuantityString, readNumber } from '../parse/parse.js'
import { Binary, isRegistered, nearestUnit, type Standard } from '../standard/Standard.js'

// ============================================
// Types
// ============================================

/** Anything a quantity can be built from */
export type QuantityInput = number | bigint | string

const exponentIn = (standard: Standard, unit: string): number => Either.getOrThrow(standard.exponentOf(unit))

const checkFinite = (value: number, input: string): Either.Either<number, ParseFailure> => {
  if (Number.isNaN(value)) {
    return Either.left(new ParseError({ input, fragment: input, message: `wrong value: <${input}>` }))
  }
  return Number.isFinite(value)
    ? Either.right(value)
    : Either.left(new OverflowError({ input, message: `<${input}> is too big!` }))
}

/**
 * Magnitude and unit for a text value. Without a caller unit the detected
 * suffix is adopted; with one, the text must not carry a suffix of its own.
 */
const fromText = (
  text: string,
  unit: string | undefined,
  standard: Standard,
): Either.Either<{ readonly magnitude: number; readonly unit: string | undefined }, ConstructionError> =>
  parseQuantityString(text, standard).pipe(
    Either.flatMap((parsed): Either.Either<{ magnitude: number; unit: string | undefined }, ConstructionError> => {
      if (unit === undefined) {
        return Either.right({ magnitude: parsed.rawBytes / exponentIn(standard, parsed.unit), unit: parsed.unit })
      }
      if (parsed.hadSuffix) {
        return Either.left(
          new ConfigurationError({
            kind: 'ambiguous-unit',
            value: text,
            message: `Double unit indication: '${unit}' and '${text}'`,
          }),
        )
      }
      return Either.right({ magnitude: parsed.rawBytes, unit })
    }),
    // A suffix that matched in front of a malformed number: retry the whole text as a number
    Either.orElse((error): Either.Either<{ magnitude: number; unit: string | undefined }, ConstructionError> =>
      error._tag === 'ParseError'
        ? Option.match(readNumber(text), {
            onNone: () =>
              Either.left(new ParseError({ input: text, fragment: error.fragment, message: `wrong value: <${text}>` })),
            onSome: (amount) => Either.map(checkFinite(Math.trunc(amount), text), (magnitude) => ({ magnitude, unit })),
          })
        : Either.left(error),
    ),
  )

const fromValue = (
  value: QuantityInput,
  unit: string | undefined,
  standard: Standard,
): Either.Either<{ readonly magnitude: number; readonly unit: string | undefined }, ConstructionError> => {
  if (typeof value === 'string') {
    return fromText(value, unit, standard)
  }
  const magnitude =
    typeof value === 'bigint' ? checkFinite(Number(value), value.toString()) : checkFinite(value, String(value))
  return Either.map(magnitude, (m) => ({ magnitude: m, unit }))
}

// ============================================
// ByteQuantity
// ============================================

/**
 * A number of bytes expressed in a unit of a standard, e.g. `1.5 MiB`.
 *
 * Values are immutable apart from the `unit` setter, which rescales the
 * magnitude and keeps the byte equivalent. The setter is a plain mutation with
 * no synchronization; a quantity shared between owners needs a single writer.
 */
export class ByteQuantity implements Equal.Equal, Inspectable.Inspectable {
  #magnitude: number
  #unit: string
  readonly standard: Standard

  private constructor(magnitude: number, unit: string, standard: Standard) {
    this.#magnitude = magnitude
    this.#unit = unit
    this.standard = standard
  }

  /**
   * Build a quantity from a number, a bigint or a string such as "1.5MiB".
   *
   * A unit passed here must belong to `standard`, and text carrying its own
   * suffix cannot be combined with one. Without any unit the base symbol
   * ("B") is used.
   */
  static make(
    value: QuantityInput,
    unit?: string,
    standard: Standard = Binary,
  ): Either.Either<ByteQuantity, ConstructionError> {
    if (!isRegistered(standard)) {
      return Either.left(
        new ConfigurationError({
          kind: 'standard',
          value: String(standard),
          message: `Unknown standard value: ${String(standard)}`,
        }),
      )
    }
    if (unit !== undefined && !standard.isUnit(unit)) {
      return Either.left(new ConfigurationError({ kind: 'unit', value: unit, message: `Unknown unit: "${unit}"` }))
    }
    return Either.map(
      fromValue(value, unit, standard),
      (resolved) => new ByteQuantity(resolved.magnitude, resolved.unit ?? standard.baseSymbol, standard),
    )
  }

  /** Like `make`, throwing the error instead of returning it */
  static unsafeMake(value: QuantityInput, unit?: string, standard: Standard = Binary): ByteQuantity {
    return Either.getOrThrowWith(ByteQuantity.make(value, unit, standard), (error) => error)
  }

  /** The amount, expressed in `unit` */
  get magnitude(): number {
    return this.#magnitude
  }

  get unit(): string {
    return this.#unit
  }

  /**
   * Re-express the quantity in another unit of the same standard.
   * Throws ConfigurationError on a symbol the standard does not know.
   */
  set unit(symbol: string) {
    const exponent = Either.getOrThrowWith(this.standard.exponentOf(symbol), (error) => error)
    if (symbol !== this.#unit) {
      this.#magnitude = this.byteEquivalent / exponent
      this.#unit = symbol
    }
  }

  /** Multiplier of `unit`, e.g. 1024 for KiB */
  get exponent(): number {
    return exponentIn(this.standard, this.#unit)
  }

  /** The quantity in base units */
  get byteEquivalent(): number {
    return this.#magnitude * this.exponent
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof ByteQuantity &&
      Equal.equals(this.standard, that.standard) &&
      this.byteEquivalent === that.byteEquivalent
    )
  }

  [Hash.symbol](): number {
    return Hash.combine(Hash.hash(this.standard))(Hash.number(this.byteEquivalent))
  }

  toString(): string {
    return `${formatMagnitude(this.#magnitude)}${this.#unit}`
  }

  toJSON(): unknown {
    return { _id: 'ByteQuantity', magnitude: this.#magnitude, unit: this.#unit, standard: this.standard.name }
  }

  [Inspectable.NodeInspectSymbol](): string {
    return this.toString()
  }
}

export const isByteQuantity = (u: unknown): u is ByteQuantity => u instanceof ByteQuantity

// ============================================
// Re-expression
// ============================================

/** Same quantity, new magnitude, same unit and standard */
export const withMagnitude = (self: ByteQuantity, magnitude: number): ByteQuantity =>
  ByteQuantity.unsafeMake(magnitude, self.unit, self.standard)

/** A copy re-expressed in `unit`; the original is left as it is */
export const withUnit = (self: ByteQuantity, unit: string): Either.Either<ByteQuantity, ConstructionError> =>
  Either.flatMap(self.standard.exponentOf(unit), (exponent) =>
    ByteQuantity.make(self.byteEquivalent / exponent, unit, self.standard),
  )

/**
 * The same number of bytes under `standard`. Without a unit, the one whose
 * exponent is closest to the current one is chosen, so 3 MiB becomes MB.
 */
export const convert = (
  self: ByteQuantity,
  standard: Standard,
  unit?: string,
): Either.Either<ByteQuantity, ConstructionError> =>
  ByteQuantity.make(self.byteEquivalent, undefined, standard).pipe(
    Either.flatMap((bytes) => withUnit(bytes, unit ?? nearestUnit(standard, self.exponent))),
  )
