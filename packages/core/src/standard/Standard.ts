import { Either, Equal, Hash, Schema } from 'effect'
import { ConfigurationError } from '../errors/index.js'

// ============================================
// Schemas
// ============================================

/** Shape accepted by Standard.make */
export const StandardOptions = Schema.Struct({
  name: Schema.NonEmptyString,
  base: Schema.Number.pipe(Schema.int(), Schema.greaterThan(1)),
  symbols: Schema.NonEmptyArray(Schema.NonEmptyString),
})
export type StandardOptions = typeof StandardOptions.Encoded

/** Names of the registered standards, as accepted by config and CLI options */
export const StandardName = Schema.Literal('decimal', 'binary', 'legacy')
export type StandardName = typeof StandardName.Type

// ============================================
// Standard
// ============================================

/**
 * A fixed unit system: a base multiplier between adjacent units and the
 * ordered unit symbols, index 0 being the unprefixed unit.
 *
 * Exponents are computed once in the constructor. Two standards are equal when
 * their base and symbols are equal, whatever their name or identity.
 */
export class Standard implements Equal.Equal {
  readonly name: string
  readonly base: number
  readonly symbols: ReadonlyArray<string>
  readonly exponents: ReadonlyMap<string, number>
  readonly #hash: number

  private constructor(options: StandardOptions) {
    this.name = options.name
    this.base = options.base
    this.symbols = Object.freeze([...options.symbols])
    this.exponents = new Map(this.symbols.map((symbol, index) => [symbol, options.base ** index] as const))
    this.#hash = Hash.combine(Hash.number(this.base))(Hash.string(this.symbols.join('\u0000')))
    Object.freeze(this)
  }

  /**
   * Build a standard. Throws if the options are malformed (base not an integer
   * above 1, empty or duplicated symbols).
   */
  static make(options: StandardOptions): Standard {
    const decoded = Schema.decodeUnknownSync(StandardOptions)(options)
    if (new Set(decoded.symbols).size !== decoded.symbols.length) {
      throw new ConfigurationError({
        kind: 'standard',
        value: decoded.name,
        message: `Standard "${decoded.name}" declares a unit symbol twice`,
      })
    }
    return new Standard(decoded)
  }

  /** The unprefixed unit, e.g. "B" */
  get baseSymbol(): string {
    return this.symbols[0] ?? 'B'
  }

  isUnit(symbol: string): boolean {
    return this.exponents.has(symbol)
  }

  /** `base ** index` of the symbol, or a ConfigurationError naming it */
  exponentOf(symbol: string): Either.Either<number, ConfigurationError> {
    const exponent = this.exponents.get(symbol)
    return exponent === undefined
      ? Either.left(
          new ConfigurationError({
            kind: 'unit',
            value: symbol,
            message: `Unknown unit "${symbol}" for standard ${this.name}`,
          }),
        )
      : Either.right(exponent)
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return (
      that instanceof Standard &&
      this.base === that.base &&
      this.symbols.length === that.symbols.length &&
      this.symbols.every((symbol, index) => symbol === that.symbols[index])
    )
  }

  [Hash.symbol](): number {
    return this.#hash
  }

  toString(): string {
    return this.name
  }

  toJSON(): unknown {
    return { _id: 'Standard', name: this.name, base: this.base, symbols: this.symbols }
  }
}

export const isStandard = (u: unknown): u is Standard => u instanceof Standard

// ============================================
// Registered Standards
// ============================================

/** SI prefixes, powers of 1000 */
export const Decimal = Standard.make({
  name: 'decimal',
  base: 1000,
  symbols: ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB', 'RB', 'QB'],
})

/** IEC prefixes, powers of 1024 */
export const Binary = Standard.make({
  name: 'binary',
  base: 1024,
  symbols: ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB', 'ZiB', 'YiB', 'RiB', 'QiB'],
})

/** JEDEC memory units: powers of 1024 written with SI-looking symbols */
export const LegacyBinary = Standard.make({
  name: 'legacy',
  base: 1024,
  symbols: ['B', 'KB', 'MB', 'GB', 'TB'],
})

export const registeredStandards: ReadonlyArray<Standard> = [Decimal, Binary, LegacyBinary]

const byName: Record<StandardName, Standard> = {
  decimal: Decimal,
  binary: Binary,
  legacy: LegacyBinary,
}

export const fromName = (name: StandardName): Standard => byName[name]

export const isRegistered = (standard: Standard): boolean =>
  registeredStandards.some((registered) => Equal.equals(registered, standard))

/**
 * The symbol whose exponent is numerically closest to `exponent`.
 * Ties go to the first symbol in standard order.
 */
export const nearestUnit = (standard: Standard, exponent: number): string => {
  let best = standard.baseSymbol
  let bestDistance = Number.POSITIVE_INFINITY
  for (const [symbol, candidate] of standard.exponents) {
    const distance = Math.abs(candidate - exponent)
    if (distance < bestDistance) {
      best = symbol
      bestDistance = distance
    }
  }
  return best
}
