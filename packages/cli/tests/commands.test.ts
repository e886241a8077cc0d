/**
 * Tests for the command logic behind parse, convert, calc and compare.
 */
import { Binary, ByteQuantity, Decimal, LegacyBinary } from '@bytewise/core'
import { describe, expect, it } from '@effect/vitest'
import { Effect, Option } from 'effect'
import { calculate } from '../src/commands/calc.js'
import { compareQuantities } from '../src/commands/compare.js'
import { convertQuantity } from '../src/commands/convert.js'
import { parseQuantity } from '../src/commands/parse.js'

const q = ByteQuantity.unsafeMake

describe('parse command', () => {
  it.effect('reports bytes, unit and suffix', () =>
    Effect.gen(function* () {
      const row = yield* parseQuantity('1.5MiB', Binary)
      expect(row).toEqual({ input: '1.5MiB', bytes: 1572864, unit: 'MiB', suffix: true, standard: 'binary' })
    }),
  )

  it.effect('reports a bare number in bytes', () =>
    Effect.gen(function* () {
      const row = yield* parseQuantity('2048', LegacyBinary)
      expect(row).toEqual({ input: '2048', bytes: 2048, unit: 'B', suffix: false, standard: 'legacy' })
    }),
  )

  it.effect('fails on text the standard cannot read', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(parseQuantity('5KB', Decimal))
      expect(error.message).toBe('string <5KB>: wrong value: <5K>')
    }),
  )
})

describe('convert command', () => {
  it.effect('picks the nearest unit of the target standard', () =>
    Effect.gen(function* () {
      const row = yield* convertQuantity({ text: '3MiB', from: Binary, to: Decimal, unit: Option.none() })
      expect(row.input).toBe('3MiB')
      expect(row.result).toBe('3.15MB')
      expect(row.from).toBe('binary')
      expect(row.to).toBe('decimal')
      expect(row.bytes).toBeCloseTo(3145728, 6)
    }),
  )

  it.effect('uses the requested unit', () =>
    Effect.gen(function* () {
      const row = yield* convertQuantity({ text: '3MiB', from: Binary, to: Decimal, unit: Option.some('B') })
      expect(row.result).toBe('3145728B')
      expect(row.bytes).toBe(3145728)
    }),
  )

  it.effect('rejects a unit the target standard lacks', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        convertQuantity({ text: '3MiB', from: Binary, to: LegacyBinary, unit: Option.some('PB') }),
      )
      expect(error._tag).toBe('ConfigurationError')
    }),
  )
})

describe('calc command', () => {
  it.effect('divides one quantity by another', () =>
    Effect.gen(function* () {
      const row = yield* calculate('divide', q(1, 'GiB'), q(256, 'MiB'))
      expect(row).toEqual({ expression: '1GiB / 256MiB', result: '4GiB', bytes: 4294967296, standard: 'binary' })
    }),
  )

  it.effect('takes the unit from the quantity when the number comes first', () =>
    Effect.gen(function* () {
      const row = yield* calculate('multiply', 2, q(3, 'TiB'))
      expect(row.expression).toBe('2 * 3TiB')
      expect(row.result).toBe('6TiB')
    }),
  )

  it.effect('fails without a quantity operand', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(calculate('add', 1, 2))
      expect(error._tag).toBe('TypeMismatchError')
    }),
  )

  it.effect('fails on division by zero', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(calculate('modulo', q(1, 'KiB'), 0))
      expect(error._tag).toBe('DivisionByZeroError')
    }),
  )
})

describe('compare command', () => {
  it.effect('prints the relation between two quantities', () =>
    Effect.gen(function* () {
      expect(yield* compareQuantities(q(1, 'MiB'), q(1000, 'KiB'))).toEqual({
        left: '1MiB',
        relation: '>',
        right: '1000KiB',
      })
      expect((yield* compareQuantities(q(1, 'KiB'), q(1024))).relation).toBe('=')
      expect((yield* compareQuantities(q(1, 'kB', Decimal), q(1, 'MB', Decimal))).relation).toBe('<')
    }),
  )

  it.effect('refuses quantities of different standards', () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(compareQuantities(q(1, 'kB', Decimal), q(1, 'KiB')))
      expect(error.operation).toBe('compare')
    }),
  )
})
