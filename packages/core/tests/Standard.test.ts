import { describe, expect, it } from '@effect/vitest'
import { Effect, Either, Equal, Hash } from 'effect'
import {
  Binary,
  Decimal,
  LegacyBinary,
  Standard,
  fromName,
  isRegistered,
  nearestUnit,
  registeredStandards,
} from '../src/index.js'

describe('Standard', () => {
  describe('registered standards', () => {
    it('maps every symbol to base ** index', () => {
      for (const standard of registeredStandards) {
        standard.symbols.forEach((symbol, index) => {
          expect(Either.getOrThrow(standard.exponentOf(symbol))).toBe(standard.base ** index)
        })
      }
    })

    it('declares the expected symbols', () => {
      expect(Decimal.base).toBe(1000)
      expect(Decimal.symbols).toEqual(['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB', 'ZB', 'YB', 'RB', 'QB'])
      expect(Binary.base).toBe(1024)
      expect(Binary.symbols[10]).toBe('QiB')
      expect(LegacyBinary.base).toBe(1024)
      expect(LegacyBinary.symbols).toEqual(['B', 'KB', 'MB', 'GB', 'TB'])
    })

    it('gives the legacy TB the binary multiplier', () => {
      expect(Either.getOrThrow(LegacyBinary.exponentOf('TB'))).toBe(1099511627776)
    })

    it('is frozen after construction', () => {
      expect(Object.isFrozen(Binary)).toBe(true)
      expect(Object.isFrozen(Binary.symbols)).toBe(true)
    })
  })

  describe('exponentOf', () => {
    it.effect('fails with ConfigurationError on a symbol of another standard', () =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(Decimal.exponentOf('KiB'))
        expect(error._tag).toBe('ConfigurationError')
        expect(error.kind).toBe('unit')
        expect(error.value).toBe('KiB')
        expect(error.message).toBe('Unknown unit "KiB" for standard decimal')
      }),
    )

    it('tells units apart with isUnit', () => {
      expect(Binary.isUnit('MiB')).toBe(true)
      expect(Binary.isUnit('MB')).toBe(false)
      expect(Binary.baseSymbol).toBe('B')
    })
  })

  describe('equality', () => {
    it('is structural', () => {
      const copy = Standard.make({
        name: 'iec-copy',
        base: 1024,
        symbols: ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB', 'ZiB', 'YiB', 'RiB', 'QiB'],
      })
      expect(copy === Binary).toBe(false)
      expect(Equal.equals(copy, Binary)).toBe(true)
      expect(Hash.hash(copy)).toBe(Hash.hash(Binary))
      expect(isRegistered(copy)).toBe(true)
    })

    it('tells apart standards sharing a base', () => {
      expect(Equal.equals(Binary, LegacyBinary)).toBe(false)
      expect(Equal.equals(Decimal, Binary)).toBe(false)
    })

    it('does not register a standard of another shape', () => {
      const custom = Standard.make({ name: 'custom', base: 1000, symbols: ['B', 'XB'] })
      expect(isRegistered(custom)).toBe(false)
    })
  })

  describe('make', () => {
    it('rejects a base below 2', () => {
      expect(() => Standard.make({ name: 'flat', base: 1, symbols: ['B'] })).toThrow()
    })

    it('rejects duplicated symbols', () => {
      expect(() => Standard.make({ name: 'twice', base: 1000, symbols: ['B', 'kB', 'kB'] })).toThrow(
        'Standard "twice" declares a unit symbol twice',
      )
    })
  })

  describe('fromName', () => {
    it('resolves the registered names', () => {
      expect(fromName('decimal')).toBe(Decimal)
      expect(fromName('binary')).toBe(Binary)
      expect(fromName('legacy')).toBe(LegacyBinary)
    })
  })

  describe('nearestUnit', () => {
    it('picks the closest exponent', () => {
      expect(nearestUnit(Decimal, 1024 ** 2)).toBe('MB')
      expect(nearestUnit(Binary, 1000)).toBe('KiB')
    })

    it('caps at the largest unit of a short standard', () => {
      expect(nearestUnit(LegacyBinary, 1024 ** 8)).toBe('TB')
    })

    it('breaks ties toward the first symbol', () => {
      expect(nearestUnit(Decimal, 500.5)).toBe('B')
    })
  })
})
