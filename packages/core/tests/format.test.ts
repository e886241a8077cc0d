import { describe, expect, it } from '@effect/vitest'
import { ByteQuantity, Decimal, format, formatMagnitude } from '../src/index.js'

describe('formatMagnitude', () => {
  it('prints integral values without decimals', () => {
    expect(formatMagnitude(1)).toBe('1')
    expect(formatMagnitude(-3)).toBe('-3')
    expect(formatMagnitude(1048576)).toBe('1048576')
  })

  it('prints other values with two decimals', () => {
    expect(formatMagnitude(1.5)).toBe('1.50')
    expect(formatMagnitude(1234.5678)).toBe('1234.57')
    expect(formatMagnitude(0.00000025)).toBe('0.00')
  })

  it('rounds exact ties to the even cent', () => {
    expect(formatMagnitude(0.125)).toBe('0.12')
    expect(formatMagnitude(0.375)).toBe('0.38')
    expect(formatMagnitude(2.625)).toBe('2.62')
    expect(formatMagnitude(2.875)).toBe('2.88')
    expect(formatMagnitude(-0.125)).toBe('-0.12')
  })

  it('leaves values near a tie to plain rounding', () => {
    expect(formatMagnitude(0.126)).toBe('0.13')
  })

  it('never switches to exponential notation for large values', () => {
    expect(formatMagnitude(1e21)).toBe('1000000000000000000000')
    expect(formatMagnitude(1e30)).toBe('1000000000000000019884624838656')
  })

  it('falls back to the default form for non-finite values', () => {
    expect(formatMagnitude(Number.POSITIVE_INFINITY)).toBe('Infinity')
    expect(formatMagnitude(Number.NaN)).toBe('NaN')
  })
})

describe('format', () => {
  it('appends the unit symbol', () => {
    expect(format(ByteQuantity.unsafeMake(1.5, 'MiB'))).toBe('1.50MiB')
    expect(format(ByteQuantity.unsafeMake(12, 'kB', Decimal))).toBe('12kB')
  })
})
