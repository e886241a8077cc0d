import type { ByteQuantity } from '../quantity/ByteQuantity.js'

// Number#toFixed switches to exponential notation from here on
const FIXED_LIMIT = 1e21

// The only doubles exactly halfway between two cents are odd multiples of 1/8
const isCentTie = (n: number): boolean => Number.isInteger(n * 8) && !Number.isInteger(n * 4)

// toFixed takes ties away from zero: 0.125 gives "0.13", 0.375 gives "0.38".
// Half to even keeps the 8s and turns the 3s into 2s.
const twoDecimals = (n: number): string => {
  const text = n.toFixed(2)
  return isCentTie(n) && text.endsWith('3') ? `${text.slice(0, -1)}2` : text
}

const fixed = (n: number): string | undefined => {
  if (!Number.isFinite(n)) return undefined
  if (Number.isInteger(n)) {
    return Math.abs(n) < FIXED_LIMIT ? n.toFixed(0) : BigInt(n).toString()
  }
  // Non-integral doubles are below 2 ** 53, inside toFixed's fixed-point range
  return twoDecimals(n)
}

/**
 * Render a magnitude without exponential notation: no decimals for integral
 * values, two otherwise, exact ties rounded half to even. Values with no
 * fixed-point form (infinities, NaN) fall back to `String`, which cannot
 * fail, so there is no further scientific-notation step.
 */
export const formatMagnitude = (n: number): string => fixed(n) ?? String(n)

/** "{magnitude}{unit}", e.g. "1.50MiB" */
export const format = (quantity: ByteQuantity): string => `${formatMagnitude(quantity.magnitude)}${quantity.unit}`
