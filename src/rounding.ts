/**
 * Increment Rounding
 *
 * Rounds an integer quantity to a multiple of an increment entirely in
 * bigint, so day-scale nanosecond counts round without float error.
 */

import { TemporalRangeError } from './errors'
import type { RoundingMode } from './options'

// ============================================================================
// Unsigned Rounding
// ============================================================================

/** Direction a mode takes once the sign of the quantity is factored out. */
type UnsignedRoundingMode = 'zero' | 'infinity' | 'half-zero' | 'half-infinity' | 'half-even'

function unsignedRoundingMode(mode: RoundingMode, isNegative: boolean): UnsignedRoundingMode {
  switch (mode) {
    case 'ceil':
      return isNegative ? 'zero' : 'infinity'
    case 'floor':
      return isNegative ? 'infinity' : 'zero'
    case 'expand':
      return 'infinity'
    case 'trunc':
      return 'zero'
    case 'halfCeil':
      return isNegative ? 'half-zero' : 'half-infinity'
    case 'halfFloor':
      return isNegative ? 'half-infinity' : 'half-zero'
    case 'halfExpand':
      return 'half-infinity'
    case 'halfTrunc':
      return 'half-zero'
    case 'halfEven':
      return 'half-even'
  }
}

function applyUnsignedRoundingMode(
  lower: bigint,
  remainder: bigint,
  increment: bigint,
  mode: UnsignedRoundingMode
): bigint {
  const upper = lower + 1n
  if (mode === 'zero') return lower
  if (mode === 'infinity') return upper

  const twice = remainder * 2n
  if (twice < increment) return lower
  if (twice > increment) return upper

  // Exactly halfway
  if (mode === 'half-zero') return lower
  if (mode === 'half-infinity') return upper
  return lower % 2n === 0n ? lower : upper
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Rounds `quantity` to a multiple of `increment` under `mode`.
 */
export function roundToIncrement(quantity: bigint, increment: bigint, mode: RoundingMode): bigint {
  if (increment <= 0n) {
    throw new TemporalRangeError(`Rounding increment must be positive, got ${increment}`)
  }

  const quotient = quantity / increment
  const remainder = quantity % increment
  if (remainder === 0n) return quantity

  const isNegative = quantity < 0n
  const lower = isNegative ? -quotient : quotient
  const absRemainder = isNegative ? -remainder : remainder

  const rounded = applyUnsignedRoundingMode(lower, absRemainder, increment, unsignedRoundingMode(mode, isNegative))
  return (isNegative ? -rounded : rounded) * increment
}
