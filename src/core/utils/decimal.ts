import { Decimal } from 'decimal.js'

// Configure Decimal.js for financial values
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP
})

export { Decimal }

export type DecimalInput = Decimal | string | number

export function toDecimal(value: DecimalInput): Decimal {
  return value instanceof Decimal ? value : new Decimal(value)
}

/**
 * Number of digits after the decimal point in the value as written.
 *
 * Decimal drops trailing zeros, so `'100.00'` would otherwise come back as `100`.
 * An explicit `scale` wins as long as it does not cut off digits.
 */
export function scaleOf(value: DecimalInput, scale?: number): number {
  if (scale !== undefined) {
    return Math.max(scale, toDecimal(value).decimalPlaces())
  }
  const decimal = toDecimal(value)
  if (typeof value !== 'string' || /e/i.test(value)) {
    return decimal.decimalPlaces()
  }
  const text = value.trim()
  const point = text.indexOf('.')
  const written = point === -1 ? 0 : text.length - point - 1
  return Math.max(written, decimal.decimalPlaces())
}
