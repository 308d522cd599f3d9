import { Decimal, scaleOf, toDecimal, type DecimalInput } from '../utils/decimal.js'

export interface AmountProps {
  number: DecimalInput
  currency: string
  /** Digits to print after the point, e.g. 2 for `new Decimal('100.00')` */
  scale?: number
}

export class Amount {
  readonly number: Decimal
  readonly currency: string
  /** Digits after the decimal point in the value as it was written. */
  readonly scale: number

  constructor(props: AmountProps) {
    this.number = toDecimal(props.number)
    this.currency = props.currency
    this.scale = scaleOf(props.number, props.scale)
  }

  equals(other: Amount): boolean {
    return this.currency === other.currency && this.number.equals(other.number)
  }

  toString(): string {
    return `${this.number.toFixed(this.scale)} ${this.currency}`
  }
}

export interface IncompleteAmountProps {
  number?: DecimalInput
  currency?: string
  scale?: number
}

/**
 * Posting units where the number, the currency, or both are left for the
 * ledger model to infer.
 */
export class IncompleteAmount {
  readonly number?: Decimal
  readonly currency?: string
  readonly scale: number

  constructor(props: IncompleteAmountProps = {}) {
    this.number = props.number === undefined ? undefined : toDecimal(props.number)
    this.currency = props.currency
    this.scale = props.number === undefined ? 0 : scaleOf(props.number, props.scale)
  }

  static from(amount: Amount): IncompleteAmount {
    return new IncompleteAmount({
      number: amount.number,
      currency: amount.currency,
      scale: amount.scale
    })
  }

  get isComplete(): boolean {
    return this.number !== undefined && this.currency !== undefined
  }
}
