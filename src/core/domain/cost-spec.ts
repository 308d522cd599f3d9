import { Decimal, scaleOf, toDecimal, type DecimalInput } from '../utils/decimal.js'

export interface CostSpecProps {
  numberPer?: DecimalInput
  numberTotal?: DecimalInput
  /** Digits to print after the point for whichever number is shown */
  scale?: number
  currency?: string
  date?: Date
  label?: string
}

/**
 * Lot cost annotation on a posting, `{...}` per unit or `{{...}}` in total.
 */
export class CostSpec {
  readonly numberPer?: Decimal
  readonly numberTotal?: Decimal
  readonly currency?: string
  readonly date?: Date
  readonly label?: string
  private readonly perScale: number
  private readonly totalScale: number

  constructor(props: CostSpecProps = {}) {
    this.numberPer = props.numberPer === undefined ? undefined : toDecimal(props.numberPer)
    this.numberTotal = props.numberTotal === undefined ? undefined : toDecimal(props.numberTotal)
    this.currency = props.currency
    this.date = props.date
    this.label = props.label
    this.perScale = props.numberPer === undefined ? 0 : scaleOf(props.numberPer, props.scale)
    this.totalScale = props.numberTotal === undefined ? 0 : scaleOf(props.numberTotal, props.scale)
  }

  get isTotal(): boolean {
    return this.numberTotal !== undefined
  }

  /**
   * The number shown inside the braces: the total when present, else the per-unit number.
   */
  get displayNumber(): { value: Decimal; scale: number } | undefined {
    if (this.numberTotal !== undefined) {
      return { value: this.numberTotal, scale: this.totalScale }
    }
    if (this.numberPer !== undefined) {
      return { value: this.numberPer, scale: this.perScale }
    }
    return undefined
  }
}
