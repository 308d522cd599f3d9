export type Flag =
  | { kind: 'okay' }
  | { kind: 'warning' }
  | { kind: 'other'; symbol: string }

export const OKAY: Flag = { kind: 'okay' }
export const WARNING: Flag = { kind: 'warning' }

export function flagFromSymbol(symbol: string): Flag {
  switch (symbol) {
    case '*':
      return OKAY
    case '!':
      return WARNING
    default:
      return { kind: 'other', symbol }
  }
}

export function flagSymbol(flag: Flag): string {
  switch (flag.kind) {
    case 'okay':
      return '*'
    case 'warning':
      return '!'
    case 'other':
      return flag.symbol
  }
}
