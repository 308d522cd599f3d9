export type AccountType = 'Assets' | 'Liabilities' | 'Equity' | 'Income' | 'Expenses'

export const ACCOUNT_TYPES: readonly AccountType[] = [
  'Assets',
  'Liabilities',
  'Equity',
  'Income',
  'Expenses'
]

export interface AccountProps {
  type: AccountType
  parts?: readonly string[]
}

function isAccountType(value: string): value is AccountType {
  return ACCOUNT_TYPES.some(type => type === value)
}

export class Account {
  readonly type: AccountType
  readonly parts: readonly string[]

  constructor(props: AccountProps) {
    this.type = props.type
    this.parts = Object.freeze([...(props.parts ?? [])])
  }

  /**
   * Build an account from its colon-separated name, e.g. `Assets:Bank:Checking`.
   */
  static parse(name: string): Account {
    const [root, ...parts] = name.split(':')
    if (root === undefined || !isAccountType(root)) {
      throw new Error(`Unknown account type in "${name}"`)
    }
    return new Account({ type: root, parts })
  }

  get name(): string {
    return [this.type, ...this.parts].join(':')
  }

  equals(other: Account): boolean {
    return this.name === other.name
  }

  toString(): string {
    return this.name
  }
}
