import type { Account } from './account.js'
import type { Amount, IncompleteAmount } from './amount.js'
import type { CostSpec } from './cost-spec.js'
import type { Flag } from './flag.js'
import type { Metadata } from './metadata.js'

export type Booking = 'strict' | 'none' | 'average' | 'fifo' | 'lifo'

export interface OpenDirective {
  type: 'open'
  date: Date
  account: Account
  currencies: readonly string[]
  booking: Booking
  meta: Metadata
}

export interface CloseDirective {
  type: 'close'
  date: Date
  account: Account
  meta: Metadata
}

export interface BalanceDirective {
  type: 'balance'
  date: Date
  account: Account
  amount: Amount
  meta: Metadata
}

export interface OptionDirective {
  type: 'option'
  name: string
  value: string
}

export interface CommodityDirective {
  type: 'commodity'
  date: Date
  name: string
  meta: Metadata
}

export interface CustomDirective {
  type: 'custom'
  date: Date
  name: string
  args: readonly string[]
  meta: Metadata
}

export interface DocumentDirective {
  type: 'document'
  date: Date
  account: Account
  path: string
  meta: Metadata
}

export interface EventDirective {
  type: 'event'
  date: Date
  name: string
  description: string
  meta: Metadata
}

export interface IncludeDirective {
  type: 'include'
  filename: string
  meta: Metadata
}

export interface NoteDirective {
  type: 'note'
  date: Date
  account: Account
  comment: string
  meta: Metadata
}

export interface PadDirective {
  type: 'pad'
  date: Date
  padToAccount: Account
  padFromAccount: Account
  meta: Metadata
}

export interface PluginDirective {
  type: 'plugin'
  module: string
  config?: string
  meta: Metadata
}

export interface PriceDirective {
  type: 'price'
  date: Date
  currency: string
  amount: Amount
  meta: Metadata
}

export interface QueryDirective {
  type: 'query'
  date: Date
  name: string
  queryString: string
  meta: Metadata
}

export interface Posting {
  flag?: Flag
  account: Account
  units: IncompleteAmount
  price?: Amount
  cost?: CostSpec
  meta: Metadata
}

export interface Transaction {
  type: 'transaction'
  date: Date
  flag: Flag
  payee?: string
  narration: string
  tags: readonly string[]
  links: readonly string[]
  postings: readonly Posting[]
  meta: Metadata
}

/**
 * A node the ledger model could not classify. Rendering one fails.
 */
export interface UnsupportedDirective {
  type: 'unsupported'
  reason?: string
}

export type Directive =
  | OpenDirective
  | CloseDirective
  | BalanceDirective
  | OptionDirective
  | CommodityDirective
  | CustomDirective
  | DocumentDirective
  | EventDirective
  | IncludeDirective
  | NoteDirective
  | PadDirective
  | PluginDirective
  | PriceDirective
  | QueryDirective
  | Transaction
  | UnsupportedDirective

export type DirectiveType = Directive['type']

export interface Ledger {
  directives: readonly Directive[]
}
