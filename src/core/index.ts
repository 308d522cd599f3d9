// Domain
export { Account, ACCOUNT_TYPES, type AccountType, type AccountProps } from './domain/account.js'
export { Amount, IncompleteAmount, type AmountProps, type IncompleteAmountProps } from './domain/amount.js'
export { CostSpec, type CostSpecProps } from './domain/cost-spec.js'
export { OKAY, WARNING, flagFromSymbol, flagSymbol, type Flag } from './domain/flag.js'
export { EMPTY_METADATA, toMetadata, type Metadata } from './domain/metadata.js'
export type {
  BalanceDirective,
  Booking,
  CloseDirective,
  CommodityDirective,
  CustomDirective,
  Directive,
  DirectiveType,
  DocumentDirective,
  EventDirective,
  IncludeDirective,
  Ledger,
  NoteDirective,
  OpenDirective,
  OptionDirective,
  PadDirective,
  PluginDirective,
  Posting,
  PriceDirective,
  QueryDirective,
  Transaction,
  UnsupportedDirective
} from './domain/directive.js'

// Ports
export { StringSink, type Sink } from './ports/sink.js'

// Renderer
export { LedgerRenderer } from './renderer/ledger-renderer.js'

// Errors
export {
  RenderError,
  RenderIoError,
  UnsupportedDirectiveError,
  type RenderErrorCode
} from './errors/render-error.js'

// Utils
export { Decimal, type DecimalInput } from './utils/decimal.js'
export { formatDate } from './utils/date.js'
