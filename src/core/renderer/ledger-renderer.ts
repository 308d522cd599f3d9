import type { Account } from '../domain/account.js'
import type { Amount, IncompleteAmount } from '../domain/amount.js'
import type { CostSpec } from '../domain/cost-spec.js'
import type {
  BalanceDirective,
  Booking,
  CloseDirective,
  CommodityDirective,
  CustomDirective,
  Directive,
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
  Transaction
} from '../domain/directive.js'
import { flagSymbol, type Flag } from '../domain/flag.js'
import type { Metadata } from '../domain/metadata.js'
import { RenderIoError, UnsupportedDirectiveError } from '../errors/render-error.js'
import { StringSink, type Sink } from '../ports/sink.js'
import { formatDate } from '../utils/date.js'

const BOOKING_SUFFIX: Record<Booking, string> = {
  strict: ' "strict"',
  average: ' "average"',
  fifo: ' "fifo"',
  lifo: ' "lifo"',
  none: ''
}

function emit(sink: Sink, chunk: string): void {
  try {
    sink.write(chunk)
  } catch (e) {
    throw new RenderIoError(e)
  }
}

function prefixed(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value : `${prefix}${value}`
}

/**
 * Writes ledger directives in plain-text ledger syntax.
 *
 * Holds no state, so one instance can be shared freely. Every method writes
 * straight to the sink in document order and throws a `RenderError` on failure;
 * whatever was written before the failure stays in the sink.
 */
export class LedgerRenderer {
  /**
   * Render every directive in stored order, each followed by a blank line.
   */
  render(ledger: Ledger, sink: Sink): void {
    for (const directive of ledger.directives) {
      this.renderDocument(directive, sink)
    }
  }

  /**
   * Render a single top-level directive framed as it would be inside a ledger.
   */
  renderDocument(directive: Directive, sink: Sink): void {
    this.renderDirective(directive, sink)
    emit(sink, '\n')
  }

  renderToString(ledger: Ledger): string {
    const sink = new StringSink()
    this.render(ledger, sink)
    return sink.toString()
  }

  appendToLedger(existingContent: string, directives: readonly Directive[]): string {
    const rendered = this.renderToString({ directives })

    let result = existingContent.trimEnd()
    if (result.length > 0) {
      result += '\n\n'
    }
    return result + rendered
  }

  renderDirective(directive: Directive, sink: Sink): void {
    switch (directive.type) {
      case 'open':
        return this.renderOpen(directive, sink)
      case 'close':
        return this.renderClose(directive, sink)
      case 'balance':
        return this.renderBalance(directive, sink)
      case 'option':
        return this.renderOption(directive, sink)
      case 'commodity':
        return this.renderCommodity(directive, sink)
      case 'custom':
        return this.renderCustom(directive, sink)
      case 'document':
        return this.renderDocumentDirective(directive, sink)
      case 'event':
        return this.renderEvent(directive, sink)
      case 'include':
        return this.renderInclude(directive, sink)
      case 'note':
        return this.renderNote(directive, sink)
      case 'pad':
        return this.renderPad(directive, sink)
      case 'plugin':
        return this.renderPlugin(directive, sink)
      case 'price':
        return this.renderPrice(directive, sink)
      case 'query':
        return this.renderQuery(directive, sink)
      case 'transaction':
        return this.renderTransaction(directive, sink)
      case 'unsupported':
        throw new UnsupportedDirectiveError(directive.reason)
      default: {
        const unreachable: never = directive
        return unreachable
      }
    }
  }

  // === Simple directives ===

  renderOpen(open: OpenDirective, sink: Sink): void {
    emit(sink, `${formatDate(open.date)} open `)
    this.renderAccount(open.account, sink)
    if (open.currencies.length > 0) {
      emit(sink, ` ${open.currencies.join(' ')}`)
    }
    emit(sink, `${BOOKING_SUFFIX[open.booking]}\n`)
    this.renderMetadata(open.meta, sink)
  }

  renderClose(close: CloseDirective, sink: Sink): void {
    emit(sink, `${formatDate(close.date)} close `)
    this.renderAccount(close.account, sink)
    emit(sink, '\n')
    this.renderMetadata(close.meta, sink)
  }

  renderBalance(balance: BalanceDirective, sink: Sink): void {
    emit(sink, `${formatDate(balance.date)} balance `)
    this.renderAccount(balance.account, sink)
    emit(sink, '\t')
    this.renderAmount(balance.amount, sink)
    emit(sink, '\n')
    this.renderMetadata(balance.meta, sink)
  }

  renderOption(option: OptionDirective, sink: Sink): void {
    emit(sink, `option "${option.name}" "${option.value}"\n`)
  }

  renderCommodity(commodity: CommodityDirective, sink: Sink): void {
    emit(sink, `${formatDate(commodity.date)} commodity ${commodity.name}\n`)
    this.renderMetadata(commodity.meta, sink)
  }

  renderCustom(custom: CustomDirective, sink: Sink): void {
    emit(sink, `${formatDate(custom.date)} custom "${custom.name}" ${custom.args.join(' ')}\n`)
    this.renderMetadata(custom.meta, sink)
  }

  renderDocumentDirective(document: DocumentDirective, sink: Sink): void {
    emit(sink, `${formatDate(document.date)} document `)
    this.renderAccount(document.account, sink)
    emit(sink, ` "${document.path}"\n`)
    this.renderMetadata(document.meta, sink)
  }

  renderEvent(event: EventDirective, sink: Sink): void {
    emit(sink, `${formatDate(event.date)} event "${event.name}" "${event.description}"\n`)
    this.renderMetadata(event.meta, sink)
  }

  renderInclude(include: IncludeDirective, sink: Sink): void {
    emit(sink, `include ${include.filename}\n`)
    this.renderMetadata(include.meta, sink)
  }

  renderNote(note: NoteDirective, sink: Sink): void {
    emit(sink, `${formatDate(note.date)} note `)
    this.renderAccount(note.account, sink)
    emit(sink, ` "${note.comment}"\n`)
    this.renderMetadata(note.meta, sink)
  }

  renderPad(pad: PadDirective, sink: Sink): void {
    emit(sink, `${formatDate(pad.date)} pad `)
    this.renderAccount(pad.padToAccount, sink)
    emit(sink, ' ')
    this.renderAccount(pad.padFromAccount, sink)
    emit(sink, '\n')
    this.renderMetadata(pad.meta, sink)
  }

  renderPlugin(plugin: PluginDirective, sink: Sink): void {
    const config = plugin.config === undefined ? '' : ` "${plugin.config}"`
    emit(sink, `plugin "${plugin.module}"${config}\n`)
    this.renderMetadata(plugin.meta, sink)
  }

  renderPrice(price: PriceDirective, sink: Sink): void {
    emit(sink, `${formatDate(price.date)} price ${price.currency} `)
    this.renderAmount(price.amount, sink)
    emit(sink, '\n')
    this.renderMetadata(price.meta, sink)
  }

  renderQuery(query: QueryDirective, sink: Sink): void {
    emit(sink, `${formatDate(query.date)} query "${query.name}" "${query.queryString}"\n`)
    this.renderMetadata(query.meta, sink)
  }

  // === Transactions ===

  renderTransaction(transaction: Transaction, sink: Sink): void {
    emit(sink, `${formatDate(transaction.date)} `)
    this.renderFlag(transaction.flag, sink)
    if (transaction.payee !== undefined) {
      emit(sink, ` "${transaction.payee}"`)
    }
    emit(sink, ` "${transaction.narration}"`)
    for (const tag of transaction.tags) {
      emit(sink, ` ${prefixed(tag, '#')}`)
    }
    for (const link of transaction.links) {
      emit(sink, ` ${prefixed(link, '^')}`)
    }
    emit(sink, '\n')

    for (const posting of transaction.postings) {
      this.renderPosting(posting, sink)
    }
    this.renderMetadata(transaction.meta, sink)
  }

  renderPosting(posting: Posting, sink: Sink): void {
    emit(sink, '\t')
    if (posting.flag !== undefined) {
      this.renderFlag(posting.flag, sink)
      emit(sink, ' ')
    }
    this.renderAccount(posting.account, sink)

    emit(sink, '\t')
    this.renderIncompleteAmount(posting.units, sink)
    if (posting.price !== undefined) {
      emit(sink, ' @ ')
      this.renderAmount(posting.price, sink)
    }
    if (posting.cost !== undefined) {
      emit(sink, ' ')
      this.renderCostSpec(posting.cost, sink)
    }
    emit(sink, '\n')
    this.renderMetadata(posting.meta, sink)
  }

  // === Structural ===

  renderAccount(account: Account, sink: Sink): void {
    emit(sink, account.name)
  }

  renderAmount(amount: Amount, sink: Sink): void {
    emit(sink, `${amount.number.toFixed(amount.scale)} ${amount.currency}`)
  }

  renderIncompleteAmount(amount: IncompleteAmount, sink: Sink): void {
    const parts: string[] = []
    if (amount.number !== undefined) {
      parts.push(amount.number.toFixed(amount.scale))
    }
    if (amount.currency !== undefined) {
      parts.push(amount.currency)
    }
    emit(sink, parts.join(' '))
  }

  renderCostSpec(cost: CostSpec, sink: Sink): void {
    const fields: string[] = []

    const amount: string[] = []
    const number = cost.displayNumber
    if (number !== undefined) {
      amount.push(number.value.toFixed(number.scale))
    }
    if (cost.currency !== undefined) {
      amount.push(cost.currency)
    }
    if (amount.length > 0) {
      fields.push(amount.join(' '))
    }
    if (cost.date !== undefined) {
      fields.push(formatDate(cost.date))
    }
    if (cost.label !== undefined) {
      fields.push(`"${cost.label}"`)
    }

    const [open, close] = cost.isTotal ? ['{{', '}}'] : ['{', '}']
    emit(sink, `${open}${fields.join(', ')}${close}`)
  }

  renderFlag(flag: Flag, sink: Sink): void {
    emit(sink, flagSymbol(flag))
  }

  renderMetadata(meta: Metadata, sink: Sink): void {
    for (const [key, value] of meta) {
      emit(sink, `\t${key}: ${value}\n`)
    }
  }
}
