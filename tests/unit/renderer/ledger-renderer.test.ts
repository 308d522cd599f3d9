import { describe, it, expect } from 'vitest'
import { LedgerRenderer } from '../../../src/core/renderer/ledger-renderer.js'
import { StringSink, type Sink } from '../../../src/core/ports/sink.js'
import { Account } from '../../../src/core/domain/account.js'
import type { Directive } from '../../../src/core/domain/directive.js'
import { EMPTY_METADATA } from '../../../src/core/domain/metadata.js'
import {
  RenderError,
  RenderIoError,
  UnsupportedDirectiveError
} from '../../../src/core/errors/render-error.js'
import { toDate } from '../../../src/core/utils/date.js'
import { TransactionBuilder } from '../../../src/testing/builders/transaction-builder.js'

const renderer = new LedgerRenderer()

const close: Directive = {
  type: 'close',
  date: toDate('2024-12-31'),
  account: Account.parse('Assets:Cash'),
  meta: EMPTY_METADATA
}

const option: Directive = { type: 'option', name: 'operating_currency', value: 'USD' }

class FailingSink implements Sink {
  readonly written: string[] = []

  constructor(private readonly failAfter: number) {}

  write(chunk: string): void {
    if (this.written.length >= this.failAfter) {
      throw new Error('disk full')
    }
    this.written.push(chunk)
  }
}

describe('LedgerRenderer', () => {
  it('should render directives in stored order separated by blank lines', () => {
    const output = renderer.renderToString({ directives: [option, close] })

    expect(output).toBe(
      'option "operating_currency" "USD"\n' +
      '\n' +
      '2024-12-31 close Assets:Cash\n' +
      '\n'
    )
  })

  it('should render an empty ledger as nothing', () => {
    expect(renderer.renderToString({ directives: [] })).toBe('')
  })

  it('should fail on an unsupported directive and keep earlier output', () => {
    const sink = new StringSink()
    const ledger = { directives: [option, { type: 'unsupported' } as const, close] }

    expect(() => renderer.render(ledger, sink)).toThrow(UnsupportedDirectiveError)
    expect(sink.toString()).toBe('option "operating_currency" "USD"\n\n')
  })

  it('should report unsupported directives with their code', () => {
    let caught: unknown
    try {
      renderer.renderDirective({ type: 'unsupported', reason: 'balance-check plugin node' }, new StringSink())
    } catch (e) {
      caught = e
    }

    expect(caught).toBeInstanceOf(RenderError)
    expect(caught).toMatchObject({
      code: 'unsupported',
      reason: 'balance-check plugin node',
      message: 'Cannot render unsupported directive (balance-check plugin node)'
    })
  })

  it('should wrap sink failures in an io error and stop writing', () => {
    const sink = new FailingSink(2)
    const txn = new TransactionBuilder()
      .withDate('2023-03-05')
      .withNarration('Coffee')
      .addPosting('Expenses:Food', '5.00', 'USD')
      .build()

    let caught: unknown
    try {
      renderer.render({ directives: [txn, close] }, sink)
    } catch (e) {
      caught = e
    }

    expect(caught).toBeInstanceOf(RenderIoError)
    expect(caught).toMatchObject({ code: 'io', message: 'Failed to write rendered ledger: disk full' })
    expect(caught instanceof Error ? caught.cause : undefined).toEqual(new Error('disk full'))
    expect(sink.written).toEqual(['2023-03-05 ', '*'])
  })

  it('should wrap a sink failure only once', () => {
    const sink = new FailingSink(0)
    let caught: unknown
    try {
      renderer.renderDirective(close, sink)
    } catch (e) {
      caught = e
    }

    expect(caught).toBeInstanceOf(RenderIoError)
    expect(caught instanceof Error ? caught.cause : undefined).not.toBeInstanceOf(RenderError)
  })

  it('should render documents one at a time exactly as a ledger', () => {
    const sink = new StringSink()
    renderer.renderDocument(option, sink)
    renderer.renderDocument(close, sink)

    expect(sink.toString()).toBe(renderer.renderToString({ directives: [option, close] }))
  })

  it('should be reusable across calls', () => {
    const first = renderer.renderToString({ directives: [close] })
    const second = renderer.renderToString({ directives: [close] })
    expect(first).toBe(second)
  })

  describe('appendToLedger', () => {
    it('should add a blank line after existing content', () => {
      const result = renderer.appendToLedger('option "title" "Home"\n\n\n', [close])
      expect(result).toBe('option "title" "Home"\n\n2024-12-31 close Assets:Cash\n\n')
    })

    it('should start an empty ledger without leading blank lines', () => {
      expect(renderer.appendToLedger('  \n', [close])).toBe('2024-12-31 close Assets:Cash\n\n')
    })
  })
})
