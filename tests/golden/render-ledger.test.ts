import { describe, it, expect } from 'vitest'
import * as fs from 'node:fs/promises'
import { LedgerRenderer } from '../../src/core/renderer/ledger-renderer.js'
import { Account } from '../../src/core/domain/account.js'
import { Amount } from '../../src/core/domain/amount.js'
import type { Ledger } from '../../src/core/domain/directive.js'
import { EMPTY_METADATA, toMetadata } from '../../src/core/domain/metadata.js'
import { toDate } from '../../src/core/utils/date.js'
import { PriceBuilder } from '../../src/testing/builders/price-builder.js'
import { TransactionBuilder } from '../../src/testing/builders/transaction-builder.js'

const checking = Account.parse('Assets:Bank:Checking')
const food = Account.parse('Expenses:Food')
const opening = Account.parse('Equity:Opening-Balances')

const household: Ledger = {
  directives: [
    { type: 'option', name: 'title', value: 'Household' },
    { type: 'plugin', module: 'beancount.plugins.implicit_prices', meta: EMPTY_METADATA },
    { type: 'include', filename: 'prices.beancount', meta: EMPTY_METADATA },
    { type: 'commodity', date: toDate('2020-01-01'), name: 'USD', meta: toMetadata({ name: '"US Dollar"' }) },
    {
      type: 'open',
      date: toDate('2020-01-01'),
      account: checking,
      currencies: ['USD'],
      booking: 'strict',
      meta: EMPTY_METADATA
    },
    { type: 'open', date: toDate('2020-01-01'), account: food, currencies: [], booking: 'none', meta: EMPTY_METADATA },
    { type: 'open', date: toDate('2020-01-01'), account: opening, currencies: [], booking: 'none', meta: EMPTY_METADATA },
    {
      type: 'pad',
      date: toDate('2020-01-02'),
      padToAccount: checking,
      padFromAccount: opening,
      meta: EMPTY_METADATA
    },
    {
      type: 'balance',
      date: toDate('2020-01-03'),
      account: checking,
      amount: new Amount({ number: '1000.00', currency: 'USD' }),
      meta: EMPTY_METADATA
    },
    new TransactionBuilder()
      .withDate('2020-01-04')
      .withPayee('Grocer')
      .withNarration('Weekly shop')
      .withTag('food')
      .addPosting('Expenses:Food', '45.10', 'USD')
      .addPosting('Assets:Bank:Checking', '-45.10', 'USD')
      .build(),
    { type: 'note', date: toDate('2020-01-05'), account: checking, comment: 'Overdraft limit raised', meta: EMPTY_METADATA },
    { type: 'document', date: toDate('2020-01-06'), account: checking, path: 'docs/jan.pdf', meta: EMPTY_METADATA },
    { type: 'event', date: toDate('2020-01-07'), name: 'location', description: 'Lisbon', meta: EMPTY_METADATA },
    new PriceBuilder().withDate('2020-01-08').withCurrency('EUR').withPrice('1.10', 'USD').build(),
    {
      type: 'query',
      date: toDate('2020-01-09'),
      name: 'food',
      queryString: 'SELECT sum(position) WHERE account ~ \'Food\'',
      meta: EMPTY_METADATA
    },
    {
      type: 'custom',
      date: toDate('2020-01-10'),
      name: 'budget',
      args: ['Expenses:Food', '"monthly"', '200.00 USD'],
      meta: EMPTY_METADATA
    },
    { type: 'close', date: toDate('2020-12-31'), account: food, meta: EMPTY_METADATA }
  ]
}

describe('Golden Tests: render household ledger', () => {
  it('should match the expected journal text', async () => {
    const expected = await fs.readFile(new URL('./fixtures/household.beancount', import.meta.url), 'utf-8')

    expect(new LedgerRenderer().renderToString(household)).toBe(expected)
  })
})
