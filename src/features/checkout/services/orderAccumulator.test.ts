/**
 * Tests for the Order Accumulator
 * Classification priority, overwrite semantics, commit, reset and append failures
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { OrderAccumulator, asCompleteOrder, buildTransaction } from './orderAccumulator'
import { StaticLookupTables } from '@/features/catalog/services/lookupTables'
import type { CommittedSale } from '../types'
import { LogAppendFailure, NothingToRetryError, UnrecognizedCodeError } from '@/shared/errors'
import {
  CARD,
  CASH,
  COKE,
  JANE,
  JOHN,
  MemoryTransactionLog,
  WATER,
  createTestTables
} from '../../../../tests/helpers/test-utils'

const FIXED_NOW = new Date(2024, 0, 15, 12, 30, 45, 678)

describe('OrderAccumulator', () => {
  let transactionLog: MemoryTransactionLog
  let accumulator: OrderAccumulator

  beforeEach(() => {
    transactionLog = new MemoryTransactionLog()
    accumulator = new OrderAccumulator(createTestTables(), transactionLog, { clock: () => FIXED_NOW })
  })

  describe('Classification', () => {
    it('should set only the member field for a member code', async () => {
      const outcome = await accumulator.scan(JOHN.code)

      expect(outcome).toEqual({ category: 'member', label: 'John Doe', committed: null })
      expect(accumulator.pending).toEqual({ member: JOHN, product: null, paymentMethod: null })
    })

    it('should set only the product field for a product code', async () => {
      const outcome = await accumulator.scan(COKE.code)

      expect(outcome).toEqual({ category: 'product', label: 'Coca-Cola', committed: null })
      expect(accumulator.pending).toEqual({ member: null, product: COKE, paymentMethod: null })
    })

    it('should set only the payment field for a payment code', async () => {
      const outcome = await accumulator.scan(CASH.code)

      expect(outcome).toEqual({ category: 'payment', label: 'Cash', committed: null })
      expect(accumulator.pending).toEqual({ member: null, product: null, paymentMethod: CASH })
    })

    it('should leave other fields untouched when a category is filled', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(CARD.code)

      expect(accumulator.pending).toEqual({ member: JOHN, product: null, paymentMethod: CARD })
    })

    it('should prefer the member table when a code exists in several tables', async () => {
      const tables = new StaticLookupTables({
        members: [{ code: 'SHARED', name: 'Shared Member' }],
        products: [{ code: 'SHARED', name: 'Shared Product', price: 2, initialStock: 0 }],
        paymentMethods: [{ code: 'SHARED', name: 'Shared Payment' }]
      })
      const overlapping = new OrderAccumulator(tables, transactionLog)

      const outcome = await overlapping.scan('SHARED')

      expect(outcome.category).toBe('member')
      expect(overlapping.pending.product).toBeNull()
    })

    it('should prefer the product table over the payment table', async () => {
      const tables = new StaticLookupTables({
        members: [],
        products: [{ code: 'SHARED', name: 'Shared Product', price: 2, initialStock: 0 }],
        paymentMethods: [{ code: 'SHARED', name: 'Shared Payment' }]
      })
      const overlapping = new OrderAccumulator(tables, transactionLog)

      expect((await overlapping.scan('SHARED')).category).toBe('product')
    })

    it('should match codes case-sensitively', async () => {
      await expect(accumulator.scan('coke001')).rejects.toBeInstanceOf(UnrecognizedCodeError)
    })
  })

  describe('Unknown codes', () => {
    it('should reject with the raw code and leave the order unchanged', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
      const before = accumulator.pending

      const error = await accumulator.scan('XXXX').catch((e: unknown) => e)

      expect(error).toBeInstanceOf(UnrecognizedCodeError)
      expect(error).toMatchObject({ scannedCode: 'XXXX', code: 'UNRECOGNIZED_CODE' })
      expect(accumulator.pending).toEqual(before)
      expect(transactionLog.appendCalls).toBe(0)
    })
  })

  describe('Re-scan', () => {
    it('should replace the member with the second member scanned', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(JANE.code)

      expect(accumulator.pending.member).toEqual(JANE)
    })

    it('should replace the product and keep the member', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
      await accumulator.scan(WATER.code)

      expect(accumulator.pending).toEqual({ member: JOHN, product: WATER, paymentMethod: null })
    })
  })

  describe('Commit', () => {
    const expected = {
      timestamp: new Date(2024, 0, 15, 12, 30, 45, 0),
      memberName: 'John Doe',
      productName: 'Coca-Cola',
      amount: 1.5,
      paymentMethodName: 'Cash'
    }

    it('should commit member, product, payment into one transaction', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
      const outcome = await accumulator.scan(CASH.code)

      expect(outcome.committed).toEqual(expected)
      expect(transactionLog.entries).toEqual([expected])
      expect(accumulator.pending).toEqual({ member: null, product: null, paymentMethod: null })
    })

    it('should produce the same transaction whatever the scan order', async () => {
      await accumulator.scan(COKE.code)
      await accumulator.scan(JOHN.code)
      await accumulator.scan(CASH.code)

      expect(transactionLog.entries).toEqual([expected])
    })

    it('should commit exactly once when payment is scanned first', async () => {
      await accumulator.scan(CASH.code)
      await accumulator.scan(COKE.code)
      const outcome = await accumulator.scan(JOHN.code)

      expect(outcome.category).toBe('member')
      expect(outcome.committed).toEqual(expected)
      expect(transactionLog.appendCalls).toBe(1)
    })

    it('should add the transaction to the recent history', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
      await accumulator.scan(CASH.code)

      expect(accumulator.store.getState().recent).toEqual([expected])
    })

    it('should keep only the five most recent transactions, newest first', async () => {
      const members = [JOHN, JANE, JOHN, JANE, JOHN, JANE, JOHN]
      for (const [index, member] of members.entries()) {
        await accumulator.scan(member.code)
        await accumulator.scan(index % 2 === 0 ? COKE.code : WATER.code)
        await accumulator.scan(CASH.code)
      }

      const recent = accumulator.store.getState().recent
      expect(transactionLog.entries).toHaveLength(7)
      expect(recent).toHaveLength(5)
      expect(recent).toEqual(transactionLog.entries.slice(2).reverse())
    })

    it('should notify committed listeners with the order', async () => {
      const sales: CommittedSale[] = []
      accumulator.onCommitted(sale => sales.push(sale))

      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
      await accumulator.scan(CASH.code)

      expect(sales).toHaveLength(1)
      expect(sales[0].order).toEqual({ member: JOHN, product: COKE, paymentMethod: CASH })
    })

    it('should stop notifying once unsubscribed', async () => {
      const sales: CommittedSale[] = []
      const unsubscribe = accumulator.onCommitted(sale => sales.push(sale))
      unsubscribe()

      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
      await accumulator.scan(CASH.code)

      expect(sales).toHaveLength(0)
    })
  })

  describe('Reset', () => {
    it('should empty a partial order without appending', async () => {
      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)

      accumulator.reset()

      expect(accumulator.pending).toEqual({ member: null, product: null, paymentMethod: null })
      expect(transactionLog.appendCalls).toBe(0)
    })

    it('should be idempotent', () => {
      accumulator.reset()
      accumulator.reset()

      expect(accumulator.pending).toEqual({ member: null, product: null, paymentMethod: null })
    })
  })

  describe('Append failure', () => {
    beforeEach(async () => {
      transactionLog.failNext()
      await accumulator.scan(JOHN.code)
      await accumulator.scan(COKE.code)
    })

    it('should reject with LogAppendFailure and keep the order pending', async () => {
      await expect(accumulator.scan(CASH.code)).rejects.toBeInstanceOf(LogAppendFailure)

      const state = accumulator.store.getState()
      expect(state.pending).toEqual({ member: JOHN, product: COKE, paymentMethod: CASH })
      expect(state.recent).toEqual([])
      expect(state.heldCommit).toMatchObject({
        attempts: 1,
        error: 'Transaction could not be saved: disk unavailable'
      })
    })

    it('should record the held transaction on retry', async () => {
      await accumulator.scan(CASH.code).catch(() => undefined)

      const transaction = await accumulator.retryCommit()

      const state = accumulator.store.getState()
      expect(transactionLog.entries).toEqual([transaction])
      expect(state.recent).toEqual([transaction])
      expect(state.pending).toEqual({ member: null, product: null, paymentMethod: null })
      expect(state.heldCommit).toBeNull()
    })

    it('should count repeated failures', async () => {
      transactionLog.failNext(2)
      await accumulator.scan(CASH.code).catch(() => undefined)
      await accumulator.retryCommit().catch(() => undefined)

      expect(accumulator.store.getState().heldCommit?.attempts).toBe(2)
      expect(transactionLog.entries).toEqual([])
    })

    it('should discard the held transaction on reset', async () => {
      await accumulator.scan(CASH.code).catch(() => undefined)

      accumulator.reset()

      expect(accumulator.store.getState().heldCommit).toBeNull()
      await expect(accumulator.retryCommit()).rejects.toBeInstanceOf(NothingToRetryError)
    })
  })

  describe('retryCommit', () => {
    it('should reject when nothing is held', async () => {
      await expect(accumulator.retryCommit()).rejects.toBeInstanceOf(NothingToRetryError)
    })
  })
})

describe('asCompleteOrder', () => {
  it('should return null while a field is missing', () => {
    expect(asCompleteOrder({ member: JOHN, product: COKE, paymentMethod: null })).toBeNull()
  })

  it('should truncate the timestamp to whole seconds', () => {
    const order = asCompleteOrder({ member: JOHN, product: COKE, paymentMethod: CASH })
    expect(order).not.toBeNull()
    if (!order) return

    expect(buildTransaction(order, FIXED_NOW).timestamp.getMilliseconds()).toBe(0)
  })
})
