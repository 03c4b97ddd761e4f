/**
 * Tests for the Order Store
 */

import { describe, it, expect, beforeEach, vi } from 'vitest'
import { createOrderStore, type OrderStore } from './orderStore'
import { CASH, COKE, JOHN, makeTransaction } from '../../../../tests/helpers/test-utils'

describe('OrderStore', () => {
  let store: OrderStore

  beforeEach(() => {
    store = createOrderStore(3)
  })

  describe('Initial State', () => {
    it('should start with an empty order and no history', () => {
      const state = store.getState()

      expect(state.pending).toEqual({ member: null, product: null, paymentMethod: null })
      expect(state.recent).toEqual([])
      expect(state.heldCommit).toBeNull()
      expect(state.status).toBeNull()
      expect(state.isComplete()).toBe(false)
    })
  })

  describe('Pending order', () => {
    it('should be complete once all three fields are set', () => {
      store.getState().setMember(JOHN)
      store.getState().setProduct(COKE)
      expect(store.getState().isComplete()).toBe(false)

      store.getState().setPaymentMethod(CASH)
      expect(store.getState().isComplete()).toBe(true)
    })

    it('should notify subscribers on change', () => {
      const listener = vi.fn()
      store.subscribe(listener)

      store.getState().setMember(JOHN)

      expect(listener).toHaveBeenCalledTimes(1)
    })
  })

  describe('recordCommit', () => {
    it('should evict the oldest entry beyond the history size', () => {
      const transactions = [1, 2, 3, 4].map(amount => makeTransaction({ amount }))
      for (const transaction of transactions) {
        store.getState().recordCommit(transaction)
      }

      expect(store.getState().recent.map(t => t.amount)).toEqual([4, 3, 2])
    })

    it('should empty the pending order', () => {
      store.getState().setMember(JOHN)
      store.getState().recordCommit(makeTransaction())

      expect(store.getState().pending.member).toBeNull()
    })
  })

  describe('holdCommit', () => {
    it('should keep the pending order and count attempts', () => {
      const order = { member: JOHN, product: COKE, paymentMethod: CASH }
      const sale = { transaction: makeTransaction(), order }
      store.getState().setMember(JOHN)

      store.getState().holdCommit(sale, 'first')
      store.getState().holdCommit(sale, 'second')

      const { heldCommit, pending } = store.getState()
      expect(heldCommit).toEqual({ ...sale, error: 'second', attempts: 2 })
      expect(pending.member).toEqual(JOHN)
    })

    it('should be cleared with the order', () => {
      const order = { member: JOHN, product: COKE, paymentMethod: CASH }
      store.getState().holdCommit({ transaction: makeTransaction(), order }, 'failed')

      store.getState().clearOrder()

      expect(store.getState().heldCommit).toBeNull()
    })
  })

  describe('loadRecent', () => {
    it('should keep at most the history size', () => {
      store.getState().loadRecent([1, 2, 3, 4, 5].map(amount => makeTransaction({ amount })))

      expect(store.getState().recent.map(t => t.amount)).toEqual([1, 2, 3])
    })
  })

  describe('setStatus', () => {
    it('should stamp the status with the current time', () => {
      vi.useFakeTimers()
      vi.setSystemTime(new Date('2024-01-01T12:00:00Z'))

      store.getState().setStatus('warning', 'Careful')

      expect(store.getState().status).toEqual({
        level: 'warning',
        text: 'Careful',
        at: new Date('2024-01-01T12:00:00Z')
      })
    })
  })
})
