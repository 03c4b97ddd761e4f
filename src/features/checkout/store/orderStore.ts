/**
 * Order Store - zustand store holding the pending order and the recent sales view
 * Owned by the order accumulator; the terminal only reads it and subscribes to changes
 */

import { createStore, type StoreApi } from 'zustand/vanilla'
import type { Member, PaymentMethod, Product } from '@/features/catalog/types'
import {
  EMPTY_ORDER,
  RECENT_HISTORY_SIZE,
  type CommittedSale,
  type HeldCommit,
  type PendingOrder,
  type StatusLevel,
  type StatusMessage,
  type Transaction
} from '../types'

export interface OrderState {
  // State
  pending: PendingOrder
  recent: Transaction[]
  heldCommit: HeldCommit | null
  status: StatusMessage | null
  historySize: number

  // Actions
  setMember: (member: Member) => void
  setProduct: (product: Product) => void
  setPaymentMethod: (paymentMethod: PaymentMethod) => void
  clearOrder: () => void
  recordCommit: (transaction: Transaction) => void
  holdCommit: (sale: CommittedSale, error: string) => void
  loadRecent: (transactions: Transaction[]) => void
  setStatus: (level: StatusLevel, text: string) => void

  // Utility functions
  isComplete: () => boolean
}

export type OrderStore = StoreApi<OrderState>

export function createOrderStore(historySize: number = RECENT_HISTORY_SIZE): OrderStore {
  return createStore<OrderState>()((set, get) => ({
    // Initial state
    pending: { ...EMPTY_ORDER },
    recent: [],
    heldCommit: null,
    status: null,
    historySize,

    setMember: (member: Member) => {
      set({ pending: { ...get().pending, member } })
    },

    setProduct: (product: Product) => {
      set({ pending: { ...get().pending, product } })
    },

    setPaymentMethod: (paymentMethod: PaymentMethod) => {
      set({ pending: { ...get().pending, paymentMethod } })
    },

    clearOrder: () => {
      set({ pending: { ...EMPTY_ORDER }, heldCommit: null })
    },

    // Successful append: newest first, oldest evicted, order emptied
    recordCommit: (transaction: Transaction) => {
      const { recent, historySize: size } = get()
      set({
        recent: [transaction, ...recent].slice(0, size),
        pending: { ...EMPTY_ORDER },
        heldCommit: null
      })
    },

    // Failed append: the pending order stays as it is
    holdCommit: (sale: CommittedSale, error: string) => {
      const previous = get().heldCommit
      set({
        heldCommit: {
          ...sale,
          error,
          attempts: (previous?.attempts ?? 0) + 1
        }
      })
    },

    loadRecent: (transactions: Transaction[]) => {
      set({ recent: transactions.slice(0, get().historySize) })
    },

    setStatus: (level: StatusLevel, text: string) => {
      set({ status: { level, text, at: new Date() } })
    },

    isComplete: () => {
      const { member, product, paymentMethod } = get().pending
      return member !== null && product !== null && paymentMethod !== null
    }
  }))
}
