/**
 * Types for the scan-driven checkout workflow
 */

import type { Member, PaymentMethod, Product } from '@/features/catalog/types'

export interface PendingOrder {
  member: Member | null
  product: Product | null
  paymentMethod: PaymentMethod | null
}

/** A pending order with every field resolved */
export type CompleteOrder = { [K in keyof PendingOrder]: NonNullable<PendingOrder[K]> }

export const EMPTY_ORDER: Readonly<PendingOrder> = Object.freeze({
  member: null,
  product: null,
  paymentMethod: null
})

export interface Transaction {
  timestamp: Date
  memberName: string
  productName: string
  amount: number
  paymentMethodName: string
}

export type ScanCategory = 'member' | 'product' | 'payment'

export interface ScanOutcome {
  category: ScanCategory
  /** Display name of the resolved entity */
  label: string
  /** Set when this scan completed the order */
  committed: Transaction | null
}

/** A transaction together with the order it was built from */
export interface CommittedSale {
  transaction: Transaction
  order: CompleteOrder
}

/** Sale whose append failed and is waiting for a retry */
export interface HeldCommit extends CommittedSale {
  error: string
  attempts: number
}

export type StatusLevel = 'info' | 'success' | 'warning' | 'error'

export interface StatusMessage {
  level: StatusLevel
  text: string
  at: Date
}

export const RECENT_HISTORY_SIZE = 5
