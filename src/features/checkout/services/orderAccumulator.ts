/**
 * Order Accumulator - turns a stream of scanned codes into committed transactions
 *
 * Each code is classified against the member, product and payment tables in that
 * order (first match wins). As soon as all three fields of the pending order are
 * set the order is committed: the transaction log must store it before the
 * order is cleared and the sale appears in the recent history.
 */

import { EventEmitter } from 'node:events'
import type { LookupTables } from '@/features/catalog/types'
import type { TransactionLogger } from '@/features/transactions/services/transactionLog'
import { LogAppendFailure, NothingToRetryError, UnrecognizedCodeError } from '@/shared/errors'
import { createLogger } from '@/shared/lib/logger'
import { createOrderStore, type OrderStore } from '../store/orderStore'
import type {
  CommittedSale,
  CompleteOrder,
  PendingOrder,
  ScanCategory,
  ScanOutcome,
  Transaction
} from '../types'

const log = createLogger('order-accumulator')

export const COMMITTED_EVENT = 'committed'

/**
 * Narrow a pending order to a complete one, null while a field is missing
 */
export function asCompleteOrder(order: PendingOrder): CompleteOrder | null {
  const { member, product, paymentMethod } = order
  if (!member || !product || !paymentMethod) return null
  return { member, product, paymentMethod }
}

export function buildTransaction(order: CompleteOrder, at: Date): Transaction {
  return {
    // The log keeps second precision
    timestamp: new Date(Math.floor(at.getTime() / 1000) * 1000),
    memberName: order.member.name,
    productName: order.product.name,
    amount: order.product.price,
    paymentMethodName: order.paymentMethod.name
  }
}

export interface OrderAccumulatorOptions {
  store?: OrderStore
  clock?: () => Date
}

export class OrderAccumulator extends EventEmitter {
  readonly store: OrderStore
  private readonly clock: () => Date

  constructor(
    private readonly tables: LookupTables,
    private readonly transactionLog: TransactionLogger,
    options: OrderAccumulatorOptions = {}
  ) {
    super()
    this.store = options.store ?? createOrderStore()
    this.clock = options.clock ?? (() => new Date())
  }

  get pending(): PendingOrder {
    return this.store.getState().pending
  }

  /**
   * Classify one scanned code and commit when the order becomes complete.
   * Throws UnrecognizedCodeError for unknown codes and LogAppendFailure when
   * the completed sale could not be stored.
   */
  async scan(code: string): Promise<ScanOutcome> {
    const { category, label } = this.classify(code)

    const complete = asCompleteOrder(this.pending)
    const committed = complete
      ? await this.persist({ transaction: buildTransaction(complete, this.clock()), order: complete })
      : null

    return { category, label, committed }
  }

  /**
   * Append the held transaction again, unchanged
   */
  async retryCommit(): Promise<Transaction> {
    const held = this.store.getState().heldCommit
    if (!held) {
      throw new NothingToRetryError()
    }

    log.info({ attempts: held.attempts }, 'Retrying transaction append')
    return this.persist({ transaction: held.transaction, order: held.order })
  }

  /**
   * Discard the pending order, whatever it holds
   */
  reset(): void {
    const { heldCommit } = this.store.getState()
    if (heldCommit) {
      log.warn({ transaction: heldCommit.transaction }, 'Order cancelled with an unsaved transaction')
    }
    this.store.getState().clearOrder()
  }

  onCommitted(listener: (sale: CommittedSale) => void): () => void {
    this.on(COMMITTED_EVENT, listener)
    return () => {
      this.off(COMMITTED_EVENT, listener)
    }
  }

  private classify(code: string): { category: ScanCategory; label: string } {
    const state = this.store.getState()

    const member = this.tables.resolveMember(code)
    if (member) {
      state.setMember(member)
      return { category: 'member', label: member.name }
    }

    const product = this.tables.resolveProduct(code)
    if (product) {
      state.setProduct(product)
      return { category: 'product', label: product.name }
    }

    const paymentMethod = this.tables.resolvePaymentMethod(code)
    if (paymentMethod) {
      state.setPaymentMethod(paymentMethod)
      return { category: 'payment', label: paymentMethod.name }
    }

    log.debug({ code }, 'Barcode not found in any table')
    throw new UnrecognizedCodeError(code)
  }

  private async persist(sale: CommittedSale): Promise<Transaction> {
    const { transaction } = sale
    try {
      await this.transactionLog.append(transaction)
    } catch (error) {
      const failure = error instanceof LogAppendFailure ? error : new LogAppendFailure(transaction, error)
      this.store.getState().holdCommit(sale, failure.message)
      log.error({ err: error, transaction }, 'Transaction kept pending, append failed')
      throw failure
    }

    this.store.getState().recordCommit(transaction)
    log.info(
      {
        member: transaction.memberName,
        product: transaction.productName,
        amount: transaction.amount,
        payment: transaction.paymentMethodName
      },
      'Transaction recorded'
    )
    this.emit(COMMITTED_EVENT, sale)
    return transaction
  }
}
