/**
 * Plain-text rendering of the checkout screen
 */

import { format } from 'date-fns'
import type { PendingOrder, StatusMessage, Transaction, HeldCommit } from '@/features/checkout/types'
import type { LowStockEntry } from '@/features/inventory/services/inventoryService'
import { TIMESTAMP_FORMAT } from '@/features/transactions/dateRange'
import { formatCurrency } from '@/shared/lib/money'

export interface ScreenView {
  pending: PendingOrder
  recent: Transaction[]
  status: StatusMessage | null
  heldCommit: HeldCommit | null
  lowStock: LowStockEntry[]
}

const EMPTY_FIELD = '---'

const STATUS_PREFIX: Record<StatusMessage['level'], string> = {
  info: '[i]',
  success: '[ok]',
  warning: '[!]',
  error: '[ERROR]'
}

const ALERT_MARK: Record<LowStockEntry['level'], string> = {
  critical: '!!',
  warning: '! ',
  low: '  '
}

export function renderScreen(view: ScreenView): string {
  const { pending } = view
  const lines: string[] = [
    '=== Stock Manager ===',
    '',
    `Member:  ${pending.member?.name ?? EMPTY_FIELD}`,
    `Product: ${pending.product ? `${pending.product.name} (${formatCurrency(pending.product.price)})` : EMPTY_FIELD}`,
    `Payment: ${pending.paymentMethod?.name ?? EMPTY_FIELD}`,
    `Amount:  ${formatCurrency(pending.product?.price ?? 0)}`,
    ''
  ]

  if (view.heldCommit) {
    lines.push(
      `[ERROR] UNSAVED SALE (${view.heldCommit.attempts} failed attempt(s)): ${view.heldCommit.error}`,
      '        Type :retry to save it again or :reset to cancel it.',
      ''
    )
  }

  if (view.status) {
    lines.push(`${STATUS_PREFIX[view.status.level]} ${view.status.text}`, '')
  }

  lines.push('--- Recent transactions ---')
  if (view.recent.length === 0) {
    lines.push('(none)')
  }
  for (const transaction of view.recent) {
    lines.push(formatTransactionLine(transaction))
  }

  if (view.lowStock.length > 0) {
    lines.push('', '--- Low stock ---')
    for (const entry of view.lowStock) {
      lines.push(`${ALERT_MARK[entry.level]} ${entry.name}: ${entry.stock}`)
    }
  }

  return lines.join('\n')
}

export function formatTransactionLine(transaction: Transaction): string {
  return [
    format(transaction.timestamp, TIMESTAMP_FORMAT),
    transaction.memberName,
    transaction.productName,
    formatCurrency(transaction.amount),
    transaction.paymentMethodName
  ].join(' | ')
}

export const HELP_TEXT = [
  'Scan a member, a product and a payment method to record a sale.',
  'Commands:',
  '  :reset                        cancel the current order',
  '  :retry                        save a sale whose recording failed',
  '  :export <from> <to> [file]    export transactions (dates as YYYY-MM-DD)',
  '  :stats <from> <to> [file]     sales statistics for a period',
  '  :stock [filter]               list stock levels',
  '  :stock-export <file> [filter] write stock levels to a CSV file',
  '  :receive <barcode> <qty>      add received units to stock',
  '  :low                          list products running low',
  '  :help                         show this help',
  '  :quit                         leave the application'
].join('\n')
