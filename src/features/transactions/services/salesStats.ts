/**
 * Sales statistics over a period of the transaction log
 */

import type { Transaction } from '@/features/checkout/types'
import { formatCurrency, roundToCents, sumAmounts } from '@/shared/lib/money'
import type { DateRange } from '../dateRange'

export const TOP_MEMBERS_LIMIT = 10

export interface AmountBreakdown {
  name: string
  count: number
  amount: number
}

export interface PaymentBreakdown extends AmountBreakdown {
  /** Share of the period total, in percent */
  share: number
}

export interface SalesStats {
  range: DateRange
  transactionCount: number
  totalAmount: number
  averageAmount: number
  byPaymentMethod: PaymentBreakdown[]
  topMembers: AmountBreakdown[]
}

function groupBy(transactions: Transaction[], key: (t: Transaction) => string): AmountBreakdown[] {
  const groups = new Map<string, AmountBreakdown>()
  for (const transaction of transactions) {
    const name = key(transaction)
    const group = groups.get(name) ?? { name, count: 0, amount: 0 }
    group.count += 1
    group.amount = roundToCents(group.amount + transaction.amount)
    groups.set(name, group)
  }
  return [...groups.values()]
}

export function computeSalesStats(transactions: Transaction[], range: DateRange): SalesStats {
  const totalAmount = sumAmounts(transactions.map(t => t.amount))
  const transactionCount = transactions.length

  const byPaymentMethod = groupBy(transactions, t => t.paymentMethodName)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(group => ({
      ...group,
      share: totalAmount > 0 ? (group.amount / totalAmount) * 100 : 0
    }))

  const topMembers = groupBy(transactions, t => t.memberName)
    .sort((a, b) => b.amount - a.amount)
    .slice(0, TOP_MEMBERS_LIMIT)

  return {
    range,
    transactionCount,
    totalAmount,
    averageAmount: transactionCount > 0 ? roundToCents(totalAmount / transactionCount) : 0,
    byPaymentMethod,
    topMembers
  }
}

export async function collectSalesStats(
  source: AsyncIterable<Transaction>,
  range: DateRange
): Promise<SalesStats> {
  const transactions: Transaction[] = []
  for await (const transaction of source) {
    transactions.push(transaction)
  }
  return computeSalesStats(transactions, range)
}

export function formatSalesReport(stats: SalesStats): string {
  const lines = [
    `Period: ${stats.range.from} to ${stats.range.to}`,
    '',
    '=== SUMMARY ===',
    `Transactions: ${stats.transactionCount}`,
    `Total amount: ${formatCurrency(stats.totalAmount)}`
  ]
  if (stats.transactionCount > 0) {
    lines.push(`Average amount: ${formatCurrency(stats.averageAmount)}`)
  }

  lines.push('', '=== BY PAYMENT METHOD ===')
  for (const method of stats.byPaymentMethod) {
    lines.push(`${method.name}: ${method.count} transactions - ${formatCurrency(method.amount)} (${method.share.toFixed(1)}%)`)
  }

  lines.push('', `=== TOP ${TOP_MEMBERS_LIMIT} MEMBERS ===`)
  stats.topMembers.forEach((member, index) => {
    lines.push(`${index + 1}. ${member.name}: ${member.count} transactions - ${formatCurrency(member.amount)}`)
  })

  return lines.join('\n') + '\n'
}
