/**
 * Terminal Controller - routes scans and operator commands to the services
 * and keeps the status line in the order store up to date
 */

import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { AppContext } from '@/app/appContext'
import type { InputEvent } from '@/features/scanner/scanInput'
import { createDateRange, type DateRange } from '@/features/transactions/dateRange'
import { collectSalesStats, formatSalesReport } from '@/features/transactions/services/salesStats'
import { defaultExportFileName } from '@/features/transactions/services/transactionLog'
import { LogAppendFailure, StockManagerError, UnrecognizedCodeError, describeError } from '@/shared/errors'
import { createLogger } from '@/shared/lib/logger'
import { formatCurrency } from '@/shared/lib/money'
import { HELP_TEXT, formatTransactionLine, renderScreen } from './renderScreen'

const log = createLogger('terminal')

export interface CommandResult {
  /** Extra text shown below the screen */
  output?: string
  quit?: boolean
}

const CATEGORY_LABEL = {
  member: 'Member',
  product: 'Product',
  payment: 'Payment'
} as const

export class TerminalController {
  constructor(private readonly context: AppContext) {}

  private get state() {
    return this.context.accumulator.store.getState()
  }

  render(): string {
    const { pending, recent, status, heldCommit } = this.state
    return renderScreen({
      pending,
      recent,
      status,
      heldCommit,
      lowStock: this.context.inventory.lowStockReport(
        this.context.tables.listProducts(),
        this.context.config.lowStockThreshold
      )
    })
  }

  /**
   * Handle one input event. Errors become status messages, except unexpected
   * failures while scanning, which propagate.
   */
  async handle(event: InputEvent): Promise<CommandResult> {
    try {
      return event.kind === 'scan' ? await this.handleScan(event.code) : await this.handleCommand(event.name, event.args)
    } catch (error) {
      if (error instanceof UnrecognizedCodeError) {
        this.state.setStatus('error', error.message)
        return {}
      }
      if (error instanceof LogAppendFailure) {
        this.state.setStatus('error', `${error.message}. The order is kept, type :retry`)
        return {}
      }
      if (error instanceof StockManagerError) {
        this.state.setStatus('warning', error.message)
        return {}
      }
      if (event.kind === 'command') {
        log.error({ err: error, command: event.name }, 'Command failed')
        this.state.setStatus('error', `:${event.name} failed: ${describeError(error)}`)
        return {}
      }
      throw error
    }
  }

  private async handleScan(code: string): Promise<CommandResult> {
    const statusBefore = this.state.status
    const outcome = await this.context.accumulator.scan(code)

    if (outcome.committed) {
      const { paymentMethodName, amount } = outcome.committed
      const recorded = `Transaction recorded: ${formatCurrency(amount)} paid by ${paymentMethodName}`
      // A committed listener may have warned while the sale was being recorded
      const { status } = this.state
      if (status && status !== statusBefore && status.level === 'warning') {
        this.state.setStatus('warning', `${recorded}. ${status.text}`)
      } else {
        this.state.setStatus('success', recorded)
      }
    } else {
      this.state.setStatus('info', `${CATEGORY_LABEL[outcome.category]}: ${outcome.label}`)
    }
    return {}
  }

  private async handleCommand(name: string, args: string[]): Promise<CommandResult> {
    switch (name) {
      case 'reset':
        this.context.accumulator.reset()
        this.state.setStatus('info', 'Order cancelled')
        return {}

      case 'retry': {
        const transaction = await this.context.accumulator.retryCommit()
        this.state.setStatus('success', `Transaction recorded: ${formatCurrency(transaction.amount)} paid by ${transaction.paymentMethodName}`)
        return {}
      }

      case 'export':
        return this.exportTransactions(args)

      case 'stats':
        return this.showStats(args)

      case 'stock': {
        const rows = this.context.inventory.stockRows(this.context.tables.listProducts(), args.join(' '))
        const lines = rows.map(row => `${row.code} | ${row.name} | ${formatCurrency(row.price)} | ${row.stock}`)
        return { output: [...lines, `${rows.length} product(s) shown`].join('\n') }
      }

      case 'stock-export': {
        const [file, ...filter] = args
        if (!file) return this.usage(':stock-export <file> [filter]')
        const count = await this.context.inventory.exportStock(this.context.tables.listProducts(), file, filter.join(' '))
        this.state.setStatus('success', `${count} product(s) exported to ${file}`)
        return {}
      }

      case 'receive': {
        const [code, quantityText] = args
        if (!code || !quantityText) return this.usage(':receive <barcode> <qty>')
        const quantity = Number(quantityText)
        const change = this.context.inventory.receiveStock(code, quantity)
        this.state.setStatus('success', `Added ${quantity} to stock of ${code}. New stock: ${change.newStockLevel}`)
        return {}
      }

      case 'low': {
        const entries = this.context.inventory.lowStockReport(
          this.context.tables.listProducts(),
          this.context.config.lowStockThreshold
        )
        const lines = entries.map(entry => `${entry.name}: ${entry.stock} (${entry.level})`)
        return { output: lines.length > 0 ? lines.join('\n') : 'No product is running low' }
      }

      case 'help':
        return { output: HELP_TEXT }

      case 'quit':
      case 'exit':
        return { quit: true }

      default:
        this.state.setStatus('warning', `Unknown command :${name}. Type :help`)
        return {}
    }
  }

  private parseRange(args: string[]): DateRange | null {
    const [from, to] = args
    return from && to ? createDateRange(from, to) : null
  }

  private async exportTransactions(args: string[]): Promise<CommandResult> {
    const range = this.parseRange(args)
    if (!range) return this.usage(':export <from> <to> [file]')

    const outputPath = args[2] ?? join(this.context.config.dataDir, 'exports', defaultExportFileName(range))
    const result = await this.context.transactionLog.exportByDateRange(range, outputPath)

    this.state.setStatus(
      'success',
      `Total: ${result.transactions.length} transactions - ${formatCurrency(result.totalAmount)}, exported to ${outputPath}`
    )
    return { output: result.transactions.map(formatTransactionLine).join('\n') }
  }

  private async showStats(args: string[]): Promise<CommandResult> {
    const range = this.parseRange(args)
    if (!range) return this.usage(':stats <from> <to> [file]')

    const stats = await collectSalesStats(this.context.transactionLog.queryByDateRange(range), range)
    const report = formatSalesReport(stats)

    const file = args[2]
    if (file) {
      await writeFile(file, report, 'utf-8')
      this.state.setStatus('success', `Statistics exported to ${file}`)
    }
    return { output: report }
  }

  private usage(text: string): CommandResult {
    this.state.setStatus('warning', `Usage: ${text}`)
    return {}
  }
}
