/**
 * Transaction Log - append-only CSV record of every committed sale
 * One row per transaction, header written once when the file is created
 */

import { createReadStream } from 'node:fs'
import { mkdir, open, readFile, stat, type FileHandle } from 'node:fs/promises'
import { dirname } from 'node:path'
import { parse, type Options as ParseOptions } from 'csv-parse'
import { parse as parseSync } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { format, isValid, parse as parseDate } from 'date-fns'
import type { Transaction } from '@/features/checkout/types'
import { LogAppendFailure } from '@/shared/errors'
import { createLogger } from '@/shared/lib/logger'
import { formatAmount, roundToCents, sumAmounts } from '@/shared/lib/money'
import { TIMESTAMP_FORMAT, isDayInRange, type DateRange } from '../dateRange'

const log = createLogger('transaction-log')

export const LOG_HEADER = ['Timestamp', 'Member', 'Product', 'Amount', 'Payment Method'] as const

export interface TransactionLogger {
  append(transaction: Transaction): Promise<void>
  queryByDateRange(range: DateRange): AsyncIterable<Transaction>
}

export interface ExportResult {
  transactions: Transaction[]
  totalAmount: number
  outputPath: string | null
}

export function toLogRow(transaction: Transaction): string[] {
  return [
    format(transaction.timestamp, TIMESTAMP_FORMAT),
    transaction.memberName,
    transaction.productName,
    formatAmount(transaction.amount),
    transaction.paymentMethodName
  ]
}

/**
 * Parse a CSV row back into a transaction, null when the row is not a valid record
 */
export function fromLogRow(row: string[]): Transaction | null {
  if (row.length !== LOG_HEADER.length) return null

  const [timestampText, memberName, productName, amountText, paymentMethodName] = row
  const timestamp = parseDate(timestampText, TIMESTAMP_FORMAT, new Date())
  const amount = Number(amountText)

  if (!isValid(timestamp) || amountText.trim() === '' || !Number.isFinite(amount)) return null

  return {
    timestamp,
    memberName,
    productName,
    amount: roundToCents(amount),
    paymentMethodName
  }
}

export function formatLogLines(rows: string[][]): string {
  return stringify(rows, { record_delimiter: 'unix' })
}

export class CsvTransactionLog implements TransactionLogger {
  // Last row written whose flush failed; appending it again only flushes it
  private unflushedLine: string | null = null

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath
  }

  /**
   * Append a transaction and flush it to disk before resolving
   */
  async append(transaction: Transaction): Promise<void> {
    const line = formatLogLines([toLogRow(transaction)])

    try {
      await mkdir(dirname(this.filePath), { recursive: true })

      const handle = await open(this.filePath, 'a+')
      try {
        const { size } = await handle.stat()
        const alreadyWritten = this.unflushedLine === line && (await endsWith(handle, size, line))
        if (!alreadyWritten) {
          await handle.appendFile(size === 0 ? formatLogLines([[...LOG_HEADER]]) + line : line, 'utf-8')
          this.unflushedLine = line
        }
        await handle.sync()
        this.unflushedLine = null
      } finally {
        await handle.close()
      }
    } catch (error) {
      log.error({ err: error, file: this.filePath }, 'Failed to append transaction')
      throw new LogAppendFailure(transaction, error)
    }
  }

  /**
   * Lazy query over the log. Every iteration re-reads the file from the start.
   */
  queryByDateRange(range: DateRange): AsyncIterable<Transaction> {
    return {
      [Symbol.asyncIterator]: () => this.readRange(range)[Symbol.asyncIterator]()
    }
  }

  private async *readRange(range: DateRange): AsyncGenerator<Transaction> {
    if (!(await this.exists())) return

    const parser = createReadStream(this.filePath, { encoding: 'utf-8' }).pipe(parse(this.parseOptions()))

    let line = 1
    for await (const record of parser) {
      line++
      const transaction = isStringRow(record) ? fromLogRow(record) : null
      if (!transaction) {
        log.warn({ file: this.filePath, line }, 'Skipping malformed transaction row')
        continue
      }
      if (isDayInRange(format(transaction.timestamp, 'yyyy-MM-dd'), range)) {
        yield transaction
      }
    }
  }

  /**
   * Last `limit` transactions, most recent first
   */
  async readRecent(limit: number): Promise<Transaction[]> {
    if (!(await this.exists())) return []

    const records: unknown[] = parseSync(await readFile(this.filePath, 'utf-8'), this.parseOptions())

    const transactions: Transaction[] = []
    for (const record of records) {
      const transaction = isStringRow(record) ? fromLogRow(record) : null
      if (transaction) transactions.push(transaction)
    }

    return transactions.slice(-limit).reverse()
  }

  /**
   * Collect the transactions of a date range, optionally writing them to a new CSV file
   */
  async exportByDateRange(range: DateRange, outputPath?: string): Promise<ExportResult> {
    const transactions: Transaction[] = []
    for await (const transaction of this.queryByDateRange(range)) {
      transactions.push(transaction)
    }

    if (outputPath) {
      await mkdir(dirname(outputPath), { recursive: true })
      const handle = await open(outputPath, 'w')
      try {
        await handle.writeFile(formatLogLines([[...LOG_HEADER], ...transactions.map(toLogRow)]), 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      log.info({ outputPath, count: transactions.length }, 'Transactions exported')
    }

    return {
      transactions,
      totalAmount: sumAmounts(transactions.map(t => t.amount)),
      outputPath: outputPath ?? null
    }
  }

  // Rows that are not valid CSV are dropped by the parser, the others by fromLogRow
  private parseOptions(): ParseOptions {
    return {
      from_line: 2,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      on_skip: (error) => {
        log.warn({ file: this.filePath, line: error?.lines, reason: error?.message }, 'Skipping unreadable transaction row')
        return undefined
      }
    }
  }

  private async exists(): Promise<boolean> {
    try {
      return (await stat(this.filePath)).isFile()
    } catch (error) {
      if (isMissingFile(error)) return false
      throw error
    }
  }
}

async function endsWith(handle: FileHandle, size: number, text: string): Promise<boolean> {
  const length = Buffer.byteLength(text, 'utf-8')
  if (size < length) return false

  const { buffer, bytesRead } = await handle.read(Buffer.alloc(length), 0, length, size - length)
  return bytesRead === length && buffer.toString('utf-8') === text
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

function isStringRow(record: unknown): record is string[] {
  return Array.isArray(record) && record.every(cell => typeof cell === 'string')
}

/** Default export file name, e.g. `transactions_2024-05-01_to_2024-05-31_20240531_184500.csv` */
export function defaultExportFileName(range: DateRange, now: Date = new Date()): string {
  return `transactions_${range.from}_to_${range.to}_${format(now, 'yyyyMMdd_HHmmss')}.csv`
}
