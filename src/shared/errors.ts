/**
 * Error types raised by the stock manager
 * Every error carries a stable `code` so the terminal can decide how loud to be
 */

import type { Transaction } from '@/features/checkout/types'

export type StockManagerErrorCode =
  | 'UNRECOGNIZED_CODE'
  | 'LOG_APPEND_FAILURE'
  | 'CONFIGURATION_LOAD'
  | 'INVALID_DATE_RANGE'
  | 'INVALID_STOCK_QUANTITY'
  | 'UNKNOWN_PRODUCT'
  | 'NOTHING_TO_RETRY'
  | 'INVALID_MEMBER_NAME'

export class StockManagerError extends Error {
  constructor(
    message: string,
    public readonly code: StockManagerErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'StockManagerError'
  }
}

export class UnrecognizedCodeError extends StockManagerError {
  constructor(public readonly scannedCode: string) {
    super(`Unknown barcode: ${scannedCode}`, 'UNRECOGNIZED_CODE')
    this.name = 'UnrecognizedCodeError'
  }
}

/**
 * The transaction log could not durably store a completed sale.
 * The order stays pending until the append succeeds.
 */
export class LogAppendFailure extends StockManagerError {
  constructor(
    public readonly transaction: Transaction,
    cause: unknown
  ) {
    super(`Transaction could not be saved: ${describeError(cause)}`, 'LOG_APPEND_FAILURE', { cause })
    this.name = 'LogAppendFailure'
  }
}

export class ConfigurationLoadError extends StockManagerError {
  constructor(
    public readonly source: string,
    detail: string,
    cause?: unknown
  ) {
    super(`Cannot load ${source}: ${detail}`, 'CONFIGURATION_LOAD', { cause })
    this.name = 'ConfigurationLoadError'
  }
}

export class InvalidDateRangeError extends StockManagerError {
  constructor(message: string) {
    super(message, 'INVALID_DATE_RANGE')
    this.name = 'InvalidDateRangeError'
  }
}

export class InvalidStockQuantityError extends StockManagerError {
  constructor(quantity: string | number) {
    super(`Stock quantity must be a positive whole number, got: ${quantity}`, 'INVALID_STOCK_QUANTITY')
    this.name = 'InvalidStockQuantityError'
  }
}

export class UnknownProductError extends StockManagerError {
  constructor(public readonly productCode: string) {
    super(`No product with barcode: ${productCode}`, 'UNKNOWN_PRODUCT')
    this.name = 'UnknownProductError'
  }
}

export class NothingToRetryError extends StockManagerError {
  constructor() {
    super('There is no failed transaction to retry', 'NOTHING_TO_RETRY')
    this.name = 'NothingToRetryError'
  }
}

export class InvalidMemberNameError extends StockManagerError {
  constructor(name: string) {
    super(`Cannot derive a member key from name '${name}'`, 'INVALID_MEMBER_NAME')
    this.name = 'InvalidMemberNameError'
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
