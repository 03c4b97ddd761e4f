/**
 * Application context - every long-lived service, built once at startup
 * and handed to the terminal instead of living in module globals
 */

import type { AppConfig } from '@/config/appConfig'
import { openInventoryDatabase } from '@/db/local/connection'
import { loadLookupTables, type StaticLookupTables } from '@/features/catalog/services/lookupTables'
import { OrderAccumulator } from '@/features/checkout/services/orderAccumulator'
import { createOrderStore } from '@/features/checkout/store/orderStore'
import { RECENT_HISTORY_SIZE } from '@/features/checkout/types'
import { InventoryService } from '@/features/inventory/services/inventoryService'
import { CsvTransactionLog } from '@/features/transactions/services/transactionLog'
import { createLogger } from '@/shared/lib/logger'

const log = createLogger('app')

export interface AppContext {
  config: AppConfig
  tables: StaticLookupTables
  transactionLog: CsvTransactionLog
  inventory: InventoryService
  accumulator: OrderAccumulator
  close: () => void
}

export async function createAppContext(config: AppConfig): Promise<AppContext> {
  // Fails with ConfigurationLoadError before anything else is opened
  const tables = await loadLookupTables(config.dataDir)

  const connection = openInventoryDatabase(config.databasePath)
  const inventory = new InventoryService(connection.db)
  inventory.seed(tables.listProducts())

  const transactionLog = new CsvTransactionLog(config.transactionsFile)
  const store = createOrderStore(RECENT_HISTORY_SIZE)
  store.getState().loadRecent(await transactionLog.readRecent(RECENT_HISTORY_SIZE))

  const accumulator = new OrderAccumulator(tables, transactionLog, { store })

  // The sale is already in the log at this point; a stock error must not undo it
  const unsubscribe = accumulator.onCommitted(({ order }) => {
    const { product } = order
    try {
      inventory.recordSale(product.code)
    } catch (error) {
      log.error({ err: error, product: product.code }, 'Stock not updated for recorded sale')
      store.getState().setStatus('warning', `Stock for ${product.name} was not updated`)
    }
  })

  return {
    config,
    tables,
    transactionLog,
    inventory,
    accumulator,
    close: () => {
      unsubscribe()
      connection.close()
    }
  }
}
