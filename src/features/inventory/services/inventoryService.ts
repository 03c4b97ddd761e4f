/**
 * Inventory Service - stock levels kept beside the read-only product table
 * Sales decrement stock, receipts add to it; every movement is written to inventory_changes
 */

import { asc, eq, sql } from 'drizzle-orm'
import { monotonicFactory } from 'ulid'
import { writeFile } from 'node:fs/promises'
import { stringify } from 'csv-stringify/sync'
import type { InventoryDatabase } from '@/db/local/connection'
import { inventory, inventoryChanges, type StockChange, type StockChangeType, type StockLevel } from '@/db/local/schema'
import type { Product } from '@/features/catalog/types'
import { InvalidStockQuantityError, UnknownProductError } from '@/shared/errors'
import { createLogger } from '@/shared/lib/logger'
import { formatAmount } from '@/shared/lib/money'

const log = createLogger('inventory')

// Monotonic so change ids sort in write order
const nextChangeId = monotonicFactory()

export const DEFAULT_LOW_STOCK_THRESHOLD = 5

export type StockAlertLevel = 'critical' | 'warning' | 'low'

export interface LowStockEntry {
  code: string
  name: string
  price: number
  stock: number
  level: StockAlertLevel
}

export interface StockRow {
  code: string
  name: string
  price: number
  stock: number
}

export function stockAlertLevel(stock: number): StockAlertLevel {
  if (stock <= 0) return 'critical'
  if (stock < 3) return 'warning'
  return 'low'
}

export class InventoryService {
  constructor(
    private readonly db: InventoryDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Start tracking products that have no stock row yet.
   * Existing rows keep their counts.
   */
  seed(products: Product[]): number {
    const timestamp = this.now().toISOString()
    let added = 0

    this.db.transaction((tx) => {
      for (const product of products) {
        const result = tx
          .insert(inventory)
          .values({ productCode: product.code, currentStock: product.initialStock, lastUpdated: timestamp })
          .onConflictDoNothing()
          .run()
        added += result.changes
      }
    })

    if (added > 0) {
      log.info({ added }, 'Inventory seeded from product table')
    }
    return added
  }

  recordSale(productCode: string): StockChange {
    return this.applyChange(productCode, 'sale', -1)
  }

  receiveStock(productCode: string, quantity: number): StockChange {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new InvalidStockQuantityError(quantity)
    }
    return this.applyChange(productCode, 'receive', quantity)
  }

  getStock(productCode: string): number | null {
    const row = this.db
      .select()
      .from(inventory)
      .where(eq(inventory.productCode, productCode))
      .get()
    return row ? row.currentStock : null
  }

  listStock(): StockLevel[] {
    return this.db.select().from(inventory).orderBy(asc(inventory.productCode)).all()
  }

  listChanges(productCode: string): StockChange[] {
    return this.db
      .select()
      .from(inventoryChanges)
      .where(eq(inventoryChanges.productCode, productCode))
      .orderBy(asc(inventoryChanges.id))
      .all()
  }

  /**
   * Products under the threshold, lowest stock first
   */
  lowStockReport(products: Product[], threshold: number = DEFAULT_LOW_STOCK_THRESHOLD): LowStockEntry[] {
    return this.stockRows(products)
      .filter(row => row.stock < threshold)
      .sort((a, b) => a.stock - b.stock || a.name.localeCompare(b.name))
      .map(row => ({ ...row, level: stockAlertLevel(row.stock) }))
  }

  /**
   * Products with their stock, sorted by name; the filter matches barcode or name
   */
  stockRows(products: Product[], filter?: string): StockRow[] {
    const levels = new Map(this.listStock().map(level => [level.productCode, level.currentStock]))
    const needle = filter?.trim().toLowerCase() ?? ''

    return products
      .filter(product =>
        needle === '' ||
        product.code.toLowerCase().includes(needle) ||
        product.name.toLowerCase().includes(needle)
      )
      .map(product => ({
        code: product.code,
        name: product.name,
        price: product.price,
        stock: levels.get(product.code) ?? product.initialStock
      }))
      .sort((a, b) => a.name.localeCompare(b.name))
  }

  async exportStock(products: Product[], outputPath: string, filter?: string): Promise<number> {
    const rows = this.stockRows(products, filter)
    const csv = stringify(
      [['Barcode', 'Product', 'Price', 'Stock'], ...rows.map(row => [row.code, row.name, formatAmount(row.price), String(row.stock)])],
      { record_delimiter: 'unix' }
    )
    await writeFile(outputPath, csv, 'utf-8')
    log.info({ outputPath, count: rows.length }, 'Stock exported')
    return rows.length
  }

  private applyChange(productCode: string, changeType: StockChangeType, changeAmount: number): StockChange {
    const timestamp = this.now().toISOString()

    return this.db.transaction((tx) => {
      const updated = tx
        .update(inventory)
        .set({
          currentStock: sql`${inventory.currentStock} + ${changeAmount}`,
          lastUpdated: timestamp
        })
        .where(eq(inventory.productCode, productCode))
        .returning({ currentStock: inventory.currentStock })
        .get()

      if (!updated) {
        throw new UnknownProductError(productCode)
      }

      const change: StockChange = {
        id: nextChangeId(),
        productCode,
        changeType,
        changeAmount,
        newStockLevel: updated.currentStock,
        createdAt: timestamp
      }
      tx.insert(inventoryChanges).values(change).run()

      log.debug({ productCode, changeType, newStockLevel: change.newStockLevel }, 'Stock updated')
      return change
    })
  }
}
