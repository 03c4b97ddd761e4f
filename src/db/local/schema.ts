/**
 * Local SQLite schema for the inventory ledger
 * Table definitions mirror schema.sql, which creates them on first open
 */

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core'

// Current stock per product barcode
export const inventory = sqliteTable('inventory', {
  productCode: text('product_code').primaryKey(),
  currentStock: integer('current_stock').notNull().default(0),
  lastUpdated: text('last_updated').notNull()
})

// Every stock movement, newest last
export const inventoryChanges = sqliteTable('inventory_changes', {
  id: text('id').primaryKey(), // ULID
  productCode: text('product_code').references(() => inventory.productCode).notNull(),
  changeType: text('change_type', { enum: ['sale', 'receive'] }).notNull(),
  changeAmount: integer('change_amount').notNull(), // negative for sales
  newStockLevel: integer('new_stock_level').notNull(),
  createdAt: text('created_at').notNull()
}, (table) => ({
  productIdx: index('inventory_changes_product_idx').on(table.productCode),
  createdAtIdx: index('inventory_changes_created_at_idx').on(table.createdAt)
}))

export type StockLevel = typeof inventory.$inferSelect
export type NewStockLevel = typeof inventory.$inferInsert
export type StockChange = typeof inventoryChanges.$inferSelect
export type NewStockChange = typeof inventoryChanges.$inferInsert
export type StockChangeType = StockChange['changeType']
