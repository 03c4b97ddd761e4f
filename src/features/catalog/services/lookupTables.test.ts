/**
 * Tests for lookup table loading and resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  MEMBERS_FILE,
  PAYMENT_METHODS_FILE,
  PRODUCTS_FILE,
  StaticLookupTables,
  loadLookupTables
} from './lookupTables'
import { ConfigurationLoadError } from '@/shared/errors'
import { createTempDir, removeTempDir, writeJson } from '../../../../tests/helpers/test-utils'

describe('loadLookupTables', () => {
  let dataDir: string

  beforeEach(async () => {
    dataDir = await createTempDir()
    await writeJson(dataDir, MEMBERS_FILE, { '1234567890': 'John Doe' })
    await writeJson(dataDir, PRODUCTS_FILE, {
      COKE001: { name: 'Coca-Cola', price: 1.5, stock: 24 },
      CHIPS01: { name: 'Chips', price: 1 }
    })
    await writeJson(dataDir, PAYMENT_METHODS_FILE, { PAY_CASH: 'Cash' })
  })

  afterEach(async () => {
    await removeTempDir(dataDir)
  })

  it('should resolve codes from all three tables', async () => {
    const tables = await loadLookupTables(dataDir)

    expect(tables.resolveMember('1234567890')).toEqual({ code: '1234567890', name: 'John Doe' })
    expect(tables.resolveProduct('COKE001')).toEqual({
      code: 'COKE001',
      name: 'Coca-Cola',
      price: 1.5,
      initialStock: 24
    })
    expect(tables.resolvePaymentMethod('PAY_CASH')).toEqual({ code: 'PAY_CASH', name: 'Cash' })
    expect(tables.sizes).toEqual({ members: 1, products: 2, paymentMethods: 1 })
  })

  it('should default the initial stock to zero', async () => {
    const tables = await loadLookupTables(dataDir)

    expect(tables.resolveProduct('CHIPS01')?.initialStock).toBe(0)
  })

  it('should accept a negative stock carried over from oversold products', async () => {
    await writeJson(dataDir, PRODUCTS_FILE, { COKE001: { name: 'Coca-Cola', price: 1.5, stock: -2 } })

    const tables = await loadLookupTables(dataDir)

    expect(tables.resolveProduct('COKE001')?.initialStock).toBe(-2)
  })

  it('should reject a fractional stock', async () => {
    await writeJson(dataDir, PRODUCTS_FILE, { COKE001: { name: 'Coca-Cola', price: 1.5, stock: 2.5 } })

    await expect(loadLookupTables(dataDir)).rejects.toMatchObject({ source: PRODUCTS_FILE })
  })

  it('should fail when a table file is missing', async () => {
    const missingDir = join(dataDir, 'nowhere')

    await expect(loadLookupTables(missingDir)).rejects.toBeInstanceOf(ConfigurationLoadError)
  })

  it('should name the file holding invalid JSON', async () => {
    await writeFile(join(dataDir, PRODUCTS_FILE), '{ not json', 'utf-8')

    await expect(loadLookupTables(dataDir)).rejects.toMatchObject({
      code: 'CONFIGURATION_LOAD',
      source: PRODUCTS_FILE
    })
  })

  it('should reject a product without a price', async () => {
    await writeJson(dataDir, PRODUCTS_FILE, { COKE001: { name: 'Coca-Cola' } })

    const error = await loadLookupTables(dataDir).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConfigurationLoadError)
    expect(error).toMatchObject({ source: PRODUCTS_FILE })
    expect(error instanceof Error ? error.message : '').toContain('COKE001.price')
  })

  it('should reject a negative price', async () => {
    await writeJson(dataDir, PRODUCTS_FILE, { COKE001: { name: 'Coca-Cola', price: -1 } })

    await expect(loadLookupTables(dataDir)).rejects.toBeInstanceOf(ConfigurationLoadError)
  })

  it('should reject an empty member name', async () => {
    await writeJson(dataDir, MEMBERS_FILE, { '1234567890': '   ' })

    await expect(loadLookupTables(dataDir)).rejects.toMatchObject({ source: MEMBERS_FILE })
  })

  it('should reject a table that is not an object', async () => {
    await writeJson(dataDir, PAYMENT_METHODS_FILE, ['Cash'])

    await expect(loadLookupTables(dataDir)).rejects.toMatchObject({ source: PAYMENT_METHODS_FILE })
  })
})

describe('StaticLookupTables', () => {
  it('should return null for unknown codes', () => {
    const tables = new StaticLookupTables({ members: [], products: [], paymentMethods: [] })

    expect(tables.resolveMember('X')).toBeNull()
    expect(tables.resolveProduct('X')).toBeNull()
    expect(tables.resolvePaymentMethod('X')).toBeNull()
    expect(tables.listProducts()).toEqual([])
  })
})
