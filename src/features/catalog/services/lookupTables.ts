/**
 * Lookup tables for members, products and payment methods
 * Each table is a JSON object keyed by barcode, validated once at startup
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { ConfigurationLoadError, describeError } from '@/shared/errors'
import { createLogger } from '@/shared/lib/logger'
import type { LookupTables, Member, PaymentMethod, Product } from '../types'

const log = createLogger('lookup-tables')

export const MEMBERS_FILE = 'members.json'
export const PRODUCTS_FILE = 'products.json'
export const PAYMENT_METHODS_FILE = 'payment_methods.json'

const nameSchema = z.string().trim().min(1, 'name must not be empty')

const membersSchema = z.record(nameSchema)

const productsSchema = z.record(
  z.object({
    name: nameSchema,
    price: z.number().finite().nonnegative(),
    stock: z.number().int().optional()
  })
)

const paymentMethodsSchema = z.record(nameSchema)

/**
 * In-memory lookup tables backed by maps
 */
export class StaticLookupTables implements LookupTables {
  private readonly members: Map<string, Member>
  private readonly products: Map<string, Product>
  private readonly paymentMethods: Map<string, PaymentMethod>

  constructor(data: {
    members: Member[]
    products: Product[]
    paymentMethods: PaymentMethod[]
  }) {
    this.members = new Map(data.members.map(member => [member.code, member]))
    this.products = new Map(data.products.map(product => [product.code, product]))
    this.paymentMethods = new Map(data.paymentMethods.map(method => [method.code, method]))
  }

  resolveMember(code: string): Member | null {
    return this.members.get(code) ?? null
  }

  resolveProduct(code: string): Product | null {
    return this.products.get(code) ?? null
  }

  resolvePaymentMethod(code: string): PaymentMethod | null {
    return this.paymentMethods.get(code) ?? null
  }

  listProducts(): Product[] {
    return [...this.products.values()]
  }

  get sizes(): { members: number; products: number; paymentMethods: number } {
    return {
      members: this.members.size,
      products: this.products.size,
      paymentMethods: this.paymentMethods.size
    }
  }
}

async function readTable<T extends z.ZodTypeAny>(
  dataDir: string,
  fileName: string,
  schema: T
): Promise<z.infer<T>> {
  const filePath = join(dataDir, fileName)

  let raw: string
  try {
    raw = await readFile(filePath, 'utf-8')
  } catch (error) {
    throw new ConfigurationLoadError(fileName, `file not readable at ${filePath} (${describeError(error)})`, error)
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new ConfigurationLoadError(fileName, `invalid JSON (${describeError(error)})`, error)
  }

  const result = schema.safeParse(json)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigurationLoadError(fileName, issues, result.error)
  }

  return result.data
}

/**
 * Load and validate the three tables from the data directory.
 * Any missing or malformed file aborts the load; partial tables are never returned.
 */
export async function loadLookupTables(dataDir: string): Promise<StaticLookupTables> {
  const [members, products, paymentMethods] = await Promise.all([
    readTable(dataDir, MEMBERS_FILE, membersSchema),
    readTable(dataDir, PRODUCTS_FILE, productsSchema),
    readTable(dataDir, PAYMENT_METHODS_FILE, paymentMethodsSchema)
  ])

  const tables = new StaticLookupTables({
    members: Object.entries(members).map(([code, name]) => ({ code, name })),
    products: Object.entries(products).map(([code, product]) => ({
      code,
      name: product.name,
      price: product.price,
      initialStock: product.stock ?? 0
    })),
    paymentMethods: Object.entries(paymentMethods).map(([code, name]) => ({ code, name }))
  })

  log.info(tables.sizes, 'Lookup tables loaded')
  return tables
}
