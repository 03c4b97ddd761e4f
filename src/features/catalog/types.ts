/**
 * Entities resolved from scanned codes
 * Loaded once from the data directory and never mutated at runtime
 */

export interface Member {
  code: string
  name: string
}

export interface Product {
  code: string
  name: string
  price: number
  /** Seed value for the inventory ledger */
  initialStock: number
}

export interface PaymentMethod {
  code: string
  name: string
}

export interface LookupTables {
  resolveMember(code: string): Member | null
  resolveProduct(code: string): Product | null
  resolvePaymentMethod(code: string): PaymentMethod | null
  listProducts(): Product[]
}
