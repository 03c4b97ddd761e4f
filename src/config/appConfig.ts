/**
 * Application configuration
 * Environment variables, optionally overlaid by `settings.local.json` in the data directory
 */

import { existsSync, readFileSync } from 'node:fs'
import { isAbsolute, join, resolve } from 'node:path'
import { z } from 'zod'
import { ConfigurationLoadError, describeError } from '@/shared/errors'

export type KeyboardLayout = 'qwerty' | 'azerty'

export interface AppConfig {
  dataDir: string
  transactionsFile: string
  databasePath: string
  keyboardLayout: KeyboardLayout
  lowStockThreshold: number
  logLevel: string
}

export interface ConfigValidationResult {
  isValid: boolean
  errors: string[]
  warnings: string[]
  config?: AppConfig
}

export const SETTINGS_FILE = 'settings.local.json'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const settingsSchema = z
  .object({
    transactionsFile: z.string().min(1),
    databasePath: z.string().min(1),
    keyboardLayout: z.string(),
    lowStockThreshold: z.number(),
    logLevel: z.string()
  })
  .partial()
  .strict()

type Settings = z.infer<typeof settingsSchema>

function readSettings(dataDir: string, warnings: string[], errors: string[]): Settings {
  const settingsPath = join(dataDir, SETTINGS_FILE)
  if (!existsSync(settingsPath)) return {}

  try {
    const result = settingsSchema.safeParse(JSON.parse(readFileSync(settingsPath, 'utf-8')))
    if (result.success) return result.data

    for (const issue of result.error.issues) {
      errors.push(`${SETTINGS_FILE}: ${issue.path.join('.') || '(root)'} ${issue.message}`)
    }
  } catch (error) {
    warnings.push(`Failed to read ${SETTINGS_FILE} (${describeError(error)}), using environment variables`)
  }
  return {}
}

function resolveIn(dataDir: string, file: string): string {
  return file === ':memory:' || isAbsolute(file) ? file : join(dataDir, file)
}

/**
 * Validate configuration on startup
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): ConfigValidationResult {
  const errors: string[] = []
  const warnings: string[] = []

  const dataDir = resolve(env.STOCK_DATA_DIR ?? 'data')
  if (!existsSync(dataDir)) {
    errors.push(`Data directory not found: ${dataDir}. Set STOCK_DATA_DIR or create ./data`)
  }

  const settings = errors.length === 0 ? readSettings(dataDir, warnings, errors) : {}

  const transactionsFile = settings.transactionsFile ?? env.STOCK_TRANSACTIONS_FILE ?? 'transactions.csv'
  const databasePath = settings.databasePath ?? env.STOCK_DATABASE_PATH ?? 'inventory.db'

  const keyboardLayout = (settings.keyboardLayout ?? env.STOCK_KEYBOARD_LAYOUT ?? 'qwerty').toLowerCase()
  if (keyboardLayout !== 'qwerty' && keyboardLayout !== 'azerty') {
    errors.push(`Keyboard layout must be 'qwerty' or 'azerty', got '${keyboardLayout}'`)
  }

  let lowStockThreshold = settings.lowStockThreshold ?? parseInt(env.STOCK_LOW_STOCK_THRESHOLD ?? '5', 10)
  if (!Number.isInteger(lowStockThreshold) || lowStockThreshold < 0) {
    warnings.push(`Low stock threshold should be a whole number >= 0. Using default: 5`)
    lowStockThreshold = 5
  }

  let logLevel = settings.logLevel ?? env.LOG_LEVEL ?? 'info'
  if (!LOG_LEVELS.some(level => level === logLevel)) {
    warnings.push(`Unknown log level '${logLevel}'. Using default: info`)
    logLevel = 'info'
  }

  if (errors.length > 0) {
    return { isValid: false, errors, warnings }
  }

  return {
    isValid: true,
    errors,
    warnings,
    config: {
      dataDir,
      transactionsFile: resolveIn(dataDir, transactionsFile),
      databasePath: resolveIn(dataDir, databasePath),
      keyboardLayout: keyboardLayout === 'azerty' ? 'azerty' : 'qwerty',
      lowStockThreshold,
      logLevel
    }
  }
}

/**
 * Get validated configuration
 * Throws if configuration is invalid, listing every problem found
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): { config: AppConfig; warnings: string[] } {
  const result = validateConfig(env)

  if (!result.isValid || !result.config) {
    throw new ConfigurationLoadError('configuration', result.errors.join('; '))
  }

  return { config: result.config, warnings: result.warnings }
}
