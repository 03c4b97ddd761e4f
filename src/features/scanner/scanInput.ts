/**
 * Scanner input - turns terminal lines into scans or operator commands
 *
 * USB scanners type the barcode and press Enter. Scanners configured for a QWERTY
 * layout but plugged into an AZERTY keyboard produce shifted characters, which
 * `remapAzerty` translates back.
 */

import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { KeyboardLayout } from '@/config/appConfig'

export type InputEvent =
  | { kind: 'scan'; code: string; raw: string }
  | { kind: 'command'; name: string; args: string[] }

export const COMMAND_PREFIX = ':'

export const COMMAND_NAMES = [
  'reset',
  'retry',
  'export',
  'stats',
  'stock',
  'stock-export',
  'receive',
  'low',
  'help',
  'quit',
  'exit'
] as const

export type CommandName = (typeof COMMAND_NAMES)[number]

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some(command => command === name)
}

const azertyMap: ReadonlyMap<string, string> = new Map(
  Object.entries(
    z.record(z.string().length(1)).parse(
      JSON.parse(readFileSync(fileURLToPath(new URL('./azertyMap.json', import.meta.url)), 'utf-8'))
    )
  )
)

export function remapAzerty(text: string): string {
  let result = ''
  for (const char of text) {
    result += azertyMap.get(char) ?? char
  }
  return result
}

/**
 * Parse one input line. Empty lines are ignored (null).
 * `:` followed by a known command name is a command, never remapped;
 * any other line, including codes starting with `:`, is a scan.
 */
export function parseInputLine(line: string, layout: KeyboardLayout = 'qwerty'): InputEvent | null {
  const trimmed = line.trim()
  if (trimmed === '') return null

  if (trimmed.startsWith(COMMAND_PREFIX)) {
    const [word = '', ...args] = trimmed.slice(COMMAND_PREFIX.length).split(/\s+/)
    const name = word.toLowerCase()
    if (isCommandName(name)) {
      return { kind: 'command', name, args }
    }
  }

  return {
    kind: 'scan',
    code: layout === 'azerty' ? remapAzerty(trimmed) : trimmed,
    raw: trimmed
  }
}
