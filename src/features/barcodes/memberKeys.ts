/**
 * Member keys - short deterministic codes derived from member names
 *
 *   "Alexis Damiens" -> MEM_ADA
 *   "Zoé"            -> MEM_ZOE
 */

import { readFile } from 'node:fs/promises'
import { InvalidMemberNameError } from '@/shared/errors'

export const MEMBER_KEY_PREFIX = 'MEM_'

export function removeAccents(text: string): string {
  return text.normalize('NFD').replace(/\p{Mn}/gu, '')
}

function head(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('')
}

export function generateMemberKey(name: string): string {
  const parts = removeAccents(name.trim()).toUpperCase().split(/\s+/).filter(part => part !== '')

  if (parts.length === 0) {
    throw new InvalidMemberNameError(name)
  }

  if (parts.length === 1) {
    return `${MEMBER_KEY_PREFIX}${head(parts[0], 3)}`
  }

  // First initial + first two letters of the last part
  return `${MEMBER_KEY_PREFIX}${head(parts[0], 1)}${head(parts[parts.length - 1], 2)}`
}

/** One name per non-blank line */
export function parseMemberNames(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '')
}

export async function loadMemberNames(txtFile: string): Promise<string[]> {
  return parseMemberNames(await readFile(txtFile, 'utf-8'))
}

export interface KeyCollision {
  name: string
  key: string
  keptName: string
}

export interface MembersTable {
  members: Record<string, string>
  collisions: KeyCollision[]
}

/**
 * Sort names alphabetically and key them. A name whose key is already taken
 * is left out and reported, so no member silently replaces another.
 */
export function buildMembersTable(names: string[]): MembersTable {
  const members: Record<string, string> = {}
  const collisions: KeyCollision[] = []

  for (const name of [...names].sort()) {
    const key = generateMemberKey(name)
    const keptName = members[key]
    if (keptName !== undefined) {
      collisions.push({ name, key, keptName })
      continue
    }
    members[key] = name
  }

  return { members, collisions }
}

/** File-system safe name: every character that is not a letter or digit becomes `_` */
export function safeFileName(name: string): string {
  return name.replace(/[^\p{L}\p{N}]/gu, '_')
}
