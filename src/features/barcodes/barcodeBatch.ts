/**
 * Batch generation of member barcode images from a members table
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { ConfigurationLoadError, describeError } from '@/shared/errors'
import { createLogger } from '@/shared/lib/logger'
import type { BarcodeRenderer } from './barcodeRenderer'
import { safeFileName } from './memberKeys'

const log = createLogger('barcodes')

const membersFileSchema = z.record(z.string().min(1))

export interface BatchOptions {
  outputDir: string
  prefix?: string
  purge?: boolean
}

export interface BatchResult {
  generated: string[]
  failed: Array<{ name: string; error: string }>
}

export function barcodeImagePath(dir: string, name: string): string {
  return join(dir, `${safeFileName(name)}.png`)
}

export async function readMembersFile(jsonFile: string): Promise<Record<string, string>> {
  let json: unknown
  try {
    json = JSON.parse(await readFile(jsonFile, 'utf-8'))
  } catch (error) {
    throw new ConfigurationLoadError(jsonFile, describeError(error), error)
  }

  const result = membersFileSchema.safeParse(json)
  if (!result.success) {
    throw new ConfigurationLoadError(jsonFile, 'expected an object of barcode -> member name', result.error)
  }
  return result.data
}

export async function writeMembersFile(jsonFile: string, members: Record<string, string>): Promise<void> {
  await writeFile(jsonFile, JSON.stringify(members, null, 2) + '\n', 'utf-8')
}

/**
 * Render one image per member. A failing member is reported and the batch goes on.
 */
export async function generateMemberBarcodes(
  members: Record<string, string>,
  render: BarcodeRenderer,
  options: BatchOptions
): Promise<BatchResult> {
  if (options.purge) {
    log.info({ outputDir: options.outputDir }, 'Purging output directory')
    await rm(options.outputDir, { recursive: true, force: true })
  }
  await mkdir(options.outputDir, { recursive: true })

  const result: BatchResult = { generated: [], failed: [] }

  for (const [code, name] of Object.entries(members)) {
    const outputPath = barcodeImagePath(options.outputDir, name)
    try {
      await render(name, `${options.prefix ?? ''}${code}`, outputPath)
      result.generated.push(outputPath)
    } catch (error) {
      log.error({ err: error, name }, 'Barcode generation failed')
      result.failed.push({ name, error: describeError(error) })
    }
  }

  return result
}
