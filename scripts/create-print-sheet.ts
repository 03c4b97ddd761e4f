#!/usr/bin/env tsx

/**
 * Assemble member barcodes into a printable A4 sheet
 *
 *   npm run create-print-sheet -- --barcode-dir barcodes --json-file data/members.json
 */

import { existsSync } from 'node:fs'
import { parseArgs } from 'node:util'
import { readMembersFile } from '../src/features/barcodes/barcodeBatch'
import { A4_SHEET, createPrintSheet } from '../src/features/barcodes/printSheet'
import { describeError } from '../src/shared/errors'

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      'barcode-dir': { type: 'string', default: 'barcodes' },
      'json-file': { type: 'string', default: 'data/members.json' },
      output: { type: 'string', default: 'member_sheet.png' },
      columns: { type: 'string', default: String(A4_SHEET.columns) }
    }
  })

  const columns = Number(values.columns)
  if (!Number.isInteger(columns) || columns < 1) {
    console.error(`Error: --columns must be a positive whole number, got '${values.columns}'`)
    return 1
  }
  if (!existsSync(values['barcode-dir'])) {
    console.error(`Error: barcode directory '${values['barcode-dir']}' not found`)
    return 1
  }
  if (!existsSync(values['json-file'])) {
    console.error(`Error: JSON file '${values['json-file']}' not found`)
    return 1
  }

  const members = await readMembersFile(values['json-file'])
  const result = await createPrintSheet(values['barcode-dir'], members, values.output, { ...A4_SHEET, columns })

  result.missing.forEach(name => console.warn(`Warning: barcode not found for ${name}`))
  console.log(`\n✓ Created print sheet: ${values.output}`)
  console.log(`✓ Sheet contains ${result.placed} barcodes in ${columns} columns`)
  console.log(`✓ Total rows: ${result.rows}`)
  return 0
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch(error => {
    console.error(`❌ Print sheet failed: ${describeError(error)}`)
    process.exitCode = 1
  })
