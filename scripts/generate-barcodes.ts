#!/usr/bin/env tsx

/**
 * Generate member barcode images
 *
 *   npm run generate-barcodes -- members.txt --json-output data/members.json
 *   npm run generate-barcodes -- data/members.json --output-dir barcodes --purge
 *
 * A .txt input (one name per line) first produces the members JSON file with
 * MEM_XXX keys; a .json input is used as is.
 */

import { existsSync } from 'node:fs'
import { extname } from 'node:path'
import { parseArgs } from 'node:util'
import { createBarcodeRenderer, DEFAULT_BARCODE_TYPE } from '../src/features/barcodes/barcodeRenderer'
import { generateMemberBarcodes, readMembersFile, writeMembersFile } from '../src/features/barcodes/barcodeBatch'
import { buildMembersTable, loadMemberNames } from '../src/features/barcodes/memberKeys'
import { describeError } from '../src/shared/errors'

const USAGE = 'Usage: generate-barcodes <members.txt|members.json> [--output-dir barcodes] [--prefix P] [--barcode-type code128] [--json-output data/members.json] [--purge]'

async function generateBarcodes(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'output-dir': { type: 'string', default: 'barcodes' },
      prefix: { type: 'string', default: '' },
      'barcode-type': { type: 'string', default: DEFAULT_BARCODE_TYPE },
      'json-output': { type: 'string', default: 'data/members.json' },
      purge: { type: 'boolean', default: false }
    }
  })

  const [inputFile] = positionals
  if (!inputFile) {
    console.error(USAGE)
    return 1
  }
  if (!existsSync(inputFile)) {
    console.error(`Error: input file '${inputFile}' not found`)
    return 1
  }

  let members: Record<string, string>
  const extension = extname(inputFile).toLowerCase()

  if (extension === '.txt') {
    console.log(`Processing member list from: ${inputFile}`)
    const table = buildMembersTable(await loadMemberNames(inputFile))
    for (const collision of table.collisions) {
      console.warn(`⚠️  ${collision.name} skipped: key ${collision.key} already used by ${collision.keptName}`)
    }
    await writeMembersFile(values['json-output'], table.members)
    members = table.members
    console.log(`✓ Created ${values['json-output']} with ${Object.keys(members).length} members (sorted alphabetically)`)
  } else if (extension === '.json') {
    console.log(`Using existing JSON file: ${inputFile}`)
    members = await readMembersFile(inputFile)
  } else {
    console.error('Error: input file must be .txt or .json')
    return 1
  }

  console.log(`\nGenerating ${Object.keys(members).length} barcodes into '${values['output-dir']}'\n`)

  const result = await generateMemberBarcodes(
    members,
    createBarcodeRenderer({ barcodeType: values['barcode-type'] }),
    { outputDir: values['output-dir'], prefix: values.prefix, purge: values.purge }
  )

  result.generated.forEach(path => console.log(`✓ ${path}`))
  result.failed.forEach(({ name, error }) => console.error(`✗ Error generating barcode for ${name}: ${error}`))

  console.log(`\n✓ Generated ${result.generated.length} barcodes in '${values['output-dir']}'`)
  return result.failed.length > 0 ? 1 : 0
}

generateBarcodes()
  .then(code => {
    process.exitCode = code
  })
  .catch(error => {
    console.error(`❌ Barcode generation failed: ${describeError(error)}`)
    process.exitCode = 1
  })
