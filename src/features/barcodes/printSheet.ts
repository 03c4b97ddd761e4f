/**
 * A4 print sheet with member barcodes laid out in columns
 * Everything is scaled so the whole list fits on one page at 300 DPI
 */

import { existsSync } from 'node:fs'
import sharp from 'sharp'
import { createLogger } from '@/shared/lib/logger'
import { barcodeImagePath } from './barcodeBatch'

const log = createLogger('print-sheet')

export interface SheetOptions {
  pageWidth: number
  pageHeight: number
  margin: number
  spacing: number
  columns: number
}

// 210 x 297 mm at 300 DPI
export const A4_SHEET: SheetOptions = {
  pageWidth: 2480,
  pageHeight: 3508,
  margin: 80,
  spacing: 30,
  columns: 2
}

export interface ImageSize {
  width: number
  height: number
}

export interface Placement extends ImageSize {
  left: number
  top: number
}

export function computeSheetLayout(sizes: ImageSize[], options: SheetOptions = A4_SHEET): Placement[] {
  const { pageWidth, pageHeight, margin, spacing, columns } = options
  if (sizes.length === 0) return []

  const cellWidth = Math.floor((pageWidth - 2 * margin - (columns - 1) * spacing) / columns)
  const rows = Math.ceil(sizes.length / columns)
  const maxCellHeight = Math.floor((pageHeight - 2 * margin - (rows - 1) * spacing) / rows)

  const scaled = sizes.map(({ width, height }) => {
    const aspectRatio = height / width
    let newWidth = cellWidth
    let newHeight = Math.floor(cellWidth * aspectRatio)
    if (newHeight > maxCellHeight) {
      newHeight = maxCellHeight
      newWidth = Math.floor(newHeight / aspectRatio)
    }
    return { width: newWidth, height: newHeight }
  })

  const placements: Placement[] = []
  let top = margin
  for (let row = 0; row < rows; row++) {
    const rowItems = scaled.slice(row * columns, (row + 1) * columns)
    rowItems.forEach((size, col) => {
      const cellLeft = margin + col * (cellWidth + spacing)
      placements.push({ ...size, left: cellLeft + Math.floor((cellWidth - size.width) / 2), top })
    })
    top += Math.max(...rowItems.map(size => size.height)) + spacing
  }

  return placements
}

/** Members ordered by name, as printed on the sheet */
export function sortMembersByName(members: Record<string, string>): Array<[string, string]> {
  return Object.entries(members).sort(([, a], [, b]) => (a < b ? -1 : a > b ? 1 : 0))
}

export interface PrintSheetResult {
  placed: number
  missing: string[]
  rows: number
}

export async function createPrintSheet(
  barcodeDir: string,
  members: Record<string, string>,
  outputFile: string,
  options: SheetOptions = A4_SHEET
): Promise<PrintSheetResult> {
  const missing: string[] = []
  const images: Array<{ path: string; size: ImageSize }> = []

  for (const [, name] of sortMembersByName(members)) {
    const path = barcodeImagePath(barcodeDir, name)
    if (!existsSync(path)) {
      log.warn({ name, path }, 'Barcode not found for member')
      missing.push(name)
      continue
    }
    const { width, height } = await sharp(path).metadata()
    if (!width || !height) {
      log.warn({ name, path }, 'Barcode image has no dimensions')
      missing.push(name)
      continue
    }
    images.push({ path, size: { width, height } })
  }

  if (images.length === 0) {
    throw new Error(`No barcode images found in ${barcodeDir}`)
  }

  const placements = computeSheetLayout(images.map(image => image.size), options)
  const layers = await Promise.all(
    placements.map(async (placement, index) => ({
      input: await sharp(images[index].path).resize(placement.width, placement.height).toBuffer(),
      left: placement.left,
      top: placement.top
    }))
  )

  await sharp({
    create: {
      width: options.pageWidth,
      height: options.pageHeight,
      channels: 3,
      background: '#ffffff'
    }
  })
    .composite(layers)
    .png()
    .withMetadata({ density: 300 })
    .toFile(outputFile)

  return {
    placed: placements.length,
    missing,
    rows: Math.ceil(placements.length / options.columns)
  }
}
