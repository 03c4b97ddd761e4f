/**
 * Barcode images for member cards: name above the symbol, encoded data below
 */

import bwipjs from 'bwip-js'
import sharp from 'sharp'

export const DEFAULT_BARCODE_TYPE = 'code128'

export interface BarcodeImageOptions {
  barcodeType?: string
  /** Pixels per module */
  scale?: number
  /** Bar height in millimetres */
  barHeight?: number
}

export type BarcodeRenderer = (name: string, data: string, outputPath: string) => Promise<void>

const LABEL_HEIGHT = 60
const LABEL_FONT_SIZE = 24

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;')
}

export function nameLabelSvg(name: string, width: number): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${LABEL_HEIGHT}">`,
    `<text x="50%" y="${LABEL_HEIGHT - 20}" text-anchor="middle" font-family="Arial, sans-serif" font-size="${LABEL_FONT_SIZE}" fill="#000000">${escapeXml(name)}</text>`,
    '</svg>'
  ].join('')
}

/**
 * Render one labelled barcode to a PNG file
 */
export async function renderMemberBarcode(
  name: string,
  data: string,
  outputPath: string,
  options: BarcodeImageOptions = {}
): Promise<void> {
  const symbol = await bwipjs.toBuffer({
    bcid: options.barcodeType ?? DEFAULT_BARCODE_TYPE,
    text: data,
    scale: options.scale ?? 3,
    height: options.barHeight ?? 10,
    includetext: true,
    textxalign: 'center',
    paddingwidth: 10,
    paddingheight: 5,
    backgroundcolor: 'FFFFFF'
  })

  const { width } = await sharp(symbol).metadata()
  if (!width) {
    throw new Error(`Barcode renderer returned an image without dimensions for ${name}`)
  }

  await sharp(symbol)
    .extend({ top: LABEL_HEIGHT, bottom: 0, left: 0, right: 0, background: '#ffffff' })
    .composite([{ input: Buffer.from(nameLabelSvg(name, width)), top: 0, left: 0 }])
    .png()
    .toFile(outputPath)
}

export function createBarcodeRenderer(options: BarcodeImageOptions = {}): BarcodeRenderer {
  return (name, data, outputPath) => renderMemberBarcode(name, data, outputPath, options)
}
