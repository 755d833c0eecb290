import bwipjs from 'bwip-js'
import QRCode from 'qrcode'

import { AppError } from '@/lib/errors'

export type CodeKind = 'qr' | 'barcode'

export function isCodeKind(value: string): value is CodeKind {
  return value === 'qr' || value === 'barcode'
}

export async function renderQrCode(text: string): Promise<Buffer> {
  return QRCode.toBuffer(text, { type: 'png', margin: 2, width: 300, errorCorrectionLevel: 'M' })
}

// Code 128 only encodes ASCII
export async function renderBarcode(text: string): Promise<Buffer> {
  if (!/^[\x20-\x7e]+$/.test(text)) {
    throw new AppError('invalid_input', 'Barcodes can only encode plain ASCII student IDs.')
  }

  return bwipjs.toBuffer({
    bcid: 'code128',
    text,
    scale: 3,
    height: 12,
    includetext: true,
    textxalign: 'center',
  })
}

export function renderStudentCode(kind: CodeKind, studentId: string): Promise<Buffer> {
  return kind === 'qr' ? renderQrCode(studentId) : renderBarcode(studentId)
}
