import { describe, expect, it } from 'vitest'

import { isCodeKind, renderBarcode, renderStudentCode } from './codes'

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47]

describe('student codes', () => {
  it('renders QR codes and barcodes as PNG images', async () => {
    for (const kind of ['qr', 'barcode'] as const) {
      const image = await renderStudentCode(kind, 'S1001')
      expect([...image.subarray(0, 4)]).toEqual(PNG_SIGNATURE)
    }
  })

  it('refuses barcodes for ids outside plain ASCII', async () => {
    await expect(renderBarcode('Élève-1')).rejects.toMatchObject({ code: 'invalid_input' })
  })

  it('recognises code kinds', () => {
    expect(isCodeKind('qr')).toBe(true)
    expect(isCodeKind('pdf417')).toBe(false)
  })
})
