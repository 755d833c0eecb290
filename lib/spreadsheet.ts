import * as XLSX from 'xlsx'

export type TableFormat = 'csv' | 'xlsx'
export type TableCell = string | number
export type TableRow = Record<string, TableCell>

export type TableFile = {
  body: Buffer
  contentType: string
  filename: string
}

const CONTENT_TYPES: Record<TableFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
}

export function isTableFormat(value: string): value is TableFormat {
  return value === 'csv' || value === 'xlsx'
}

function normalizeHeader(header: string) {
  return header.trim().toLowerCase().replace(/[\s-]+/g, '_')
}

/**
 * Reads the first sheet of a CSV text into rows keyed by normalized header
 * ("Student ID" becomes `student_id`). Cell values are kept as text, so ids
 * such as `007` survive.
 */
export function readCsvRows(text: string): Array<Record<string, string>> {
  if (!text.trim()) return []

  const workbook = XLSX.read(text, { type: 'string', raw: true })
  const sheetName = workbook.SheetNames[0]
  if (!sheetName) return []

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    defval: '',
    raw: false,
  })

  return rows.map((row) => {
    const normalized: Record<string, string> = {}
    for (const [key, value] of Object.entries(row)) {
      normalized[normalizeHeader(key)] = String(value ?? '').trim()
    }
    return normalized
  })
}

/** Writes rows as a CSV text or a single-sheet workbook with the given column order. */
export function writeTable(
  rows: TableRow[],
  options: { columns: string[]; format: TableFormat; sheetName: string; basename: string }
): TableFile {
  const worksheet = XLSX.utils.json_to_sheet(rows, { header: options.columns })
  const filename = `${options.basename}.${options.format}`

  if (options.format === 'csv') {
    return {
      body: Buffer.from(XLSX.utils.sheet_to_csv(worksheet), 'utf8'),
      contentType: CONTENT_TYPES.csv,
      filename,
    }
  }

  worksheet['!cols'] = options.columns.map((column) => ({ wch: Math.max(10, column.length + 2) }))
  const workbook = XLSX.utils.book_new()
  XLSX.utils.book_append_sheet(workbook, worksheet, options.sheetName.slice(0, 31))

  const written: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
  if (!Buffer.isBuffer(written)) throw new Error('Excel export produced no data.')

  return { body: written, contentType: CONTENT_TYPES.xlsx, filename }
}
