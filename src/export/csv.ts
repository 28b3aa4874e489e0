import fs from 'node:fs'
import type { HubRecord, ResultKind } from '../types.js'
import { ensureParentDir } from '../fs/ensure.js'
import { errorMessage, ExportError } from '../utils/errors.js'
import { formatNumber, kindLabel } from '../utils/format.js'

const EOL = '\r\n'

export function csvHeader(kind: ResultKind): string[] {
  return [`${kindLabel(kind)} ID`, 'Author', 'Downloads', 'Likes', 'Tags']
}

/**
 * Quote a field only when it contains a delimiter, a quote or a line break.
 */
export function csvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value
  return `"${value.replaceAll('"', '""')}"`
}

export function csvRow(record: HubRecord): string[] {
  return [
    record.id,
    record.author,
    formatNumber(record.downloads),
    formatNumber(record.likes),
    record.tags.join(', ')
  ]
}

export function toCsv(records: HubRecord[], kind: ResultKind): string {
  const lines = [csvHeader(kind), ...records.map(csvRow)].map((cells) => cells.map(csvField).join(','))
  return lines.map((l) => l + EOL).join('')
}

/**
 * Export results to a CSV file (UTF-8, CRLF rows, header first).
 *
 * @example
 * const results = await searchModels({ query: 'bert', limit: 5 })
 * exportToCsv(results, 'model', 'results.csv')
 */
export function exportToCsv(records: HubRecord[], kind: ResultKind, filePath: string): void {
  try {
    ensureParentDir(filePath)
    fs.writeFileSync(filePath, toCsv(records, kind), 'utf8')
  } catch (err) {
    throw new ExportError(`Error exporting to CSV: ${errorMessage(err)}`, { cause: err })
  }
}
