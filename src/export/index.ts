import path from 'node:path'
import type { ExportFormat, HubRecord, ResultKind } from '../types.js'
import { fileStamp } from '../utils/format.js'
import { exportToCsv } from './csv.js'
import { exportToTxt } from './txt.js'

export { exportToCsv } from './csv.js'
export { exportToTxt } from './txt.js'

/**
 * `models_search_20240102_030405.csv` style name, local time.
 */
export function defaultExportFilename(kind: ResultKind, format: ExportFormat, now: Date): string {
  return `${kind}s_search_${fileStamp(now)}.${format}`
}

export function resolveExportPath(opts: {
  kind: ResultKind
  format: ExportFormat
  now: Date
  cwd: string
  output?: string
  exportDir?: string
}): string {
  if (opts.output) return path.resolve(opts.cwd, opts.output)
  const dir = opts.exportDir ? path.resolve(opts.cwd, opts.exportDir) : opts.cwd
  return path.join(dir, defaultExportFilename(opts.kind, opts.format, opts.now))
}

export function exportResults(records: HubRecord[], kind: ResultKind, format: ExportFormat, filePath: string): void {
  if (format === 'csv') {
    exportToCsv(records, kind, filePath)
  } else {
    exportToTxt(records, kind, filePath)
  }
}
