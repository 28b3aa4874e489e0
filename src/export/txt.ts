import fs from 'node:fs'
import type { HubRecord, ResultKind } from '../types.js'
import { ensureParentDir } from '../fs/ensure.js'
import { errorMessage, ExportError } from '../utils/errors.js'
import { formatNumber, kindLabel } from '../utils/format.js'

export function toText(records: HubRecord[], kind: ResultKind): string {
  const label = kindLabel(kind)
  const lines: string[] = []
  lines.push(`${label} Search Results`)
  lines.push('='.repeat(80))
  lines.push('')

  records.forEach((r, i) => {
    lines.push(`${i + 1}. ${r.id}`)
    lines.push(`   Author: ${r.author}`)
    lines.push(`   Downloads: ${formatNumber(r.downloads)}`)
    lines.push(`   Likes: ${formatNumber(r.likes)}`)
    if (r.tags.length) lines.push(`   Tags: ${r.tags.join(', ')}`)
    lines.push('')
  })

  lines.push('')
  lines.push(`Total: ${records.length} ${label}`)
  return lines.join('\n') + '\n'
}

/**
 * Export results to a plain-text listing, one numbered block per record.
 */
export function exportToTxt(records: HubRecord[], kind: ResultKind, filePath: string): void {
  try {
    ensureParentDir(filePath)
    fs.writeFileSync(filePath, toText(records, kind), 'utf8')
  } catch (err) {
    throw new ExportError(`Error exporting to TXT: ${errorMessage(err)}`, { cause: err })
  }
}
