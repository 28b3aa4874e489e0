/**
 * Plain-text result tables for the terminal (rounded box borders, no colors).
 *
 * Widths are terminal columns, not UTF-16 units: CJK and emoji take two.
 */

import stringWidth from 'string-width'
import type { HubRecord, ResultKind } from '../types.js'
import { formatNumber, kindLabel } from '../utils/format.js'

type Align = 'left' | 'right'

interface Column {
  header: string
  align: Align
}

/** Only the first few tags fit in a table cell. */
export const MAX_TABLE_TAGS = 3

export function summarizeTags(tags: string[]): string {
  const shown = tags.slice(0, MAX_TABLE_TAGS).join(', ')
  return tags.length > MAX_TABLE_TAGS ? `${shown}...` : shown
}

function pad(text: string, width: number, align: Align, fill = ' '): string {
  const gap = fill.repeat(Math.max(0, width - stringWidth(text)))
  return align === 'right' ? gap + text : text + gap
}

function border(widths: number[], left: string, mid: string, right: string): string {
  return left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right
}

function row(cells: string[], widths: number[], columns: Column[]): string {
  const parts = cells.map((c, i) => ` ${pad(c, widths[i] ?? 0, columns[i]?.align ?? 'left')} `)
  return `│${parts.join('│')}│`
}

/**
 * Render a titled table with one row per record:
 *
 *        Model Search Results
 * ╭──────────┬────────┬───────────┬───────┬──────╮
 * │ Model ID │ Author │ Downloads │ Likes │ Tags │
 * ├──────────┼────────┼───────────┼───────┼──────┤
 * │ ...      │        │           │       │      │
 * ╰──────────┴────────┴───────────┴───────┴──────╯
 */
export function renderResultsTable(records: HubRecord[], kind: ResultKind): string {
  const columns: Column[] = [
    { header: `${kindLabel(kind)} ID`, align: 'left' },
    { header: 'Author', align: 'left' },
    { header: 'Downloads', align: 'right' },
    { header: 'Likes', align: 'right' },
    { header: 'Tags', align: 'left' }
  ]
  const body = records.map((r) => [
    r.id,
    r.author,
    formatNumber(r.downloads),
    formatNumber(r.likes),
    summarizeTags(r.tags)
  ])

  const widths = columns.map((col, i) =>
    Math.max(stringWidth(col.header), ...body.map((cells) => stringWidth(cells[i] ?? '')))
  )

  const top = border(widths, '╭', '┬', '╮')
  const title = `${kindLabel(kind)} Search Results`
  const indent = Math.max(0, Math.floor((stringWidth(top) - stringWidth(title)) / 2))

  const lines: string[] = []
  lines.push(' '.repeat(indent) + title)
  lines.push(top)
  lines.push(
    row(
      columns.map((c) => c.header),
      widths,
      columns
    )
  )
  lines.push(border(widths, '├', '┼', '┤'))
  for (const cells of body) lines.push(row(cells, widths, columns))
  lines.push(border(widths, '╰', '┴', '╯'))
  return lines.join('\n')
}

/**
 * Box a short message, optionally with a title set into the top border.
 */
export function renderPanel(message: string, title?: string): string {
  const inner = Math.max(stringWidth(message), title ? stringWidth(title) + 2 : 0)
  const topFill = title ? pad(` ${title} `, inner + 2, 'left', '─') : '─'.repeat(inner + 2)
  return [`╭${topFill}╮`, `│ ${pad(message, inner, 'left')} │`, `╰${'─'.repeat(inner + 2)}╯`].join('\n')
}
