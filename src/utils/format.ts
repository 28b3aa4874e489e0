import type { ResultKind } from '../types.js'

const numberFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })

/**
 * Format counts with thousands separators: 1234567 -> "1,234,567".
 */
export function formatNumber(num: number): string {
  return numberFormat.format(num)
}

export function kindLabel(kind: ResultKind): string {
  return kind === 'model' ? 'Model' : 'Dataset'
}

/** Pad a local-time date component to two digits. */
function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/**
 * Local-time stamp used in export file names: YYYYMMDD_HHMMSS.
 */
export function fileStamp(now: Date): string {
  return (
    `${now.getFullYear()}${pad2(now.getMonth() + 1)}${pad2(now.getDate())}` +
    `_${pad2(now.getHours())}${pad2(now.getMinutes())}${pad2(now.getSeconds())}`
  )
}
