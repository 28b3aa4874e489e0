/**
 * Run log writer.
 *
 * When `log.runLog` is enabled, every run appends to
 * `<projectRoot>/logs/<stamp>-<command>.log`.
 *
 * Notes:
 * - Append-only and synchronous; a CLI run is short and single-threaded.
 * - Never log secrets (Hub tokens). Call sites must avoid including them.
 * - A log that cannot be written turns itself off and reports once through `onError`.
 */

import fs from 'node:fs'
import path from 'node:path'
import { ensureDir } from '../fs/ensure.js'
import { errorMessage } from '../utils/errors.js'

let logFilePath: string | undefined
let onError: ((message: string) => void) | undefined

function safeStamp(iso: string): string {
  return iso.replace(/[:.]/g, '-')
}

function disable(err: unknown): void {
  const failed = logFilePath
  logFilePath = undefined
  onError?.(`[hf-search] run log disabled (${failed}): ${errorMessage(err)}`)
}

export function initRunLog(opts: {
  projectRoot: string
  now: Date
  command: string
  onError?: (message: string) => void
}): string | undefined {
  onError = opts.onError
  const dir = path.join(opts.projectRoot, 'logs')
  const stamp = safeStamp(opts.now.toISOString())
  logFilePath = path.join(dir, `${stamp}-${opts.command}.log`)

  try {
    ensureDir(dir)
    fs.appendFileSync(logFilePath, `# hf-search ${opts.command} ${opts.now.toISOString()}\n`, 'utf8')
  } catch (err) {
    disable(err)
  }
  return logFilePath
}

export function closeRunLog(): void {
  logFilePath = undefined
  onError = undefined
}

export function appendRunLog(line: string): void {
  if (!logFilePath) return
  try {
    fs.appendFileSync(logFilePath, `[${new Date().toISOString()}] ${line}\n`, 'utf8')
  } catch (err) {
    disable(err)
  }
}

export function logSearch(opts: {
  kind: string
  query?: string
  author?: string
  tags?: string[]
  task?: string
  limit: number
  count?: number
  error?: string
}): void {
  const parts: string[] = []
  parts.push(`search kind=${opts.kind} limit=${opts.limit}`)
  if (opts.query) parts.push(`query=${JSON.stringify(opts.query)}`)
  if (opts.author) parts.push(`author=${opts.author}`)
  if (opts.tags?.length) parts.push(`tags=${opts.tags.join(',')}`)
  if (opts.task) parts.push(`task=${opts.task}`)
  if (opts.count !== undefined) parts.push(`count=${opts.count}`)
  if (opts.error) parts.push(`error=${opts.error}`)
  appendRunLog(parts.join(' '))
}
