/**
 * Shared types used across the hf-search tool.
 */

export type ResultKind = 'model' | 'dataset'
export type ExportFormat = 'csv' | 'txt'

/**
 * One search result, projected from a raw Hub entry.
 */
export interface HubRecord {
  id: string
  author: string
  downloads: number
  likes: number
  tags: string[]
}

export interface CommandContext {
  /** Absolute path: package root (holds config/ and logs/) */
  projectRoot: string
  /** process.cwd() at runtime */
  cwd: string
  /** Timestamp for this run */
  now: Date
  /** Logger interface (console-like) */
  log: Pick<Console, 'log' | 'info' | 'warn' | 'error'>
}

export interface SearchCommandOptions {
  kind: ResultKind
  query?: string
  limit: number
  author?: string
  tags: string[]
  /** Models only; maps to the Hub's `pipeline_tag`. */
  task?: string
  export: boolean
  exportFormat: ExportFormat
  /** Explicit export path. When unset, a timestamped name is generated under `exportDir`. */
  output?: string
  /** Directory for generated export names (default: cwd). */
  exportDir?: string
}
