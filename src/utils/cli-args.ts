/**
 * Minimal CLI argument parser.
 *
 * Two subcommands with a handful of flags don't need commander/yargs; the command
 * API (`SearchCommandOptions`) stays stable if this module is ever replaced.
 */

import type { ExportFormat, ResultKind, SearchCommandOptions } from '../types.js'
import type { ToolConfig } from '../config/config.js'
import { DEFAULT_LIMIT } from '../search/search.js'

export type CliCommand = 'models' | 'datasets' | 'help' | 'version'

type ParsedOk = {
  ok: true
  data: {
    command: CliCommand
    options: SearchCommandOptions
    helpText: string
  }
}

type ParsedErr = { ok: false; error: string }

const SHORT_ALIASES: Record<string, string> = {
  '-q': 'query',
  '-l': 'limit',
  '-a': 'author',
  '-e': 'export',
  '-o': 'output'
}

const BOOLEAN_FLAGS = new Set(['export'])
const VALUE_FLAGS = new Set(['query', 'limit', 'author', 'task', 'export-format', 'output'])

function splitCsv(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function isFlag(arg: string): boolean {
  return arg.startsWith('--') || arg in SHORT_ALIASES || arg === '-h' || arg === '-v'
}

function parseLimit(raw: string): number | undefined {
  if (!/^\d+$/.test(raw)) return undefined
  const n = Number.parseInt(raw, 10)
  return n > 0 ? n : undefined
}

function parseFormat(raw: string): ExportFormat | undefined {
  return raw === 'csv' || raw === 'txt' ? raw : undefined
}

export function getHelpText(): string {
  return [
    'hf-search: search models and datasets on the Hugging Face Hub',
    '',
    'Usage:',
    '  hf-search models [options]',
    '  hf-search datasets [options]',
    '',
    'Options:',
    '  -q, --query <text>          search query/keywords',
    '  -l, --limit <n>             maximum number of results (default: 10)',
    '  -a, --author <org>          filter by author/organization',
    '      --tags <tag> [tag ...]  filter by tags (space- or comma-separated)',
    '      --task <task>           models: filter by task (e.g. text-classification, translation)',
    '  -e, --export                export results to a file (auto-generated name)',
    '      --export-format <fmt>   csv or txt (default: csv)',
    '  -o, --output <path>         export to this path (implies --export)',
    '  -v, --version               show version',
    '  -h, --help                  show help',
    '',
    'Examples:',
    '  hf-search models --query "bert"',
    '  hf-search models --query "translation" --limit 20',
    '  hf-search models --author "google" --limit 5',
    '  hf-search datasets --query "sentiment"',
    '  hf-search datasets --tags "text-classification" --limit 15',
    '  hf-search models --query "bert" --export',
    '  hf-search models --query "bert" --export --export-format txt',
    ''
  ].join('\n')
}

function getDefaultOptions(kind: ResultKind, config?: ToolConfig | null): SearchCommandOptions {
  const exportDir = config?.export?.dir?.trim()
  return {
    kind,
    limit: config?.search?.limit ?? DEFAULT_LIMIT,
    tags: [],
    export: false,
    exportFormat: config?.export?.format ?? 'csv',
    ...(exportDir ? { exportDir } : {})
  }
}

/**
 * Parse process.argv into a command + strongly-typed options.
 *
 * No command at all is an error (help text, exit code 1); `help` / `--help` is not.
 */
export function parseCliArgs(argv: string[], config?: ToolConfig | null): ParsedOk | ParsedErr {
  const helpText = getHelpText()
  const args = argv.slice(2)
  const command = args.shift()

  if (command === undefined) {
    return { ok: false, error: helpText }
  }
  if (command === '-h' || command === '--help' || command === 'help') {
    return { ok: true, data: { command: 'help', options: getDefaultOptions('model', config), helpText } }
  }
  if (command === '-v' || command === '--version' || command === 'version') {
    return { ok: true, data: { command: 'version', options: getDefaultOptions('model', config), helpText } }
  }
  if (command !== 'models' && command !== 'datasets') {
    return { ok: false, error: `Unknown command: ${command}\n\n${helpText}` }
  }

  const kind: ResultKind = command === 'models' ? 'model' : 'dataset'
  const options = getDefaultOptions(kind, config)
  const optsRaw: Record<string, string | boolean> = {}
  const tags: string[] = []

  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? ''
    if (a === '-h' || a === '--help') {
      return { ok: true, data: { command: 'help', options, helpText } }
    }
    if (a === '-v' || a === '--version') {
      return { ok: true, data: { command: 'version', options, helpText } }
    }
    if (!isFlag(a)) {
      return { ok: false, error: `Unexpected arg: ${a}\n\n${helpText}` }
    }

    let key: string
    let inlineValue: string | undefined
    const alias = SHORT_ALIASES[a]
    if (alias) {
      key = alias
    } else {
      const eq = a.indexOf('=')
      key = eq === -1 ? a.slice(2) : a.slice(2, eq)
      inlineValue = eq === -1 ? undefined : a.slice(eq + 1)
    }

    if (key === 'tags') {
      if (inlineValue !== undefined) tags.push(...splitCsv(inlineValue))
      let taken = inlineValue !== undefined ? 1 : 0
      while (i + 1 < args.length && !isFlag(args[i + 1] ?? '')) {
        tags.push(...splitCsv(args[i + 1] ?? ''))
        taken++
        i++
      }
      if (taken === 0) {
        return { ok: false, error: `Missing value for --tags\n\n${helpText}` }
      }
      continue
    }
    if (BOOLEAN_FLAGS.has(key)) {
      if (inlineValue !== undefined) {
        return { ok: false, error: `Option --${key} does not take a value\n\n${helpText}` }
      }
      optsRaw[key] = true
      continue
    }
    if (!VALUE_FLAGS.has(key)) {
      return { ok: false, error: `Unknown option: ${a}\n\n${helpText}` }
    }

    if (inlineValue !== undefined) {
      optsRaw[key] = inlineValue
      continue
    }
    const next = args[i + 1]
    if (next === undefined || isFlag(next)) {
      return { ok: false, error: `Missing value for --${key}\n\n${helpText}` }
    }
    optsRaw[key] = next
    i++
  }

  const str = (key: string): string | undefined => {
    const v = optsRaw[key]
    return typeof v === 'string' && v.trim() ? v.trim() : undefined
  }

  const limitRaw = str('limit')
  if (limitRaw !== undefined) {
    const limit = parseLimit(limitRaw)
    if (limit === undefined) {
      return { ok: false, error: `Invalid --limit value: ${limitRaw}\n\n${helpText}` }
    }
    options.limit = limit
  }

  const formatRaw = str('export-format')
  if (formatRaw !== undefined) {
    const format = parseFormat(formatRaw)
    if (!format) {
      return { ok: false, error: `Invalid --export-format value: ${formatRaw} (expected csv or txt)\n\n${helpText}` }
    }
    options.exportFormat = format
  }

  const task = str('task')
  if (task && kind === 'dataset') {
    return { ok: false, error: `--task is only supported for models\n\n${helpText}` }
  }

  const query = str('query')
  const author = str('author')
  const output = str('output')
  if (query) options.query = query
  if (author) options.author = author
  if (task) options.task = task
  if (output) options.output = output
  options.tags = tags
  options.export = optsRaw['export'] === true || output !== undefined

  return { ok: true, data: { command, options, helpText } }
}
