import { describe, it } from 'mocha'
import { expect } from 'chai'

import { parseCliArgs } from '../src/utils/cli-args.js'

const argv = (...args: string[]): string[] => ['node', 'hf-search', ...args]

function parseOk(args: string[], config?: Parameters<typeof parseCliArgs>[1]) {
  const parsed = parseCliArgs(argv(...args), config)
  if (!parsed.ok) throw new Error(`expected success, got: ${parsed.error.split('\n')[0]}`)
  return parsed.data
}

function parseErr(args: string[]): string {
  const parsed = parseCliArgs(argv(...args))
  if (parsed.ok) throw new Error('expected a parse error')
  return parsed.error.split('\n')[0] ?? ''
}

describe('parseCliArgs', () => {
  it('treats a missing command as an error that shows help', () => {
    const parsed = parseCliArgs(argv())
    expect(parsed.ok).to.equal(false)
    if (!parsed.ok) expect(parsed.error).to.contain('Usage:')
  })

  it('recognizes help and version', () => {
    expect(parseOk(['--help']).command).to.equal('help')
    expect(parseOk(['models', '-h']).command).to.equal('help')
    expect(parseOk(['--version']).command).to.equal('version')
    expect(parseOk(['models', '-v']).command).to.equal('version')
    expect(parseOk(['datasets', '-q', 'x', '--version']).command).to.equal('version')
  })

  it('applies defaults for a bare models search', () => {
    const { command, options } = parseOk(['models'])
    expect(command).to.equal('models')
    expect(options).to.deep.equal({ kind: 'model', limit: 10, tags: [], export: false, exportFormat: 'csv' })
  })

  it('parses long and short flags', () => {
    const { options } = parseOk([
      'models',
      '-q',
      'bert',
      '-l',
      '20',
      '-a',
      'google',
      '--task',
      'fill-mask',
      '-e',
      '--export-format',
      'txt'
    ])
    expect(options).to.deep.equal({
      kind: 'model',
      query: 'bert',
      limit: 20,
      author: 'google',
      task: 'fill-mask',
      tags: [],
      export: true,
      exportFormat: 'txt'
    })
  })

  it('collects space- and comma-separated tags up to the next flag', () => {
    const { options } = parseOk(['datasets', '--tags', 'text-classification', 'en,fr', '--limit', '15'])
    expect(options.kind).to.equal('dataset')
    expect(options.tags).to.deep.equal(['text-classification', 'en', 'fr'])
    expect(options.limit).to.equal(15)
  })

  it('accepts --key=value', () => {
    const { options } = parseOk(['models', '--query=llama', '--tags=gguf'])
    expect(options.query).to.equal('llama')
    expect(options.tags).to.deep.equal(['gguf'])
  })

  it('turns on export when an output path is given', () => {
    const { options } = parseOk(['models', '-o', 'out/results.csv'])
    expect(options.export).to.equal(true)
    expect(options.output).to.equal('out/results.csv')
  })

  it('takes defaults from config', () => {
    const { options } = parseOk(['datasets'], { search: { limit: 3 }, export: { format: 'txt', dir: 'exports' } })
    expect(options.limit).to.equal(3)
    expect(options.exportFormat).to.equal('txt')
    expect(options.exportDir).to.equal('exports')
  })

  it('rejects bad input with a specific message', () => {
    expect(parseErr(['search'])).to.equal('Unknown command: search')
    expect(parseErr(['models', 'bert'])).to.equal('Unexpected arg: bert')
    expect(parseErr(['models', '--sort', 'likes'])).to.equal('Unknown option: --sort')
    expect(parseErr(['models', '--query'])).to.equal('Missing value for --query')
    expect(parseErr(['models', '--tags', '--export'])).to.equal('Missing value for --tags')
    expect(parseErr(['models', '--limit', '0'])).to.equal('Invalid --limit value: 0')
    expect(parseErr(['models', '--limit', 'ten'])).to.equal('Invalid --limit value: ten')
    expect(parseErr(['models', '--export-format', 'json'])).to.equal(
      'Invalid --export-format value: json (expected csv or txt)'
    )
    expect(parseErr(['datasets', '--task', 'translation'])).to.equal('--task is only supported for models')
    expect(parseErr(['models', '--export=false'])).to.equal('Option --export does not take a value')
    expect(parseErr(['models', '--export='])).to.equal('Option --export does not take a value')
  })
})
