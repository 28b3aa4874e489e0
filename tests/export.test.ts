import { afterEach, beforeEach, describe, it } from 'mocha'
import { expect } from 'chai'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { defaultExportFilename, exportToCsv, exportToTxt, resolveExportPath } from '../src/export/index.js'
import { csvField, toCsv } from '../src/export/csv.js'
import { ExportError } from '../src/utils/errors.js'
import type { HubRecord } from '../src/types.js'
import { expectInstance } from './helpers/assert.js'

const RECORDS: HubRecord[] = [
  { id: 'org/model-a', author: 'org', downloads: 1234, likes: 5, tags: ['nlp', 'text "quoted"'] },
  { id: 'solo', author: 'N/A', downloads: 0, likes: 0, tags: [] }
]

describe('export', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'hf-search-export-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  describe('csv', () => {
    it('quotes only fields that need it', () => {
      expect(csvField('plain')).to.equal('plain')
      expect(csvField('1,234')).to.equal('"1,234"')
      expect(csvField('say "hi"')).to.equal('"say ""hi"""')
      expect(csvField('two\nlines')).to.equal('"two\nlines"')
    })

    it('writes a header and one CRLF row per model', async () => {
      const file = path.join(dir, 'models.csv')
      exportToCsv(RECORDS, 'model', file)

      const text = await readFile(file, 'utf8')
      expect(text).to.equal(
        'Model ID,Author,Downloads,Likes,Tags\r\n' +
          'org/model-a,org,"1,234",5,"nlp, text ""quoted"""\r\n' +
          'solo,N/A,0,0,\r\n'
      )
    })

    it('uses the dataset id column for datasets', () => {
      expect(toCsv([], 'dataset')).to.equal('Dataset ID,Author,Downloads,Likes,Tags\r\n')
    })

    it('creates missing parent directories', async () => {
      const file = path.join(dir, 'nested', 'deeper', 'out.csv')
      exportToCsv([], 'model', file)
      expect(await readFile(file, 'utf8')).to.equal('Model ID,Author,Downloads,Likes,Tags\r\n')
    })

    it('wraps write failures in an ExportError', async () => {
      // A regular file where a directory is expected makes mkdir fail.
      const blocker = path.join(dir, 'blocker')
      await writeFile(blocker, 'x')

      let caught: unknown
      try {
        exportToCsv(RECORDS, 'model', path.join(blocker, 'out.csv'))
      } catch (err) {
        caught = err
      }
      const error = expectInstance(caught, ExportError)
      expect(error.message).to.match(/^Error exporting to CSV: /)
    })
  })

  describe('txt', () => {
    it('writes a numbered listing with a total line', async () => {
      const file = path.join(dir, 'models.txt')
      exportToTxt(RECORDS, 'model', file)

      const text = await readFile(file, 'utf8')
      expect(text).to.equal(
        [
          'Model Search Results',
          '='.repeat(80),
          '',
          '1. org/model-a',
          '   Author: org',
          '   Downloads: 1,234',
          '   Likes: 5',
          '   Tags: nlp, text "quoted"',
          '',
          '2. solo',
          '   Author: N/A',
          '   Downloads: 0',
          '   Likes: 0',
          '',
          '',
          'Total: 2 Model',
          ''
        ].join('\n')
      )
    })

    it('writes only the header and total for an empty list', async () => {
      const file = path.join(dir, 'datasets.txt')
      exportToTxt([], 'dataset', file)

      expect(await readFile(file, 'utf8')).to.equal(`Dataset Search Results\n${'='.repeat(80)}\n\n\nTotal: 0 Dataset\n`)
    })
  })

  describe('file names', () => {
    it('stamps generated names with local time', () => {
      const now = new Date(2024, 0, 2, 3, 4, 5)
      expect(defaultExportFilename('model', 'csv', now)).to.equal('models_search_20240102_030405.csv')
      expect(defaultExportFilename('dataset', 'txt', now)).to.equal('datasets_search_20240102_030405.txt')
    })

    it('prefers an explicit output path, resolved against cwd', () => {
      const now = new Date(2024, 0, 2, 3, 4, 5)
      expect(resolveExportPath({ kind: 'model', format: 'csv', now, cwd: dir, output: 'out/r.csv' })).to.equal(
        path.join(dir, 'out', 'r.csv')
      )
      expect(resolveExportPath({ kind: 'model', format: 'txt', now, cwd: dir, exportDir: 'exports' })).to.equal(
        path.join(dir, 'exports', 'models_search_20240102_030405.txt')
      )
    })
  })
})
