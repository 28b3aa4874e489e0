/**
 * `hf-search models` / `hf-search datasets`: search, print a table, optionally export.
 */

import type { CommandContext, HubRecord, SearchCommandOptions } from '../types.js'
import type { HubClient } from '../hub/client.js'
import { exportResults, resolveExportPath } from '../export/index.js'
import { appendRunLog, logSearch } from '../log/run-log.js'
import { renderPanel, renderResultsTable } from '../render/table.js'
import { searchDatasets, searchModels } from '../search/search.js'
import { errorMessage } from '../utils/errors.js'

export const DOWNLOAD_TIP = "Tip: Use 'huggingface-cli download <model_id>' to download a model"

/**
 * Returns the process exit code; the caller owns `process.exitCode`.
 */
export async function searchCommand(
  ctx: CommandContext,
  options: SearchCommandOptions,
  client: HubClient
): Promise<number> {
  const { kind, query, limit, author, tags, task } = options
  const plural = `${kind}s`

  ctx.log.info('Searching Hugging Face Hub...')

  let results: HubRecord[]
  try {
    results =
      kind === 'model'
        ? await searchModels({ query, limit, author, tags, task, client })
        : await searchDatasets({ query, limit, author, tags, client })
  } catch (err) {
    const message = errorMessage(err)
    logSearch({ kind, query, author, tags, task, limit, error: message })
    ctx.log.error(`Error: ${message}`)
    return 1
  }
  logSearch({ kind, query, author, tags, task, limit, count: results.length })

  if (!results.length) {
    ctx.log.log(renderPanel(`No ${plural} found matching your criteria.`, 'No Results'))
    return 0
  }

  ctx.log.log('')
  ctx.log.log(renderResultsTable(results, kind))
  ctx.log.log(`\nFound ${results.length} ${plural}\n`)

  if (options.export) {
    const filePath = resolveExportPath({
      kind,
      format: options.exportFormat,
      now: ctx.now,
      cwd: ctx.cwd,
      output: options.output,
      exportDir: options.exportDir
    })
    try {
      exportResults(results, kind, options.exportFormat, filePath)
    } catch (err) {
      const message = errorMessage(err)
      appendRunLog(`export-error path=${filePath} error=${message}`)
      ctx.log.error(`Error exporting: ${message}`)
      return 1
    }
    appendRunLog(`export format=${options.exportFormat} path=${filePath} count=${results.length}`)
    ctx.log.log(`Results exported to ${filePath}`)
  }

  if (query) {
    ctx.log.log(renderPanel(DOWNLOAD_TIP))
  }
  return 0
}
