/**
 * Search Hugging Face Hub models and datasets.
 */

import type { HubRecord, ResultKind } from '../types.js'
import { HubClient } from '../hub/client.js'
import { loadHubConfig } from '../hub/hub-config.js'
import type { ListParams } from '../hub/endpoints.js'
import type { HubEntry } from '../hub/schema.js'
import { errorMessage, SearchError } from '../utils/errors.js'

export const DEFAULT_LIMIT = 10

export interface DatasetSearchOptions {
  /** Search query/keywords. */
  query?: string
  /** Maximum number of results, a positive integer (default: 10). */
  limit?: number
  /** Filter by author/organization. */
  author?: string
  /** Filter by tags; entries must carry all of them. */
  tags?: string[]
  /** Client to use. Default: one built from HF_ENDPOINT / HF_TOKEN. */
  client?: HubClient
}

export interface ModelSearchOptions extends DatasetSearchOptions {
  /** Filter by task (e.g. text-classification, translation). */
  task?: string
}

function namespaceOf(id: string): string | undefined {
  const slash = id.indexOf('/')
  return slash > 0 ? id.slice(0, slash) : undefined
}

/**
 * Project a raw Hub entry onto the record shape, filling missing fields with defaults.
 */
export function toHubRecord(entry: HubEntry): HubRecord {
  const id = entry.id || entry.modelId || 'N/A'
  return {
    id,
    author: entry.author || namespaceOf(id) || 'N/A',
    downloads: entry.downloads ?? 0,
    likes: entry.likes ?? 0,
    tags: entry.tags ?? []
  }
}

function toListParams(opts: ModelSearchOptions, limit: number): ListParams {
  const params: ListParams = { limit }
  if (opts.query) params.search = opts.query
  if (opts.author) params.author = opts.author
  const tags = (opts.tags ?? []).filter(Boolean)
  if (tags.length) params.filter = tags
  if (opts.task) params.pipelineTag = opts.task
  return params
}

function defaultClient(): HubClient {
  return new HubClient(loadHubConfig(null))
}

async function search(kind: ResultKind, opts: ModelSearchOptions): Promise<HubRecord[]> {
  const limit = opts.limit ?? DEFAULT_LIMIT
  if (!Number.isSafeInteger(limit) || limit <= 0) {
    throw new SearchError(`Error searching ${kind}s: limit must be a positive integer`)
  }
  const client = opts.client ?? defaultClient()
  try {
    const params = toListParams(opts, limit)
    const entries = kind === 'model' ? await client.listModels(params) : await client.listDatasets(params)
    return entries.slice(0, limit).map(toHubRecord)
  } catch (err) {
    throw new SearchError(`Error searching ${kind}s: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Search for models on the Hub.
 *
 * @example
 * const results = await searchModels({ query: 'bert', limit: 5 })
 * console.log(results[0]?.id)
 */
export async function searchModels(opts: ModelSearchOptions = {}): Promise<HubRecord[]> {
  return search('model', opts)
}

/**
 * Search for datasets on the Hub. Same filters as {@link searchModels}, minus `task`.
 */
export async function searchDatasets(opts: DatasetSearchOptions = {}): Promise<HubRecord[]> {
  const { query, limit, author, tags, client } = opts
  return search('dataset', { query, limit, author, tags, client })
}
