/**
 * Hugging Face Hub endpoint helpers.
 *
 * Only the public list/search endpoints are used:
 * - GET {endpoint}/api/models
 * - GET {endpoint}/api/datasets
 */

import type { ResultKind } from '../types.js'

export const DEFAULT_HUB_ENDPOINT = 'https://huggingface.co'

export interface ListParams {
  search?: string
  author?: string
  /** Each tag becomes one repeated `filter` parameter. */
  filter?: string[]
  /** Models only. */
  pipelineTag?: string
  limit?: number
}

export function hubApiBase(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, '')}/api`
}

function kindPath(kind: ResultKind): string {
  return kind === 'model' ? 'models' : 'datasets'
}

/**
 * Build the list URL for `kind`. Empty params are left out.
 */
export function hubListUrl(endpoint: string, kind: ResultKind, params: ListParams): string {
  const qs = new URLSearchParams()
  if (params.search) qs.set('search', params.search)
  if (params.author) qs.set('author', params.author)
  for (const tag of params.filter ?? []) {
    if (tag) qs.append('filter', tag)
  }
  if (kind === 'model' && params.pipelineTag) qs.set('pipeline_tag', params.pipelineTag)
  if (params.limit !== undefined) qs.set('limit', String(params.limit))

  const query = qs.toString()
  const base = `${hubApiBase(endpoint)}/${kindPath(kind)}`
  return query ? `${base}?${query}` : base
}
