/**
 * Hugging Face Hub client for the list/search endpoints.
 *
 * One request per call: the Hub returns up to `limit` entries in the first page,
 * which is all a search needs.
 */

import type { Dispatcher } from 'undici'
import type { ResultKind } from '../types.js'
import { fetchTextWithRetry } from '../http/fetch.js'
import { getRetries, getTimeoutMs } from '../http/network.js'
import { HubRequestError, HubResponseError } from '../utils/errors.js'
import { DEFAULT_HUB_ENDPOINT, hubListUrl, type ListParams } from './endpoints.js'
import { hubListSchema, type HubEntry } from './schema.js'

export interface HubClientOptions {
  /** Hub base URL. Default: https://huggingface.co */
  endpoint?: string
  /** Sent as `Authorization: Bearer <token>`. */
  token?: string
  /** Retry count for transient errors (default from network config). */
  retries?: number
  /** Request timeout in ms (default from network config). */
  timeoutMs?: number
  /** undici dispatcher override (proxy agents, mock agents in tests). */
  dispatcher?: Dispatcher
  /** Optional logger for request tracing. Tokens are never passed to it. */
  log?: Pick<Console, 'info'>
}

export class HubClient {
  private endpoint: string
  private token?: string
  private retries: number
  private timeoutMs: number
  private dispatcher?: Dispatcher
  private log?: Pick<Console, 'info'>

  constructor(opts: HubClientOptions = {}) {
    this.endpoint = opts.endpoint || DEFAULT_HUB_ENDPOINT
    this.token = opts.token
    this.retries = opts.retries ?? getRetries()
    this.timeoutMs = opts.timeoutMs ?? getTimeoutMs()
    this.dispatcher = opts.dispatcher
    this.log = opts.log
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.token) headers['Authorization'] = `Bearer ${this.token}`
    return headers
  }

  private async list(kind: ResultKind, params: ListParams): Promise<HubEntry[]> {
    const url = hubListUrl(this.endpoint, kind, params)
    this.log?.info(`[hf-search] GET ${url}`)

    const res = await fetchTextWithRetry(
      url,
      { method: 'GET', headers: this.headers(), ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}) },
      this.retries,
      this.timeoutMs
    )
    if (!res.ok) {
      throw new HubRequestError(res.status, res.statusText, url)
    }

    let body: unknown
    try {
      body = JSON.parse(res.text)
    } catch (err) {
      throw new HubResponseError(`Invalid JSON from ${url}`, { cause: err })
    }

    const parsed = hubListSchema.safeParse(body)
    if (!parsed.success) {
      const first = parsed.error.issues[0]
      const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unexpected shape'
      throw new HubResponseError(`Unexpected ${kind} list from ${url} (${where})`)
    }
    return parsed.data
  }

  async listModels(params: ListParams = {}): Promise<HubEntry[]> {
    return this.list('model', params)
  }

  /** `pipelineTag` has no dataset counterpart and is not sent. */
  async listDatasets(params: ListParams = {}): Promise<HubEntry[]> {
    return this.list('dataset', params)
  }
}
