/**
 * Shared fetch helpers with:
 * - global proxy/mirror support
 * - optional HTTP proxy support (CONNECT)
 * - User-Agent default
 * - retry + timeout
 */

import { fetch, Headers, ProxyAgent, type Dispatcher, type RequestInit } from 'undici'
import { RequestTimeoutError } from '../utils/errors.js'
import { applyProxy, getHttpProxy, getUserAgent } from './network.js'

const RETRYABLE_STATUS = [403, 429, 500, 502, 503, 504]

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms))
}

function withUserAgent(init: RequestInit): RequestInit {
  const headers = new Headers(init.headers)
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', getUserAgent())
  }
  return { ...init, headers }
}

let cachedHttpProxy: string | undefined
let cachedProxyAgent: ProxyAgent | undefined

function normalizeHttpProxy(p: string): string {
  const t = p.trim()
  if (!t) return ''
  if (/^https?:\/\//i.test(t)) return t
  // Allow "127.0.0.1:10809" style.
  return `http://${t}`
}

function getProxyAgent(): ProxyAgent | undefined {
  const pRaw = getHttpProxy()
  const p = pRaw ? normalizeHttpProxy(pRaw) : undefined
  if (!p) return undefined

  if (cachedProxyAgent && cachedHttpProxy === p) return cachedProxyAgent
  cachedHttpProxy = p
  cachedProxyAgent = new ProxyAgent(p)
  return cachedProxyAgent
}

/**
 * Dispatcher for a request: an explicit `init.dispatcher` wins over the configured transport proxy.
 */
export function resolveDispatcher(init: RequestInit): Dispatcher | undefined {
  return init.dispatcher ?? getProxyAgent()
}

/**
 * A response whose body has been read in full.
 */
export interface BufferedResponse {
  ok: boolean
  status: number
  statusText: string
  text: string
}

/**
 * Fetch `url` and read the whole body as text, retrying 403/429/5xx, network errors
 * and timeouts with linear backoff.
 *
 * The body is read inside each attempt so the timeout covers a stalled body too.
 * The last non-ok response is returned as-is; callers decide how to report it.
 */
export async function fetchTextWithRetry(
  url: string,
  init: RequestInit,
  retries: number,
  timeoutMs: number
): Promise<BufferedResponse> {
  const targetUrl = applyProxy(url)
  const dispatcher = resolveDispatcher(init)

  let lastErr: unknown
  for (let attempt = 0; attempt <= retries; attempt++) {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    try {
      const res = await fetch(targetUrl, {
        ...withUserAgent(init),
        signal: controller.signal,
        ...(dispatcher ? { dispatcher } : {})
      })
      if (!res.ok && RETRYABLE_STATUS.includes(res.status) && attempt < retries) {
        // Drain the body so the connection can be reused.
        await res.body?.cancel()
        await sleep(250 * (attempt + 1))
        continue
      }
      return { ok: res.ok, status: res.status, statusText: res.statusText, text: await res.text() }
    } catch (err) {
      lastErr = controller.signal.aborted ? new RequestTimeoutError(url, timeoutMs, { cause: err }) : err
      if (attempt < retries) {
        await sleep(250 * (attempt + 1))
        continue
      }
      throw lastErr
    } finally {
      clearTimeout(timeoutId)
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr))
}
