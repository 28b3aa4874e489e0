/**
 * Network defaults (proxy/mirror, user agent, timeout, retries).
 *
 * Module-level singleton: `runCli()` initializes once per process so call sites
 * don't have to thread config through.
 *
 * Security note:
 * - This module must never log or echo config values.
 */

import type { ToolConfig } from '../config/config.js'

export const DEFAULT_USER_AGENT = 'hf-search'
export const DEFAULT_TIMEOUT_MS = 30_000
export const DEFAULT_RETRIES = 2

let proxy: string | undefined
let httpProxy: string | undefined
let userAgent = DEFAULT_USER_AGENT
let timeoutMs = DEFAULT_TIMEOUT_MS
let retries = DEFAULT_RETRIES

export function trimStr(v: unknown): string | undefined {
  if (typeof v !== 'string') return undefined
  const t = v.trim()
  return t ? t : undefined
}

export function initNetworkDefaults(config?: ToolConfig | null): void {
  const cfg = config?.network
  proxy = trimStr(cfg?.proxy)
  httpProxy = trimStr(cfg?.httpProxy)
  userAgent = trimStr(cfg?.userAgent) || DEFAULT_USER_AGENT
  timeoutMs = cfg?.timeoutMs ?? DEFAULT_TIMEOUT_MS
  retries = cfg?.retries ?? DEFAULT_RETRIES
}

export function getUserAgent(): string {
  return userAgent
}

export function getHttpProxy(): string | undefined {
  return httpProxy
}

export function getTimeoutMs(): number {
  return timeoutMs
}

export function getRetries(): number {
  return retries
}

function stripProtocol(url: string): string {
  return url.replace(/^https?:\/\//, '')
}

/**
 * Apply global proxy/mirror rules to an absolute URL.
 */
export function applyProxy(url: string): string {
  const p = proxy
  if (!p) return url

  // Template mode: replace placeholders.
  if (p.includes('{')) {
    const urlNoProto = stripProtocol(url)
    return p
      .replaceAll('{encodedUrlNoProto}', encodeURIComponent(urlNoProto))
      .replaceAll('{urlNoProto}', urlNoProto)
      .replaceAll('{encodedUrl}', encodeURIComponent(url))
      .replaceAll('{url}', url)
  }

  // Prefix mode: concatenate.
  return `${p}${url}`
}
