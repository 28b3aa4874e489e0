/**
 * Hub connection settings.
 *
 * `config/config.json` is gitignored, so users may choose to store a token there.
 * Never put tokens into committed files, and never log them.
 */

import type { ToolConfig } from '../config/config.js'
import { trimStr } from '../http/network.js'
import { DEFAULT_HUB_ENDPOINT } from './endpoints.js'

export interface HubConfig {
  endpoint: string
  /**
   * Access token, resolved from (first wins):
   * - process.env[hub.tokenEnv] (default HF_TOKEN)
   * - hub.token (direct string)
   */
  token?: string
}

export function loadHubConfig(
  config: ToolConfig | null | undefined,
  env: NodeJS.ProcessEnv = process.env
): HubConfig {
  const hub = config?.hub
  const endpoint = (trimStr(env.HF_ENDPOINT) || trimStr(hub?.endpoint) || DEFAULT_HUB_ENDPOINT).replace(/\/+$/, '')
  const tokenEnv = trimStr(hub?.tokenEnv) || 'HF_TOKEN'
  const token = trimStr(env[tokenEnv]) || trimStr(hub?.token)
  return token ? { endpoint, token } : { endpoint }
}
