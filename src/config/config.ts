/**
 * Runtime configuration loader.
 *
 * - config file is optional
 * - CLI flags always override config defaults
 * - config.json is gitignored; only config.example.json is committed
 */

import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { ConfigError } from '../utils/errors.js'

const optionalStr = z.string().optional()

export const toolConfigSchema = z.object({
  hub: z
    .object({
      /** Hub base URL. Default: https://huggingface.co (HF_ENDPOINT env wins). */
      endpoint: optionalStr,
      /**
       * Direct access token (recommended only in `config/config.json`, which is gitignored).
       *
       * DO NOT put secrets into any committed files.
       */
      token: optionalStr,
      /** Env var name for the access token. Default: HF_TOKEN */
      tokenEnv: optionalStr
    })
    .optional(),
  network: z
    .object({
      /**
       * Optional proxy/mirror prefix or template for all HTTP(S) requests.
       *
       * Supported forms:
       * - Prefix: "https://mirror.example/"  -> proxy + url
       * - Template: "https://mirror.example/{urlNoProto}"
       *
       * Placeholders: {url}, {encodedUrl}, {urlNoProto}, {encodedUrlNoProto}
       */
      proxy: optionalStr,
      /**
       * Optional HTTP proxy URL (transport proxy, CONNECT for HTTPS).
       * If both are set, `proxy` rewriting is applied first, then the request is routed via `httpProxy`.
       */
      httpProxy: optionalStr,
      /** Custom User-Agent header (default: "hf-search"). */
      userAgent: optionalStr,
      /** Request timeout in ms. */
      timeoutMs: z.number().int().positive().optional(),
      /** Retry count for transient errors. */
      retries: z.number().int().min(0).optional()
    })
    .optional(),
  search: z
    .object({
      limit: z.number().int().positive().optional()
    })
    .optional(),
  export: z
    .object({
      format: z.enum(['csv', 'txt']).optional(),
      /** Directory for auto-named export files (default: cwd). */
      dir: optionalStr
    })
    .optional(),
  log: z
    .object({
      /** Append a per-run log under `<projectRoot>/logs`. Default: false */
      runLog: z.boolean().optional()
    })
    .optional()
})

export type ToolConfig = z.infer<typeof toolConfigSchema>

export function configPath(projectRoot: string): string {
  return path.join(projectRoot, 'config', 'config.json')
}

export function loadToolConfig(projectRoot: string): ToolConfig | null {
  const filePath = configPath(projectRoot)
  if (!fs.existsSync(filePath)) return null

  let parsed: unknown
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'))
  } catch (err) {
    throw new ConfigError(`Invalid config file ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err
    })
  }

  const result = toolConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid config file ${filePath}: ${issues.join('; ')}`)
  }
  return result.data
}
