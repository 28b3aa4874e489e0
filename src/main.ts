/**
 * CLI router / top-level composition root.
 *
 * This file is intentionally small: it wires argv -> command handlers.
 */

import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { Dispatcher } from 'undici'
import { searchCommand } from './commands/search.js'
import { loadToolConfig } from './config/config.js'
import { HubClient } from './hub/client.js'
import { loadHubConfig } from './hub/hub-config.js'
import { initNetworkDefaults } from './http/network.js'
import { appendRunLog, closeRunLog, initRunLog } from './log/run-log.js'
import { parseCliArgs } from './utils/cli-args.js'
import { formatError } from './utils/errors.js'
import { VERSION } from './version.js'
import type { CommandContext } from './types.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

function getProjectRoot(): string {
  // dist/ (or src/) -> project root
  return path.resolve(__dirname, '..')
}

/**
 * Overrides for embedding and tests; a normal run passes none.
 */
export interface RunCliDeps {
  projectRoot?: string
  cwd?: string
  now?: Date
  env?: NodeJS.ProcessEnv
  log?: CommandContext['log']
  /** undici dispatcher for Hub requests. */
  dispatcher?: Dispatcher
}

/**
 * Entrypoint used by cli.ts. Sets `process.exitCode` instead of exiting.
 */
export async function runCli(argv: string[], deps: RunCliDeps = {}): Promise<void> {
  const log = deps.log ?? console
  const ctx: CommandContext = {
    projectRoot: deps.projectRoot ?? getProjectRoot(),
    cwd: deps.cwd ?? process.cwd(),
    now: deps.now ?? new Date(),
    log
  }

  try {
    const config = loadToolConfig(ctx.projectRoot)
    initNetworkDefaults(config)

    const parsed = parseCliArgs(argv, config)
    if (!parsed.ok) {
      log.error(parsed.error)
      process.exitCode = 1
      return
    }

    switch (parsed.data.command) {
      case 'models':
      case 'datasets': {
        if (config?.log?.runLog) {
          initRunLog({
            projectRoot: ctx.projectRoot,
            now: ctx.now,
            command: parsed.data.command,
            onError: (message) => log.warn(message)
          })
        }
        const hub = loadHubConfig(config, deps.env ?? process.env)
        const client = new HubClient({
          ...hub,
          dispatcher: deps.dispatcher,
          log: { info: (line: string) => appendRunLog(line) }
        })
        const code = await searchCommand(ctx, parsed.data.options, client)
        if (code !== 0) process.exitCode = code
        return
      }
      case 'version':
        log.log(VERSION)
        return
      case 'help':
      default:
        log.log(parsed.data.helpText)
        return
    }
  } catch (err) {
    log.error(formatError(err))
    process.exitCode = 1
  } finally {
    closeRunLog()
  }
}
