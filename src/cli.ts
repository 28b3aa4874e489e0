#!/usr/bin/env node
/**
 * hf-search CLI entry.
 */

import { runCli } from './main.js'

await runCli(process.argv)
