#!/usr/bin/env node
import { InventoryCli } from './cli.js'
import { LogLevelEnum, Logger } from '../ledger/index.js'

const log = new Logger('inventory')

try {
  process.exitCode = new InventoryCli({ out: process.stdout, err: process.stderr, env: process.env }).run(process.argv)
} catch (e: unknown) {
  const msg = e instanceof Error ? e.message : String(e)
  log.log(LogLevelEnum.error, msg)
  process.exitCode = 5
}
