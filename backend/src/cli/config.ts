import * as fs from 'fs'
import { dirname, isAbsolute, join } from 'path'
import { parse } from 'yaml'
import Debug from 'debug'
import { DEFAULT_FILE, DEFAULT_LOW_THRESHOLD, LogLevelEnum, isJsonObject, toQuantity } from '../ledger/index.js'

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      INVENTORY_FILE?: string
      INVENTORY_LOW_THRESHOLD?: string
      INVENTORY_LOG_LEVEL?: string
    }
  }
}

const debug = Debug('config')

export interface IledgerConfiguration {
  file: string
  lowStockThreshold: number
  logLevel: LogLevelEnum
}

/** Values given on the command line. Missing ones fall back to environment, config file and defaults. */
export interface IconfigOverrides {
  configFile?: string
  file?: string
  lowStockThreshold?: number
  logLevel?: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

function toLogLevel(value: unknown, source: string): LogLevelEnum {
  const level = Object.values(LogLevelEnum).find((l) => l === value)
  if (level === undefined)
    throw new ConfigError(`${source}: invalid log level '${String(value)}'. Allowed: ${Object.values(LogLevelEnum).join(', ')}`)
  return level
}

function toThreshold(value: unknown, source: string): number {
  const threshold = toQuantity(value)
  if (threshold === undefined) throw new ConfigError(`${source}: low stock threshold '${String(value)}' is not an integer`)
  return threshold
}

function toFile(value: unknown, source: string): string {
  if (typeof value !== 'string' || value.trim().length == 0) throw new ConfigError(`${source}: file must be a non-empty string`)
  return value
}

export class LedgerConfig {
  static readonly defaults: IledgerConfiguration = {
    file: DEFAULT_FILE,
    lowStockThreshold: DEFAULT_LOW_THRESHOLD,
    logLevel: LogLevelEnum.info,
  }

  /** Reads a YAML configuration file. Relative `file` entries are resolved against its directory. */
  static readYaml(configFile: string): Partial<IledgerConfiguration> {
    let src: string
    try {
      src = fs.readFileSync(configFile, { encoding: 'utf8' })
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e)
      throw new ConfigError(`Unable to read configuration ${configFile}: ${msg}`)
    }
    let doc: unknown
    try {
      doc = parse(src)
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e)
      throw new ConfigError(`Unable to parse configuration ${configFile}: ${msg}`)
    }
    // An empty YAML file parses to null
    if (doc === null || doc === undefined) return {}
    if (!isJsonObject(doc)) throw new ConfigError(`${configFile}: top level must be a mapping`)

    const rc: Partial<IledgerConfiguration> = {}
    if (doc['file'] !== undefined) {
      const file = toFile(doc['file'], configFile)
      rc.file = isAbsolute(file) ? file : join(dirname(configFile), file)
    }
    if (doc['lowStockThreshold'] !== undefined) rc.lowStockThreshold = toThreshold(doc['lowStockThreshold'], configFile)
    if (doc['logLevel'] !== undefined) rc.logLevel = toLogLevel(doc['logLevel'], configFile)
    debug('read ' + configFile + ': ' + JSON.stringify(rc))
    return rc
  }

  static fromEnv(env: NodeJS.ProcessEnv): Partial<IledgerConfiguration> {
    const rc: Partial<IledgerConfiguration> = {}
    if (env.INVENTORY_FILE) rc.file = toFile(env.INVENTORY_FILE, 'INVENTORY_FILE')
    if (env.INVENTORY_LOW_THRESHOLD) rc.lowStockThreshold = toThreshold(env.INVENTORY_LOW_THRESHOLD, 'INVENTORY_LOW_THRESHOLD')
    if (env.INVENTORY_LOG_LEVEL) rc.logLevel = toLogLevel(env.INVENTORY_LOG_LEVEL, 'INVENTORY_LOG_LEVEL')
    return rc
  }

  /** Defaults, then config file, then environment, then command line. */
  static resolve(overrides: IconfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): IledgerConfiguration {
    const fromFile = overrides.configFile ? LedgerConfig.readYaml(overrides.configFile) : {}
    const fromCli: Partial<IledgerConfiguration> = {}
    if (overrides.file !== undefined) fromCli.file = toFile(overrides.file, '--file')
    if (overrides.lowStockThreshold !== undefined) fromCli.lowStockThreshold = overrides.lowStockThreshold
    if (overrides.logLevel !== undefined) fromCli.logLevel = toLogLevel(overrides.logLevel, '--log-level')
    return { ...LedgerConfig.defaults, ...fromFile, ...LedgerConfig.fromEnv(env), ...fromCli }
  }
}
