import Debug from 'debug'
import { format } from 'util'
import winston, { Logger as WinstonLogger } from 'winston'
import Transport from 'winston-transport'
export enum LogLevelEnum {
  verbose = 'verbose',
  http = 'http',
  info = 'info',
  warn = 'warn',
  error = 'error',
}
const debug = Debug('logger')

interface LogRecord {
  level?: string
  label?: string
  message?: unknown
  timestamp?: string
}

function isTestRun(): boolean {
  return process.env['VITEST'] !== undefined
}

// Forwards to debug('logger'), enabled with DEBUG=logger
class DebugTransport extends Transport {
  override log(info: LogRecord, next?: () => void) {
    setImmediate(() => {
      debug(`${info.level ?? 'info'} ${info.label ?? ''}: ${String(info.message ?? '')}`)
      this.emit('logged', info)
    })
    if (next) next()
  }
}

/** Where the ledger sends its records. */
export interface ILogSink {
  log(level: LogLevelEnum, message: string, ...args: unknown[]): void
}

/*
 * Under Vitest the records go through debug() and stay quiet unless DEBUG includes 'logger'.
 * Logger makes it easy to set a source file specific prefix.
 */
export class Logger implements ILogSink {
  private logger: WinstonLogger

  constructor(
    private prefix: string,
    level: LogLevelEnum = LogLevelEnum.info
  ) {
    const commonLabel = winston.format.label({ label: this.prefix })
    const format = !isTestRun()
      ? winston.format.combine(
          winston.format.timestamp(),
          commonLabel,
          winston.format.printf((info) => {
            const i = info as LogRecord
            const time = i.timestamp ?? ''
            return `${time} ${i.level ?? ''} ${i.label ?? ''}: ${String(i.message ?? '')}`
          })
        )
      : winston.format.combine(
          commonLabel,
          winston.format.printf((info) => {
            const i = info as LogRecord
            return `${i.level ?? ''} ${i.label ?? ''}: ${String(i.message ?? '')}`
          })
        )

    // Records go to stderr so command output on stdout stays parseable
    const loggerTransport = isTestRun()
      ? new DebugTransport()
      : new winston.transports.Console({ stderrLevels: Object.values(LogLevelEnum) })
    this.logger = winston.createLogger({
      level: level,
      format: format,
      transports: [loggerTransport],
    })
  }

  get level(): string {
    return this.logger.level
  }

  log(level: LogLevelEnum, message: string, ...args: unknown[]) {
    const msg = format(message, ...args)
    this.logger.log({ level: level, message: msg })
  }
}
