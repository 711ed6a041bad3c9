import { Command, CommanderError, InvalidArgumentError, OptionValues } from 'commander'
import Debug from 'debug'
import {
  ILogSink,
  IStockPersistence,
  InventoryLedger,
  IreportOutput,
  LedgerErrorKind,
  LogLevelEnum,
  Logger,
  toQuantity,
} from '../ledger/index.js'
import { ConfigError, IledgerConfiguration, LedgerConfig } from './config.js'
import { runDemo } from './demo.js'

const debug = Debug('inventorycli')

export interface IcliContext {
  out: IreportOutput
  err: IreportOutput
  env: NodeJS.ProcessEnv
  createLog?: (level: LogLevelEnum) => ILogSink
  persistence?: IStockPersistence
}

interface IglobalOptions extends OptionValues {
  config?: string
  file?: string
  logLevel?: string
}

interface Isession {
  config: IledgerConfiguration
  log: ILogSink
  ledger: InventoryLedger
}

function parseInteger(value: string): number {
  const n = toQuantity(value)
  if (n === undefined) throw new InvalidArgumentError('Not an integer.')
  return n
}

/**
 * Command line front end of the ledger. Every command loads the configured file first;
 * `add` and `remove` write it back.
 */
export class InventoryCli {
  exitCode = 0
  readonly program: Command

  constructor(private ctx: IcliContext) {
    this.program = this.build()
  }

  /** Parses the arguments and runs the command. An instance runs one command line. */
  run(argv: readonly string[], from: 'node' | 'user' = 'node'): number {
    this.exitCode = 0
    try {
      this.program.parse(argv, { from })
    } catch (e: unknown) {
      if (e instanceof CommanderError) return e.exitCode
      if (e instanceof ConfigError) {
        this.createLog(LogLevelEnum.info).log(LogLevelEnum.error, e.message)
        return 2
      }
      throw e
    }
    return this.exitCode
  }

  private createLog(level: LogLevelEnum): ILogSink {
    return this.ctx.createLog ? this.ctx.createLog(level) : new Logger('inventory', level)
  }

  private build(): Command {
    const cli = new Command('inventory-ledger')
    cli.exitOverride()
    cli.configureOutput({
      writeOut: (str) => this.ctx.out.write(str),
      writeErr: (str) => this.ctx.err.write(str),
    })
    cli.usage('[--config <yaml-file>][--file <json-file>][--log-level <level>] <command>')
    cli.option('-c, --config <yaml-file>', 'read settings from a YAML file')
    cli.option('-f, --file <json-file>', 'inventory file (default: inventory.json)')
    cli.option('-l, --log-level <level>', 'one of ' + Object.values(LogLevelEnum).join(', '))

    cli
      .command('add')
      .description('add a quantity of an item')
      .argument('<item>')
      .argument('<quantity>')
      .action((item: string, quantity: string, _options: OptionValues, cmd: Command) => {
        this.mutate(cmd, item, quantity, (ledger, qty) => ledger.add(item, qty).ok)
      })

    cli
      .command('remove')
      .description('remove a quantity of an item; items at zero or less are deleted')
      .argument('<item>')
      .argument('<quantity>')
      .action((item: string, quantity: string, _options: OptionValues, cmd: Command) => {
        this.mutate(cmd, item, quantity, (ledger, qty) => ledger.remove(item, qty).ok)
      })

    cli
      .command('get')
      .description('print the quantity of an item')
      .argument('<item>')
      .action((item: string, _options: OptionValues, cmd: Command) => {
        const session = this.openLoaded(cmd)
        if (session) this.ctx.out.write(`${session.ledger.getQuantity(item)}\n`)
      })

    cli
      .command('low')
      .description('list items below the low stock threshold')
      .option('-t, --threshold <number>', 'low stock threshold', parseInteger)
      .action((options: { threshold?: number }, cmd: Command) => {
        const session = this.openLoaded(cmd)
        if (!session) return
        const threshold = options.threshold ?? session.config.lowStockThreshold
        session.ledger.checkLow(threshold).forEach((item) => {
          this.ctx.out.write(`${item}\n`)
        })
      })

    cli
      .command('report')
      .description('print all items and their quantities')
      .action((_options: OptionValues, cmd: Command) => {
        const session = this.openLoaded(cmd)
        if (session) session.ledger.printReport(this.ctx.out)
      })

    cli
      .command('demo')
      .description('run a fixed sequence of operations against the inventory file')
      .action((_options: OptionValues, cmd: Command) => {
        const session = this.open(cmd)
        runDemo(session.ledger, session.config.file, this.ctx.out)
      })
    return cli
  }

  private open(cmd: Command): Isession {
    const options = cmd.optsWithGlobals<IglobalOptions>()
    const config = LedgerConfig.resolve({ configFile: options.config, file: options.file, logLevel: options.logLevel }, this.ctx.env)
    debug('configuration ' + JSON.stringify(config))
    const log = this.createLog(config.logLevel)
    const ledger = new InventoryLedger({ log, persistence: this.ctx.persistence })
    return { config, log, ledger }
  }

  // A file that exists but cannot be read must not be overwritten
  private openLoaded(cmd: Command): Isession | undefined {
    const session = this.open(cmd)
    const loaded = session.ledger.load(session.config.file)
    if (!loaded.ok && loaded.kind != LedgerErrorKind.fileNotFound) {
      this.exitCode = 1
      return undefined
    }
    return session
  }

  private mutate(cmd: Command, item: string, quantity: string, apply: (ledger: InventoryLedger, quantity: number) => boolean): void {
    const qty = toQuantity(quantity)
    if (qty === undefined) {
      this.open(cmd).log.log(LogLevelEnum.warn, `Invalid quantity '${quantity}' for item '${item}'. Must be an integer.`)
      this.exitCode = 1
      return
    }
    const session = this.openLoaded(cmd)
    if (!session) return
    if (!apply(session.ledger, qty)) this.exitCode = 1
    if (!session.ledger.save(session.config.file).ok) this.exitCode = 1
  }
}
