import Debug from 'debug'
import { ILogSink, LogLevelEnum, Logger } from './log.js'
import { IStockPersistence } from './persistence/persistence.js'
import { StockFilePersistence } from './persistence/stockPersistence.js'
import { formatReport } from './report.js'
import { LedgerErrorKind, LedgerResult, OK, failure } from './result.js'
import { isAddableItemName, isJsonObject, isQuantity, toStockEntries } from './validate.js'

const debug = Debug('ledger')

export const DEFAULT_FILE = 'inventory.json'
export const DEFAULT_LOW_THRESHOLD = 5
const indentation = 4

export interface IreportOutput {
  write(text: string): unknown
}

export interface IledgerOptions {
  log?: ILogSink
  persistence?: IStockPersistence
  now?: () => Date
}

/**
 * Named item quantities with JSON file persistence.
 *
 * No operation throws. Failures come back as a `LedgerResult` and are logged
 * through the log sink; `load` failures leave the Stock Map empty.
 */
export class InventoryLedger {
  private stock = new Map<string, number>()
  private log: ILogSink
  private persistence: IStockPersistence
  private now: () => Date

  constructor(options: IledgerOptions = {}) {
    this.log = options.log ?? new Logger('ledger')
    this.persistence = options.persistence ?? new StockFilePersistence()
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Adds `quantity` to the stored total, creating the entry when absent.
   * A negative quantity decreases the total; an entry reaching zero or less is deleted.
   */
  add(item: string, quantity: number): LedgerResult {
    if (!isAddableItemName(item)) {
      const msg = `Invalid item name '${String(item)}'. Must be a non-empty string other than 'default'.`
      this.log.log(LogLevelEnum.warn, msg)
      return failure(LedgerErrorKind.validation, msg)
    }
    if (!isQuantity(quantity)) {
      const msg = `Invalid quantity '${String(quantity)}' for item '${item}'. Must be an integer.`
      this.log.log(LogLevelEnum.warn, msg)
      return failure(LedgerErrorKind.validation, msg)
    }
    const total = (this.stock.get(item) ?? 0) + quantity
    if (!Number.isSafeInteger(total)) return this.outOfRange(item, quantity)
    this.stock.set(item, total)
    this.log.log(LogLevelEnum.info, `${this.now().toISOString()}: Added ${quantity} of ${item}`)
    this.dropIfEmpty(item, total)
    return OK
  }

  remove(item: string, quantity: number): LedgerResult {
    if (typeof item !== 'string' || !isQuantity(quantity)) {
      return this.invalidRemove(item, quantity)
    }
    const current = this.stock.get(item)
    if (current === undefined) {
      const msg = `Attempted to remove non-existent item: ${item}`
      this.log.log(LogLevelEnum.warn, msg)
      return failure(LedgerErrorKind.notFound, msg)
    }
    const total = current - quantity
    if (!Number.isSafeInteger(total)) return this.outOfRange(item, -quantity)
    this.stock.set(item, total)
    this.dropIfEmpty(item, total)
    return OK
  }

  getQuantity(item: string): number {
    return this.stock.get(item) ?? 0
  }

  /** Items whose quantity is strictly below `threshold`, in insertion order. */
  checkLow(threshold: number = DEFAULT_LOW_THRESHOLD): string[] {
    const low: string[] = []
    this.stock.forEach((quantity, item) => {
      if (quantity < threshold) low.push(item)
    })
    return low
  }

  entries(): Array<[string, number]> {
    return Array.from(this.stock.entries())
  }

  get size(): number {
    return this.stock.size
  }

  /**
   * Replaces the Stock Map with the JSON object stored in `file`.
   * On any failure the Stock Map is emptied.
   */
  load(file: string = DEFAULT_FILE): LedgerResult {
    this.stock = new Map<string, number>()
    const read = this.persistence.read(file)
    if (!read.ok) {
      switch (read.kind) {
        case LedgerErrorKind.fileNotFound:
          return this.loadFailed(LedgerErrorKind.fileNotFound, LogLevelEnum.warn, `File not found: ${file}. Starting with empty inventory.`)
        case LedgerErrorKind.parse:
          return this.loadFailed(LedgerErrorKind.parse, LogLevelEnum.error, `Error decoding JSON from ${file}. Starting with empty inventory.`)
        default:
          return this.loadFailed(
            LedgerErrorKind.io,
            LogLevelEnum.error,
            `Error loading data from ${file}: ${read.message}. Starting with empty inventory.`
          )
      }
    }
    if (!isJsonObject(read.value)) {
      debug('top level of ' + file + ' is not an object')
      return this.loadFailed(LedgerErrorKind.parse, LogLevelEnum.error, `Error decoding JSON from ${file}. Starting with empty inventory.`)
    }
    const { entries, rejected } = toStockEntries(read.value)
    rejected.forEach((key) => {
      this.log.log(LogLevelEnum.warn, `Ignoring invalid entry '${key}' in ${file}`)
    })
    this.stock = new Map(entries)
    this.log.log(LogLevelEnum.info, `Data loaded successfully from ${file}`)
    return OK
  }

  save(file: string = DEFAULT_FILE): LedgerResult {
    const text = JSON.stringify(Object.fromEntries(this.stock), null, indentation)
    const written = this.persistence.write(file, text)
    if (!written.ok) {
      const msg = `Error saving data to ${file}: ${written.message}`
      this.log.log(LogLevelEnum.error, msg)
      return failure(written.kind, msg)
    }
    this.log.log(LogLevelEnum.info, `Data saved successfully to ${file}`)
    return OK
  }

  formatReport(): string {
    return formatReport(this.entries())
  }

  printReport(out: IreportOutput = process.stdout): void {
    out.write(this.formatReport())
  }

  private dropIfEmpty(item: string, total: number): void {
    if (total > 0) return
    this.stock.delete(item)
    this.log.log(LogLevelEnum.info, `Removed item '${item}' from stock (quantity zero or less).`)
  }

  private invalidRemove(item: unknown, quantity: unknown): LedgerResult {
    const msg = `Invalid types for remove: ${String(item)}, ${String(quantity)}`
    this.log.log(LogLevelEnum.warn, msg)
    return failure(LedgerErrorKind.validation, msg)
  }

  private outOfRange(item: string, change: number): LedgerResult {
    const msg = `Changing '${item}' by ${change} leaves the safe integer range. Quantity unchanged.`
    this.log.log(LogLevelEnum.warn, msg)
    return failure(LedgerErrorKind.validation, msg)
  }

  private loadFailed(kind: LedgerErrorKind, level: LogLevelEnum, msg: string): LedgerResult {
    this.log.log(level, msg)
    return failure(kind, msg)
  }
}
