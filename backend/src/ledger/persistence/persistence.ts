import { LedgerResult } from '../result.js'

/**
 * Persistence interface for the Stock Map document.
 * The ledger uses this interface; implementations handle filesystem I/O.
 */
export interface IStockPersistence {
  /** Parsed JSON document, not yet validated. */
  read(file: string): LedgerResult<unknown>
  write(file: string, text: string): LedgerResult
}
