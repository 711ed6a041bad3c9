import * as fs from 'fs'
import * as path from 'path'
import Debug from 'debug'
import { IStockPersistence } from './persistence.js'
import { LedgerErrorKind, LedgerResult, OK, errorMessage, failure, success } from '../result.js'

const debug = Debug('stockPersistence')

function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') return e.code
  return undefined
}

export class StockFilePersistence implements IStockPersistence {
  read(file: string): LedgerResult<unknown> {
    let src: string
    try {
      src = fs.readFileSync(file, { encoding: 'utf8' })
    } catch (e: unknown) {
      if (errorCode(e) === 'ENOENT') return failure(LedgerErrorKind.fileNotFound, `File not found: ${file}`)
      return failure(LedgerErrorKind.io, errorMessage(e))
    }
    debug('read ' + src.length + ' characters from ' + file)
    try {
      return success<unknown>(JSON.parse(src))
    } catch (e: unknown) {
      return failure(LedgerErrorKind.parse, errorMessage(e))
    }
  }

  write(file: string, text: string): LedgerResult {
    try {
      const dir = path.dirname(file)
      if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true })
      fs.writeFileSync(file, text, { encoding: 'utf8' })
      debug('wrote ' + file)
      return OK
    } catch (e: unknown) {
      return failure(LedgerErrorKind.io, errorMessage(e))
    }
  }
}
