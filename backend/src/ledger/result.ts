export enum LedgerErrorKind {
  validation = 'validation',
  notFound = 'notFound',
  fileNotFound = 'fileNotFound',
  parse = 'parse',
  io = 'io',
}

export interface ILedgerFailure {
  ok: false
  kind: LedgerErrorKind
  message: string
}

export type LedgerResult<T = undefined> = { ok: true; value: T } | ILedgerFailure

export const OK: LedgerResult = { ok: true, value: undefined }

export function success<T>(value: T): LedgerResult<T> {
  return { ok: true, value }
}

export function failure(kind: LedgerErrorKind, message: string): ILedgerFailure {
  return { ok: false, kind, message }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
