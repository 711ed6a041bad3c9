export * from './ledger.js'
export * from './log.js'
export * from './report.js'
export * from './result.js'
export * from './validate.js'
export * from './persistence/persistence.js'
export * from './persistence/stockPersistence.js'
