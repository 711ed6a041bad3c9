import { InventoryLedger, IreportOutput } from '../ledger/index.js'

/**
 * Walks a ledger through a fixed sequence, including calls the validation rejects,
 * then saves, reloads and prints the report.
 */
export function runDemo(ledger: InventoryLedger, file: string, out: IreportOutput): void {
  ledger.load(file)

  ledger.add('apple', 10)
  ledger.add('banana', 2)
  ledger.add('default', 5)
  ledger.add('pear', 1.5)
  ledger.remove('apple', 3)
  ledger.remove('orange', 1)

  out.write(`Apple stock: ${ledger.getQuantity('apple')}\n`)
  out.write(`Low items: ${JSON.stringify(ledger.checkLow())}\n`)

  ledger.save(file)
  ledger.load(file)
  ledger.printReport(out)
}
