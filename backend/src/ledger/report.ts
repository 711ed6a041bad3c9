const title = '--- Items Report ---'
const border = '-'.repeat(title.length)
const emptyLine = '  (Inventory is empty)'

export function formatReport(entries: ReadonlyArray<readonly [string, number]>): string {
  const lines: string[] = ['', title]
  if (entries.length == 0) lines.push(emptyLine)
  entries.forEach(([item, quantity]) => {
    lines.push(`  ${item} -> ${quantity}`)
  })
  lines.push(border, '', '')
  return lines.join('\n')
}
