/**
 * Terminal Output
 */

import chalk from 'chalk'

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2))
}

/**
 * Left-aligned columns, header in bold. Cells are padded before colouring so
 * escape codes do not skew the widths.
 */
export function formatTable(headers: string[], rows: string[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  )

  const line = (cells: string[]) =>
    cells
      .map((cell, column) => (column === cells.length - 1 ? cell : cell.padEnd(widths[column])))
      .join('  ')
      .trimEnd()

  return [chalk.bold(line(headers)), ...rows.map(line)].join('\n')
}

export function printTable(headers: string[], rows: string[][]): void {
  if (rows.length === 0) {
    console.log(chalk.dim('(none)'))
    return
  }
  console.log(formatTable(headers, rows))
}

export function statusColor(status: string): string {
  switch (status) {
    case 'resolved':
      return chalk.green(status)
    case 'ignored':
      return chalk.gray(status)
    case 'unresolved':
      return chalk.yellow(status)
    default:
      return status
  }
}
