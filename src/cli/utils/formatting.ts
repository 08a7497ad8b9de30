/**
 * Plain-text tables for `loom` listings.
 */

export interface Column<T> {
  header: string
  value: (row: T) => string
  /** Longer values are cut and end in "..." */
  maxWidth?: number
}

function fit(text: string, maxWidth: number | undefined): string {
  if (maxWidth === undefined || text.length <= maxWidth) return text
  return text.slice(0, Math.max(0, maxWidth - 3)) + '...'
}

/**
 * Columns are padded to their widest cell and joined with " | "; a dashed
 * rule follows the header row. Trailing padding is trimmed from every line.
 */
export function formatTable<T>(columns: Column<T>[], rows: T[]): string {
  const cells = rows.map((row) => columns.map((column) => fit(column.value(row), column.maxWidth)))
  const widths = columns.map((column, i) =>
    cells.reduce((max, line) => Math.max(max, (line[i] ?? '').length), column.header.length),
  )

  const renderLine = (values: string[]): string =>
    values
      .map((value, i) => value.padEnd(widths[i] ?? value.length))
      .join(' | ')
      .trimEnd()

  return [
    renderLine(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(renderLine),
  ].join('\n')
}
