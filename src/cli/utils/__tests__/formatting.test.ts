import { describe, it, expect } from 'vitest'
import { formatTable } from '../formatting.js'
import type { Column } from '../formatting.js'

interface Row {
  id: string
  note: string
}

const columns: Column<Row>[] = [
  { header: 'ID', value: (row) => row.id },
  { header: 'Note', value: (row) => row.note, maxWidth: 10 },
]

describe('formatTable', () => {
  it('pads to the widest cell and cuts long values', () => {
    const table = formatTable(columns, [
      { id: 'instr-10', note: 'short' },
      { id: 'i-2', note: 'a note that runs long' },
    ])

    expect(table.split('\n')).toEqual([
      'ID       | Note',
      '---------+-----------',
      'instr-10 | short',
      'i-2      | a note ...',
    ])
  })

  it('renders only the header and rule without rows', () => {
    expect(formatTable(columns, [])).toBe('ID | Note\n---+-----')
  })
})
