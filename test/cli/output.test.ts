/**
 * Terminal Output Tests
 */

import chalk from 'chalk'
import { afterEach, beforeAll, describe, it, expect, vi } from 'vitest'
import { formatTable, printTable, statusColor } from '../../src/cli/utils/output.js'

beforeAll(() => {
  chalk.level = 0
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('formatTable', () => {
  it('pads every column but the last', () => {
    const table = formatTable(
      ['SLUG', 'NAME'],
      [
        ['backend', 'Backend'],
        ['ui', 'Frontend'],
      ]
    )

    expect(table.split('\n')).toEqual(['SLUG     NAME', 'backend  Backend', 'ui       Frontend'])
  })

  it('trims trailing padding from empty cells', () => {
    const table = formatTable(['A', 'B', 'C'], [['x', '', '']])

    expect(table.split('\n')[1]).toBe('x')
  })
})

describe('printTable', () => {
  it('says so when there are no rows', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})

    printTable(['SLUG'], [])

    expect(log).toHaveBeenCalledWith('(none)')
  })
})

describe('statusColor', () => {
  it('leaves the text intact', () => {
    expect(statusColor('resolved')).toBe('resolved')
    expect(statusColor('resolvedInNextRelease')).toBe('resolvedInNextRelease')
  })
})
