/**
 * Typed access to stored tables by role. Anything that does not match the
 * layout a role requires is a TableShapeError.
 */

import {
  findColumn, isNumericColumn, isUnsignedColumn, readNumbers, type Column, type Table,
} from '@geomesh/table-store'
import { TableShapeError } from './errors'

/** Columns of a table that must be exactly `width` wide. */
export function requireWidth(table: Table, width: number, what: string): readonly Column[] {
  if (table.columns.length !== width) {
    throw new TableShapeError(`${what}: expected ${width} columns, found ${table.columns.length}`)
  }
  return table.columns
}

export function columnAt(columns: readonly Column[], index: number, what: string): Column {
  const col = columns[index]
  if (!col) throw new TableShapeError(`${what}: missing column ${index}`)
  return col
}

/** Column looked up by name, or by position when the table does not name it. */
export function columnNamed(table: Table, name: string, index: number, what: string): Column {
  return findColumn(table, name) ?? columnAt(table.columns, index, what)
}

export function unsignedValues(col: Column, what: string): number[] {
  if (!isNumericColumn(col) || !isUnsignedColumn(col)) {
    throw new TableShapeError(`${what}: column '${col.name}' is ${col.type}, expected uint32 or uint64`)
  }
  return readNumbers(col)
}

export function floatValues(col: Column, what: string): Float64Array {
  if (col.type !== 'float64' && col.type !== 'float32') {
    throw new TableShapeError(`${what}: column '${col.name}' is ${col.type}, expected float32 or float64`)
  }
  return Float64Array.from(col.values)
}

export function int32Values(col: Column, what: string): Int32Array {
  switch (col.type) {
    case 'int32':
      return Int32Array.from(col.values)
    case 'int64': {
      const out = new Int32Array(col.values.length)
      col.values.forEach((v, i) => {
        if (v > 0x7FFFFFFFn || v < -0x80000000n) {
          throw new TableShapeError(`${what}: value ${v} in column '${col.name}' exceeds int32`)
        }
        out[i] = Number(v)
      })
      return out
    }
    default:
      throw new TableShapeError(`${what}: column '${col.name}' is ${col.type}, expected int32 or int64`)
  }
}

export function utf8Values(col: Column, what: string): string[] {
  if (col.type !== 'utf8') {
    throw new TableShapeError(`${what}: column '${col.name}' is ${col.type}, expected utf8`)
  }
  return [...col.values]
}
