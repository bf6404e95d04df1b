/**
 * Table construction and column access helpers.
 */

import { TableCodecError } from './errors'
import type { Column, NumericColumn, Table } from './types'

/** Build a table, checking that every column has the same length and a unique name. */
export function createTable(columns: Column[]): Table {
  const rowCount = columns[0]?.values.length ?? 0
  const seen = new Set<string>()

  for (const col of columns) {
    if (col.values.length !== rowCount) {
      throw new TableCodecError(
        `Column length mismatch: '${col.name}' has ${col.values.length} rows, expected ${rowCount}`,
      )
    }
    if (seen.has(col.name)) throw new TableCodecError(`Duplicate column name: '${col.name}'`)
    seen.add(col.name)
  }

  return { columns, rowCount }
}

/** Column type of a table, or the types joined by '/' when they differ. */
export function dataTypeOf(table: Table): string {
  const types = table.columns.map((c) => c.type)
  const [only, ...others] = [...new Set(types)]
  return only !== undefined && others.length === 0 ? only : types.join('/')
}

export function findColumn(table: Table, name: string): Column | undefined {
  return table.columns.find((c) => c.name === name)
}

export function isNumericColumn(col: Column): col is NumericColumn {
  return col.type !== 'utf8'
}

export function isUnsignedColumn(col: Column): boolean {
  return col.type === 'uint32' || col.type === 'uint64'
}

/**
 * Read a numeric column as plain numbers.
 * 64-bit integers outside the safe integer range are rejected.
 */
export function readNumbers(col: NumericColumn): number[] {
  switch (col.type) {
    case 'int64':
    case 'uint64': {
      const bigints: ArrayLike<bigint> = col.values
      return Array.from(bigints, (v) => {
        if (v > BigInt(Number.MAX_SAFE_INTEGER) || v < BigInt(Number.MIN_SAFE_INTEGER)) {
          throw new TableCodecError(`Value ${v} in column '${col.name}' exceeds the safe integer range`)
        }
        return Number(v)
      })
    }
    default:
      return Array.from(col.values)
  }
}

// ─── Column constructors ────────────────────────────────────────────────────

export const float32Column = (name: string, values: ArrayLike<number>): Column =>
  ({ name, type: 'float32', values: Float32Array.from(values) })

export const float64Column = (name: string, values: ArrayLike<number>): Column =>
  ({ name, type: 'float64', values: Float64Array.from(values) })

export const int32Column = (name: string, values: ArrayLike<number>): Column =>
  ({ name, type: 'int32', values: Int32Array.from(values) })

export const uint32Column = (name: string, values: ArrayLike<number>): Column =>
  ({ name, type: 'uint32', values: Uint32Array.from(values) })

export const int64Column = (name: string, values: ArrayLike<number>): Column =>
  ({ name, type: 'int64', values: BigInt64Array.from(Array.from(values, (v) => BigInt(v))) })

export const uint64Column = (name: string, values: ArrayLike<number>): Column =>
  ({ name, type: 'uint64', values: BigUint64Array.from(Array.from(values, (v) => BigInt(v))) })

export const utf8Column = (name: string, values: string[]): Column =>
  ({ name, type: 'utf8', values: [...values] })
