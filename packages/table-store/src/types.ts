/**
 * Columnar table model shared by the store, the codec and the converter.
 *
 * A table is an ordered list of equally long, typed columns. Tables are
 * values: once saved they are addressed by content and never mutated.
 */

// ─── Column types ───────────────────────────────────────────────────────────

export type NumericColumnType = 'float32' | 'float64' | 'int32' | 'uint32' | 'int64' | 'uint64'

export type ColumnType = NumericColumnType | 'utf8'

export interface Float32Column { name: string; type: 'float32'; values: Float32Array }
export interface Float64Column { name: string; type: 'float64'; values: Float64Array }
export interface Int32Column { name: string; type: 'int32'; values: Int32Array }
export interface Uint32Column { name: string; type: 'uint32'; values: Uint32Array }
export interface Int64Column { name: string; type: 'int64'; values: BigInt64Array }
export interface Uint64Column { name: string; type: 'uint64'; values: BigUint64Array }
export interface Utf8Column { name: string; type: 'utf8'; values: string[] }

/** Discriminated union of all column kinds, keyed on `type`. */
export type Column =
  | Float32Column
  | Float64Column
  | Int32Column
  | Uint32Column
  | Int64Column
  | Uint64Column
  | Utf8Column

export type NumericColumn = Exclude<Column, Utf8Column>

export interface Table {
  readonly columns: readonly Column[]
  readonly rowCount: number
}

// ─── Table handle ───────────────────────────────────────────────────────────

/**
 * Immutable back-reference to a stored table.
 * - data: content hash of the encoded table (hex SHA-256)
 * - length: row count
 * - width: column count
 * - dataType: column type, or the column types joined by '/' when mixed
 */
export interface TableRef {
  readonly data: string
  readonly length: number
  readonly width: number
  readonly dataType: string
}

// ─── Codec constants ────────────────────────────────────────────────────────

/** "GTBL" read as a little-endian uint32. */
export const TABLE_MAGIC = 0x4c425447
export const TABLE_VERSION = 1

/** Header: 4B magic + 1B version + 2B columnCount + 4B rowCount */
export const TABLE_HEADER_SIZE = 11

export const COLUMN_TYPES: readonly ColumnType[] = [
  'float32', 'float64', 'int32', 'uint32', 'int64', 'uint64', 'utf8',
]

export const COLUMN_TYPE_TAGS: Record<ColumnType, number> = {
  float32: 1,
  float64: 2,
  int32: 3,
  uint32: 4,
  int64: 5,
  uint64: 6,
  utf8: 7,
}

export const COLUMN_TYPE_BYTES: Record<NumericColumnType, number> = {
  float32: 4,
  float64: 8,
  int32: 4,
  uint32: 4,
  int64: 8,
  uint64: 8,
}
