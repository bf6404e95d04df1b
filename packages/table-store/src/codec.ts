/**
 * Binary table codec: Table ⇄ Uint8Array via DataView.
 *
 * Layout:
 *   [4B magic "GTBL"] [1B version] [2B columnCount] [4B rowCount]
 *   per column: [2B nameLength] [name utf-8] [1B typeTag] [values]
 *
 * Numeric values are packed back to back; utf8 values are written as
 * [4B byteLength] [bytes] per row. All multi-byte values are little-endian.
 */

import { TableCodecError } from './errors'
import type { Column, ColumnType, NumericColumn, Table } from './types'
import {
  TABLE_MAGIC, TABLE_VERSION, TABLE_HEADER_SIZE,
  COLUMN_TYPES, COLUMN_TYPE_TAGS, COLUMN_TYPE_BYTES,
} from './types'

const utf8Encoder = new TextEncoder()
const utf8Decoder = new TextDecoder('utf-8', { fatal: true })

const TAG_TO_TYPE = new Map<number, ColumnType>(
  COLUMN_TYPES.map((type) => [COLUMN_TYPE_TAGS[type], type] as const),
)

// ─── Encode ─────────────────────────────────────────────────────────────────

/** Encode a table into a new byte array. */
export function encodeTable(table: Table): Uint8Array {
  if (table.columns.length > 0xFFFF) {
    throw new TableCodecError(`Too many columns: ${table.columns.length}`)
  }

  const parts = table.columns.map((col) => ({
    col,
    name: utf8Encoder.encode(col.name),
    strings: col.type === 'utf8' ? col.values.map((s) => utf8Encoder.encode(s)) : [],
  }))

  let size = TABLE_HEADER_SIZE
  for (const { col, name, strings } of parts) {
    size += 2 + name.byteLength + 1
    if (col.type === 'utf8') {
      for (const s of strings) size += 4 + s.byteLength
    } else {
      size += col.values.length * COLUMN_TYPE_BYTES[col.type]
    }
  }

  const bytes = new Uint8Array(size)
  const view = new DataView(bytes.buffer)

  view.setUint32(0, TABLE_MAGIC, true)
  view.setUint8(4, TABLE_VERSION)
  view.setUint16(5, table.columns.length, true)
  view.setUint32(7, table.rowCount, true)

  let offset = TABLE_HEADER_SIZE
  for (const { col, name, strings } of parts) {
    view.setUint16(offset, name.byteLength, true); offset += 2
    bytes.set(name, offset); offset += name.byteLength
    view.setUint8(offset, COLUMN_TYPE_TAGS[col.type]); offset += 1

    if (col.type === 'utf8') {
      for (const s of strings) {
        view.setUint32(offset, s.byteLength, true); offset += 4
        bytes.set(s, offset); offset += s.byteLength
      }
    } else {
      offset = writeValues(view, offset, col)
    }
  }

  return bytes
}

function writeValues(view: DataView, offset: number, col: NumericColumn): number {
  switch (col.type) {
    case 'float32':
      for (const v of col.values) { view.setFloat32(offset, v, true); offset += 4 }
      break
    case 'float64':
      for (const v of col.values) { view.setFloat64(offset, v, true); offset += 8 }
      break
    case 'int32':
      for (const v of col.values) { view.setInt32(offset, v, true); offset += 4 }
      break
    case 'uint32':
      for (const v of col.values) { view.setUint32(offset, v, true); offset += 4 }
      break
    case 'int64':
      for (const v of col.values) { view.setBigInt64(offset, v, true); offset += 8 }
      break
    case 'uint64':
      for (const v of col.values) { view.setBigUint64(offset, v, true); offset += 8 }
      break
  }
  return offset
}

// ─── Decode ─────────────────────────────────────────────────────────────────

/** Decode a table from bytes produced by encodeTable. */
export function decodeTable(bytes: Uint8Array): Table {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let offset = 0

  const need = (n: number, what: string): void => {
    if (offset + n > bytes.byteLength) {
      throw new TableCodecError(`Truncated table: ${what} needs ${n} bytes at offset ${offset}`)
    }
  }

  need(TABLE_HEADER_SIZE, 'header')
  const magic = view.getUint32(0, true)
  if (magic !== TABLE_MAGIC) {
    throw new TableCodecError(`Bad table magic: 0x${magic.toString(16).padStart(8, '0')}`)
  }
  const version = view.getUint8(4)
  if (version !== TABLE_VERSION) throw new TableCodecError(`Unsupported table version: ${version}`)
  const columnCount = view.getUint16(5, true)
  const rowCount = view.getUint32(7, true)
  offset = TABLE_HEADER_SIZE

  const columns: Column[] = []
  for (let c = 0; c < columnCount; c++) {
    need(2, 'column name length')
    const nameLength = view.getUint16(offset, true); offset += 2
    need(nameLength + 1, 'column name')
    const name = utf8Decoder.decode(bytes.subarray(offset, offset + nameLength)); offset += nameLength
    const tag = view.getUint8(offset); offset += 1
    const type = TAG_TO_TYPE.get(tag)
    if (type === undefined) throw new TableCodecError(`Unknown column type tag ${tag} for '${name}'`)

    if (type === 'utf8') {
      const values: string[] = []
      for (let r = 0; r < rowCount; r++) {
        need(4, `string length in '${name}'`)
        const len = view.getUint32(offset, true); offset += 4
        need(len, `string in '${name}'`)
        values.push(utf8Decoder.decode(bytes.subarray(offset, offset + len))); offset += len
      }
      columns.push({ name, type, values })
      continue
    }

    need(rowCount * COLUMN_TYPE_BYTES[type], `values of '${name}'`)
    const { column, next } = readValues(view, offset, name, type, rowCount)
    columns.push(column)
    offset = next
  }

  if (offset !== bytes.byteLength) {
    throw new TableCodecError(`Trailing bytes after table: ${bytes.byteLength - offset}`)
  }

  return { columns, rowCount }
}

function readValues(
  view: DataView,
  offset: number,
  name: string,
  type: NumericColumn['type'],
  rowCount: number,
): { column: Column; next: number } {
  switch (type) {
    case 'float32': {
      const values = new Float32Array(rowCount)
      for (let r = 0; r < rowCount; r++) { values[r] = view.getFloat32(offset, true); offset += 4 }
      return { column: { name, type, values }, next: offset }
    }
    case 'float64': {
      const values = new Float64Array(rowCount)
      for (let r = 0; r < rowCount; r++) { values[r] = view.getFloat64(offset, true); offset += 8 }
      return { column: { name, type, values }, next: offset }
    }
    case 'int32': {
      const values = new Int32Array(rowCount)
      for (let r = 0; r < rowCount; r++) { values[r] = view.getInt32(offset, true); offset += 4 }
      return { column: { name, type, values }, next: offset }
    }
    case 'uint32': {
      const values = new Uint32Array(rowCount)
      for (let r = 0; r < rowCount; r++) { values[r] = view.getUint32(offset, true); offset += 4 }
      return { column: { name, type, values }, next: offset }
    }
    case 'int64': {
      const values = new BigInt64Array(rowCount)
      for (let r = 0; r < rowCount; r++) { values[r] = view.getBigInt64(offset, true); offset += 8 }
      return { column: { name, type, values }, next: offset }
    }
    case 'uint64': {
      const values = new BigUint64Array(rowCount)
      for (let r = 0; r < rowCount; r++) { values[r] = view.getBigUint64(offset, true); offset += 8 }
      return { column: { name, type, values }, next: offset }
    }
  }
}
