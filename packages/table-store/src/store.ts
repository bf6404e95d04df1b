/**
 * Content-addressed table store.
 *
 * `save` encodes a table and files it under the SHA-256 of its bytes, so
 * saving equal tables yields equal handles and a stored table is never
 * overwritten with different content. `load` always decodes a fresh copy.
 */

import { createHash } from 'node:crypto'
import { encodeTable, decodeTable } from './codec'
import { dataTypeOf } from './columns'
import { TableCodecError, TableNotFoundError } from './errors'
import type { Table, TableRef } from './types'

export interface TableStore {
  /** Persist a table and return its handle. */
  save(table: Table): Promise<TableRef>
  /** Load the table a handle refers to. Throws TableNotFoundError if absent. */
  load(ref: TableRef): Promise<Table>
  /** Check whether the store holds the table a handle refers to. */
  has(ref: TableRef): Promise<boolean>
}

/** Hex SHA-256 of encoded table bytes. */
export function contentHash(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex')
}

/** Build the handle for a table from its encoded bytes. */
export function tableRefFor(table: Table, bytes: Uint8Array): TableRef {
  return {
    data: contentHash(bytes),
    length: table.rowCount,
    width: table.columns.length,
    dataType: dataTypeOf(table),
  }
}

/** Decode stored bytes and check them against the handle that named them. */
export function decodeStored(ref: TableRef, bytes: Uint8Array): Table {
  const table = decodeTable(bytes)
  if (table.rowCount !== ref.length || table.columns.length !== ref.width) {
    throw new TableCodecError(
      `Table ${ref.data} is ${table.rowCount}x${table.columns.length}, handle says ${ref.length}x${ref.width}`,
    )
  }
  return table
}

// ─── In-memory store ────────────────────────────────────────────────────────

/** Process-local store. Used by tests and by the converter when no Redis is configured. */
export class MemoryTableStore implements TableStore {
  private readonly blobs = new Map<string, Uint8Array>()

  async save(table: Table): Promise<TableRef> {
    const bytes = encodeTable(table)
    const ref = tableRefFor(table, bytes)
    if (!this.blobs.has(ref.data)) this.blobs.set(ref.data, bytes)
    return ref
  }

  async load(ref: TableRef): Promise<Table> {
    const bytes = this.blobs.get(ref.data)
    if (!bytes) throw new TableNotFoundError(ref.data)
    return decodeStored(ref, bytes)
  }

  async has(ref: TableRef): Promise<boolean> {
    return this.blobs.has(ref.data)
  }

  /** Number of distinct tables held. */
  get size(): number {
    return this.blobs.size
  }
}
