// Types
export type {
  ColumnType, NumericColumnType, Column, NumericColumn, Table, TableRef,
  Float32Column, Float64Column, Int32Column, Uint32Column, Int64Column, Uint64Column, Utf8Column,
} from './types'

export { TABLE_MAGIC, TABLE_VERSION, TABLE_HEADER_SIZE } from './types'

// Errors
export { TableNotFoundError, TableCodecError } from './errors'

// Columns
export {
  createTable, dataTypeOf, findColumn, isNumericColumn, isUnsignedColumn, readNumbers,
  float32Column, float64Column, int32Column, uint32Column, int64Column, uint64Column, utf8Column,
} from './columns'

// Codec
export { encodeTable, decodeTable } from './codec'

// Stores
export { MemoryTableStore, contentHash, tableRefFor, decodeStored, type TableStore } from './store'
export { RedisTableStore, createRedisClient, type RedisTableStoreOptions } from './redis-store'
