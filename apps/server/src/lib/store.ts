import type { ConverterConfig } from '@geomesh/config'
import { MemoryTableStore, RedisTableStore, createRedisClient, type TableStore } from '@geomesh/table-store'

export interface StoreHandle {
  store: TableStore
  ping: () => Promise<boolean>
  close: () => Promise<void>
}

/** Build the table store named by configuration. */
export function createTableStore(config: ConverterConfig): StoreHandle {
  if (config.tableStore === 'redis') {
    const store = new RedisTableStore(createRedisClient(config.redisUrl), {
      keyPrefix: config.tableKeyPrefix,
      ttlSeconds: config.tableTtlSeconds,
    })
    return { store, ping: () => store.ping(), close: () => store.close() }
  }

  const store = new MemoryTableStore()
  return { store, ping: async () => true, close: async () => {} }
}
