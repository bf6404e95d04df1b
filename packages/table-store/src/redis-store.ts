import Redis from 'ioredis'
import { encodeTable } from './codec'
import { TableNotFoundError } from './errors'
import { decodeStored, tableRefFor } from './store'
import type { TableStore } from './store'
import type { Table, TableRef } from './types'

export interface RedisTableStoreOptions {
  /** Prefix prepended to every content hash to form the Redis key. */
  keyPrefix: string
  /** Optional expiry in seconds for saved tables. */
  ttlSeconds?: number
}

/** Create a Redis client configured the way the table store expects. */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  })
}

/** Table store over Redis binary values. */
export class RedisTableStore implements TableStore {
  constructor(
    private readonly redis: Redis,
    private readonly options: RedisTableStoreOptions = { keyPrefix: 'tables:' },
  ) {}

  private key(ref: Pick<TableRef, 'data'>): string {
    return `${this.options.keyPrefix}${ref.data}`
  }

  async save(table: Table): Promise<TableRef> {
    const bytes = encodeTable(table)
    const ref = tableRefFor(table, bytes)
    const value = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)

    // Content addressing: an existing key already holds identical bytes
    if (this.options.ttlSeconds !== undefined) {
      await this.redis.set(this.key(ref), value, 'EX', this.options.ttlSeconds, 'NX')
    } else {
      await this.redis.set(this.key(ref), value, 'NX')
    }
    return ref
  }

  async load(ref: TableRef): Promise<Table> {
    const raw = await this.redis.getBuffer(this.key(ref))
    if (raw === null) throw new TableNotFoundError(ref.data)
    return decodeStored(ref, raw)
  }

  async has(ref: TableRef): Promise<boolean> {
    const result = await this.redis.exists(this.key(ref))
    return result === 1
  }

  /** Check if Redis is connected and responding. */
  async ping(): Promise<boolean> {
    try {
      const pong = await this.redis.ping()
      return pong === 'PONG'
    } catch {
      return false
    }
  }

  async close(): Promise<void> {
    await this.redis.quit()
  }
}
