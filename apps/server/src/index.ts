import { serve } from '@hono/node-server'
import { createLogger } from '@geomesh/converter'
import { env } from './lib/env'
import { createTableStore } from './lib/store'
import { createApp } from './app'

const logger = createLogger(env.logLevel)
const { store, ping, close } = createTableStore(env)

const app = createApp({
  store,
  logger,
  ping,
  defaultEpsgCode: env.defaultEpsgCode,
  nodeEnv: env.nodeEnv,
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.port }, (info) => {
  logger.info('server_started', { port: info.port, env: env.nodeEnv, tableStore: env.tableStore })
})

function shutdown(signal: string) {
  logger.info('shutdown', { signal })

  server.close(() => {
    close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('store_close_failed', { error: err instanceof Error ? err.message : String(err) })
        process.exit(1)
      },
    )
  })
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
