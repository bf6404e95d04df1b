/**
 * HTTP surface of the converter: export and import of surface containers
 * against a shared table store.
 */

import { Hono } from 'hono'
import { InvalidCanonicalMeshError, isConversionError, type Logger } from '@geomesh/converter'
import { SurfaceFormatError } from '@geomesh/surface-format'
import { TableNotFoundError, type TableStore } from '@geomesh/table-store'
import { requestLogger } from './lib/request-logger'
import { InvalidRequestError } from './lib/validate'
import { surfaceRoutes } from './routes/surfaces'

export interface AppDeps {
  store: TableStore
  logger: Logger
  /** Store reachability check for GET /health. */
  ping: () => Promise<boolean>
  defaultEpsgCode?: number
  nodeEnv?: string
}

export function createApp(deps: AppDeps) {
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    if (err instanceof InvalidRequestError) {
      return c.json({ error: err.message, code: err.code, issues: err.issues }, 400)
    }
    if (err instanceof InvalidCanonicalMeshError) {
      return c.json({ error: err.message, code: err.code, issues: err.issues }, 422)
    }
    if (isConversionError(err)) {
      return c.json({ error: err.message, code: err.code }, 422)
    }
    if (err instanceof TableNotFoundError) {
      return c.json({ error: err.message, code: 'TABLE_NOT_FOUND' }, 422)
    }
    if (err instanceof SurfaceFormatError) {
      return c.json({ error: err.message }, 400)
    }

    deps.logger.error('request_failed', {
      method: c.req.method,
      path: c.req.path,
      error: err.message,
      stack: deps.nodeEnv !== 'production' ? err.stack : undefined,
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  app.use('*', requestLogger(deps.logger))

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------

  app.get('/health', async (c) => {
    const checks: Record<string, string> = {}

    try {
      checks['tableStore'] = (await deps.ping()) ? 'ok' : 'error'
    } catch {
      checks['tableStore'] = 'error'
    }

    const healthy = Object.values(checks).every((v) => v === 'ok')
    return c.json({ status: healthy ? 'healthy' : 'degraded', checks }, healthy ? 200 : 503)
  })

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/surfaces', surfaceRoutes({
    store: deps.store,
    logger: deps.logger,
    defaultEpsgCode: deps.defaultEpsgCode,
  }))

  app.get('/', (c) => c.json({ name: 'geomesh converter', version: '0.1.0' }))

  return app
}
