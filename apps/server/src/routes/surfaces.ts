import { Hono } from 'hono'
import { z } from 'zod'
import {
  exportSurfaces, importSurfaces, parseCanonicalMesh,
  type Logger,
} from '@geomesh/converter'
import type { TableStore } from '@geomesh/table-store'
import { readBody, readQuery } from '../lib/validate'

export interface SurfaceRouteDeps {
  store: TableStore
  logger: Logger
  /** CRS code applied by import when the request gives none. */
  defaultEpsgCode: number | undefined
}

const exportBodySchema = z.object({
  objects: z.array(z.unknown()).min(1, 'At least one object is required'),
})

const importQuerySchema = z.object({
  epsg: z.coerce.number().int().positive().optional(),
})

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(buffer).set(bytes)
  return buffer
}

export function surfaceRoutes(deps: SurfaceRouteDeps) {
  const routes = new Hono()

  /** POST /surfaces/export: canonical mesh objects to one surface container */
  routes.post('/export', async (c) => {
    const body = await readBody(c, exportBodySchema)

    const meshes = body.objects.map(parseCanonicalMesh)
    const bytes = await exportSurfaces(meshes, deps.store, { logger: deps.logger })
    return c.body(toArrayBuffer(bytes), 200, {
      'Content-Type': 'application/octet-stream',
      'Content-Disposition': 'attachment; filename="surfaces.gsrf"',
    })
  })

  /** POST /surfaces/import?epsg=: surface container to canonical mesh objects */
  routes.post('/import', async (c) => {
    const query = readQuery(c, importQuerySchema)

    const bytes = new Uint8Array(await c.req.arrayBuffer())
    const report = await importSurfaces(bytes, deps.store, {
      epsgCode: query.epsg ?? deps.defaultEpsgCode,
      logger: deps.logger,
    })
    return c.json(report)
  })

  return routes
}
