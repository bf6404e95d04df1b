import { describe, it, expect } from 'vitest'
import {
  MemoryTableStore, createTable, float64Column, uint32Column,
  type Table, type TableRef, type TableStore,
} from '@geomesh/table-store'
import { decodeContainer, encodeContainer, type SurfaceElement } from '@geomesh/surface-format'
import { createLogger, silentLogger } from '@geomesh/converter'
import { createApp, type AppDeps } from '../app'

/**
 * In-process tests of the HTTP surface: every request goes through
 * app.request against an in-memory table store.
 */

const BOX = { minX: 0, maxX: 1, minY: 0, maxY: 1, minZ: 0, maxZ: 0 }

function buildApp(overrides: Partial<AppDeps> = {}) {
  const store = new MemoryTableStore()
  const app = createApp({ store, logger: silentLogger, ping: async () => true, ...overrides })
  return { app, store }
}

async function saveTriangle(store: TableStore) {
  const vertices = await store.save(createTable([
    float64Column('x', [0, 1, 0]), float64Column('y', [0, 0, 1]), float64Column('z', [0, 0, 0]),
  ]))
  const indices = await store.save(createTable([
    uint32Column('n0', [0]), uint32Column('n1', [1]), uint32Column('n2', [2]),
  ]))
  return { vertices, indices }
}

function meshJson(name: string, vertices: TableRef, indices: TableRef, extra: Record<string, unknown> = {}) {
  return {
    schema: 'triangle-mesh/2.1.0',
    name,
    boundingBox: BOX,
    crs: 'unspecified',
    triangles: {
      vertices: { ...vertices, attributes: [] },
      indices: { ...indices, attributes: [] },
    },
    ...extra,
  }
}

function postJson(app: ReturnType<typeof buildApp>['app'], path: string, body: unknown) {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
}

function postBytes(app: ReturnType<typeof buildApp>['app'], path: string, bytes: Uint8Array) {
  const body = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(body).set(bytes)
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/octet-stream' },
    body,
  })
}

const triangleElement: SurfaceElement = {
  name: 'top',
  description: '',
  geometry: {
    kind: 'surface',
    vertices: Float64Array.from([0, 0, 0, 1, 0, 0, 0, 1, 0]),
    triangles: Uint32Array.from([0, 1, 2]),
  },
  data: [],
}

describe('API Route Structure', () => {
  describe('Public endpoints', () => {
    it('GET / returns API info', async () => {
      const res = await buildApp().app.request('/')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ name: 'geomesh converter', version: '0.1.0' })
    })

    it('GET /health reports a reachable store', async () => {
      const res = await buildApp().app.request('/health')
      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ status: 'healthy', checks: { tableStore: 'ok' } })
    })

    it('GET /health degrades when the store is unreachable', async () => {
      const failing = buildApp({ ping: async () => false })
      expect((await failing.app.request('/health')).status).toBe(503)

      const throwing = buildApp({ ping: () => Promise.reject(new Error('connection refused')) })
      const res = await throwing.app.request('/health')
      expect(res.status).toBe(503)
      expect(await res.json()).toEqual({ status: 'degraded', checks: { tableStore: 'error' } })
    })

    it('returns 404 for unknown routes', async () => {
      const res = await buildApp().app.request('/nope')
      expect(res.status).toBe(404)
      expect(await res.json()).toEqual({ error: 'Not found.' })
    })
  })

  describe('POST /surfaces/export', () => {
    it('returns a surface container', async () => {
      const { app, store } = buildApp()
      const { vertices, indices } = await saveTriangle(store)

      const res = await postJson(app, '/surfaces/export', { objects: [meshJson('top', vertices, indices)] })

      expect(res.status).toBe(200)
      expect(res.headers.get('Content-Type')).toBe('application/octet-stream')
      const elements = decodeContainer(new Uint8Array(await res.arrayBuffer()))
      expect(elements.map((e) => e.name)).toEqual(['top'])
    })

    it('returns 400 without objects', async () => {
      const res = await postJson(buildApp().app, '/surfaces/export', { objects: [] })
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: 'Invalid request body.',
        code: 'INVALID_REQUEST',
        issues: ['objects: At least one object is required'],
      })
    })

    it('returns 422 with the issues of a malformed mesh', async () => {
      const res = await postJson(buildApp().app, '/surfaces/export', {
        objects: [{ schema: 'triangle-mesh/2.1.0', name: 'x' }],
      })
      expect(res.status).toBe(422)
      expect(await res.json()).toMatchObject({
        code: 'INVALID_CANONICAL_MESH',
        issues: expect.arrayContaining(['boundingBox: Required']),
      })
    })

    it('returns 422 for an unsupported schema version', async () => {
      const res = await postJson(buildApp().app, '/surfaces/export', {
        objects: [{ schema: 'triangle-mesh/3.0.0', name: 'x' }],
      })
      expect(res.status).toBe(422)
      expect(await res.json()).toEqual({
        error: 'Unsupported schema version: "triangle-mesh/3.0.0"',
        code: 'UNSUPPORTED_SCHEMA_VERSION',
      })
    })

    it('returns 422 for a chunk past the triangle count', async () => {
      const { app, store } = buildApp()
      const { vertices, indices } = await saveTriangle(store)
      const chunks = await store.save(createTable([
        uint32Column('start_segment_index', [0]), uint32Column('number_of_segments', [2]),
      ]))

      const res = await postJson(app, '/surfaces/export', {
        objects: [meshJson('top', vertices, indices, { parts: { chunks } })],
      })

      expect(res.status).toBe(422)
      expect(await res.json()).toMatchObject({ code: 'INDEX_OUT_OF_RANGE' })
    })

    it('returns 422 for a table the store does not hold', async () => {
      const { app } = buildApp()
      const vertices = { data: 'missing', length: 3, width: 3, dataType: 'float64' }
      const indices = { data: 'missing-too', length: 1, width: 3, dataType: 'uint32' }

      const res = await postJson(app, '/surfaces/export', { objects: [meshJson('top', vertices, indices)] })

      expect(res.status).toBe(422)
      expect(await res.json()).toEqual({ error: 'Table not found: missing', code: 'TABLE_NOT_FOUND' })
    })

    it('returns 500 and logs when the store fails unexpectedly', async () => {
      const lines: string[] = []
      const logger = createLogger('error', { out: (l) => lines.push(l), err: (l) => lines.push(l) })
      const memory = new MemoryTableStore()
      const broken: TableStore = {
        save: (table: Table) => memory.save(table),
        load: () => Promise.reject(new Error('disk on fire')),
        has: (ref: TableRef) => memory.has(ref),
      }
      const { vertices, indices } = await saveTriangle(memory)
      const { app } = buildApp({ store: broken, logger })

      const res = await postJson(app, '/surfaces/export', { objects: [meshJson('top', vertices, indices)] })

      expect(res.status).toBe(500)
      expect(await res.json()).toEqual({ error: 'Internal server error.' })
      expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
        level: 'error', event: 'request_failed', path: '/surfaces/export', error: 'disk on fire',
      })
    })
  })

  describe('POST /surfaces/import', () => {
    it('returns the import report with the requested CRS', async () => {
      const { app, store } = buildApp()

      const res = await postBytes(app, '/surfaces/import?epsg=32633', encodeContainer([triangleElement]))

      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        objects: [{ schema: 'triangle-mesh/2.1.0', name: 'top', crs: { epsgCode: 32633 } }],
        skipped: [],
      })
      expect(store.size).toBe(2)
    })

    it('falls back to the configured EPSG code', async () => {
      const { app } = buildApp({ defaultEpsgCode: 4326 })

      const res = await postBytes(app, '/surfaces/import', encodeContainer([triangleElement]))

      expect(await res.json()).toMatchObject({ objects: [{ crs: { epsgCode: 4326 } }] })
    })

    it('reports skipped elements', async () => {
      const { app } = buildApp()
      const bytes = encodeContainer([
        { name: 'wells', description: '', geometry: { kind: 'lineset', payload: new Uint8Array(0) } },
        triangleElement,
      ])

      const res = await postBytes(app, '/surfaces/import', bytes)

      expect(res.status).toBe(200)
      expect(await res.json()).toMatchObject({
        objects: [{ name: 'top' }],
        skipped: [{ index: 0, name: 'wells', code: 'UNSUPPORTED_GEOMETRY_TYPE' }],
      })
    })

    it('returns 400 for bytes that are not a container', async () => {
      const res = await postBytes(buildApp().app, '/surfaces/import', Uint8Array.from([1, 2, 3]))
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Buffer too small for container header: 3 bytes' })
    })

    it('returns 400 for an invalid epsg query', async () => {
      const res = await postBytes(buildApp().app, '/surfaces/import?epsg=-5', encodeContainer([triangleElement]))
      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: 'Invalid query.',
        code: 'INVALID_REQUEST',
        issues: ['epsg: Number must be greater than 0'],
      })
    })
  })
})
