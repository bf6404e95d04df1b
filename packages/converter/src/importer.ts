/**
 * Import: surface container elements to canonical triangle-mesh/2.1.0
 * objects, writing every array to the table store.
 *
 * Elements are independent. One that cannot be converted is skipped and
 * reported; the rest of the container still converts.
 */

import { randomUUID } from 'node:crypto'
import {
  decodeContainer, isSurfaceElement,
  type ContainerElement, type SurfaceData, type SurfaceElement,
} from '@geomesh/surface-format'
import {
  CURRENT_MESH_SCHEMA, triangleMeshV2_1_0Schema,
  type BoundingBox, type Crs, type TriangleMeshV2_1_0,
} from '@geomesh/schemas'
import {
  createTable, float64Column, int32Column, uint32Column, utf8Column,
  type TableRef, type TableStore,
} from '@geomesh/table-store'
import {
  IndexOutOfRangeError, InvalidCanonicalMeshError, UnsupportedGeometryTypeError, isConversionError,
  type ConversionErrorCode,
} from './errors'
import { silentLogger, type Logger } from './logger'
import { formatIssues } from './normalize'

export interface ImportOptions {
  /** EPSG code of the imported objects' CRS; 'unspecified' when absent. */
  epsgCode?: number
  logger?: Logger
}

export interface SkippedElement {
  index: number
  name: string
  code: ConversionErrorCode
  message: string
}

export interface ImportReport {
  objects: TriangleMeshV2_1_0[]
  skipped: SkippedElement[]
}

// ─── Helpers ────────────────────────────────────────────────────────────────

export function boundingBoxOf(vertices: Float64Array): BoundingBox {
  if (vertices.length === 0) return { minX: 0, maxX: 0, minY: 0, maxY: 0, minZ: 0, maxZ: 0 }
  const min = [Infinity, Infinity, Infinity]
  const max = [-Infinity, -Infinity, -Infinity]
  vertices.forEach((v, i) => {
    const axis = i % 3
    if (v < (min[axis] ?? Infinity)) min[axis] = v
    if (v > (max[axis] ?? -Infinity)) max[axis] = v
  })
  const [minX = 0, minY = 0, minZ = 0] = min
  const [maxX = 0, maxY = 0, maxZ = 0] = max
  return { minX, maxX, minY, maxY, minZ, maxZ }
}

function axis(vertices: Float64Array, offset: number): Float64Array {
  const out = new Float64Array(vertices.length / 3)
  for (let i = 0; i < out.length; i++) out[i] = vertices[i * 3 + offset] ?? 0
  return out
}

function corner(triangles: Uint32Array, offset: number): Uint32Array {
  const out = new Uint32Array(triangles.length / 3)
  for (let i = 0; i < out.length; i++) out[i] = triangles[i * 3 + offset] ?? 0
  return out
}

function checkTriangles(element: SurfaceElement): void {
  const vertexCount = element.geometry.vertices.length / 3
  element.geometry.triangles.forEach((v, i) => {
    if (v >= vertexCount) {
      throw new IndexOutOfRangeError(
        `Surface '${element.name}': triangle ${Math.floor(i / 3)} references vertex ${v}, but there are only ${vertexCount} vertices`,
        v,
        vertexCount,
      )
    }
  })
}

async function saveData(store: TableStore, data: SurfaceData): Promise<Record<string, unknown>> {
  const common = {
    name: data.name,
    key: randomUUID(),
    nanDescription: { values: [] },
  }
  switch (data.kind) {
    case 'scalar':
      return {
        ...common,
        attributeType: 'scalar',
        values: await store.save(createTable([float64Column('value', data.array)])),
      }
    case 'integer':
      return {
        ...common,
        attributeType: 'integer',
        values: await store.save(createTable([int32Column('value', data.array)])),
      }
    case 'mapped': {
      const lookup: TableRef = await store.save(createTable([
        int32Column('key', data.legend.map((e) => e.key)),
        utf8Column('value', data.legend.map((e) => e.value)),
      ]))
      return {
        ...common,
        attributeType: 'category',
        values: await store.save(createTable([int32Column('value', data.array)])),
        table: lookup,
      }
    }
  }
}

// ─── Import ─────────────────────────────────────────────────────────────────

/** Convert one decoded element. Non-surface geometry is an UnsupportedGeometryTypeError. */
export async function importSurfaceElement(
  element: ContainerElement,
  store: TableStore,
  options: ImportOptions = {},
): Promise<TriangleMeshV2_1_0> {
  if (!isSurfaceElement(element)) throw new UnsupportedGeometryTypeError(element.name, element.geometry.kind)
  checkTriangles(element)

  const { vertices, triangles } = element.geometry
  const verticesRef = await store.save(createTable([
    float64Column('x', axis(vertices, 0)),
    float64Column('y', axis(vertices, 1)),
    float64Column('z', axis(vertices, 2)),
  ]))
  const trianglesRef = await store.save(createTable([
    uint32Column('n0', corner(triangles, 0)),
    uint32Column('n1', corner(triangles, 1)),
    uint32Column('n2', corner(triangles, 2)),
  ]))

  const vertexAttributes: Record<string, unknown>[] = []
  const faceAttributes: Record<string, unknown>[] = []
  for (const data of element.data) {
    const attribute = await saveData(store, data)
    if (data.location === 'vertices') vertexAttributes.push(attribute)
    else faceAttributes.push(attribute)
  }

  const crs: Crs = options.epsgCode !== undefined ? { epsgCode: options.epsgCode } : 'unspecified'

  const result = triangleMeshV2_1_0Schema.safeParse({
    schema: CURRENT_MESH_SCHEMA,
    name: element.name,
    description: element.description,
    boundingBox: boundingBoxOf(vertices),
    crs,
    triangles: {
      vertices: { ...verticesRef, attributes: vertexAttributes },
      indices: { ...trianglesRef, attributes: faceAttributes },
    },
  })
  if (!result.success) throw new InvalidCanonicalMeshError(CURRENT_MESH_SCHEMA, formatIssues(result.error))
  return result.data
}

/** Convert every element of a container, in container order. */
export async function importSurfaces(
  bytes: Uint8Array,
  store: TableStore,
  options: ImportOptions = {},
): Promise<ImportReport> {
  const logger = options.logger ?? silentLogger
  const report: ImportReport = { objects: [], skipped: [] }

  const elements = decodeContainer(bytes)
  for (const [index, element] of elements.entries()) {
    try {
      const mesh = await importSurfaceElement(element, store, options)
      report.objects.push(mesh)
      logger.info('surface_imported', { index, name: element.name, vertices: mesh.triangles.vertices.length })
    } catch (err) {
      if (!isConversionError(err)) throw err
      report.skipped.push({ index, name: element.name, code: err.code, message: err.message })
      logger.warn('element_skipped', { index, name: element.name, code: err.code, message: err.message })
    }
  }

  return report
}
