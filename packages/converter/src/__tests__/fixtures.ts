import {
  MemoryTableStore, createTable, float64Column, int32Column, uint32Column, uint64Column, utf8Column,
  type Column, type TableRef,
} from '@geomesh/table-store'
import type { CanonicalMesh } from '@geomesh/schemas'
import { parseCanonicalMesh } from '../normalize'

export type Vec3 = [number, number, number]

export const BOX = { minX: 0, maxX: 1, minY: 0, maxY: 1, minZ: 0, maxZ: 1 }

export function newStore(): MemoryTableStore {
  return new MemoryTableStore()
}

export function saveVertices(store: MemoryTableStore, points: Vec3[]): Promise<TableRef> {
  return store.save(createTable([
    float64Column('x', points.map((p) => p[0])),
    float64Column('y', points.map((p) => p[1])),
    float64Column('z', points.map((p) => p[2])),
  ]))
}

export function saveTriangles(
  store: MemoryTableStore,
  triangles: Vec3[],
  width: 'uint32' | 'uint64' = 'uint32',
): Promise<TableRef> {
  const col = width === 'uint32' ? uint32Column : uint64Column
  return store.save(createTable([
    col('n0', triangles.map((t) => t[0])),
    col('n1', triangles.map((t) => t[1])),
    col('n2', triangles.map((t) => t[2])),
  ]))
}

export function saveFloats(store: MemoryTableStore, values: number[]): Promise<TableRef> {
  return store.save(createTable([float64Column('value', values)]))
}

export function saveInts(store: MemoryTableStore, values: number[]): Promise<TableRef> {
  return store.save(createTable([int32Column('value', values)]))
}

export function saveLookup(store: MemoryTableStore, entries: [number, string][]): Promise<TableRef> {
  return store.save(createTable([
    int32Column('key', entries.map((e) => e[0])),
    utf8Column('value', entries.map((e) => e[1])),
  ]))
}

export function saveChunks(store: MemoryTableStore, chunks: [number, number][]): Promise<TableRef> {
  return store.save(createTable([
    uint32Column('start_segment_index', chunks.map((c) => c[0])),
    uint32Column('number_of_segments', chunks.map((c) => c[1])),
  ]))
}

export function saveIndices(store: MemoryTableStore, indices: number[]): Promise<TableRef> {
  return store.save(createTable([uint32Column('index', indices)]))
}

export function saveColumns(store: MemoryTableStore, columns: Column[]): Promise<TableRef> {
  return store.save(createTable(columns))
}

/** Triangle strip: `triangleCount` triangles over `triangleCount + 2` vertices. */
export function stripGeometry(triangleCount: number): { points: Vec3[]; triangles: Vec3[] } {
  const points: Vec3[] = Array.from({ length: triangleCount + 2 }, (_, i) => [i, i % 2, 0])
  const triangles: Vec3[] = Array.from({ length: triangleCount }, (_, i) => [i, i + 1, i + 2])
  return { points, triangles }
}

export function scalarAttribute(name: string, values: TableRef, key?: string): Record<string, unknown> {
  return {
    name,
    ...(key ? { key } : {}),
    attributeType: 'scalar',
    values,
    nanDescription: { values: [-9999] },
  }
}

export function meshV1(
  name: string,
  vertices: TableRef,
  indices: TableRef,
  vertexAttributes: Record<string, unknown>[] = [],
): CanonicalMesh {
  return parseCanonicalMesh({
    schema: 'triangle-mesh/1.0.0',
    name,
    boundingBox: BOX,
    crs: 'unspecified',
    vertices,
    indices,
    vertexAttributes,
  })
}

export interface MeshV2Input {
  name?: string
  description?: string | null
  vertices: TableRef
  indices: TableRef
  vertexAttributes?: Record<string, unknown>[]
  faceAttributes?: Record<string, unknown>[]
  parts?: { chunks: TableRef; triangleIndices?: TableRef }
}

export function meshV2_1(input: MeshV2Input): CanonicalMesh {
  return parseCanonicalMesh({
    schema: 'triangle-mesh/2.1.0',
    name: input.name ?? 'surface',
    description: input.description,
    boundingBox: BOX,
    crs: { epsgCode: 32633 },
    triangles: {
      vertices: { ...input.vertices, attributes: input.vertexAttributes ?? [] },
      indices: { ...input.indices, attributes: input.faceAttributes ?? [] },
    },
    ...(input.parts ? { parts: input.parts } : {}),
  })
}
