/**
 * Geometry materialization: stored vertex and triangle tables to flat arrays.
 *
 * The vertex set is emitted whole. Triangles are projected at the resolved
 * indices, keeping order and duplicates; vertex indices are passed through
 * unchanged, so unreferenced vertices stay in the output.
 */

import type { TableRef, TableStore } from '@geomesh/table-store'
import { IndexOutOfRangeError } from './errors'
import { columnAt, floatValues, requireWidth, unsignedValues } from './tables'

export interface MaterializedGeometry {
  /** x0, y0, z0, x1, y1, z1, ... */
  vertices: Float64Array
  /** Three vertex indices per output triangle. */
  triangles: Uint32Array
  vertexCount: number
}

export async function loadVertices(store: TableStore, ref: TableRef): Promise<Float64Array> {
  const columns = requireWidth(await store.load(ref), 3, 'vertices')
  const out = new Float64Array(ref.length * 3)
  for (let axis = 0; axis < 3; axis++) {
    floatValues(columnAt(columns, axis, 'vertices'), 'vertices').forEach((v, row) => {
      out[row * 3 + axis] = v
    })
  }
  return out
}

/** Load the base triangle stream, checking every index against the vertex count. */
export async function loadTriangles(store: TableStore, ref: TableRef, vertexCount: number): Promise<Uint32Array> {
  const columns = requireWidth(await store.load(ref), 3, 'triangles')
  const out = new Uint32Array(ref.length * 3)
  for (let c = 0; c < 3; c++) {
    const values = unsignedValues(columnAt(columns, c, 'triangles'), 'triangles')
    values.forEach((v, row) => {
      if (v >= vertexCount) {
        throw new IndexOutOfRangeError(
          `Triangle ${row} references vertex ${v}, but there are only ${vertexCount} vertices`,
          v,
          vertexCount,
        )
      }
      out[row * 3 + c] = v
    })
  }
  return out
}

/** Rows of the base triangle stream at the resolved positions. */
export function projectTriangles(base: Uint32Array, resolved: readonly number[]): Uint32Array {
  const baseCount = base.length / 3
  const out = new Uint32Array(resolved.length * 3)
  resolved.forEach((t, i) => {
    if (t < 0 || t >= baseCount) {
      throw new IndexOutOfRangeError(`Resolved triangle ${t} exceeds ${baseCount} base triangles`, t, baseCount)
    }
    out.set(base.subarray(t * 3, t * 3 + 3), i * 3)
  })
  return out
}

export async function materialize(
  store: TableStore,
  verticesRef: TableRef,
  trianglesRef: TableRef,
  resolved: readonly number[],
): Promise<MaterializedGeometry> {
  const vertices = await loadVertices(store, verticesRef)
  const vertexCount = verticesRef.length
  const base = await loadTriangles(store, trianglesRef, vertexCount)
  return { vertices, triangles: projectTriangles(base, resolved), vertexCount }
}
