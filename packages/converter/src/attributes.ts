/**
 * Attribute binding: stored attribute values to data arrays in output order.
 *
 * Vertex attributes pass through unchanged. Face attributes follow the same
 * resolved triangle sequence as the geometry. Lengths are checked against the
 * base element count before any projection, and sentinel values are copied
 * like any other value.
 */

import type { LegendEntry, SurfaceData } from '@geomesh/surface-format'
import type { TableStore } from '@geomesh/table-store'
import { AttributeLengthMismatchError } from './errors'
import type { AttributeLocation, CategoryAttribute, NormalizedAttribute } from './normalize'
import { columnAt, floatValues, int32Values, requireWidth, utf8Values } from './tables'

export interface BindContext {
  vertexCount: number
  baseTriangleCount: number
  /** Resolved base triangle indices; face values are picked at these positions. */
  resolved: readonly number[]
}

function fillRows(values: ArrayLike<number>, resolved: readonly number[], out: Float64Array | Int32Array): void {
  resolved.forEach((t, i) => {
    out[i] = values[t] ?? 0
  })
}

async function loadLegend(store: TableStore, attr: CategoryAttribute): Promise<LegendEntry[]> {
  const what = `lookup table of '${attr.name}'`
  const columns = requireWidth(await store.load(attr.lookup), 2, what)
  const keys = int32Values(columnAt(columns, 0, what), what)
  const labels = utf8Values(columnAt(columns, 1, what), what)
  return labels.map((value, i) => ({ key: keys[i] ?? 0, value }))
}

export async function bindAttribute(
  store: TableStore,
  attr: NormalizedAttribute,
  ctx: BindContext,
): Promise<SurfaceData> {
  const expected = attr.location === 'vertices' ? ctx.vertexCount : ctx.baseTriangleCount
  if (attr.values.length !== expected) {
    throw new AttributeLengthMismatchError(attr.name, attr.location, attr.values.length, expected)
  }

  const what = `attribute '${attr.name}'`
  const column = columnAt(requireWidth(await store.load(attr.values), 1, what), 0, what)
  const pick = <A extends Float64Array | Int32Array>(values: A, empty: (n: number) => A): A => {
    if (attr.location === 'vertices') return values
    const out = empty(ctx.resolved.length)
    fillRows(values, ctx.resolved, out)
    return out
  }

  switch (attr.kind) {
    case 'continuous':
      return {
        kind: 'scalar',
        location: attr.location,
        name: attr.name,
        array: pick(floatValues(column, what), (n) => new Float64Array(n)),
      }
    case 'integer':
      return {
        kind: 'integer',
        location: attr.location,
        name: attr.name,
        array: pick(int32Values(column, what), (n) => new Int32Array(n)),
      }
    case 'category':
      return {
        kind: 'mapped',
        location: attr.location,
        name: attr.name,
        array: pick(int32Values(column, what), (n) => new Int32Array(n)),
        legend: await loadLegend(store, attr),
      }
  }
}

/** Bind the attributes at one location, in their given order. */
export async function bindAttributes(
  store: TableStore,
  attributes: readonly NormalizedAttribute[],
  location: AttributeLocation,
  ctx: BindContext,
): Promise<SurfaceData[]> {
  const bound: SurfaceData[] = []
  for (const attr of attributes) {
    if (attr.location === location) bound.push(await bindAttribute(store, attr, ctx))
  }
  return bound
}
