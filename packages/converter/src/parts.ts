/**
 * Parts resolution: which base triangles a mesh selects, in which order.
 *
 * Two projections applied in sequence:
 *   1. chunks pick contiguous runs of the base triangle stream and are
 *      concatenated in list order (no sorting, no deduplication)
 *   2. triangleIndices, when present, pick positions in that concatenation
 *
 * Indices address the concatenated stream, never the base stream.
 */

import type { TableStore } from '@geomesh/table-store'
import { IndexOutOfRangeError } from './errors'
import type { PartsRefs } from './normalize'
import { columnNamed, requireWidth, unsignedValues } from './tables'

export interface Chunk {
  start: number
  count: number
}

export interface PartsSelection {
  chunks: Chunk[]
  triangleIndices: number[] | undefined
}

/** Base triangle indices covered by the chunks, in chunk order. */
export function selectChunks(chunks: readonly Chunk[], baseTriangleCount: number): number[] {
  const selected: number[] = []
  chunks.forEach(({ start, count }, i) => {
    const end = start + count
    if (end > baseTriangleCount) {
      throw new IndexOutOfRangeError(
        `Chunk ${i} [${start}, ${end}) exceeds ${baseTriangleCount} base triangles`,
        end,
        baseTriangleCount,
      )
    }
    for (let t = start; t < end; t++) selected.push(t)
  })
  return selected
}

/** Pick positions of the chunk-selected sequence. */
export function selectIndices(selected: readonly number[], triangleIndices: readonly number[]): number[] {
  return triangleIndices.map((position, i) => {
    const triangle = selected[position]
    if (triangle === undefined) {
      throw new IndexOutOfRangeError(
        `Triangle index ${i} is ${position}, but chunks select only ${selected.length} triangles`,
        position,
        selected.length,
      )
    }
    return triangle
  })
}

/** Full resolution. Without parts every base triangle is selected in order. */
export function resolveParts(parts: PartsSelection | undefined, baseTriangleCount: number): number[] {
  if (!parts) return Array.from({ length: baseTriangleCount }, (_, i) => i)
  const selected = selectChunks(parts.chunks, baseTriangleCount)
  return parts.triangleIndices ? selectIndices(selected, parts.triangleIndices) : selected
}

/** Read the chunk and index tables a parts descriptor refers to. */
export async function loadParts(store: TableStore, refs: PartsRefs): Promise<PartsSelection> {
  const chunkTable = await store.load(refs.chunks)
  requireWidth(chunkTable, 2, 'chunks')
  const starts = unsignedValues(columnNamed(chunkTable, 'start_segment_index', 0, 'chunks'), 'chunks')
  const counts = unsignedValues(columnNamed(chunkTable, 'number_of_segments', 1, 'chunks'), 'chunks')
  const chunks = starts.map((start, i) => ({ start, count: counts[i] ?? 0 }))

  let triangleIndices: number[] | undefined
  if (refs.triangleIndices) {
    const indexTable = await store.load(refs.triangleIndices)
    requireWidth(indexTable, 1, 'triangle indices')
    triangleIndices = unsignedValues(columnNamed(indexTable, 'index', 0, 'triangle indices'), 'triangle indices')
  }

  return { chunks, triangleIndices }
}
