/**
 * Export: canonical mesh objects to surface container elements.
 *
 * normalize -> resolve parts -> materialize geometry -> bind attributes
 * (vertex entries first, then face entries) -> assemble.
 */

import { encodeContainer, type EncodeOptions, type SurfaceElement } from '@geomesh/surface-format'
import type { CanonicalMesh } from '@geomesh/schemas'
import type { TableStore } from '@geomesh/table-store'
import { bindAttributes } from './attributes'
import { materialize } from './geometry'
import { silentLogger, type Logger } from './logger'
import { normalize } from './normalize'
import { loadParts, resolveParts } from './parts'

export interface ExportOptions {
  logger?: Logger
  encode?: EncodeOptions
}

export async function exportSurface(
  mesh: CanonicalMesh,
  store: TableStore,
  options: ExportOptions = {},
): Promise<SurfaceElement> {
  const logger = options.logger ?? silentLogger
  const normalized = normalize(mesh)
  const baseTriangleCount = normalized.triangles.length

  const parts = normalized.parts ? await loadParts(store, normalized.parts) : undefined
  const resolved = resolveParts(parts, baseTriangleCount)

  const geometry = await materialize(store, normalized.vertices, normalized.triangles, resolved)
  const ctx = { vertexCount: geometry.vertexCount, baseTriangleCount, resolved }
  const data = [
    ...(await bindAttributes(store, normalized.vertexAttributes, 'vertices', ctx)),
    ...(await bindAttributes(store, normalized.faceAttributes, 'faces', ctx)),
  ]

  logger.info('surface_exported', {
    name: normalized.name,
    schema: normalized.schema,
    vertices: geometry.vertexCount,
    triangles: resolved.length,
    data: data.length,
  })

  return {
    name: normalized.name,
    description: normalized.description ?? '',
    geometry: { kind: 'surface', vertices: geometry.vertices, triangles: geometry.triangles },
    data,
  }
}

/** Export several meshes into one container, in order. Any failure aborts the whole container. */
export async function exportSurfaces(
  meshes: readonly CanonicalMesh[],
  store: TableStore,
  options: ExportOptions = {},
): Promise<Uint8Array> {
  const elements: SurfaceElement[] = []
  for (const mesh of meshes) elements.push(await exportSurface(mesh, store, options))
  return encodeContainer(elements, options.encode)
}
