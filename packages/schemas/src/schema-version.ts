/**
 * Schema versioning for canonical triangle meshes.
 * 1.0.0 carries vertex attributes only, 2.0.0 adds face attributes and
 * 2.1.0 adds parts. The converter normalizes every version into one shape.
 */

export const MESH_SCHEMA_TAGS = [
  'triangle-mesh/1.0.0',
  'triangle-mesh/2.0.0',
  'triangle-mesh/2.1.0',
] as const

export type MeshSchemaTag = (typeof MESH_SCHEMA_TAGS)[number]

/** Version written by import. */
export const CURRENT_MESH_SCHEMA = 'triangle-mesh/2.1.0' satisfies MeshSchemaTag

export function isMeshSchemaTag(value: unknown): value is MeshSchemaTag {
  return MESH_SCHEMA_TAGS.some((tag) => tag === value)
}
