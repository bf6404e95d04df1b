import { z } from 'zod'
import {
  boundingBoxSchema, crsSchema,
  floatArray3Schema, indexArray3Schema, indexArray2Schema, indexArray1Schema,
} from './elements'
import { attributeSchema, continuousAttributeV1_0_1Schema } from './attributes'

const meshBaseSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  uuid: z.string().uuid().nullish(),
  boundingBox: boundingBoxSchema,
  crs: crsSchema,
  tags: z.record(z.string()).optional(),
})

// ─── 1.0.0: flat layout, vertex attributes only ─────────────────────────────

export const triangleMeshV1_0_0Schema = meshBaseSchema.extend({
  schema: z.literal('triangle-mesh/1.0.0'),
  vertices: floatArray3Schema,
  indices: indexArray3Schema,
  vertexAttributes: z.array(continuousAttributeV1_0_1Schema),
})

// ─── 2.0.0: nested triangles, face attributes ───────────────────────────────

export const trianglesSchema = z.object({
  vertices: floatArray3Schema.extend({ attributes: z.array(attributeSchema) }),
  indices: indexArray3Schema.extend({ attributes: z.array(attributeSchema) }),
})

export const triangleMeshV2_0_0Schema = meshBaseSchema.extend({
  schema: z.literal('triangle-mesh/2.0.0'),
  triangles: trianglesSchema,
})

// ─── 2.1.0: adds parts ──────────────────────────────────────────────────────

/**
 * Parts select triangles from the base stream in two steps: `chunks` picks
 * contiguous runs, and `triangleIndices` (when present) picks positions in
 * the concatenation of those runs.
 */
export const partsSchema = z.object({
  chunks: indexArray2Schema,
  triangleIndices: indexArray1Schema.optional(),
})

export const triangleMeshV2_1_0Schema = triangleMeshV2_0_0Schema.extend({
  schema: z.literal('triangle-mesh/2.1.0'),
  parts: partsSchema.optional(),
})

/** Every supported canonical mesh version, discriminated by `schema`. */
export const canonicalMeshSchema = z.discriminatedUnion('schema', [
  triangleMeshV1_0_0Schema,
  triangleMeshV2_0_0Schema,
  triangleMeshV2_1_0Schema,
])

export type Triangles = z.infer<typeof trianglesSchema>
export type Parts = z.infer<typeof partsSchema>
export type TriangleMeshV1_0_0 = z.infer<typeof triangleMeshV1_0_0Schema>
export type TriangleMeshV2_0_0 = z.infer<typeof triangleMeshV2_0_0Schema>
export type TriangleMeshV2_1_0 = z.infer<typeof triangleMeshV2_1_0Schema>
export type CanonicalMesh = z.infer<typeof canonicalMeshSchema>
