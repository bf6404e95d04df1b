import { z } from 'zod'

/**
 * Table-backed array shapes. Each is a handle into the table store plus the
 * width and column type the referenced table must have.
 */
const tableRefSchema = z.object({
  data: z.string().min(1, 'Table reference is required'),
  length: z.number().int().min(0),
  width: z.number().int().min(1),
  dataType: z.string(),
})

const unsignedType = z.enum(['uint32', 'uint64'])

/** Vertex coordinates: 3 × float (x, y, z). */
export const floatArray3Schema = tableRefSchema.extend({
  width: z.literal(3),
  dataType: z.enum(['float32', 'float64']),
})

/** Triangle vertex indices: 3 × unsigned (n0, n1, n2). */
export const indexArray3Schema = tableRefSchema.extend({
  width: z.literal(3),
  dataType: unsignedType,
})

/** Chunk ranges: 2 × unsigned (start_segment_index, number_of_segments). */
export const indexArray2Schema = tableRefSchema.extend({
  width: z.literal(2),
  dataType: unsignedType,
})

/** Single unsigned column (index). */
export const indexArray1Schema = tableRefSchema.extend({
  width: z.literal(1),
  dataType: unsignedType,
})

export const floatArray1Schema = tableRefSchema.extend({
  width: z.literal(1),
  dataType: z.enum(['float32', 'float64']),
})

export const integerArray1Schema = tableRefSchema.extend({
  width: z.literal(1),
  dataType: z.enum(['int32', 'int64']),
})

/** Category lookup table: integer key column plus utf8 value column. */
export const lookupTableSchema = tableRefSchema.extend({
  width: z.literal(2),
  dataType: z.enum(['int32/utf8', 'int64/utf8']),
})

export const boundingBoxSchema = z.object({
  minX: z.number(),
  maxX: z.number(),
  minY: z.number(),
  maxY: z.number(),
  minZ: z.number(),
  maxZ: z.number(),
})

export const crsSchema = z.union([
  z.object({ epsgCode: z.number().int().positive() }),
  z.object({ ogcWkt: z.string().min(1) }),
  z.literal('unspecified'),
])

export type FloatArray3 = z.infer<typeof floatArray3Schema>
export type IndexArray3 = z.infer<typeof indexArray3Schema>
export type IndexArray2 = z.infer<typeof indexArray2Schema>
export type IndexArray1 = z.infer<typeof indexArray1Schema>
export type FloatArray1 = z.infer<typeof floatArray1Schema>
export type IntegerArray1 = z.infer<typeof integerArray1Schema>
export type LookupTable = z.infer<typeof lookupTableSchema>
export type BoundingBox = z.infer<typeof boundingBoxSchema>
export type Crs = z.infer<typeof crsSchema>
