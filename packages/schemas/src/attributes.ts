import { z } from 'zod'
import { floatArray1Schema, integerArray1Schema, lookupTableSchema } from './elements'

/** Values that stand for "no data". Kept as literal data by the converter. */
export const nanDescriptionSchema = z.object({
  values: z.array(z.number()),
})

// 1.0.1 predates attribute keys.
export const continuousAttributeV1_0_1Schema = z.object({
  name: z.string(),
  attributeType: z.literal('scalar'),
  values: floatArray1Schema,
  nanDescription: nanDescriptionSchema,
})

export const continuousAttributeV1_1_0Schema = continuousAttributeV1_0_1Schema.extend({
  key: z.string().min(1),
})

export const integerAttributeV1_1_0Schema = z.object({
  name: z.string(),
  key: z.string().min(1),
  attributeType: z.literal('integer'),
  values: integerArray1Schema,
  nanDescription: nanDescriptionSchema,
})

export const categoryAttributeV1_1_0Schema = z.object({
  name: z.string(),
  key: z.string().min(1),
  attributeType: z.literal('category'),
  values: integerArray1Schema,
  table: lookupTableSchema,
  nanDescription: nanDescriptionSchema,
})

/** Any supported attribute. Keyed shapes are tried before the unkeyed 1.0.1 shape. */
export const attributeSchema = z.union([
  continuousAttributeV1_1_0Schema,
  integerAttributeV1_1_0Schema,
  categoryAttributeV1_1_0Schema,
  continuousAttributeV1_0_1Schema,
])

export type NanDescription = z.infer<typeof nanDescriptionSchema>
export type ContinuousAttributeV1_0_1 = z.infer<typeof continuousAttributeV1_0_1Schema>
export type ContinuousAttributeV1_1_0 = z.infer<typeof continuousAttributeV1_1_0Schema>
export type IntegerAttributeV1_1_0 = z.infer<typeof integerAttributeV1_1_0Schema>
export type CategoryAttributeV1_1_0 = z.infer<typeof categoryAttributeV1_1_0Schema>
export type Attribute = z.infer<typeof attributeSchema>
