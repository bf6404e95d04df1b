export {
  floatArray3Schema,
  indexArray3Schema,
  indexArray2Schema,
  indexArray1Schema,
  floatArray1Schema,
  integerArray1Schema,
  lookupTableSchema,
  boundingBoxSchema,
  crsSchema,
  type FloatArray3,
  type IndexArray3,
  type IndexArray2,
  type IndexArray1,
  type FloatArray1,
  type IntegerArray1,
  type LookupTable,
  type BoundingBox,
  type Crs,
} from './elements'

export {
  nanDescriptionSchema,
  continuousAttributeV1_0_1Schema,
  continuousAttributeV1_1_0Schema,
  integerAttributeV1_1_0Schema,
  categoryAttributeV1_1_0Schema,
  attributeSchema,
  type NanDescription,
  type ContinuousAttributeV1_0_1,
  type ContinuousAttributeV1_1_0,
  type IntegerAttributeV1_1_0,
  type CategoryAttributeV1_1_0,
  type Attribute,
} from './attributes'

export {
  trianglesSchema,
  partsSchema,
  triangleMeshV1_0_0Schema,
  triangleMeshV2_0_0Schema,
  triangleMeshV2_1_0Schema,
  canonicalMeshSchema,
  type Triangles,
  type Parts,
  type TriangleMeshV1_0_0,
  type TriangleMeshV2_0_0,
  type TriangleMeshV2_1_0,
  type CanonicalMesh,
} from './meshes'

export {
  MESH_SCHEMA_TAGS,
  CURRENT_MESH_SCHEMA,
  isMeshSchemaTag,
  type MeshSchemaTag,
} from './schema-version'
