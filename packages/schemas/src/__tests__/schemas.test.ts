import { describe, it, expect } from 'vitest'
import {
  attributeSchema,
  canonicalMeshSchema,
  crsSchema,
  partsSchema,
  triangleMeshV1_0_0Schema,
  triangleMeshV2_1_0Schema,
} from '../index'
import { isMeshSchemaTag } from '../schema-version'

const ref = (width: number, dataType: string, length = 4) => ({ data: `hash-${width}-${dataType}`, length, width, dataType })

const boundingBox = { minX: 0, maxX: 1, minY: 0, maxY: 1, minZ: 0, maxZ: 1 }

const continuous = {
  name: 'grade',
  attributeType: 'scalar',
  values: ref(1, 'float64'),
  nanDescription: { values: [-999] },
}

describe('attributeSchema', () => {
  it('keeps the key of a 1.1.0 continuous attribute', () => {
    const parsed = attributeSchema.parse({ ...continuous, key: 'k-grade' })
    expect(parsed).toEqual({ ...continuous, key: 'k-grade' })
  })

  it('accepts a 1.0.1 continuous attribute without a key', () => {
    const parsed = attributeSchema.parse(continuous)
    expect('key' in parsed).toBe(false)
  })

  it('requires a lookup table for category attributes', () => {
    const category = {
      name: 'lithology',
      key: 'k-lith',
      attributeType: 'category',
      values: ref(1, 'int32'),
      nanDescription: { values: [] },
    }
    expect(attributeSchema.safeParse(category).success).toBe(false)
    expect(attributeSchema.safeParse({ ...category, table: ref(2, 'int32/utf8', 3) }).success).toBe(true)
  })

  it('rejects float values for integer attributes', () => {
    const integer = {
      name: 'domain',
      key: 'k-domain',
      attributeType: 'integer',
      values: ref(1, 'float64'),
      nanDescription: { values: [] },
    }
    expect(attributeSchema.safeParse(integer).success).toBe(false)
  })
})

describe('canonicalMeshSchema', () => {
  it('parses a 1.0.0 mesh', () => {
    const mesh = {
      schema: 'triangle-mesh/1.0.0',
      name: 'pit shell',
      boundingBox,
      crs: 'unspecified',
      vertices: ref(3, 'float64'),
      indices: ref(3, 'uint32', 2),
      vertexAttributes: [continuous],
    }
    const parsed = canonicalMeshSchema.parse(mesh)
    expect(parsed.schema).toBe('triangle-mesh/1.0.0')
    expect(triangleMeshV1_0_0Schema.parse(mesh).vertexAttributes).toHaveLength(1)
  })

  it('parses a 2.1.0 mesh with parts', () => {
    const mesh = {
      schema: 'triangle-mesh/2.1.0',
      name: 'fault',
      description: 'north wall',
      boundingBox,
      crs: { epsgCode: 32650 },
      triangles: {
        vertices: { ...ref(3, 'float64'), attributes: [] },
        indices: { ...ref(3, 'uint64', 2), attributes: [] },
      },
      parts: { chunks: ref(2, 'uint64', 1), triangleIndices: ref(1, 'uint64', 1) },
    }
    const parsed = triangleMeshV2_1_0Schema.parse(mesh)
    expect(parsed.parts?.chunks.width).toBe(2)
    expect(parsed.crs).toEqual({ epsgCode: 32650 })
  })

  it('passes a null description and empty names through', () => {
    const parsed = triangleMeshV2_1_0Schema.parse({
      schema: 'triangle-mesh/2.1.0',
      name: '',
      description: null,
      boundingBox,
      crs: 'unspecified',
      triangles: {
        vertices: { ...ref(3, 'float64'), attributes: [{ ...continuous, name: '', key: 'k' }] },
        indices: { ...ref(3, 'uint32', 2), attributes: [] },
      },
    })
    expect(parsed.name).toBe('')
    expect(parsed.description).toBeNull()
    expect(parsed.triangles.vertices.attributes[0]?.name).toBe('')
  })

  it('accepts float32 vertex tables', () => {
    const result = triangleMeshV1_0_0Schema.safeParse({
      schema: 'triangle-mesh/1.0.0',
      name: 'coarse',
      boundingBox,
      crs: 'unspecified',
      vertices: ref(3, 'float32'),
      indices: ref(3, 'uint32', 2),
      vertexAttributes: [],
    })
    expect(result.success).toBe(true)
  })

  it('rejects unknown schema tags', () => {
    const result = canonicalMeshSchema.safeParse({ schema: 'triangle-mesh/9.0.0', name: 'x' })
    expect(result.success).toBe(false)
  })

  it('rejects a vertex table of the wrong width', () => {
    const result = canonicalMeshSchema.safeParse({
      schema: 'triangle-mesh/2.0.0',
      name: 'bad',
      boundingBox,
      crs: 'unspecified',
      triangles: {
        vertices: { ...ref(2, 'float64'), attributes: [] },
        indices: { ...ref(3, 'uint32'), attributes: [] },
      },
    })
    expect(result.success).toBe(false)
  })
})

describe('partsSchema', () => {
  it('makes triangle indices optional', () => {
    expect(partsSchema.parse({ chunks: ref(2, 'uint32', 1) }).triangleIndices).toBeUndefined()
  })
})

describe('crsSchema', () => {
  it('accepts EPSG codes, WKT and unspecified', () => {
    expect(crsSchema.safeParse({ epsgCode: 4326 }).success).toBe(true)
    expect(crsSchema.safeParse({ ogcWkt: 'PROJCS["x"]' }).success).toBe(true)
    expect(crsSchema.safeParse('unspecified').success).toBe(true)
    expect(crsSchema.safeParse({ epsgCode: -1 }).success).toBe(false)
  })
})

describe('schema versions', () => {
  it('recognises the supported tags only', () => {
    expect(isMeshSchemaTag('triangle-mesh/2.0.0')).toBe(true)
    expect(isMeshSchemaTag('triangle-mesh/3.0.0')).toBe(false)
    expect(isMeshSchemaTag(210)).toBe(false)
  })
})
