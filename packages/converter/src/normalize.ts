/**
 * Schema normalizer: reduces every supported canonical mesh version to one
 * internal shape.
 *
 * Versions differ in nesting, in whether face attributes exist and in
 * whether parts exist. Attribute order and names are kept as given.
 */

import type { ZodError } from 'zod'
import {
  canonicalMeshSchema, isMeshSchemaTag,
  type Attribute, type BoundingBox, type CanonicalMesh, type Crs, type MeshSchemaTag,
} from '@geomesh/schemas'
import type { TableRef } from '@geomesh/table-store'
import { InvalidCanonicalMeshError, UnsupportedSchemaVersionError } from './errors'

export type AttributeLocation = 'vertices' | 'faces'

interface AttributeBase {
  name: string
  /** Stable key of keyed attribute versions; undefined for 1.0.1 attributes. */
  key: string | undefined
  location: AttributeLocation
  values: TableRef
  /** Sentinel values standing for "no data". Passed through as data. */
  nanValues: number[]
}

export interface ContinuousAttribute extends AttributeBase { kind: 'continuous' }
export interface IntegerAttribute extends AttributeBase { kind: 'integer' }
export interface CategoryAttribute extends AttributeBase { kind: 'category'; lookup: TableRef }

export type NormalizedAttribute = ContinuousAttribute | IntegerAttribute | CategoryAttribute

export interface PartsRefs {
  chunks: TableRef
  triangleIndices: TableRef | undefined
}

export interface NormalizedMesh {
  schema: MeshSchemaTag
  name: string
  description: string | undefined
  boundingBox: BoundingBox
  crs: Crs
  vertices: TableRef
  triangles: TableRef
  vertexAttributes: NormalizedAttribute[]
  faceAttributes: NormalizedAttribute[]
  parts: PartsRefs | undefined
}

// ─── Parsing ────────────────────────────────────────────────────────────────

function schemaTagOf(value: unknown): unknown {
  return typeof value === 'object' && value !== null && 'schema' in value ? value.schema : undefined
}

export function formatIssues(error: ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
}

/**
 * Validate raw input into a canonical mesh. An unknown `schema` tag is an
 * UnsupportedSchemaVersionError; a known tag on a malformed object is an
 * InvalidCanonicalMeshError carrying the validation issues.
 */
export function parseCanonicalMesh(input: unknown): CanonicalMesh {
  const tag = schemaTagOf(input)
  if (typeof tag !== 'string' || !isMeshSchemaTag(tag)) throw new UnsupportedSchemaVersionError(tag)

  const result = canonicalMeshSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidCanonicalMeshError(tag, formatIssues(result.error))
  }
  return result.data
}

// ─── Normalization ──────────────────────────────────────────────────────────

export function normalizeAttribute(attr: Attribute, location: AttributeLocation): NormalizedAttribute {
  const base = {
    name: attr.name,
    key: 'key' in attr ? attr.key : undefined,
    location,
    values: refOf(attr.values),
    nanValues: [...attr.nanDescription.values],
  }
  switch (attr.attributeType) {
    case 'scalar':
      return { ...base, kind: 'continuous' }
    case 'integer':
      return { ...base, kind: 'integer' }
    case 'category':
      return { ...base, kind: 'category', lookup: refOf(attr.table) }
  }
}

/** Strip a table-backed array down to its handle. */
function refOf(array: TableRef): TableRef {
  return { data: array.data, length: array.length, width: array.width, dataType: array.dataType }
}

function unsupported(mesh: never): never {
  throw new UnsupportedSchemaVersionError(schemaTagOf(mesh))
}

export function normalize(mesh: CanonicalMesh): NormalizedMesh {
  const common = {
    schema: mesh.schema,
    name: mesh.name,
    description: mesh.description ?? undefined,
    boundingBox: mesh.boundingBox,
    crs: mesh.crs,
  }

  switch (mesh.schema) {
    case 'triangle-mesh/1.0.0':
      return {
        ...common,
        vertices: refOf(mesh.vertices),
        triangles: refOf(mesh.indices),
        vertexAttributes: mesh.vertexAttributes.map((a) => normalizeAttribute(a, 'vertices')),
        faceAttributes: [],
        parts: undefined,
      }

    case 'triangle-mesh/2.0.0':
      return {
        ...common,
        vertices: refOf(mesh.triangles.vertices),
        triangles: refOf(mesh.triangles.indices),
        vertexAttributes: mesh.triangles.vertices.attributes.map((a) => normalizeAttribute(a, 'vertices')),
        faceAttributes: mesh.triangles.indices.attributes.map((a) => normalizeAttribute(a, 'faces')),
        parts: undefined,
      }

    case 'triangle-mesh/2.1.0':
      return {
        ...common,
        vertices: refOf(mesh.triangles.vertices),
        triangles: refOf(mesh.triangles.indices),
        vertexAttributes: mesh.triangles.vertices.attributes.map((a) => normalizeAttribute(a, 'vertices')),
        faceAttributes: mesh.triangles.indices.attributes.map((a) => normalizeAttribute(a, 'faces')),
        parts: mesh.parts
          ? {
            chunks: refOf(mesh.parts.chunks),
            triangleIndices: mesh.parts.triangleIndices && refOf(mesh.parts.triangleIndices),
          }
          : undefined,
      }

    default:
      return unsupported(mesh)
  }
}
