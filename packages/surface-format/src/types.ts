/**
 * Interchange container types for triangulated surfaces.
 *
 * Container: [4B magic "GSRF"] [2B version] [4B elementCount] [elements...]
 * Element:   [4B elementByteLength] [1B geometryKind] [name] [description] [payload]
 *
 * Only surface payloads are decoded; other geometry kinds are carried as
 * opaque bytes so a reader can name and skip them.
 */

// ─── Geometry kind tags ─────────────────────────────────────────────────────

export const GEOMETRY_SURFACE  = 0x01 as const
export const GEOMETRY_POINTSET = 0x02 as const
export const GEOMETRY_LINESET  = 0x03 as const
export const GEOMETRY_VOLUME   = 0x04 as const

const GEOMETRY_KINDS = ['surface', 'pointset', 'lineset', 'volume'] as const

export type GeometryKind = (typeof GEOMETRY_KINDS)[number]

const GEOMETRY_TAGS: Record<GeometryKind, number> = {
  surface: GEOMETRY_SURFACE,
  pointset: GEOMETRY_POINTSET,
  lineset: GEOMETRY_LINESET,
  volume: GEOMETRY_VOLUME,
}

export function geometryTagToKind(tag: number): GeometryKind | undefined {
  return GEOMETRY_KINDS.find((kind) => GEOMETRY_TAGS[kind] === tag)
}

export function geometryKindToTag(kind: GeometryKind): number {
  return GEOMETRY_TAGS[kind]
}

// ─── Data tags ──────────────────────────────────────────────────────────────

export const DATA_SCALAR  = 0x01 as const
export const DATA_INTEGER = 0x02 as const
export const DATA_MAPPED  = 0x03 as const

export const LOCATION_VERTICES = 0x01 as const
export const LOCATION_FACES    = 0x02 as const

export type DataLocation = 'vertices' | 'faces'

// ─── Geometry ───────────────────────────────────────────────────────────────

/**
 * Flat surface geometry.
 * - vertices: x0, y0, z0, x1, y1, z1, ...
 * - triangles: three vertex indices per face
 */
export interface SurfaceGeometry {
  kind: 'surface'
  vertices: Float64Array
  triangles: Uint32Array
}

/** Geometry this container does not interpret. */
export interface OpaqueGeometry {
  kind: Exclude<GeometryKind, 'surface'>
  payload: Uint8Array
}

// ─── Data arrays ────────────────────────────────────────────────────────────

export interface ScalarData {
  kind: 'scalar'
  location: DataLocation
  name: string
  array: Float64Array
}

export interface IntegerData {
  kind: 'integer'
  location: DataLocation
  name: string
  array: Int32Array
}

export interface LegendEntry {
  key: number
  value: string
}

/** Integer codes with the legend that names them. */
export interface MappedData {
  kind: 'mapped'
  location: DataLocation
  name: string
  array: Int32Array
  legend: LegendEntry[]
}

/** Discriminated union of all data arrays. */
export type SurfaceData = ScalarData | IntegerData | MappedData

// ─── Elements ───────────────────────────────────────────────────────────────

export interface SurfaceElement {
  name: string
  description: string
  geometry: SurfaceGeometry
  data: SurfaceData[]
}

export interface ForeignElement {
  name: string
  description: string
  geometry: OpaqueGeometry
}

export type ContainerElement = SurfaceElement | ForeignElement

export function isSurfaceElement(element: ContainerElement): element is SurfaceElement {
  return element.geometry.kind === 'surface'
}

// ─── Header constants ───────────────────────────────────────────────────────

/** "GSRF" read as a little-endian uint32. */
export const CONTAINER_MAGIC = 0x46525347
export const CONTAINER_VERSION = 1

/** Container header: 4B magic + 2B version + 4B elementCount */
export const CONTAINER_HEADER_SIZE = 10

/** Element header before the strings: 4B byteLength + 1B geometryKind */
export const ELEMENT_HEADER_SIZE = 5
