// Types
export type {
  GeometryKind, DataLocation,
  SurfaceGeometry, OpaqueGeometry,
  ScalarData, IntegerData, MappedData, LegendEntry, SurfaceData,
  SurfaceElement, ForeignElement, ContainerElement,
} from './types'

export {
  GEOMETRY_SURFACE, GEOMETRY_POINTSET, GEOMETRY_LINESET, GEOMETRY_VOLUME,
  DATA_SCALAR, DATA_INTEGER, DATA_MAPPED, LOCATION_VERTICES, LOCATION_FACES,
  CONTAINER_MAGIC, CONTAINER_VERSION, CONTAINER_HEADER_SIZE, ELEMENT_HEADER_SIZE,
  geometryTagToKind, geometryKindToTag, isSurfaceElement,
} from './types'

// Errors
export { SurfaceFormatError } from './errors'

// Encoder
export {
  encodeContainer, encodeElementInto, encodedElementSize, validateSurfaceElement,
  type EncodeOptions,
} from './encoder'

// Decoder
export { decodeContainer, decodeElementAt, peekElementCount, type DecodeResult } from './decoder'
