// Errors
export {
  ConversionError, isConversionError,
  UnsupportedSchemaVersionError, InvalidCanonicalMeshError, IndexOutOfRangeError,
  AttributeLengthMismatchError, UnsupportedGeometryTypeError, TableShapeError,
  type ConversionErrorCode,
} from './errors'

// Logging
export { createLogger, silentLogger, type Logger, type LogFields, type LogSink } from './logger'

// Pipeline stages
export {
  parseCanonicalMesh, normalize, normalizeAttribute, formatIssues,
  type NormalizedMesh, type NormalizedAttribute, type AttributeLocation, type PartsRefs,
  type ContinuousAttribute, type IntegerAttribute, type CategoryAttribute,
} from './normalize'
export { selectChunks, selectIndices, resolveParts, loadParts, type Chunk, type PartsSelection } from './parts'
export { materialize, loadVertices, loadTriangles, projectTriangles, type MaterializedGeometry } from './geometry'
export { bindAttribute, bindAttributes, type BindContext } from './attributes'

// Directions
export { exportSurface, exportSurfaces, type ExportOptions } from './exporter'
export {
  importSurfaces, importSurfaceElement, boundingBoxOf,
  type ImportOptions, type ImportReport, type SkippedElement,
} from './importer'
