/**
 * Conversion error taxonomy.
 *
 * Every failure of the converter core is a ConversionError with a stable
 * code. All are terminal for the mesh or element being converted; none are
 * retried.
 */

export type ConversionErrorCode =
  | 'UNSUPPORTED_SCHEMA_VERSION'
  | 'INVALID_CANONICAL_MESH'
  | 'INDEX_OUT_OF_RANGE'
  | 'ATTRIBUTE_LENGTH_MISMATCH'
  | 'UNSUPPORTED_GEOMETRY_TYPE'
  | 'TABLE_SHAPE'

export class ConversionError extends Error {
  constructor(
    public readonly code: ConversionErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'ConversionError'
  }
}

export function isConversionError(err: unknown): err is ConversionError {
  return err instanceof ConversionError
}

/** The object's `schema` tag is outside the supported version set. */
export class UnsupportedSchemaVersionError extends ConversionError {
  constructor(public readonly schema: unknown) {
    super('UNSUPPORTED_SCHEMA_VERSION', `Unsupported schema version: ${JSON.stringify(schema) ?? String(schema)}`)
    this.name = 'UnsupportedSchemaVersionError'
  }
}

/** The `schema` tag is supported but the object does not match its shape. */
export class InvalidCanonicalMeshError extends ConversionError {
  constructor(
    public readonly schema: string,
    public readonly issues: string[],
  ) {
    super('INVALID_CANONICAL_MESH', `Invalid ${schema} object: ${issues.join('; ')}`)
    this.name = 'InvalidCanonicalMeshError'
  }
}

/** A chunk range, triangle index or vertex index points past the data it addresses. */
export class IndexOutOfRangeError extends ConversionError {
  constructor(
    message: string,
    public readonly index: number,
    public readonly limit: number,
  ) {
    super('INDEX_OUT_OF_RANGE', message)
    this.name = 'IndexOutOfRangeError'
  }
}

export class AttributeLengthMismatchError extends ConversionError {
  constructor(
    public readonly attribute: string,
    public readonly location: string,
    public readonly actual: number,
    public readonly expected: number,
  ) {
    super(
      'ATTRIBUTE_LENGTH_MISMATCH',
      `Attribute '${attribute}' has ${actual} values, expected ${expected} for location '${location}'`,
    )
    this.name = 'AttributeLengthMismatchError'
  }
}

export class UnsupportedGeometryTypeError extends ConversionError {
  constructor(
    public readonly element: string,
    public readonly geometryKind: string,
  ) {
    super('UNSUPPORTED_GEOMETRY_TYPE', `Element '${element}' has unsupported geometry type '${geometryKind}'`)
    this.name = 'UnsupportedGeometryTypeError'
  }
}

/** A stored table does not have the columns its role requires. */
export class TableShapeError extends ConversionError {
  constructor(message: string) {
    super('TABLE_SHAPE', message)
    this.name = 'TableShapeError'
  }
}
