/**
 * Binary decoder: Uint8Array → ContainerElement[] via DataView.
 *
 * Reads the layout produced by encoder.ts. Surface payloads are decoded and
 * validated; other geometry kinds are returned with their payload bytes.
 */

import { SurfaceFormatError } from './errors'
import type {
  ContainerElement, DataLocation, LegendEntry, SurfaceData, SurfaceElement,
} from './types'
import {
  CONTAINER_MAGIC, CONTAINER_VERSION, CONTAINER_HEADER_SIZE, ELEMENT_HEADER_SIZE,
  DATA_SCALAR, DATA_INTEGER, DATA_MAPPED, LOCATION_VERTICES, LOCATION_FACES,
  geometryTagToKind,
} from './types'
import { validateSurfaceElement } from './encoder'

const utf8 = new TextDecoder('utf-8', { fatal: true })

// ─── Reader ─────────────────────────────────────────────────────────────────

/** Bounds-checked little-endian reader over a byte range. */
class Reader {
  private readonly view: DataView

  constructor(
    private readonly bytes: Uint8Array,
    public offset: number,
    private readonly end: number,
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private need(n: number, what: string): void {
    if (this.offset + n > this.end) {
      throw new SurfaceFormatError(`Truncated container: ${what} needs ${n} bytes at offset ${this.offset}`)
    }
  }

  u8(what: string): number {
    this.need(1, what)
    const v = this.view.getUint8(this.offset); this.offset += 1
    return v
  }

  u16(what: string): number {
    this.need(2, what)
    const v = this.view.getUint16(this.offset, true); this.offset += 2
    return v
  }

  u32(what: string): number {
    this.need(4, what)
    const v = this.view.getUint32(this.offset, true); this.offset += 4
    return v
  }

  i32(what: string): number {
    this.need(4, what)
    const v = this.view.getInt32(this.offset, true); this.offset += 4
    return v
  }

  string(what: string): string {
    const len = this.u32(`${what} length`)
    this.need(len, what)
    const s = utf8.decode(this.bytes.subarray(this.offset, this.offset + len)); this.offset += len
    return s
  }

  float64s(count: number, what: string): Float64Array {
    this.need(count * 8, what)
    const out = new Float64Array(count)
    for (let i = 0; i < count; i++) { out[i] = this.view.getFloat64(this.offset, true); this.offset += 8 }
    return out
  }

  int32s(count: number, what: string): Int32Array {
    this.need(count * 4, what)
    const out = new Int32Array(count)
    for (let i = 0; i < count; i++) { out[i] = this.view.getInt32(this.offset, true); this.offset += 4 }
    return out
  }

  /** Unsigned indices of the given width, narrowed to uint32. */
  indices(count: number, width: number, what: string): Uint32Array {
    this.need(count * width, what)
    const out = new Uint32Array(count)
    for (let i = 0; i < count; i++) {
      if (width === 8) {
        const v = this.view.getBigUint64(this.offset, true)
        if (v > 0xFFFFFFFFn) throw new SurfaceFormatError(`${what}: index ${v} exceeds uint32`)
        out[i] = Number(v)
      } else {
        out[i] = this.view.getUint32(this.offset, true)
      }
      this.offset += width
    }
    return out
  }

  rest(): Uint8Array {
    const out = this.bytes.slice(this.offset, this.end)
    this.offset = this.end
    return out
  }
}

// ─── Surface payload ────────────────────────────────────────────────────────

function readLocation(tag: number, name: string): DataLocation {
  switch (tag) {
    case LOCATION_VERTICES: return 'vertices'
    case LOCATION_FACES:    return 'faces'
    default:
      throw new SurfaceFormatError(`Data '${name}': unknown location tag ${tag}`)
  }
}

function readData(reader: Reader): SurfaceData {
  const kindTag = reader.u8('data kind')
  const locationTag = reader.u8('data location')
  const name = reader.string('data name')
  const location = readLocation(locationTag, name)
  const count = reader.u32(`count of '${name}'`)

  switch (kindTag) {
    case DATA_SCALAR:
      return { kind: 'scalar', location, name, array: reader.float64s(count, `values of '${name}'`) }

    case DATA_INTEGER:
      return { kind: 'integer', location, name, array: reader.int32s(count, `values of '${name}'`) }

    case DATA_MAPPED: {
      const array = reader.int32s(count, `codes of '${name}'`)
      const legendCount = reader.u32(`legend count of '${name}'`)
      const legend: LegendEntry[] = []
      for (let i = 0; i < legendCount; i++) {
        const key = reader.i32(`legend key of '${name}'`)
        legend.push({ key, value: reader.string(`legend value of '${name}'`) })
      }
      return { kind: 'mapped', location, name, array, legend }
    }

    default:
      throw new SurfaceFormatError(`Data '${name}': unknown kind tag 0x${kindTag.toString(16).padStart(2, '0')}`)
  }
}

function readSurface(reader: Reader, name: string, description: string): SurfaceElement {
  const vertexCount = reader.u32('vertex count')
  const vertices = reader.float64s(vertexCount * 3, 'vertices')

  const indexWidth = reader.u8('index width')
  if (indexWidth !== 4 && indexWidth !== 8) {
    throw new SurfaceFormatError(`Surface '${name}': unsupported index width ${indexWidth}`)
  }
  const triangleCount = reader.u32('triangle count')
  const triangles = reader.indices(triangleCount * 3, indexWidth, 'triangles')

  const dataCount = reader.u16('data count')
  const data: SurfaceData[] = []
  for (let i = 0; i < dataCount; i++) data.push(readData(reader))

  const element: SurfaceElement = { name, description, geometry: { kind: 'surface', vertices, triangles }, data }
  validateSurfaceElement(element)
  return element
}

// ─── Decode element ─────────────────────────────────────────────────────────

export interface DecodeResult {
  element: ContainerElement
  bytesRead: number
}

/** Decode a single element starting at the given offset. */
export function decodeElementAt(bytes: Uint8Array, offset: number): DecodeResult {
  const header = new Reader(bytes, offset, bytes.byteLength)
  const byteLength = header.u32('element length')
  if (byteLength < ELEMENT_HEADER_SIZE || offset + byteLength > bytes.byteLength) {
    throw new SurfaceFormatError(`Element at offset ${offset} declares ${byteLength} bytes`)
  }

  const reader = new Reader(bytes, header.offset, offset + byteLength)
  const tag = reader.u8('geometry kind')
  const kind = geometryTagToKind(tag)
  if (kind === undefined) {
    throw new SurfaceFormatError(`Unknown geometry kind: 0x${tag.toString(16).padStart(2, '0')}`)
  }
  const name = reader.string('element name')
  const description = reader.string('element description')

  let element: ContainerElement
  if (kind === 'surface') {
    element = readSurface(reader, name, description)
    if (reader.offset !== offset + byteLength) {
      throw new SurfaceFormatError(`Surface '${name}': ${offset + byteLength - reader.offset} unread bytes`)
    }
  } else {
    element = { name, description, geometry: { kind, payload: reader.rest() } }
  }

  return { element, bytesRead: byteLength }
}

// ─── Decode container ───────────────────────────────────────────────────────

function readContainerHeader(bytes: Uint8Array): number {
  if (bytes.byteLength < CONTAINER_HEADER_SIZE) {
    throw new SurfaceFormatError(`Buffer too small for container header: ${bytes.byteLength} bytes`)
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const magic = view.getUint32(0, true)
  if (magic !== CONTAINER_MAGIC) {
    throw new SurfaceFormatError(`Bad container magic: 0x${magic.toString(16).padStart(8, '0')}`)
  }
  const version = view.getUint16(4, true)
  if (version !== CONTAINER_VERSION) {
    throw new SurfaceFormatError(`Unsupported container version: ${version}`)
  }
  return view.getUint32(6, true)
}

/** Read the element count from a container without decoding it. */
export function peekElementCount(bytes: Uint8Array): number {
  return readContainerHeader(bytes)
}

/** Decode every element of a container, in order. */
export function decodeContainer(bytes: Uint8Array): ContainerElement[] {
  const count = readContainerHeader(bytes)
  const elements: ContainerElement[] = []

  let offset = CONTAINER_HEADER_SIZE
  for (let i = 0; i < count; i++) {
    const { element, bytesRead } = decodeElementAt(bytes, offset)
    elements.push(element)
    offset += bytesRead
  }

  if (offset !== bytes.byteLength) {
    throw new SurfaceFormatError(`Trailing bytes after container: ${bytes.byteLength - offset}`)
  }

  return elements
}
