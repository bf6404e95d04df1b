/**
 * Binary encoder: ContainerElement[] → Uint8Array via DataView.
 *
 * Surface payload:
 *   [4B vertexCount] [vertexCount × 3 float64]
 *   [1B indexWidth 4|8] [4B triangleCount] [triangleCount × 3 uint32|uint64]
 *   [2B dataCount] [data entries...]
 *
 * Data entry:
 *   [1B kind] [1B location] [name] [4B count] [values]
 *   mapped only: [4B legendCount] [legendCount × ([4B int32 key] [value])]
 *
 * Strings are [4B byteLength] [utf-8]. All multi-byte values are little-endian.
 */

import { SurfaceFormatError } from './errors'
import type { ContainerElement, SurfaceData, SurfaceElement } from './types'
import {
  CONTAINER_MAGIC, CONTAINER_VERSION, CONTAINER_HEADER_SIZE, ELEMENT_HEADER_SIZE,
  DATA_SCALAR, DATA_INTEGER, DATA_MAPPED, LOCATION_VERTICES, LOCATION_FACES,
  geometryKindToTag, isSurfaceElement,
} from './types'

export interface EncodeOptions {
  /** Bytes per triangle index on the wire. Defaults to 4. */
  indexWidth?: 4 | 8
}

const utf8 = new TextEncoder()

// ─── Size calculation ───────────────────────────────────────────────────────

const stringSize = (s: string): number => 4 + utf8.encode(s).byteLength

function dataSize(data: SurfaceData): number {
  let size = 2 + stringSize(data.name) + 4
  switch (data.kind) {
    case 'scalar':
      size += data.array.length * 8
      break
    case 'integer':
      size += data.array.length * 4
      break
    case 'mapped':
      size += data.array.length * 4 + 4
      for (const entry of data.legend) size += 4 + stringSize(entry.value)
      break
  }
  return size
}

function payloadSize(element: ContainerElement, indexWidth: 4 | 8): number {
  if (!isSurfaceElement(element)) return element.geometry.payload.byteLength
  const { vertices, triangles } = element.geometry
  let size = 4 + vertices.length * 8 + 1 + 4 + triangles.length * indexWidth + 2
  for (const data of element.data) size += dataSize(data)
  return size
}

/** Calculate the exact byte size of one encoded element, length prefix included. */
export function encodedElementSize(element: ContainerElement, options: EncodeOptions = {}): number {
  return ELEMENT_HEADER_SIZE
    + stringSize(element.name)
    + stringSize(element.description)
    + payloadSize(element, options.indexWidth ?? 4)
}

// ─── Validation ─────────────────────────────────────────────────────────────

/** Check the flat array shapes of a surface element and the length of every data array. */
export function validateSurfaceElement(element: SurfaceElement): void {
  const { vertices, triangles } = element.geometry
  if (vertices.length % 3 !== 0) {
    throw new SurfaceFormatError(`Surface '${element.name}': vertex array length ${vertices.length} is not a multiple of 3`)
  }
  if (triangles.length % 3 !== 0) {
    throw new SurfaceFormatError(`Surface '${element.name}': triangle array length ${triangles.length} is not a multiple of 3`)
  }
  const counts = { vertices: vertices.length / 3, faces: triangles.length / 3 }
  for (const data of element.data) {
    if (data.array.length !== counts[data.location]) {
      throw new SurfaceFormatError(
        `Surface '${element.name}': data '${data.name}' has ${data.array.length} values, ` +
        `expected ${counts[data.location]} for location '${data.location}'`,
      )
    }
  }
  if (element.data.length > 0xFFFF) {
    throw new SurfaceFormatError(`Surface '${element.name}': too many data arrays (${element.data.length})`)
  }
}

// ─── Writers ────────────────────────────────────────────────────────────────

function writeString(view: DataView, bytes: Uint8Array, offset: number, s: string): number {
  const encoded = utf8.encode(s)
  view.setUint32(offset, encoded.byteLength, true); offset += 4
  bytes.set(encoded, offset)
  return offset + encoded.byteLength
}

function writeData(view: DataView, bytes: Uint8Array, offset: number, data: SurfaceData): number {
  const kindTag = data.kind === 'scalar' ? DATA_SCALAR : data.kind === 'integer' ? DATA_INTEGER : DATA_MAPPED
  view.setUint8(offset, kindTag); offset += 1
  view.setUint8(offset, data.location === 'vertices' ? LOCATION_VERTICES : LOCATION_FACES); offset += 1
  offset = writeString(view, bytes, offset, data.name)
  view.setUint32(offset, data.array.length, true); offset += 4

  switch (data.kind) {
    case 'scalar':
      for (const v of data.array) { view.setFloat64(offset, v, true); offset += 8 }
      break
    case 'integer':
      for (const v of data.array) { view.setInt32(offset, v, true); offset += 4 }
      break
    case 'mapped':
      for (const v of data.array) { view.setInt32(offset, v, true); offset += 4 }
      view.setUint32(offset, data.legend.length, true); offset += 4
      for (const entry of data.legend) {
        view.setInt32(offset, entry.key, true); offset += 4
        offset = writeString(view, bytes, offset, entry.value)
      }
      break
  }
  return offset
}

function writeSurface(
  view: DataView,
  bytes: Uint8Array,
  offset: number,
  element: SurfaceElement,
  indexWidth: 4 | 8,
): number {
  const { vertices, triangles } = element.geometry

  view.setUint32(offset, vertices.length / 3, true); offset += 4
  for (const v of vertices) { view.setFloat64(offset, v, true); offset += 8 }

  view.setUint8(offset, indexWidth); offset += 1
  view.setUint32(offset, triangles.length / 3, true); offset += 4
  for (const t of triangles) {
    if (indexWidth === 8) {
      view.setBigUint64(offset, BigInt(t), true)
    } else {
      view.setUint32(offset, t, true)
    }
    offset += indexWidth
  }

  view.setUint16(offset, element.data.length, true); offset += 2
  for (const data of element.data) offset = writeData(view, bytes, offset, data)
  return offset
}

/** Encode one element into an existing DataView at the given offset. Returns new offset. */
export function encodeElementInto(
  view: DataView,
  bytes: Uint8Array,
  offset: number,
  element: ContainerElement,
  options: EncodeOptions = {},
): number {
  const indexWidth = options.indexWidth ?? 4
  const start = offset

  view.setUint32(offset, encodedElementSize(element, options), true); offset += 4
  view.setUint8(offset, geometryKindToTag(element.geometry.kind)); offset += 1
  offset = writeString(view, bytes, offset, element.name)
  offset = writeString(view, bytes, offset, element.description)

  if (isSurfaceElement(element)) {
    offset = writeSurface(view, bytes, offset, element, indexWidth)
  } else {
    bytes.set(element.geometry.payload, offset)
    offset += element.geometry.payload.byteLength
  }

  const expected = start + encodedElementSize(element, options)
  if (offset !== expected) {
    throw new SurfaceFormatError(`Element '${element.name}' wrote ${offset - start} bytes, sized ${expected - start}`)
  }
  return offset
}

// ─── Encode container ───────────────────────────────────────────────────────

/** Encode elements, in order, into a new container. */
export function encodeContainer(elements: ContainerElement[], options: EncodeOptions = {}): Uint8Array {
  for (const element of elements) {
    if (isSurfaceElement(element)) validateSurfaceElement(element)
  }

  let size = CONTAINER_HEADER_SIZE
  for (const element of elements) size += encodedElementSize(element, options)

  const bytes = new Uint8Array(size)
  const view = new DataView(bytes.buffer)

  view.setUint32(0, CONTAINER_MAGIC, true)
  view.setUint16(4, CONTAINER_VERSION, true)
  view.setUint32(6, elements.length, true)

  let offset = CONTAINER_HEADER_SIZE
  for (const element of elements) {
    offset = encodeElementInto(view, bytes, offset, element, options)
  }

  return bytes
}
