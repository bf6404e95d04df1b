import { describe, it, expect } from 'vitest'
import { int64Column } from '@geomesh/table-store'
import { bindAttribute, bindAttributes, type BindContext } from '../attributes'
import { AttributeLengthMismatchError, TableShapeError } from '../errors'
import type { NormalizedAttribute } from '../normalize'
import { newStore, saveColumns, saveFloats, saveInts, saveLookup } from './fixtures'

const ctx: BindContext = { vertexCount: 4, baseTriangleCount: 3, resolved: [2, 0, 2] }

function attribute(
  kind: 'continuous' | 'integer',
  name: string,
  location: 'vertices' | 'faces',
  values: NormalizedAttribute['values'],
): NormalizedAttribute {
  return { kind, name, key: undefined, location, values, nanValues: [-9999] }
}

describe('bindAttribute', () => {
  it('passes vertex values through unchanged, sentinels included', async () => {
    const store = newStore()
    const values = await saveFloats(store, [1.5, -9999, 3, Number.NaN])

    const bound = await bindAttribute(store, attribute('continuous', 'depth', 'vertices', values), ctx)

    expect(bound.kind).toBe('scalar')
    expect(bound.location).toBe('vertices')
    expect(Array.from(bound.array)).toEqual([1.5, -9999, 3, Number.NaN])
  })

  it('projects face values with the resolved triangle sequence', async () => {
    const store = newStore()
    const values = await saveInts(store, [10, 11, 12])

    const bound = await bindAttribute(store, attribute('integer', 'zone', 'faces', values), ctx)

    expect(bound.kind).toBe('integer')
    expect(Array.from(bound.array)).toEqual([12, 10, 12])
  })

  it('checks length against the base count before loading', async () => {
    const ref = { data: 'not-stored', length: 2, width: 1, dataType: 'float64' }

    await expect(bindAttribute(newStore(), attribute('continuous', 'porosity', 'faces', ref), ctx))
      .rejects.toThrow(AttributeLengthMismatchError)
    await expect(bindAttribute(newStore(), attribute('continuous', 'porosity', 'faces', ref), ctx))
      .rejects.toThrow("Attribute 'porosity' has 2 values, expected 3 for location 'faces'")
  })

  it('checks vertex attributes against the vertex count', async () => {
    const store = newStore()
    const values = await saveFloats(store, [1, 2, 3])

    await expect(bindAttribute(store, attribute('continuous', 'depth', 'vertices', values), ctx))
      .rejects.toThrow("Attribute 'depth' has 3 values, expected 4 for location 'vertices'")
  })

  it('attaches the lookup table of a category attribute as a legend', async () => {
    const store = newStore()
    const values = await saveInts(store, [1, 2, 1])
    const lookup = await saveLookup(store, [[1, 'sand'], [2, 'shale']])

    const bound = await bindAttribute(store, {
      kind: 'category', name: 'facies', key: 'k', location: 'faces', values, lookup, nanValues: [],
    }, ctx)

    expect(bound).toEqual({
      kind: 'mapped',
      location: 'faces',
      name: 'facies',
      array: Int32Array.from([1, 1, 1]),
      legend: [{ key: 1, value: 'sand' }, { key: 2, value: 'shale' }],
    })
  })

  it('rejects int64 values outside the int32 range', async () => {
    const store = newStore()
    const values = await saveColumns(store, [int64Column('value', [1, 2 ** 33, 3])])

    await expect(bindAttribute(store, attribute('integer', 'big', 'faces', values), ctx))
      .rejects.toThrow(TableShapeError)
  })
})

describe('bindAttributes', () => {
  it('binds only the requested location, in order', async () => {
    const store = newStore()
    const a = await saveFloats(store, [1, 2, 3, 4])
    const b = await saveFloats(store, [5, 6, 7])
    const c = await saveFloats(store, [8, 9, 10, 11])

    const bound = await bindAttributes(store, [
      attribute('continuous', 'a', 'vertices', a),
      attribute('continuous', 'b', 'faces', b),
      attribute('continuous', 'c', 'vertices', c),
    ], 'vertices', ctx)

    expect(bound.map((d) => d.name)).toEqual(['a', 'c'])
  })
})
