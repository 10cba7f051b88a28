/**
 * Schema Tests
 *
 * Layout declaration and exact field-set validation of records.
 */

import { describe, it, expect } from 'vitest'
import { Graph, defineSchema, RecordValidator, SchemaMismatchError } from '../src'

function thrown(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected a throw')
}

describe('defineSchema()', () => {
  it('should keep declared names in order', () => {
    const schema = defineSchema(['name', 'city'], ['weight'])

    expect(schema.nodeAttributes).toEqual(['name', 'city'])
    expect(schema.nodeFields).toEqual(['name', 'city'])
    expect(schema.edgeAttributes).toEqual(['weight'])
  })

  it('should put the endpoints ahead of edge attributes', () => {
    const schema = defineSchema([], ['weight', 'label'])
    expect(schema.edgeFields).toEqual(['start', 'end', 'weight', 'label'])
  })

  it('should freeze the layout', () => {
    const schema = defineSchema(['name'], [])
    expect(Object.isFrozen(schema)).toBe(true)
    expect(Object.isFrozen(schema.nodeAttributes)).toBe(true)
  })

  it('should reject duplicate names', () => {
    expect(() => defineSchema(['name', 'name'], [])).toThrow(
      'Invalid node attributes: unexpected field names: name; attribute names must be declared once',
    )
  })

  it('should reject edge attributes that shadow the endpoints', () => {
    const error = thrown(() => defineSchema([], ['start', 'weight']))

    expect(error).toBeInstanceOf(SchemaMismatchError)
    expect(error).toMatchObject({ kind: 'edge', unexpected: ['start'] })
  })

  it('should allow nodes to declare start and end', () => {
    expect(defineSchema(['start', 'end'], []).nodeFields).toEqual(['start', 'end'])
  })

  it('should reject empty names', () => {
    expect(() => defineSchema([''], [])).toThrow(SchemaMismatchError)
  })

  it('should reject __proto__ as a name', () => {
    expect(() => defineSchema(['__proto__'], [])).toThrow(
      "Invalid node attributes: '__proto__' cannot be an attribute name",
    )
    expect(() => defineSchema([], ['__proto__'])).toThrow(SchemaMismatchError)
  })
})

describe('RecordValidator', () => {
  const validator = new RecordValidator(defineSchema(['city'], ['distance']))

  describe('node()', () => {
    it('should return a frozen copy', () => {
      const input = { city: 'Atlanta' }
      const record = validator.node(input)

      expect(record).toEqual({ city: 'Atlanta' })
      expect(record).not.toBe(input)
      expect(Object.isFrozen(record)).toBe(true)
    })

    it('should accept null as a value', () => {
      expect(validator.node({ city: null })).toEqual({ city: null })
    })

    it('should name unexpected fields', () => {
      const error = thrown(() => validator.node({ city: 'Austin', name: 'tim' }))

      expect(error).toBeInstanceOf(SchemaMismatchError)
      expect(error).toMatchObject({ kind: 'node', unexpected: ['name'], missing: [] })
    })

    it('should name missing fields', () => {
      expect(() => validator.node({})).toThrow('Invalid node attributes: missing field names: city')
    })

    it('should treat undefined values as missing', () => {
      expect(() => validator.node({ city: undefined })).toThrow('missing field names: city')
    })

    it('should report misnamed fields as both unexpected and missing', () => {
      expect(() => validator.node({ town: 'Austin' })).toThrow(
        'Invalid node attributes: unexpected field names: town; missing field names: city',
      )
    })

    it('should not count inherited properties as present', () => {
      const inherited = new RecordValidator(defineSchema(['toString', 'constructor'], []))

      expect(() => inherited.node({})).toThrow('Invalid node attributes: missing field names: toString, constructor')
      expect(inherited.node({ toString: 'a', constructor: 'b' })).toEqual({ toString: 'a', constructor: 'b' })
    })

    it('should reject non-objects', () => {
      expect(() => validator.node('LA')).toThrow(SchemaMismatchError)
    })
  })

  describe('edge()', () => {
    it('should require the endpoints', () => {
      expect(() => validator.edge({ distance: 5 })).toThrow('missing field names: start, end')
    })

    it('should require integer endpoints', () => {
      expect(() => validator.edge({ start: 'a', end: 2, distance: 5 })).toThrow(SchemaMismatchError)
      expect(() => validator.edge({ start: 1.5, end: 2, distance: 5 })).toThrow(SchemaMismatchError)
    })

    it('should accept a complete edge', () => {
      expect(validator.edge({ start: 1, end: 2, distance: 5 })).toEqual({ start: 1, end: 2, distance: 5 })
    })
  })

  describe('buildEdge()', () => {
    it('should attach the endpoints', () => {
      expect(validator.buildEdge(1, 2, { distance: 850 })).toEqual({ start: 1, end: 2, distance: 850 })
    })

    it('should reject endpoints passed as attributes', () => {
      expect(() => validator.buildEdge(1, 2, { start: 3, distance: 850 })).toThrow(
        'Invalid edge attributes: unexpected field names: start; endpoints are passed positionally',
      )
    })
  })

  describe('checkNames()', () => {
    it('should accept declared names and endpoints', () => {
      expect(() => validator.checkNames('edge', ['start', 'distance'])).not.toThrow()
    })

    it('should reject undeclared names', () => {
      expect(() => validator.checkNames('node', ['mustache'])).toThrow(
        'Invalid node attributes: unexpected field names: mustache',
      )
    })
  })
})

describe('Graph record validation', () => {
  it('should refuse a node missing an attribute named like an Object method', () => {
    const g = new Graph<string, string>(['toString'], [])

    expect(() => g.addNode({})).toThrow(SchemaMismatchError)
    expect(g.order()).toBe(0)

    const id = g.addNode({ toString: 'shown' })
    expect(Object.hasOwn(g.node(id), 'toString')).toBe(true)
    expect([...g.searchNodes({ toString: 'shown' })]).toEqual([{ toString: 'shown' }])
  })
})
