/**
 * Config schema validation tests
 */

import { describe, it, expect } from 'vitest'
import { configSchema, outputFormatSchema } from '../schema.js'

describe('configSchema', () => {
  it('should parse empty object with defaults', () => {
    expect(configSchema.parse({})).toEqual({ placeholder: '<empty>', format: 'text' })
  })

  it('should parse full valid config', () => {
    const result = configSchema.parse({ placeholder: '(none)', format: 'json' })
    expect(result.placeholder).toBe('(none)')
    expect(result.format).toBe('json')
  })

  it('should reject empty placeholder', () => {
    expect(configSchema.safeParse({ placeholder: '' }).success).toBe(false)
  })

  it('should reject unknown format', () => {
    expect(configSchema.safeParse({ format: 'xml' }).success).toBe(false)
  })

  it('should ignore unknown fields', () => {
    expect(configSchema.parse({ colour: 'blue' })).toEqual({ placeholder: '<empty>', format: 'text' })
  })
})

describe('outputFormatSchema', () => {
  it('accepts text and json only', () => {
    expect(outputFormatSchema.safeParse('text').success).toBe(true)
    expect(outputFormatSchema.safeParse('json').success).toBe(true)
    expect(outputFormatSchema.safeParse('yaml').success).toBe(false)
  })
})
