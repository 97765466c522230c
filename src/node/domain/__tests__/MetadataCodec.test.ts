import type { OperationMetadata } from '@shared/types'
import { describe, expect, it } from 'vitest'
import { OperationStateError } from '../../shared/errors'
import { MetadataCodec } from '../MetadataCodec'

describe('MetadataCodec', () => {
  describe('encode', () => {
    it('writes snake_case keys and base64 messages', () => {
      const parsed: unknown = JSON.parse(MetadataCodec.encode(createMetadata()))

      expect(parsed).toEqual({
        base_branch: 'main',
        merge_base: 'abc123',
        target_branch: 'feature-2',
        stack: [
          { commit: 'c1', branches: ['feature-1'], message: 'QWRkIGF1dGg=' },
          { commit: 'c2', branches: [], message: 'd2lw' }
        ],
        original_branch: 'feature-2',
        timestamp: '2024-01-15T10:30:00.000Z'
      })
    })

    it('keeps quotes and newlines out of the JSON text', () => {
      const metadata = createMetadata()
      metadata.stack = [{ commit: 'c1', branches: [], message: 'Fix "quoted"\n\nbody' }]

      const text = MetadataCodec.encode(metadata)

      expect(text).not.toContain('quoted')
    })
  })

  describe('decode', () => {
    it('restores what encode wrote', () => {
      const metadata = createMetadata()
      metadata.stack[0] = { commit: 'c1', branches: ['feature-1'], message: 'Add auth\n\n"Details" ü' }

      expect(MetadataCodec.decode(MetadataCodec.encode(metadata))).toEqual(metadata)
    })

    it('restores control characters, astral symbols and long bodies exactly', () => {
      const message = `Fix\x00null\x1b[31mred\ttab\r\nwindows 🚀 ${'long body line\n'.repeat(2000)}end`
      const metadata = createMetadata()
      metadata.stack = [{ commit: 'c1', branches: ['feature-1'], message }]

      const decoded = MetadataCodec.decode(MetadataCodec.encode(metadata))

      expect(decoded.stack[0]?.message).toBe(message)
      expect(decoded).toEqual(metadata)
    })

    it('keeps a message that is not valid base64 as raw text', () => {
      const record = encodedRecord()
      record.stack = [{ commit: 'c1', branches: [], message: 'not base64!' }]

      const metadata = MetadataCodec.decode(JSON.stringify(record))

      expect(metadata.stack[0]?.message).toBe('not base64!')
    })

    it('stores an empty timestamp when it is absent', () => {
      const { timestamp: _timestamp, ...record } = encodedRecord()

      expect(MetadataCodec.decode(JSON.stringify(record)).timestamp).toBe('')
    })

    it('rejects text that is not JSON', () => {
      expect(() => MetadataCodec.decode('{not json')).toThrow(OperationStateError)
      expect(() => MetadataCodec.decode('{not json')).toThrow('Invalid operation record: not valid JSON')
    })

    it('rejects a JSON value that is not an object', () => {
      expect(() => MetadataCodec.decode('[1, 2]')).toThrow('expected a JSON object')
    })

    it('lists every missing required field', () => {
      const { merge_base: _mergeBase, original_branch: _original, ...record } = encodedRecord()

      let caught: unknown
      try {
        MetadataCodec.decode(JSON.stringify(record))
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(OperationStateError)
      if (caught instanceof OperationStateError) {
        expect(caught.code).toBe('MISSING_FIELDS')
        expect(caught.missingFields).toEqual(['merge_base', 'original_branch'])
        expect(caught.message).toBe(
          'Invalid operation record: missing required fields: merge_base, original_branch'
        )
      }
    })

    it('treats null fields as missing', () => {
      const record = { ...encodedRecord(), base_branch: null }

      expect(() => MetadataCodec.decode(JSON.stringify(record))).toThrow(
        'missing required fields: base_branch'
      )
    })

    it('rejects a stack that is not an array', () => {
      const record = { ...encodedRecord(), stack: 'c1' }

      expect(() => MetadataCodec.decode(JSON.stringify(record))).toThrow('stack must be an array')
    })

    it('rejects a malformed stack entry', () => {
      const record = { ...encodedRecord(), stack: [{ commit: 'c1', branches: 'feature-1', message: '' }] }

      expect(() => MetadataCodec.decode(JSON.stringify(record))).toThrow(
        'malformed stack entry at index 0'
      )
    })

    it('rejects a non-string branch field', () => {
      const record = { ...encodedRecord(), target_branch: 42 }

      expect(() => MetadataCodec.decode(JSON.stringify(record))).toThrow('target_branch must be a string')
    })
  })
})

function createMetadata(): OperationMetadata {
  return {
    baseBranch: 'main',
    targetBranch: 'feature-2',
    originalBranch: 'feature-2',
    mergeBase: 'abc123',
    stack: [
      { commit: 'c1', branches: ['feature-1'], message: 'Add auth' },
      { commit: 'c2', branches: [], message: 'wip' }
    ],
    timestamp: '2024-01-15T10:30:00.000Z'
  }
}

function encodedRecord(): {
  base_branch: string
  merge_base: string
  target_branch: string
  stack: { commit: string; branches: string[]; message: string }[]
  original_branch: string
  timestamp: string
} {
  return {
    base_branch: 'main',
    merge_base: 'abc123',
    target_branch: 'feature-2',
    stack: [{ commit: 'c1', branches: ['feature-1'], message: 'QWRkIGF1dGg=' }],
    original_branch: 'feature-2',
    timestamp: '2024-01-15T10:30:00.000Z'
  }
}
