/**
 * MetadataCodec - serialization of OperationMetadata.
 *
 * Records are JSON with snake_case keys. Commit messages are stored base64
 * encoded so that quotes, newlines and control characters in free-text
 * messages never reach the JSON layer verbatim.
 */

import type { OperationMetadata, StackEntry } from '@shared/types'
import { OperationStateError } from '../shared/errors'

type EncodedStackEntry = {
  commit: string
  branches: string[]
  message: string
}

type EncodedMetadata = {
  base_branch: string
  merge_base: string
  target_branch: string
  stack: EncodedStackEntry[]
  original_branch: string
  timestamp: string
}

export const REQUIRED_FIELDS = [
  'base_branch',
  'merge_base',
  'target_branch',
  'stack',
  'original_branch'
] as const

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

export class MetadataCodec {
  private constructor() {}

  static encode(metadata: OperationMetadata): string {
    const encoded: EncodedMetadata = {
      base_branch: metadata.baseBranch,
      merge_base: metadata.mergeBase,
      target_branch: metadata.targetBranch,
      stack: metadata.stack.map((entry) => ({
        commit: entry.commit,
        branches: [...entry.branches],
        message: MetadataCodec.encodeMessage(entry.message)
      })),
      original_branch: metadata.originalBranch,
      timestamp: metadata.timestamp
    }
    return JSON.stringify(encoded, null, 2)
  }

  /**
   * @throws {OperationStateError} INVALID_STRUCTURE or MISSING_FIELDS
   */
  static decode(text: string): OperationMetadata {
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new OperationStateError(
        'INVALID_STRUCTURE',
        `Invalid operation record: not valid JSON`,
        [],
        error
      )
    }

    if (!isRecord(parsed)) {
      throw new OperationStateError(
        'INVALID_STRUCTURE',
        'Invalid operation record: expected a JSON object'
      )
    }

    const missing = REQUIRED_FIELDS.filter((field) => parsed[field] === undefined || parsed[field] === null)
    if (missing.length > 0) {
      throw new OperationStateError(
        'MISSING_FIELDS',
        `Invalid operation record: missing required fields: ${missing.join(', ')}`,
        [...missing]
      )
    }

    const baseBranch = requireString(parsed, 'base_branch')
    const mergeBase = requireString(parsed, 'merge_base')
    const targetBranch = requireString(parsed, 'target_branch')
    const originalBranch = requireString(parsed, 'original_branch')
    const timestamp = typeof parsed.timestamp === 'string' ? parsed.timestamp : ''

    if (!Array.isArray(parsed.stack)) {
      throw new OperationStateError(
        'INVALID_STRUCTURE',
        'Invalid operation record: stack must be an array'
      )
    }

    const stack = parsed.stack.map((entry: unknown, index: number) => decodeEntry(entry, index))

    return { baseBranch, mergeBase, targetBranch, originalBranch, stack, timestamp }
  }

  static encodeMessage(message: string): string {
    return Buffer.from(message, 'utf8').toString('base64')
  }

  /**
   * Decodes a stored message. Text that is not valid base64 is returned as-is.
   */
  static decodeMessage(stored: string): string {
    if (!BASE64_PATTERN.test(stored)) {
      return stored
    }
    return Buffer.from(stored, 'base64').toString('utf8')
  }
}

function decodeEntry(entry: unknown, index: number): StackEntry {
  if (
    !isRecord(entry) ||
    typeof entry.commit !== 'string' ||
    typeof entry.message !== 'string' ||
    !Array.isArray(entry.branches) ||
    !entry.branches.every((branch: unknown) => typeof branch === 'string')
  ) {
    throw new OperationStateError(
      'INVALID_STRUCTURE',
      `Invalid operation record: malformed stack entry at index ${index}`
    )
  }

  return {
    commit: entry.commit,
    branches: entry.branches.filter((branch: unknown): branch is string => typeof branch === 'string'),
    message: MetadataCodec.decodeMessage(entry.message)
  }
}

function requireString(record: Record<string, unknown>, field: string): string {
  const value = record[field]
  if (typeof value !== 'string') {
    throw new OperationStateError(
      'INVALID_STRUCTURE',
      `Invalid operation record: ${field} must be a string`
    )
  }
  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
