/**
 * Operation State Store
 *
 * Persists the metadata of the in-flight stack rebase for one repository.
 * The record lives in the repository's git directory, so two repositories
 * never share state and a paused operation survives process exit.
 *
 * This module provides:
 * - An abstract interface for operation persistence
 * - A file-backed implementation (atomic temp file + rename writes)
 * - An in-memory implementation for tests
 */

import type { OperationMetadata, StoredOperation } from '@shared/types'
import { log } from '@shared/logger'
import fs from 'fs'
import path from 'path'
import { MetadataCodec } from '../domain'
import { METADATA_FILE } from '../shared/constants'
import { OperationStateError, errorMessage } from '../shared/errors'

/**
 * Abstract interface for operation storage.
 * Allows swapping implementations without changing callers.
 */
export interface IOperationStateStore {
  /**
   * Write the record, replacing any existing one.
   */
  save(metadata: OperationMetadata): Promise<void>

  /**
   * Read the record.
   * @returns `not_found` when no operation is in progress
   * @throws {OperationStateError} when a record exists but is unusable
   */
  load(): Promise<StoredOperation>

  exists(): Promise<boolean>

  /**
   * Remove the record. Removing a missing record is not an error.
   */
  delete(): Promise<void>
}

/**
 * File-backed store at `<gitDir>/restack-metadata.json`.
 */
export class FileOperationStateStore implements IOperationStateStore {
  readonly path: string

  constructor(gitDir: string) {
    this.path = path.join(gitDir, METADATA_FILE)
  }

  /**
   * Persist using atomic write (temp file + rename).
   * This prevents a torn record if the process dies mid-write.
   */
  async save(metadata: OperationMetadata): Promise<void> {
    const tempPath = `${this.path}.${process.pid}.tmp`

    try {
      await fs.promises.writeFile(tempPath, MetadataCodec.encode(metadata), 'utf-8')
      await fs.promises.rename(tempPath, this.path)
    } catch (err) {
      await fs.promises.rm(tempPath, { force: true })
      throw err
    }

    log.debug(`[OperationStateStore] Saved operation record to ${this.path}`)
  }

  async load(): Promise<StoredOperation> {
    let content: string
    try {
      content = await fs.promises.readFile(this.path, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) {
        return { status: 'not_found' }
      }
      throw new OperationStateError(
        'UNREADABLE',
        `Failed to read operation record ${this.path}: ${errorMessage(err)}`,
        [],
        err
      )
    }

    return { status: 'found', metadata: MetadataCodec.decode(content) }
  }

  async exists(): Promise<boolean> {
    try {
      await fs.promises.access(this.path)
      return true
    } catch {
      return false
    }
  }

  async delete(): Promise<void> {
    await fs.promises.rm(this.path, { force: true })
    log.debug(`[OperationStateStore] Removed operation record ${this.path}`)
  }
}

/**
 * In-memory implementation of IOperationStateStore.
 *
 * Keeps the serialized text rather than the object, so loads go through the
 * same codec as the file store.
 */
export class InMemoryOperationStateStore implements IOperationStateStore {
  private content: string | null = null

  async save(metadata: OperationMetadata): Promise<void> {
    this.content = MetadataCodec.encode(metadata)
  }

  async load(): Promise<StoredOperation> {
    if (this.content === null) {
      return { status: 'not_found' }
    }
    return { status: 'found', metadata: MetadataCodec.decode(this.content) }
  }

  async exists(): Promise<boolean> {
    return this.content !== null
  }

  async delete(): Promise<void> {
    this.content = null
  }

  /**
   * Replace the stored text directly. Test helper for corrupt records.
   */
  setRaw(content: string | null): void {
    this.content = content
  }

  getRaw(): string | null {
    return this.content
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
