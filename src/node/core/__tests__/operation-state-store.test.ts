import type { OperationMetadata } from '@shared/types'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { OperationStateError } from '../../shared/errors'
import {
  FileOperationStateStore,
  InMemoryOperationStateStore
} from '../operation-state-store'

describe('FileOperationStateStore', () => {
  let gitDir: string
  let store: FileOperationStateStore

  beforeEach(async () => {
    gitDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'restack-store-'))
    store = new FileOperationStateStore(gitDir)
  })

  afterEach(async () => {
    await fs.promises.rm(gitDir, { recursive: true, force: true })
  })

  it('stores the record in the git directory', () => {
    expect(store.path).toBe(path.join(gitDir, 'restack-metadata.json'))
  })

  describe('load', () => {
    it('returns not_found when no record exists', async () => {
      expect(await store.load()).toEqual({ status: 'not_found' })
    })

    it('returns the saved metadata', async () => {
      const metadata = createMetadata()
      await store.save(metadata)

      expect(await store.load()).toEqual({ status: 'found', metadata })
    })

    it('throws INVALID_STRUCTURE for a corrupt record', async () => {
      await fs.promises.writeFile(store.path, 'garbage')

      await expect(store.load()).rejects.toBeInstanceOf(OperationStateError)
      await expect(store.load()).rejects.toMatchObject({ code: 'INVALID_STRUCTURE' })
    })

    it('throws MISSING_FIELDS for a record without required fields', async () => {
      await fs.promises.writeFile(store.path, JSON.stringify({ base_branch: 'main' }))

      await expect(store.load()).rejects.toMatchObject({
        code: 'MISSING_FIELDS',
        missingFields: ['merge_base', 'target_branch', 'stack', 'original_branch']
      })
    })
  })

  describe('save', () => {
    it('replaces an existing record', async () => {
      await store.save(createMetadata())
      const second = { ...createMetadata(), baseBranch: 'develop' }

      await store.save(second)

      expect(await store.load()).toEqual({ status: 'found', metadata: second })
    })

    it('leaves no temp file behind', async () => {
      await store.save(createMetadata())

      expect(await fs.promises.readdir(gitDir)).toEqual(['restack-metadata.json'])
    })

    it('writes readable JSON with snake_case keys', async () => {
      await store.save(createMetadata())

      const text = await fs.promises.readFile(store.path, 'utf-8')
      expect(text).toContain('"base_branch": "main"')
    })
  })

  describe('exists and delete', () => {
    it('reports existence after save', async () => {
      expect(await store.exists()).toBe(false)
      await store.save(createMetadata())
      expect(await store.exists()).toBe(true)
    })

    it('removes the record', async () => {
      await store.save(createMetadata())

      await store.delete()

      expect(await store.exists()).toBe(false)
      expect(await store.load()).toEqual({ status: 'not_found' })
    })

    it('does not fail when there is nothing to delete', async () => {
      await expect(store.delete()).resolves.toBeUndefined()
    })

    it('reports a corrupt record as existing', async () => {
      await fs.promises.writeFile(store.path, '{')

      expect(await store.exists()).toBe(true)
    })
  })
})

describe('InMemoryOperationStateStore', () => {
  let store: InMemoryOperationStateStore

  beforeEach(() => {
    store = new InMemoryOperationStateStore()
  })

  it('round-trips metadata through the codec', async () => {
    const metadata = createMetadata()
    await store.save(metadata)

    expect(await store.load()).toEqual({ status: 'found', metadata })
    expect(store.getRaw()).toContain('"target_branch": "feature-2"')
  })

  it('surfaces corrupt raw text as an error', async () => {
    store.setRaw('[]')

    await expect(store.load()).rejects.toMatchObject({ code: 'INVALID_STRUCTURE' })
  })

  it('clears on delete', async () => {
    await store.save(createMetadata())
    await store.delete()

    expect(await store.exists()).toBe(false)
    expect(await store.load()).toEqual({ status: 'not_found' })
  })
})

function createMetadata(): OperationMetadata {
  return {
    baseBranch: 'main',
    targetBranch: 'feature-2',
    originalBranch: 'feature-2',
    mergeBase: 'abc123',
    stack: [
      { commit: 'c1', branches: ['feature-1'], message: 'Add auth\n\nWith "details"' },
      { commit: 'c2', branches: [], message: 'wip' },
      { commit: 'c3', branches: ['feature-2', 'hotfix'], message: 'Add settings' }
    ],
    timestamp: '2024-01-15T10:30:00.000Z'
  }
}
