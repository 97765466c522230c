/**
 * Git Adapter Module
 *
 * Provides the git capabilities used by the stack rebase.
 *
 * Usage:
 * ```typescript
 * import { getGitAdapter } from '@node/core/git-adapter'
 *
 * const git = getGitAdapter()
 * const base = await git.mergeBase(repoPath, 'main', 'feature-3')
 * ```
 */

export { createGitAdapter, getGitAdapter, resetGitAdapter } from './factory'
export type { GitAdapterConfig } from './factory'

export type { GitAdapter } from './interface'
export type { PushOptions, RebaseOptions, RebaseResult } from './types'

export { SimpleGitAdapter } from './simple-git-adapter'
