/**
 * Git Adapter Interface
 *
 * The set of git capabilities the stack rebase needs. Every method takes the
 * repository (or worktree) directory first and reports failure by throwing
 * a GitError, except the boolean probes which never throw.
 */

import type { RewrittenCommit } from '@shared/types'
import type { PushOptions, RebaseOptions, RebaseResult } from './types'

export interface GitAdapter {
  readonly name: string

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  /** Whether `dir` is inside a git work tree */
  isRepository(dir: string): Promise<boolean>

  /** Absolute path of the repository's git directory */
  gitDir(dir: string): Promise<string>

  /** Whether `ref` resolves to a commit */
  refExists(dir: string, ref: string): Promise<boolean>

  /** Current branch name, or null when HEAD is detached */
  currentBranch(dir: string): Promise<string | null>

  /** Nearest common ancestor of two refs */
  mergeBase(dir: string, ref1: string, ref2: string): Promise<string>

  /** Commits in `ancestor..ref`, oldest first */
  revList(dir: string, ancestor: string, ref: string): Promise<string[]>

  /** Local branch names pointing exactly at `sha` */
  branchesAt(dir: string, sha: string): Promise<string[]>

  /** Full message of a commit, without surrounding whitespace */
  commitMessage(dir: string, sha: string): Promise<string>

  /**
   * The last `count` commits reachable from `ref` (HEAD when null), newest first,
   * with full messages.
   */
  recentCommits(dir: string, ref: string | null, count: number): Promise<RewrittenCommit[]>

  /** Whether git has a paused rebase in this repository */
  rebaseInProgress(dir: string): Promise<boolean>

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  checkout(dir: string, ref: string): Promise<void>

  /** Point `branch` at `sha` regardless of where it points now */
  forceMoveRef(dir: string, branch: string, sha: string): Promise<void>

  rebaseOnto(dir: string, options: RebaseOptions): Promise<RebaseResult>

  rebaseAbort(dir: string): Promise<void>

  // ============================================================================
  // Network Operations
  // ============================================================================

  pushForceWithLease(dir: string, options: PushOptions): Promise<void>
}
