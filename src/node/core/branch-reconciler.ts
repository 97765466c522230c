/**
 * Branch Reconciler
 *
 * After a rebase, moves every branch of the original stack to the rewritten
 * commit that replaced its old commit. Matching is delegated to a
 * CommitMatcher (message based by default).
 *
 * Outcomes are partitioned rather than thrown:
 * - any rejected move → `failed` (successful moves are still listed)
 * - otherwise any entry without a match → `warning`
 * - otherwise → `ok`
 */

import type {
  BranchUpdate,
  ReconcileResult,
  RewrittenCommit,
  Stack,
  UnmatchedEntry,
  UpdateFailure
} from '@shared/types'
import { log } from '@shared/logger'
import { MessageMatcher, type CommitMatcherFactory } from '../domain'
import { errorMessage } from '../shared/errors'
import type { GitAdapter } from './git-adapter/interface'

export async function reconcile(
  repoPath: string,
  stack: Stack,
  rewritten: RewrittenCommit[],
  git: GitAdapter,
  createMatcher: CommitMatcherFactory = MessageMatcher.createMatcher
): Promise<ReconcileResult> {
  const matcher = createMatcher(rewritten)
  const updates: BranchUpdate[] = []
  const unmatched: UnmatchedEntry[] = []
  const failures: UpdateFailure[] = []

  // Newest first, the same order the rewritten commits are reported in
  for (let i = stack.length - 1; i >= 0; i--) {
    const entry = stack[i]
    if (!entry || entry.branches.length === 0) continue

    const newCommit = matcher.match(entry)
    if (newCommit === undefined) {
      for (const branch of entry.branches) {
        unmatched.push({ branch, oldCommit: entry.commit, message: entry.message })
      }
      continue
    }

    for (const branch of entry.branches) {
      try {
        await git.forceMoveRef(repoPath, branch, newCommit)
        updates.push({ branch, oldCommit: entry.commit, newCommit })
        log.debug(`[BranchReconciler] ${branch}: ${entry.commit} -> ${newCommit}`)
      } catch (error) {
        failures.push({ branch, reason: errorMessage(error) })
        log.warn(`[BranchReconciler] Failed to move ${branch}:`, errorMessage(error))
      }
    }
  }

  if (failures.length > 0) {
    return { status: 'failed', updates, unmatched, failures }
  }
  if (unmatched.length > 0) {
    return { status: 'warning', updates, unmatched }
  }
  return { status: 'ok', updates }
}

/**
 * Turns a rejected ref move into a reason the operator can act on.
 */
export function describeUpdateFailure(failure: UpdateFailure): string {
  if (failure.reason.includes('worktree')) {
    return `${failure.branch}: Cannot update - branch is checked out in a worktree`
  }
  if (failure.reason.includes('checked out')) {
    return `${failure.branch}: Cannot update - branch is currently checked out`
  }
  return `${failure.branch}: ${failure.reason}`
}
