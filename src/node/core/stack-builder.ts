/**
 * Stack Builder
 *
 * Computes the stack between a base and a target ref: every commit after
 * their merge base up to and including the target, oldest first, with the
 * local branches pointing at each one. Read-only.
 */

import type { Stack, StackEntry } from '@shared/types'
import { log } from '@shared/logger'
import { StackValidator } from '../domain'
import { StackBuildError, errorMessage } from '../shared/errors'
import type { GitAdapter } from './git-adapter/interface'

export type BuiltStack = {
  stack: Stack
  mergeBase: string
}

/**
 * @throws {StackBuildError} when a ref cannot be resolved, a lookup fails,
 * or there are no commits between the refs
 */
export async function buildStack(
  repoPath: string,
  baseRef: string,
  targetRef: string,
  git: GitAdapter
): Promise<BuiltStack> {
  let mergeBase: string
  try {
    mergeBase = await git.mergeBase(repoPath, baseRef, targetRef)
  } catch (error) {
    throw new StackBuildError(
      `Could not find a merge base between ${baseRef} and ${targetRef}: ${errorMessage(error)}`,
      `${baseRef}...${targetRef}`,
      error
    )
  }

  let commits: string[]
  try {
    commits = await git.revList(repoPath, mergeBase, targetRef)
  } catch (error) {
    throw new StackBuildError(
      `Could not list commits from ${mergeBase.slice(0, 8)} to ${targetRef}: ${errorMessage(error)}`,
      targetRef,
      error
    )
  }

  const stack: Stack = []
  for (const commit of commits) {
    stack.push(await buildEntry(repoPath, commit, git))
  }

  const validation = StackValidator.validateNonEmpty(stack, baseRef, targetRef)
  if (!validation.valid) {
    throw new StackBuildError(validation.message, targetRef)
  }

  log.debug(`[StackBuilder] ${stack.length} commit(s) between ${baseRef} and ${targetRef}`)
  return { stack, mergeBase }
}

async function buildEntry(repoPath: string, commit: string, git: GitAdapter): Promise<StackEntry> {
  try {
    const branches = await git.branchesAt(repoPath, commit)
    const message = await git.commitMessage(repoPath, commit)
    return { commit, branches, message }
  } catch (error) {
    throw new StackBuildError(
      `Could not read commit ${commit.slice(0, 8)}: ${errorMessage(error)}`,
      commit,
      error
    )
  }
}
