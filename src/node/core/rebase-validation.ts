/**
 * Rebase Validation
 *
 * Pre-flight checks for stack rebase operations. Every check here is
 * read-only and runs before any state is written.
 */

import type { PreconditionCode } from '../shared/errors'
import type { GitAdapter } from './git-adapter/interface'
import type { IOperationStateStore } from './operation-state-store'

/**
 * Result of a validation check
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; code: PreconditionCode; message: string }

const CLI = 'git-restack rebase-stack'

export async function validateRepository(repoPath: string, git: GitAdapter): Promise<ValidationResult> {
  if (!(await git.isRepository(repoPath))) {
    return { valid: false, code: 'NOT_A_REPOSITORY', message: 'Not in a git repository' }
  }
  return { valid: true }
}

/**
 * Checks that neither a stack rebase nor a plain git rebase is in progress.
 */
export async function validateCanStart(
  repoPath: string,
  git: GitAdapter,
  store: IOperationStateStore
): Promise<ValidationResult> {
  if (await store.exists()) {
    return {
      valid: false,
      code: 'OPERATION_IN_PROGRESS',
      message:
        'A rebase-stack operation is already in progress.\n' +
        'Use --continue to resume or --abort to cancel.'
    }
  }

  if (await git.rebaseInProgress(repoPath)) {
    return {
      valid: false,
      code: 'REBASE_IN_PROGRESS',
      message:
        'A git rebase is in progress.\n' +
        "Please finish it with 'git rebase --continue' or 'git rebase --abort' first."
    }
  }

  return { valid: true }
}

export async function validateBranches(
  repoPath: string,
  baseRef: string,
  targetRef: string,
  git: GitAdapter
): Promise<ValidationResult> {
  if (!(await git.refExists(repoPath, baseRef))) {
    return { valid: false, code: 'BRANCH_NOT_FOUND', message: `Base branch '${baseRef}' does not exist` }
  }
  if (!(await git.refExists(repoPath, targetRef))) {
    return {
      valid: false,
      code: 'BRANCH_NOT_FOUND',
      message: `Target branch '${targetRef}' does not exist`
    }
  }
  return { valid: true }
}

/**
 * Checks that the git rebase started by the operation has been finished.
 */
export async function validateCanContinue(repoPath: string, git: GitAdapter): Promise<ValidationResult> {
  if (await git.rebaseInProgress(repoPath)) {
    return {
      valid: false,
      code: 'CONFLICTS_UNRESOLVED',
      message:
        'Git rebase still has conflicts.\n' +
        "Please resolve conflicts and stage changes with 'git add',\n" +
        "then run 'git rebase --continue' before running this command again."
    }
  }
  return { valid: true }
}

export const NO_OPERATION_MESSAGE =
  'No rebase-stack operation in progress.\n' + `Start a new one with: ${CLI} <base> <target>`
