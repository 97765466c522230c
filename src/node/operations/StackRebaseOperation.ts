/**
 * StackRebaseOperation - stack rebase capability facade
 *
 * Orchestrates the start → (conflict →) continue / abort lifecycle of a
 * stack rebase:
 * - start: validate, build the stack, persist the operation, rebase
 * - continue: after the operator finished a paused git rebase, move branches
 * - abort: stop git's rebase if one is active and drop the operation
 *
 * The operation record in the state store is the only state. It is read
 * fresh on every entry point and never cached between calls.
 */

import type {
  BranchUpdate,
  OperationMetadata,
  ReconcileResult,
  Stack
} from '@shared/types'
import { log } from '@shared/logger'
import { reconcile } from '../core/branch-reconciler'
import { getGitAdapter, type GitAdapter } from '../core/git-adapter'
import { FileOperationStateStore, type IOperationStateStore } from '../core/operation-state-store'
import {
  NO_OPERATION_MESSAGE,
  validateBranches,
  validateCanContinue,
  validateCanStart,
  validateRepository,
  type ValidationResult
} from '../core/rebase-validation'
import { buildStack } from '../core/stack-builder'
import { MessageMatcher, StackValidator, type CommitMatcherFactory } from '../domain'
import { DEFAULT_REMOTE } from '../shared/constants'
import { GitError, PreconditionError, StackBuildError, errorMessage } from '../shared/errors'

// ============================================================================
// Types
// ============================================================================

/**
 * What is about to be rebased, shown to the user before anything changes.
 */
export type StackPreview = {
  baseBranch: string
  targetBranch: string
  mergeBase: string
  stack: Stack
}

export type StackRebaseHooks = {
  /** Return false to cancel before any state is written */
  confirmStack?: (preview: StackPreview) => Promise<boolean>
}

export type StartResult =
  | { status: 'cancelled' }
  | { status: 'conflict'; conflicts: string[]; metadata: OperationMetadata }
  | { status: 'completed'; reconciliation: ReconcileResult; metadata: OperationMetadata }

export type ContinueResult = {
  status: 'completed'
  reconciliation: ReconcileResult
  metadata: OperationMetadata
}

export type AbortResult = {
  status: 'aborted'
  /** Whether a paused git rebase was aborted */
  rebaseAborted: boolean
  /** Set when git refused to abort; the operation record is still removed */
  rebaseAbortError?: string
}

export type OperationStatus = {
  inProgress: boolean
  rebaseInProgress: boolean
  metadata?: OperationMetadata
  /** Set when a record exists but cannot be read */
  stateError?: string
}

export type PushOutcome =
  | { branch: string; success: true }
  | { branch: string; success: false; message: string }

export type StackRebaseOperationOptions = {
  repoPath: string
  git: GitAdapter
  store: IOperationStateStore
  hooks?: StackRebaseHooks
  /** Commit matching strategy used during reconciliation */
  createMatcher?: CommitMatcherFactory
  now?: () => Date
}

// ============================================================================
// StackRebaseOperation
// ============================================================================

export class StackRebaseOperation {
  private readonly repoPath: string
  private readonly git: GitAdapter
  private readonly store: IOperationStateStore
  private readonly hooks: StackRebaseHooks
  private readonly createMatcher: CommitMatcherFactory
  private readonly now: () => Date

  constructor(options: StackRebaseOperationOptions) {
    this.repoPath = options.repoPath
    this.git = options.git
    this.store = options.store
    this.hooks = options.hooks ?? {}
    this.createMatcher = options.createMatcher ?? MessageMatcher.createMatcher
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Creates an operation backed by the file store in the repository's git dir.
   *
   * @throws {PreconditionError} NOT_A_REPOSITORY
   */
  static async forRepository(
    repoPath: string,
    git: GitAdapter = getGitAdapter(),
    hooks: StackRebaseHooks = {}
  ): Promise<StackRebaseOperation> {
    assertValid(await validateRepository(repoPath, git))
    const gitDir = await git.gitDir(repoPath)
    return new StackRebaseOperation({
      repoPath,
      git,
      store: new FileOperationStateStore(gitDir),
      hooks
    })
  }

  /**
   * Rebases the stack between `baseRef` and `targetRef` onto `baseRef`.
   */
  async start(baseRef: string, targetRef: string): Promise<StartResult> {
    assertValid(await validateRepository(this.repoPath, this.git))
    assertValid(await validateCanStart(this.repoPath, this.git, this.store))

    const originalBranch = (await this.git.currentBranch(this.repoPath)) ?? 'HEAD'

    assertValid(await validateBranches(this.repoPath, baseRef, targetRef, this.git))

    const { stack, mergeBase } = await buildStack(this.repoPath, baseRef, targetRef, this.git)

    const linear = StackValidator.validateLinearStack(stack)
    if (!linear.valid) {
      throw new StackBuildError(linear.message, targetRef)
    }

    if (this.hooks.confirmStack) {
      const confirmed = await this.hooks.confirmStack({
        baseBranch: baseRef,
        targetBranch: targetRef,
        mergeBase,
        stack
      })
      if (!confirmed) {
        log.info('[StackRebaseOperation] Cancelled before any change')
        return { status: 'cancelled' }
      }
    }

    const metadata: OperationMetadata = {
      baseBranch: baseRef,
      targetBranch: targetRef,
      originalBranch,
      mergeBase,
      stack,
      timestamp: this.now().toISOString()
    }

    // Persist before anything destructive so a crash leaves a resumable record
    await this.store.save(metadata)

    try {
      await this.git.checkout(this.repoPath, targetRef)
    } catch (error) {
      await this.store.delete()
      throw new GitError(`Failed to checkout ${targetRef}: ${errorMessage(error)}`, 'checkout', error)
    }

    log.info(`Rebasing ${stack.length} commit(s) from ${targetRef} onto ${baseRef}...`)

    let result
    try {
      result = await this.git.rebaseOnto(this.repoPath, {
        onto: baseRef,
        upstream: mergeBase,
        branch: targetRef
      })
    } catch (error) {
      // Record stays so the operator can inspect and then --abort
      throw new GitError(`Rebase failed: ${errorMessage(error)}`, 'rebaseOnto', error)
    }

    if (result.status === 'conflict') {
      log.warn(`[StackRebaseOperation] Rebase paused on conflicts in ${result.conflicts.length} file(s)`)
      return { status: 'conflict', conflicts: result.conflicts, metadata }
    }

    return this.finalize(metadata, null)
  }

  /**
   * Finishes an operation whose git rebase was completed by the operator.
   */
  async continue(): Promise<ContinueResult> {
    assertValid(await validateRepository(this.repoPath, this.git))

    const stored = await this.store.load()
    if (stored.status === 'not_found') {
      throw new PreconditionError('NO_OPERATION', NO_OPERATION_MESSAGE)
    }

    assertValid(await validateCanContinue(this.repoPath, this.git))

    log.info('Continuing rebase-stack operation...')
    return this.finalize(stored.metadata, stored.metadata.targetBranch)
  }

  /**
   * Drops the current operation, aborting git's rebase first when one is active.
   */
  async abort(): Promise<AbortResult> {
    assertValid(await validateRepository(this.repoPath, this.git))

    // exists() rather than load(): an unreadable record must still be abortable
    if (!(await this.store.exists())) {
      throw new PreconditionError('NO_OPERATION', NO_OPERATION_MESSAGE)
    }

    let rebaseAborted = false
    let rebaseAbortError: string | undefined

    if (await this.git.rebaseInProgress(this.repoPath)) {
      log.info('Aborting git rebase...')
      try {
        await this.git.rebaseAbort(this.repoPath)
        rebaseAborted = true
      } catch (error) {
        rebaseAbortError = errorMessage(error)
        log.warn(`Failed to abort git rebase: ${rebaseAbortError}`)
      }
    }

    await this.store.delete()

    return rebaseAbortError === undefined
      ? { status: 'aborted', rebaseAborted }
      : { status: 'aborted', rebaseAborted, rebaseAbortError }
  }

  /**
   * Read-only snapshot of the operation state.
   */
  async status(): Promise<OperationStatus> {
    const rebaseInProgress = await this.git.rebaseInProgress(this.repoPath)

    if (!(await this.store.exists())) {
      return { inProgress: false, rebaseInProgress }
    }

    try {
      const stored = await this.store.load()
      return stored.status === 'found'
        ? { inProgress: true, rebaseInProgress, metadata: stored.metadata }
        : { inProgress: false, rebaseInProgress }
    } catch (error) {
      return { inProgress: true, rebaseInProgress, stateError: errorMessage(error) }
    }
  }

  /**
   * Pushes every updated branch with --force-with-lease.
   * A failed push does not stop the remaining ones.
   */
  async pushBranches(updates: BranchUpdate[], remote = DEFAULT_REMOTE): Promise<PushOutcome[]> {
    const outcomes: PushOutcome[] = []
    for (const { branch } of updates) {
      try {
        await this.git.pushForceWithLease(this.repoPath, { remote, branch })
        outcomes.push({ branch, success: true })
      } catch (error) {
        outcomes.push({ branch, success: false, message: errorMessage(error) })
      }
    }
    return outcomes
  }

  // ============================================================================
  // Internal
  // ============================================================================

  /**
   * Reads the rewritten commits, moves the stack's branches and drops the
   * operation record. The record is dropped for every reconcile outcome,
   * since reconciling again from the same record gives the same result.
   *
   * @param ref - Where the rewritten commits are read from (HEAD when null)
   */
  private async finalize(metadata: OperationMetadata, ref: string | null): Promise<ContinueResult> {
    let rewritten
    try {
      rewritten = await this.git.recentCommits(this.repoPath, ref, metadata.stack.length)
    } catch (error) {
      throw new GitError(
        `Failed to get new commits from ${ref ?? 'HEAD'}: ${errorMessage(error)}`,
        'recentCommits',
        error
      )
    }

    // No stack branch may be checked out while its ref is force-moved
    log.info(`Switching to ${metadata.baseBranch} to update branch pointers...`)
    try {
      await this.git.checkout(this.repoPath, metadata.baseBranch)
    } catch (error) {
      log.warn(`Could not checkout ${metadata.baseBranch}: ${errorMessage(error)}`)
      log.warn('Attempting to update branches anyway...')
    }

    const reconciliation = await reconcile(
      this.repoPath,
      metadata.stack,
      rewritten,
      this.git,
      this.createMatcher
    )

    await this.store.delete()

    return { status: 'completed', reconciliation, metadata }
  }
}

function assertValid(result: ValidationResult): void {
  if (!result.valid) {
    throw new PreconditionError(result.code, result.message)
  }
}
