/**
 * Stack model shared between the rebase core and the CLI.
 */

/**
 * One commit of a stack together with the local branches pointing at it.
 */
export type StackEntry = {
  /** Original commit SHA */
  commit: string
  /** Local branches pointing exactly at `commit` (may be empty) */
  branches: string[]
  /** Full commit message */
  message: string
}

/**
 * Commits between the merge base (exclusive) and the target (inclusive),
 * oldest first.
 */
export type Stack = StackEntry[]

/**
 * Durable record of an in-flight stack rebase.
 * Its presence in the state store is the "operation in progress" flag.
 */
export type OperationMetadata = {
  baseBranch: string
  targetBranch: string
  /** Branch checked out when the operation started. Informational only. */
  originalBranch: string
  mergeBase: string
  /** Captured at start and never recomputed */
  stack: Stack
  /** ISO-8601 creation time */
  timestamp: string
}

/**
 * Load outcome of the state store. A corrupt record is an error, not `not_found`.
 */
export type StoredOperation =
  | { status: 'not_found' }
  | { status: 'found'; metadata: OperationMetadata }

// ============================================================================
// Reconciliation
// ============================================================================

export type BranchUpdate = {
  branch: string
  oldCommit: string
  newCommit: string
}

export type UnmatchedEntry = {
  branch: string
  oldCommit: string
  message: string
}

export type UpdateFailure = {
  branch: string
  reason: string
}

/**
 * A commit produced by the rebase, as reported by the git adapter.
 */
export type RewrittenCommit = {
  commit: string
  message: string
}

export type ReconcileResult =
  | { status: 'ok'; updates: BranchUpdate[] }
  | { status: 'warning'; updates: BranchUpdate[]; unmatched: UnmatchedEntry[] }
  | {
      status: 'failed'
      updates: BranchUpdate[]
      unmatched: UnmatchedEntry[]
      failures: UpdateFailure[]
    }
