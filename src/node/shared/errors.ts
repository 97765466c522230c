/**
 * Custom error classes for the backend.
 * Provides typed errors for different failure scenarios.
 */

import type { ReconcileResult } from '@shared/types'

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git operation fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Precondition codes, checked before any state is mutated.
 */
export type PreconditionCode =
  | 'NOT_A_REPOSITORY'
  | 'OPERATION_IN_PROGRESS'
  | 'REBASE_IN_PROGRESS'
  | 'BRANCH_NOT_FOUND'
  | 'NO_OPERATION'
  | 'CONFLICTS_UNRESOLVED'

/**
 * Error thrown when an operation cannot start (or resume) in the current
 * repository state. Nothing has been changed when this is thrown.
 */
export class PreconditionError extends AppError {
  constructor(
    public readonly code: PreconditionCode,
    message: string
  ) {
    super(message)
    this.name = 'PreconditionError'
  }
}

/**
 * Error thrown when the stack between two refs cannot be computed.
 */
export class StackBuildError extends AppError {
  constructor(
    message: string,
    public readonly ref?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'StackBuildError'
  }
}

export type OperationStateErrorCode = 'INVALID_STRUCTURE' | 'MISSING_FIELDS' | 'UNREADABLE'

/**
 * Error thrown when a persisted operation record exists but cannot be used.
 */
export class OperationStateError extends AppError {
  constructor(
    public readonly code: OperationStateErrorCode,
    message: string,
    public readonly missingFields: string[] = [],
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'OperationStateError'
  }
}

/**
 * Error raised when one or more branch pointers could not be moved.
 * Carries the full result so successful moves can still be reported.
 */
export class ReconciliationError extends AppError {
  constructor(
    message: string,
    public readonly result: Extract<ReconcileResult, { status: 'failed' }>
  ) {
    super(message)
    this.name = 'ReconciliationError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
