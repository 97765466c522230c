/**
 * Stack Validator
 *
 * Pure validation logic for stacks.
 * For async checks that need git state, see core/rebase-validation.
 */

import type { Stack } from '@shared/types'

// ============================================================================
// Validation Result Types
// ============================================================================

/**
 * Result of a validation check
 */
export type ValidationResult =
  | { valid: true }
  | { valid: false; code: StackValidationErrorCode; message: string }

export type StackValidationErrorCode = 'EMPTY_STACK' | 'NON_LINEAR_STACK'

// ============================================================================
// StackValidator Class
// ============================================================================

export class StackValidator {
  private constructor() {
    // Static-only class
  }

  static validateNonEmpty(stack: Stack, baseRef: string, targetRef: string): ValidationResult {
    if (stack.length === 0) {
      return {
        valid: false,
        code: 'EMPTY_STACK',
        message: `No commits found between ${baseRef} and ${targetRef}`
      }
    }
    return { valid: true }
  }

  /**
   * Checks that a stack is a single linear chain.
   *
   * `rev-list` over `mergeBase..target` already yields a linear walk for the
   * histories we accept, so this currently accepts every stack. Merge-commit
   * detection belongs here.
   */
  static validateLinearStack(_stack: Stack): ValidationResult {
    return { valid: true }
  }
}
