/**
 * git-restack command handlers.
 *
 * Each handler drives one StackRebaseOperation entry point and renders its
 * result. Handlers return the process exit code; errors propagate to the
 * program, which prints them and exits 1.
 */

import type { ReconcileResult } from '@shared/types'
import type {
  StackRebaseHooks,
  StackRebaseOperation
} from '@node/operations/StackRebaseOperation'
import { ReconciliationError } from '@node/shared/errors'
import { SHORT_SHA_LENGTH } from '@node/shared/constants'
import {
  CLI_NAME,
  format,
  formatConflictHelp,
  formatFailures,
  formatPushInstructions,
  formatPushOutcomes,
  formatStack,
  formatStackPreview,
  formatUnmatched,
  formatUpdates
} from './format'
import type { Confirm } from './prompt'

export type CliOutput = {
  out: (text: string) => void
  err: (text: string) => void
}

export type CommandContext = {
  output: CliOutput
  confirm: Confirm
}

export type RebaseStackOptions = {
  yes?: boolean
  push?: boolean
  remote: string
}

/**
 * Shows the stack and asks before anything is written. `--yes` skips the
 * question but still shows the stack.
 */
export function createConfirmStackHook(ctx: CommandContext, yes: boolean): StackRebaseHooks {
  return {
    confirmStack: async ({ baseBranch, targetBranch, stack }) => {
      ctx.output.out(formatStackPreview(baseBranch, targetBranch, stack))
      if (yes) return true
      return ctx.confirm('Proceed with rebase?', true)
    }
  }
}

export async function startCommand(
  ctx: CommandContext,
  operation: StackRebaseOperation,
  baseRef: string,
  targetRef: string,
  options: RebaseStackOptions
): Promise<number> {
  const result = await operation.start(baseRef, targetRef)

  switch (result.status) {
    case 'cancelled':
      ctx.output.out('Rebase cancelled.')
      return 0
    case 'conflict':
      ctx.output.out('')
      ctx.output.out(formatConflictHelp(result.conflicts))
      return 0
    case 'completed':
      ctx.output.out(format.success('Rebase completed successfully!'))
      ctx.output.out('')
      return reportCompletion(ctx, operation, result.reconciliation, options)
  }
}

export async function continueCommand(
  ctx: CommandContext,
  operation: StackRebaseOperation,
  options: RebaseStackOptions
): Promise<number> {
  const result = await operation.continue()
  ctx.output.out(format.success('Rebase completed successfully!'))
  ctx.output.out('')
  return reportCompletion(ctx, operation, result.reconciliation, options)
}

export async function abortCommand(ctx: CommandContext, operation: StackRebaseOperation): Promise<number> {
  const result = await operation.abort()

  if (result.rebaseAbortError !== undefined) {
    ctx.output.out(format.warning(`Failed to abort git rebase: ${result.rebaseAbortError}`))
    ctx.output.out('You may need to manually run: git rebase --abort')
  }

  ctx.output.out(format.success('Rebase-stack operation aborted'))
  if (result.rebaseAborted) {
    ctx.output.out('Repository has been restored to its previous state.')
  }
  return 0
}

export async function statusCommand(ctx: CommandContext, operation: StackRebaseOperation): Promise<number> {
  const status = await operation.status()

  if (!status.inProgress) {
    ctx.output.out('No rebase-stack operation in progress.')
  } else if (status.metadata) {
    const { metadata } = status
    ctx.output.out(format.header('Rebase-stack operation in progress'))
    ctx.output.out('')
    ctx.output.out(`  Base:       ${format.branch(metadata.baseBranch)}`)
    ctx.output.out(`  Target:     ${format.branch(metadata.targetBranch)}`)
    ctx.output.out(`  Started on: ${metadata.originalBranch}`)
    ctx.output.out(`  Merge base: ${metadata.mergeBase.slice(0, SHORT_SHA_LENGTH)}`)
    if (metadata.timestamp) {
      ctx.output.out(`  Started at: ${metadata.timestamp}`)
    }
    ctx.output.out('')
    ctx.output.out(formatStack(metadata.stack))
  } else {
    ctx.output.out(format.warning(`Operation record is unreadable: ${status.stateError ?? 'unknown error'}`))
    ctx.output.out(format.command(`${CLI_NAME} rebase-stack --abort`))
  }

  if (status.rebaseInProgress) {
    ctx.output.out('')
    ctx.output.out(format.warning('A git rebase is in progress.'))
    ctx.output.out(format.command(`${CLI_NAME} rebase-stack --continue`))
  }
  return 0
}

async function reportCompletion(
  ctx: CommandContext,
  operation: StackRebaseOperation,
  reconciliation: ReconcileResult,
  options: RebaseStackOptions
): Promise<number> {
  const { updates } = reconciliation

  if (updates.length > 0) {
    ctx.output.out(format.header('Updated branches:'))
    ctx.output.out(formatUpdates(updates))
    ctx.output.out('')
  }

  if (reconciliation.status !== 'ok' && reconciliation.unmatched.length > 0) {
    ctx.output.out(formatUnmatched(reconciliation.unmatched))
    ctx.output.out('')
  }

  if (reconciliation.status === 'failed') {
    ctx.output.out(formatFailures(reconciliation.failures))
    ctx.output.out('')
    throw new ReconciliationError('Branch update failed', reconciliation)
  }

  if (updates.length === 0) {
    ctx.output.out(format.info('No branches needed updating.'))
    return 0
  }

  ctx.output.out(formatPushInstructions(updates, options.remote))

  const shouldPush =
    options.push === true ||
    (options.yes !== true && (await ctx.confirm('Would you like to push all these branches now?', false)))

  if (!shouldPush) {
    ctx.output.out('You can push the branches manually later using the commands above.')
    return 0
  }

  ctx.output.out(format.info('Pushing branches...'))
  ctx.output.out('')
  const outcomes = await operation.pushBranches(updates, options.remote)
  ctx.output.out(formatPushOutcomes(outcomes))
  return outcomes.every((outcome) => outcome.success) ? 0 : 1
}
