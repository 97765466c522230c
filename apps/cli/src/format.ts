/**
 * Terminal formatting for the git-restack CLI.
 * Every function returns text; printing is left to the caller.
 */

import type { BranchUpdate, Stack, StackEntry, UnmatchedEntry, UpdateFailure } from '@shared/types'
import { describeUpdateFailure } from '@node/core/branch-reconciler'
import type { PushOutcome } from '@node/operations/StackRebaseOperation'
import { PREVIEW_SHA_LENGTH, SHORT_SHA_LENGTH } from '@node/shared/constants'
import chalk from 'chalk'

export const CLI_NAME = 'git-restack'

export const format = {
  error: (message: string) => `${chalk.red.bold('Error: ')}${chalk.red(message)}`,
  success: (message: string) => `${chalk.green.bold('✓ ')}${chalk.green(message)}`,
  warning: (message: string) => `${chalk.yellow.bold('Warning: ')}${chalk.yellow(message)}`,
  info: (message: string) => `${chalk.blue.bold('→ ')}${message}`,
  header: (message: string) => chalk.cyan.bold(message),
  branch: (name: string) => chalk.green.bold(name),
  command: (cmd: string) => `${chalk.cyan.bold('  $ ')}${chalk.cyan(cmd)}`
}

export function firstLine(message: string): string {
  return message.split('\n')[0] ?? ''
}

/**
 * `* <sha> - (<branches>) <subject>`, the branch group omitted when empty.
 */
export function formatStackEntry(entry: StackEntry): string {
  const sha = chalk.red(entry.commit.slice(0, PREVIEW_SHA_LENGTH))
  const subject = firstLine(entry.message)
  if (entry.branches.length === 0) {
    return `* ${sha} - ${subject}`
  }
  return `* ${sha} - ${chalk.yellow(`(${entry.branches.join(', ')})`)} ${subject}`
}

export function formatStack(stack: Stack): string {
  return stack.map(formatStackEntry).join('\n')
}

export function formatStackPreview(baseBranch: string, targetBranch: string, stack: Stack): string {
  return [
    format.header('Stack to rebase:'),
    '',
    `  Base:   ${format.branch(baseBranch)}`,
    `  Target: ${format.branch(targetBranch)}`,
    '',
    formatStack(stack),
    ''
  ].join('\n')
}

export function formatUpdates(updates: BranchUpdate[]): string {
  return updates
    .map(
      ({ branch, oldCommit, newCommit }) =>
        `  ${branch}: ${oldCommit.slice(0, SHORT_SHA_LENGTH)} → ${newCommit.slice(0, SHORT_SHA_LENGTH)}`
    )
    .join('\n')
}

export function formatUnmatched(unmatched: UnmatchedEntry[]): string {
  return [
    format.warning('Some commits could not be matched:'),
    ...unmatched.map(({ branch, oldCommit }) => `  ${branch} (${oldCommit.slice(0, SHORT_SHA_LENGTH)})`)
  ].join('\n')
}

export function formatFailures(failures: UpdateFailure[]): string {
  return [
    format.error('Failed to update some branches:'),
    '',
    ...failures.map((failure) => `  ${describeUpdateFailure(failure)}`)
  ].join('\n')
}

export function formatPushInstructions(updates: BranchUpdate[], remote: string): string {
  return [
    format.header('Next steps:'),
    'To push the rebased branches to remote, run:',
    '',
    ...updates.map(({ branch }) => format.command(`git push --force-with-lease ${remote} ${branch}`)),
    ''
  ].join('\n')
}

export function formatConflictHelp(conflicts: string[]): string {
  const lines = [format.warning('Rebase conflict detected!'), '']
  if (conflicts.length > 0) {
    lines.push('Conflicted files:', ...conflicts.map((file) => `  ${file}`), '')
  }
  lines.push(
    'Please resolve the conflicts and then run:',
    format.command(`${CLI_NAME} rebase-stack --continue`),
    '',
    'Or abort the rebase:',
    format.command(`${CLI_NAME} rebase-stack --abort`),
    ''
  )
  return lines.join('\n')
}

export function formatPushOutcomes(outcomes: PushOutcome[]): string {
  const lines = outcomes.map((outcome) =>
    outcome.success
      ? chalk.green(`  ✓ ${outcome.branch} pushed successfully`)
      : chalk.red(`  ✗ Failed to push ${outcome.branch}: ${outcome.message}`)
  )

  const failed = outcomes.filter((outcome) => !outcome.success)
  lines.push('')
  if (failed.length === 0) {
    lines.push(format.success('All branches pushed successfully!'))
  } else {
    lines.push(
      format.warning('Some branches failed to push:'),
      ...failed.map(({ branch }) => `  - ${branch}`),
      '',
      'You can retry pushing these branches manually.'
    )
  }
  return lines.join('\n')
}
