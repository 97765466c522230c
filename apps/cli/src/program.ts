import type { Configuration } from '@shared/types'
import { setLogLevel } from '@shared/logger'
import type {
  StackRebaseHooks,
  StackRebaseOperation
} from '@node/operations/StackRebaseOperation'
import { errorMessage } from '@node/shared/errors'
import { Command } from 'commander'
import {
  abortCommand,
  continueCommand,
  createConfirmStackHook,
  startCommand,
  statusCommand,
  type CliOutput,
  type CommandContext
} from './commands'
import { CLI_NAME, format } from './format'
import type { Confirm } from './prompt'

export const VERSION = '0.1.0'

export type ProgramDeps = {
  config: Configuration
  output: CliOutput
  confirm: Confirm
  createOperation: (repoPath: string, hooks: StackRebaseHooks) => Promise<StackRebaseOperation>
  setExitCode: (code: number) => void
}

type RebaseStackCliOptions = {
  continue?: boolean
  abort?: boolean
  yes?: boolean
  push?: boolean
  remote?: string
}

export function createProgram(deps: ProgramDeps): Command {
  const ctx: CommandContext = { output: deps.output, confirm: deps.confirm }
  setLogLevel(deps.config.logLevel)

  const run = async (action: () => Promise<number>): Promise<void> => {
    try {
      deps.setExitCode(await action())
    } catch (error) {
      deps.output.err(format.error(errorMessage(error)))
      deps.setExitCode(1)
    }
  }

  const program = new Command()
    .name(CLI_NAME)
    .description('Rebase a linear stack of branches and move every branch in it')
    .version(VERSION)

  program
    .command('rebase-stack')
    .description('Rebase the stack between <base> and <target> onto <base>')
    .argument('[base]', 'Branch to rebase onto')
    .argument('[target]', 'Top branch of the stack')
    .option('--continue', 'Finish after resolving conflicts and running git rebase --continue')
    .option('--abort', 'Abort the operation and any paused git rebase')
    .option('-y, --yes', 'Do not ask before rebasing or pushing')
    .option('--push', 'Push updated branches with --force-with-lease')
    .option('--remote <name>', 'Remote to push to')
    .action(async (base: string | undefined, target: string | undefined, opts: RebaseStackCliOptions) => {
      await run(async () => {
        const options = {
          yes: opts.yes,
          push: opts.push,
          remote: opts.remote ?? deps.config.remote
        }
        const hooks = createConfirmStackHook(ctx, opts.yes === true)

        if (opts.continue && opts.abort) {
          throw new Error('--continue and --abort cannot be used together')
        }
        if (opts.abort) {
          return abortCommand(ctx, await deps.createOperation(deps.config.repoPath, hooks))
        }
        if (opts.continue) {
          return continueCommand(ctx, await deps.createOperation(deps.config.repoPath, hooks), options)
        }
        if (!base || !target) {
          throw new Error(
            `Missing arguments\nUsage: ${CLI_NAME} rebase-stack <base> <target>\n` +
              `Run '${CLI_NAME} --help' for usage information.`
          )
        }
        const operation = await deps.createOperation(deps.config.repoPath, hooks)
        return startCommand(ctx, operation, base, target, options)
      })
    })

  program
    .command('status')
    .description('Show the rebase-stack operation in progress, if any')
    .action(async () => {
      await run(async () => statusCommand(ctx, await deps.createOperation(deps.config.repoPath, {})))
    })

  return program
}
