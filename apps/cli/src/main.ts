import { loadConfiguration } from '@node/core/config'
import { StackRebaseOperation } from '@node/operations/StackRebaseOperation'
import { errorMessage } from '@node/shared/errors'
import { format } from './format'
import { createProgram } from './program'
import { confirmPrompt } from './prompt'

export async function main(argv: string[] = process.argv) {
  try {
    const program = createProgram({
      config: loadConfiguration(),
      output: {
        out: (text) => console.log(text),
        err: (text) => console.error(text)
      },
      confirm: confirmPrompt,
      createOperation: (repoPath, hooks) =>
        StackRebaseOperation.forRepository(repoPath, undefined, hooks),
      setExitCode: (code) => {
        process.exitCode = code
      }
    })
    await program.parseAsync(argv)
  } catch (error) {
    console.error(format.error(errorMessage(error)))
    process.exitCode = 1
  }
}

void main()
