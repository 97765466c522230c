import chalk from 'chalk'
import { beforeAll, beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import { FakeGitAdapter, createStackRepo, sha } from '@node/__tests__/fakes/FakeGitAdapter'
import { InMemoryOperationStateStore } from '@node/core/operation-state-store'
import { StackRebaseOperation } from '@node/operations/StackRebaseOperation'
import { createProgram } from '../program'
import type { Confirm } from '../prompt'

beforeAll(() => {
  chalk.level = 0
})

describe('git-restack program', () => {
  let git: FakeGitAdapter
  let store: InMemoryOperationStateStore
  let out: string[]
  let err: string[]
  let exitCode: number | undefined
  let confirm: Mock<Confirm>

  beforeEach(() => {
    git = createStackRepo()
    store = new InMemoryOperationStateStore()
    out = []
    err = []
    exitCode = undefined
    confirm = vi.fn<Confirm>(async () => true)
  })

  async function run(...args: string[]): Promise<void> {
    const program = createProgram({
      config: { repoPath: '/repo', logLevel: 'error', remote: 'origin' },
      output: {
        out: (text) => out.push(...text.split('\n')),
        err: (text) => err.push(...text.split('\n'))
      },
      confirm,
      createOperation: async (repoPath, hooks) =>
        new StackRebaseOperation({ repoPath, git, store, hooks }),
      setExitCode: (code) => {
        exitCode = code
      }
    })
    await program.parseAsync(args, { from: 'user' })
  }

  describe('rebase-stack <base> <target>', () => {
    it('shows the stack, asks, rebases and prints the updates', async () => {
      confirm.mockResolvedValueOnce(true).mockResolvedValueOnce(false)

      await run('rebase-stack', 'main', 'feature-2')

      expect(out).toContain('* c11111111 - (feature-1) Add auth')
      expect(out).toContain('* c22222222 - wip')
      expect(out).toContain('* c33333333 - (feature-2, hotfix) Add settings')
      expect(confirm).toHaveBeenNthCalledWith(1, 'Proceed with rebase?', true)
      expect(out).toContain('✓ Rebase completed successfully!')
      expect(out).toContain('  feature-2: c3333333 → n3cccccc')
      expect(out).toContain('  hotfix: c3333333 → n3cccccc')
      expect(out).toContain('  feature-1: c1111111 → n1aaaaaa')
      expect(out).toContain('  $ git push --force-with-lease origin feature-1')
      expect(confirm).toHaveBeenNthCalledWith(2, 'Would you like to push all these branches now?', false)
      expect(out).toContain('You can push the branches manually later using the commands above.')
      expect(git.pushes).toEqual([])
      expect(exitCode).toBe(0)
    })

    it('stops when the stack is not confirmed', async () => {
      confirm.mockResolvedValueOnce(false)

      await run('rebase-stack', 'main', 'feature-2')

      expect(out).toContain('Rebase cancelled.')
      expect(git.calls).toEqual([])
      expect(exitCode).toBe(0)
    })

    it('does not ask with --yes', async () => {
      await run('rebase-stack', 'main', 'feature-2', '--yes')

      expect(confirm).not.toHaveBeenCalled()
      expect(git.refs.get('feature-1')).toBe(sha('n1'))
      expect(exitCode).toBe(0)
    })

    it('pushes to the chosen remote with --push', async () => {
      await run('rebase-stack', 'main', 'feature-2', '-y', '--push', '--remote', 'upstream')

      expect(git.pushes).toEqual([
        { remote: 'upstream', branch: 'feature-2' },
        { remote: 'upstream', branch: 'hotfix' },
        { remote: 'upstream', branch: 'feature-1' }
      ])
      expect(out).toContain('  $ git push --force-with-lease upstream hotfix')
      expect(out).toContain('✓ All branches pushed successfully!')
      expect(exitCode).toBe(0)
    })

    it('exits 1 when a push fails', async () => {
      git.failPush('hotfix', 'stale info')

      await run('rebase-stack', 'main', 'feature-2', '-y', '--push')

      expect(out).toContain('  ✗ Failed to push hotfix: stale info')
      expect(exitCode).toBe(1)
    })

    it('prints the next commands on conflict', async () => {
      git.rebaseResult = { status: 'conflict', conflicts: ['src/app.ts'] }

      await run('rebase-stack', 'main', 'feature-2', '--yes')

      expect(out).toContain('Warning: Rebase conflict detected!')
      expect(out).toContain('  src/app.ts')
      expect(out).toContain('  $ git-restack rebase-stack --continue')
      expect(await store.exists()).toBe(true)
      expect(exitCode).toBe(0)
    })

    it('reports missing arguments', async () => {
      await run('rebase-stack', 'main')

      expect(err[0]).toBe('Error: Missing arguments')
      expect(exitCode).toBe(1)
    })

    it('reports a precondition failure', async () => {
      await run('rebase-stack', 'main', 'missing', '--yes')

      expect(err).toEqual(["Error: Target branch 'missing' does not exist"])
      expect(exitCode).toBe(1)
    })
  })

  describe('rebase-stack --continue', () => {
    it('finishes a paused operation', async () => {
      git.rebaseResult = { status: 'conflict', conflicts: [] }
      await run('rebase-stack', 'main', 'feature-2', '--yes')
      git.rebasing = false
      out = []

      await run('rebase-stack', '--continue', '--yes')

      expect(out[0]).toBe('✓ Rebase completed successfully!')
      expect(out).toContain('  feature-1: c1111111 → n1aaaaaa')
      expect(await store.exists()).toBe(false)
      expect(exitCode).toBe(0)
    })

    it('fails when nothing is in progress', async () => {
      await run('rebase-stack', '--continue')

      expect(err).toEqual([
        'Error: No rebase-stack operation in progress.',
        'Start a new one with: git-restack rebase-stack <base> <target>'
      ])
      expect(exitCode).toBe(1)
    })

    it('exits 1 after listing branches that could not be moved', async () => {
      git.failBranch('hotfix', "cannot force update the branch 'hotfix' used by worktree at '/wt'")

      await run('rebase-stack', 'main', 'feature-2', '--yes')

      expect(out).toContain('Error: Failed to update some branches:')
      expect(out).toContain('  hotfix: Cannot update - branch is checked out in a worktree')
      expect(err).toEqual(['Error: Branch update failed'])
      expect(exitCode).toBe(1)
    })
  })

  describe('rebase-stack --abort', () => {
    it('aborts a paused operation', async () => {
      git.rebaseResult = { status: 'conflict', conflicts: [] }
      await run('rebase-stack', 'main', 'feature-2', '--yes')

      await run('rebase-stack', '--abort')

      expect(out).toContain('✓ Rebase-stack operation aborted')
      expect(out).toContain('Repository has been restored to its previous state.')
      expect(git.rebasing).toBe(false)
      expect(await store.exists()).toBe(false)
      expect(exitCode).toBe(0)
    })

    it('rejects --continue together with --abort', async () => {
      await run('rebase-stack', '--continue', '--abort')

      expect(err).toEqual(['Error: --continue and --abort cannot be used together'])
      expect(exitCode).toBe(1)
    })
  })

  describe('status', () => {
    it('reports no operation', async () => {
      await run('status')

      expect(out).toEqual(['No rebase-stack operation in progress.'])
      expect(exitCode).toBe(0)
    })

    it('describes a paused operation', async () => {
      git.rebaseResult = { status: 'conflict', conflicts: [] }
      await run('rebase-stack', 'main', 'feature-2', '--yes')
      out = []

      await run('status')

      expect(out).toContain('Rebase-stack operation in progress')
      expect(out).toContain('  Target:     feature-2')
      expect(out).toContain('* c33333333 - (feature-2, hotfix) Add settings')
      expect(out).toContain('Warning: A git rebase is in progress.')
    })
  })
})
