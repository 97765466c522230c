/**
 * Simple-Git Adapter
 *
 * Git adapter implementation using simple-git library.
 * This uses the native Git CLI under the hood.
 */

import type { RewrittenCommit } from '@shared/types'
import { log } from '@shared/logger'
import fs from 'fs'
import path from 'path'
import simpleGit, { type SimpleGit } from 'simple-git'
import { REBASE_STATE_DIRS } from '../../shared/constants'
import { GitError, errorMessage } from '../../shared/errors'
import type { GitAdapter } from './interface'
import type { PushOptions, RebaseOptions, RebaseResult } from './types'

/** Terminates one `git log -z` record; the only byte git keeps out of messages */
const RECORD_SEPARATOR = '\x00'

export class SimpleGitAdapter implements GitAdapter {
  readonly name = 'simple-git'

  private createGit(dir: string): SimpleGit {
    return simpleGit(dir)
  }

  // ============================================================================
  // Repository Inspection
  // ============================================================================

  async isRepository(dir: string): Promise<boolean> {
    try {
      return await this.createGit(dir).checkIsRepo()
    } catch {
      return false
    }
  }

  async gitDir(dir: string): Promise<string> {
    const output = await this.run(dir, 'gitDir', ['rev-parse', '--absolute-git-dir'])
    return output.trim()
  }

  async refExists(dir: string, ref: string): Promise<boolean> {
    try {
      const git = this.createGit(dir)
      const sha = await git.revparse(['--verify', `${ref}^{commit}`])
      return sha.trim().length > 0
    } catch {
      return false
    }
  }

  async currentBranch(dir: string): Promise<string | null> {
    const output = await this.run(dir, 'currentBranch', ['branch', '--show-current'])
    const branch = output.trim()
    return branch || null
  }

  async mergeBase(dir: string, ref1: string, ref2: string): Promise<string> {
    const output = await this.run(dir, 'mergeBase', ['merge-base', ref1, ref2])
    return output.trim()
  }

  async revList(dir: string, ancestor: string, ref: string): Promise<string[]> {
    const output = await this.run(dir, 'revList', ['rev-list', '--reverse', `${ancestor}..${ref}`])
    return splitLines(output)
  }

  async branchesAt(dir: string, sha: string): Promise<string[]> {
    // for-each-ref lists real refs only, never a detached HEAD entry
    const output = await this.run(dir, 'branchesAt', [
      'for-each-ref',
      '--points-at',
      sha,
      '--format=%(refname:short)',
      'refs/heads/'
    ])
    return splitLines(output)
  }

  async commitMessage(dir: string, sha: string): Promise<string> {
    const output = await this.run(dir, 'commitMessage', ['log', '-1', '--format=%B', sha])
    return output.trim()
  }

  async recentCommits(dir: string, ref: string | null, count: number): Promise<RewrittenCommit[]> {
    if (count <= 0) {
      return []
    }

    const output = await this.run(dir, 'recentCommits', [
      'log',
      '-z',
      `-${count}`,
      '--format=%H%n%B',
      ref ?? 'HEAD'
    ])

    const commits: RewrittenCommit[] = []
    for (const record of output.split(RECORD_SEPARATOR)) {
      const entry = record.replace(/^\n+/, '')
      if (entry.length === 0) continue

      const lineEnd = entry.indexOf('\n')
      commits.push({
        commit: (lineEnd === -1 ? entry : entry.slice(0, lineEnd)).trim(),
        message: lineEnd === -1 ? '' : entry.slice(lineEnd + 1).trim()
      })
    }
    return commits
  }

  async rebaseInProgress(dir: string): Promise<boolean> {
    let gitDir: string
    try {
      gitDir = await this.gitDir(dir)
    } catch {
      return false
    }

    for (const name of REBASE_STATE_DIRS) {
      try {
        const stat = await fs.promises.stat(path.join(gitDir, name))
        if (stat.isDirectory()) return true
      } catch {
        // Not present
      }
    }
    return false
  }

  // ============================================================================
  // Repository Mutation
  // ============================================================================

  async checkout(dir: string, ref: string): Promise<void> {
    await this.run(dir, 'checkout', ['checkout', ref])
  }

  async forceMoveRef(dir: string, branch: string, sha: string): Promise<void> {
    await this.run(dir, 'forceMoveRef', ['branch', '--force', branch, sha])
  }

  /**
   * Rebase `branch` so that the commits after `upstream` sit on top of `onto`.
   *
   * A rejected command that leaves git mid-rebase is a conflict; anything
   * else is rethrown.
   */
  async rebaseOnto(dir: string, options: RebaseOptions): Promise<RebaseResult> {
    try {
      const output = await this.run(dir, 'rebaseOnto', [
        'rebase',
        '--onto',
        options.onto,
        options.upstream,
        options.branch
      ])
      return { status: 'success', output }
    } catch (error) {
      if (await this.rebaseInProgress(dir)) {
        const status = await this.createGit(dir).status()
        return { status: 'conflict', conflicts: status.conflicted }
      }
      throw error
    }
  }

  async rebaseAbort(dir: string): Promise<void> {
    await this.run(dir, 'rebaseAbort', ['rebase', '--abort'])
  }

  // ============================================================================
  // Network Operations
  // ============================================================================

  async pushForceWithLease(dir: string, options: PushOptions): Promise<void> {
    await this.run(dir, 'push', ['push', '--force-with-lease', options.remote, options.branch])
  }

  // ============================================================================
  // Private Helper Methods
  // ============================================================================

  private async run(dir: string, operation: string, args: string[]): Promise<string> {
    log.debug(`[SimpleGitAdapter] $ git ${args.join(' ')}`)
    try {
      return await this.createGit(dir).raw(args)
    } catch (error) {
      throw new GitError(
        `[SimpleGitAdapter] ${operation} failed: ${errorMessage(error).trim()}`,
        operation,
        error
      )
    }
  }
}

function splitLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}
