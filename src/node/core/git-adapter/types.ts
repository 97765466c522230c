/**
 * Git adapter type definitions
 */

/**
 * Options for `git rebase --onto <onto> <upstream> <branch>`
 */
export interface RebaseOptions {
  /** New base the commits are replayed onto */
  onto: string
  /** Commits after this one (exclusive) are replayed */
  upstream: string
  /** Branch whose commits are replayed; it is checked out by git */
  branch: string
}

/**
 * Outcome of a rebase that did not fail outright.
 * A failure that leaves no paused rebase behind is thrown as a GitError.
 */
export type RebaseResult =
  | { status: 'success'; output: string }
  | { status: 'conflict'; conflicts: string[] }

export interface PushOptions {
  remote: string
  branch: string
}
