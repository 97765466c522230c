/**
 * MessageMatcher - correlates rewritten commits with stack entries by message.
 *
 * A rebase gives every replayed commit a new SHA but keeps its message, so the
 * normalized message is the correlation key. Whitespace differences (blank
 * lines, wrapping, trailing newlines) are ignored on both sides.
 */

import type { RewrittenCommit, StackEntry } from '@shared/types'

/**
 * Finds the rewritten commit for an original stack entry.
 */
export interface CommitMatcher {
  match(entry: StackEntry): string | undefined
}

export type CommitMatcherFactory = (rewritten: RewrittenCommit[]) => CommitMatcher

export class MessageMatcher {
  private constructor() {}

  /**
   * Trims the message and collapses every whitespace run to a single space.
   */
  static normalize(message: string): string {
    return message.trim().replace(/\s+/g, ' ')
  }

  /**
   * Builds a normalized-message → commit lookup.
   * When two commits share a key the last one listed (the oldest) wins.
   */
  static buildLookup(rewritten: RewrittenCommit[]): Map<string, string> {
    const lookup = new Map<string, string>()
    for (const { commit, message } of rewritten) {
      lookup.set(MessageMatcher.normalize(message), commit)
    }
    return lookup
  }

  static createMatcher(rewritten: RewrittenCommit[]): CommitMatcher {
    const lookup = MessageMatcher.buildLookup(rewritten)
    return {
      match: (entry) => lookup.get(MessageMatcher.normalize(entry.message))
    }
  }
}
