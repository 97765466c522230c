/**
 * Git Adapter Factory
 *
 * Provides a centralized way to create and access the Git adapter instance.
 */

import { log } from '@shared/logger'
import type { GitAdapter } from './interface'
import { SimpleGitAdapter } from './simple-git-adapter'

/**
 * Configuration for adapter creation
 */
export interface GitAdapterConfig {
  /**
   * Whether to log adapter creation
   */
  verbose?: boolean
}

/**
 * Singleton adapter instance
 * Cached to avoid recreating adapters on every operation
 */
let cachedAdapter: GitAdapter | null = null

/**
 * Create a Git adapter instance
 */
export function createGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  const adapter = new SimpleGitAdapter()

  if (config.verbose) {
    log.info(`[GitAdapter] Creating adapter: ${adapter.name}`)
  }

  return adapter
}

/**
 * Get the singleton Git adapter instance
 *
 * @param config - Optional configuration (only used on first call)
 */
export function getGitAdapter(config: GitAdapterConfig = {}): GitAdapter {
  if (cachedAdapter) {
    return cachedAdapter
  }

  cachedAdapter = createGitAdapter(config)
  return cachedAdapter
}

/**
 * Reset the cached adapter instance
 *
 * Useful for testing
 */
export function resetGitAdapter(): void {
  cachedAdapter = null
}
