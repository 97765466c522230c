/**
 * Node-specific constants for the backend.
 */

/** Operation record file, stored inside the repository's git directory */
export const METADATA_FILE = 'restack-metadata.json'

/** Length of abbreviated SHAs in user-facing output */
export const SHORT_SHA_LENGTH = 8

/** Length of abbreviated SHAs in the stack preview */
export const PREVIEW_SHA_LENGTH = 9

export const DEFAULT_REMOTE = 'origin'

/** Directories git creates while a rebase is paused */
export const REBASE_STATE_DIRS = ['rebase-merge', 'rebase-apply'] as const
