import type { LogLevel } from '../logger'

export type {
  BranchUpdate,
  OperationMetadata,
  ReconcileResult,
  RewrittenCommit,
  Stack,
  StackEntry,
  StoredOperation,
  UnmatchedEntry,
  UpdateFailure
} from './stack'

export type Configuration = {
  repoPath: string
  logLevel: LogLevel
  /** Remote used for push instructions and `--push` */
  remote: string
}

export type { LogLevel }
