/**
 * Domain Layer - Pure business logic with no I/O dependencies.
 *
 * All classes in this module are pure - they contain only synchronous functions
 * that operate on data without side effects. For async operations that require
 * git or the filesystem, use the core layer.
 */

export { MessageMatcher } from './MessageMatcher'
export type { CommitMatcher, CommitMatcherFactory } from './MessageMatcher'
export { MetadataCodec } from './MetadataCodec'
export { StackValidator } from './StackValidator'
export type { StackValidationErrorCode } from './StackValidator'
