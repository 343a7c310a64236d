/**
 * Barrel exports for the conflict module.
 */

export type {
  Conflict,
  ConflictFinding,
  ConflictRule,
  ConflictResolution,
  ConflictScope,
  ConflictStatus,
} from './types.js'
export type { ConflictDetector } from './conflict-detector.js'
export type { ConflictResolver, ResolveContext } from './conflict-resolver.js'
export { fieldDisagreementRule, ruleApplies } from './conflict-rules.js'
export type { FieldDisagreementOptions } from './conflict-rules.js'
export {
  ConflictDetectorImpl,
  createConflictDetector,
  createConflictDetectorFromConfig,
} from './conflict-detector-impl.js'
export {
  ConflictResolverImpl,
  createConflictResolver,
  DEFAULT_ARBITER_TIMEOUT_MS,
} from './conflict-resolver-impl.js'
export type { ConflictResolverOptions } from './conflict-resolver-impl.js'
export {
  WeightedVoteArbiter,
  computeWeightedVote,
  registerConflictTasks,
  DEFAULT_CONFIDENCE,
  DEFAULT_TIE_BREAK_MARGIN,
} from './weighted-vote-arbiter.js'
export type { Vote, WeightedVoteResult } from './weighted-vote-arbiter.js'
