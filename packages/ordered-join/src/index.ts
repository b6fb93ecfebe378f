/**
 * ordered-join - streaming merge joins over key-ordered sequences
 *
 * Inner, left, right and full row joins plus two group-join variants, each reading
 * both inputs once, front to back, without materializing either. Inputs must already
 * be ordered by the join key; ordering is never checked.
 */

// Common types and errors
export { StatusCode } from './common/types.js';
export type {
	AnyIterable,
	GroupJoinOptions,
	GroupResultSelector,
	JoinResultSelector,
	KeyComparator,
	KeyEqualityComparer,
	KeySelector,
} from './common/types.js';
export { OrderedJoinError, MisuseError, InvalidArgumentError } from './common/errors.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// Key comparison
export {
	compareKeys,
	keysEqual,
	reverseComparator,
	resolveComparator,
	resolveEqualityComparer,
} from './util/comparison.js';

// Iterable helpers
export { isIterable, isAsyncIterable, getAsyncIterator, asyncIterableToArray } from './util/iterable.js';

// Cursors
export { RunCursor } from './cursor/run-cursor.js';
export { AsyncRunCursor } from './cursor/async-run-cursor.js';
export type { RunTest } from './cursor/run-test.js';

// Row joins
export type { JoinType, JoinPolicy, MergeEmitters, UnmatchedBuilders } from './join/join-policy.js';
export { JOIN_POLICIES, isJoinType, joinPolicy, buildEmitters, emittersFor } from './join/join-policy.js';
export { mergeJoin } from './join/merge-join.js';
export { mergeJoinAsync } from './join/async-merge-join.js';
export {
	orderedInnerJoin,
	orderedLeftJoin,
	orderedRightJoin,
	orderedFullJoin,
	orderedJoin,
} from './join/ordered-join.js';
export {
	orderedInnerJoinAsync,
	orderedLeftJoinAsync,
	orderedRightJoinAsync,
	orderedFullJoinAsync,
	orderedJoinAsync,
} from './join/async-ordered-join.js';

// Group joins
export type { GroupJoinVariant } from './join/group-join.js';
export { groupJoin, orderedEqualityGroupJoin, orderedCompareGroupJoin } from './join/group-join.js';
export { groupJoinAsync, orderedEqualityGroupJoinAsync, orderedCompareGroupJoinAsync } from './join/async-group-join.js';
