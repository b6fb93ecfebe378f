import { InvalidArgumentError, OrderedJoinError } from '../common/errors.js';
import { StatusCode, type JoinResultSelector } from '../common/types.js';

/**
 * Type of row join to perform
 */
export type JoinType = 'inner' | 'left' | 'right' | 'full';

/**
 * Which unmatched sides a join type emits, padded with a null placeholder.
 */
export interface JoinPolicy {
	readonly keepUnmatchedOuter: boolean;
	readonly keepUnmatchedInner: boolean;
}

export const JOIN_POLICIES: Readonly<Record<JoinType, JoinPolicy>> = {
	inner: { keepUnmatchedOuter: false, keepUnmatchedInner: false },
	left: { keepUnmatchedOuter: true, keepUnmatchedInner: false },
	right: { keepUnmatchedOuter: false, keepUnmatchedInner: true },
	full: { keepUnmatchedOuter: true, keepUnmatchedInner: true },
};

export function isJoinType(value: unknown): value is JoinType {
	return value === 'inner' || value === 'left' || value === 'right' || value === 'full';
}

export function joinPolicy(type: JoinType): JoinPolicy {
	if (!isJoinType(type)) {
		throw new InvalidArgumentError('type', `Join type ${String(type)} is invalid`);
	}
	return JOIN_POLICIES[type];
}

/**
 * Per-outcome row builders consumed by the merge loop. The unmatched-side builders
 * are present exactly when the join type emits that side.
 */
export interface MergeEmitters<TOuter, TInner, TResult> {
	matched: (outer: TOuter, inner: TInner) => TResult;
	outerOnly?: (outer: TOuter) => TResult;
	innerOnly?: (inner: TInner) => TResult;
}

/**
 * Row builders for unmatched elements. Which of them is used is decided by the
 * join type's policy, never by the caller.
 */
export interface UnmatchedBuilders<TOuter, TInner, TResult> {
	outerOnly?: (outer: TOuter) => TResult;
	innerOnly?: (inner: TInner) => TResult;
}

function requireBuilder<F>(builder: F | undefined, type: JoinType, side: string): F {
	if (!builder) {
		throw new OrderedJoinError(`A ${type} join needs a row builder for unmatched ${side} elements`, StatusCode.INTERNAL);
	}
	return builder;
}

/**
 * Builds the emitters for a join type from {@link JOIN_POLICIES}. A builder the policy
 * does not call for is dropped; one it calls for but that is missing is an internal error.
 */
export function buildEmitters<TOuter, TInner, TResult>(
	type: JoinType,
	matched: (outer: TOuter, inner: TInner) => TResult,
	unmatched: UnmatchedBuilders<TOuter, TInner, TResult> = {}
): MergeEmitters<TOuter, TInner, TResult> {
	const policy = joinPolicy(type);
	return {
		matched,
		outerOnly: policy.keepUnmatchedOuter ? requireBuilder(unmatched.outerOnly, type, 'outer') : undefined,
		innerOnly: policy.keepUnmatchedInner ? requireBuilder(unmatched.innerOnly, type, 'inner') : undefined,
	};
}

/**
 * Builds the emitters for a join type from a selector that accepts null on either side.
 */
export function emittersFor<TOuter, TInner, TResult>(
	type: JoinType,
	resultSelector: JoinResultSelector<TOuter | null, TInner | null, TResult>
): MergeEmitters<TOuter, TInner, TResult> {
	return buildEmitters<TOuter, TInner, TResult>(type, resultSelector, {
		outerOnly: outer => resultSelector(outer, null),
		innerOnly: inner => resultSelector(null, inner),
	});
}
