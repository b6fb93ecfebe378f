import type { JoinResultSelector, KeyComparator, KeySelector } from '../common/types.js';
import { requireFunction, requireIterable } from '../util/arguments.js';
import { resolveComparator } from '../util/comparison.js';
import { buildEmitters, emittersFor, type JoinType } from './join-policy.js';
import { mergeJoin } from './merge-join.js';

/**
 * Row joins over two sequences ordered by the same key.
 *
 * Every operator validates its arguments when called and returns a lazy generator;
 * no element is read until the first row is requested. A missing comparator means
 * the default key ordering ({@link compareKeys}). Rows with no partner carry `null`
 * on the missing side.
 *
 * Equal keys are paired one-to-one: with duplicates on both sides, the n-th outer
 * element of a key meets the n-th inner element of that key and any surplus is
 * treated as unmatched. Group one side first (see the group joins) when every
 * combination is needed.
 */

function checkArguments(
	outer: unknown,
	inner: unknown,
	outerKeySelector: unknown,
	innerKeySelector: unknown,
	resultSelector: unknown
): void {
	requireIterable(outer, 'outer');
	requireIterable(inner, 'inner');
	requireFunction(outerKeySelector, 'outerKeySelector');
	requireFunction(innerKeySelector, 'innerKeySelector');
	requireFunction(resultSelector, 'resultSelector');
}

/**
 * Emits a row for each pair of elements with equal keys.
 */
export function orderedInnerJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter, TInner, TResult>,
	comparator?: KeyComparator<TKey> | null
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoin(outer, inner, outerKeySelector, innerKeySelector,
		buildEmitters<TOuter, TInner, TResult>('inner', resultSelector),
		resolveComparator(comparator), 'inner');
}

/**
 * Inner join rows plus every unmatched outer element, paired with `null`.
 */
export function orderedLeftJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter, TInner | null, TResult>,
	comparator?: KeyComparator<TKey> | null
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoin(outer, inner, outerKeySelector, innerKeySelector,
		buildEmitters<TOuter, TInner, TResult>('left', resultSelector, { outerOnly: o => resultSelector(o, null) }),
		resolveComparator(comparator), 'left');
}

/**
 * Inner join rows plus every unmatched inner element, paired with `null`.
 */
export function orderedRightJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter | null, TInner, TResult>,
	comparator?: KeyComparator<TKey> | null
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoin(outer, inner, outerKeySelector, innerKeySelector,
		buildEmitters<TOuter, TInner, TResult>('right', resultSelector, { innerOnly: i => resultSelector(null, i) }),
		resolveComparator(comparator), 'right');
}

/**
 * Inner join rows plus the unmatched elements of both sides, in merge order.
 */
export function orderedFullJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter | null, TInner | null, TResult>,
	comparator?: KeyComparator<TKey> | null
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoin(outer, inner, outerKeySelector, innerKeySelector,
		emittersFor<TOuter, TInner, TResult>('full', resultSelector),
		resolveComparator(comparator), 'full');
}

/**
 * Row join with the join type chosen at run time.
 */
export function orderedJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter | null, TInner | null, TResult>,
	type: JoinType = 'inner',
	comparator?: KeyComparator<TKey> | null
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoin(outer, inner, outerKeySelector, innerKeySelector,
		emittersFor<TOuter, TInner, TResult>(type, resultSelector),
		resolveComparator(comparator), type);
}
