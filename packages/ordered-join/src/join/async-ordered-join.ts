import type { AnyIterable, JoinResultSelector, KeyComparator, KeySelector } from '../common/types.js';
import { requireAnyIterable, requireFunction } from '../util/arguments.js';
import { resolveComparator } from '../util/comparison.js';
import { mergeJoinAsync } from './async-merge-join.js';
import { buildEmitters, emittersFor, type JoinType } from './join-policy.js';

// Async row joins. Same semantics as the synchronous operators in ordered-join.ts;
// either input may be an async iterable or a plain iterable.

function checkArguments(
	outer: unknown,
	inner: unknown,
	outerKeySelector: unknown,
	innerKeySelector: unknown,
	resultSelector: unknown
): void {
	requireAnyIterable(outer, 'outer');
	requireAnyIterable(inner, 'inner');
	requireFunction(outerKeySelector, 'outerKeySelector');
	requireFunction(innerKeySelector, 'innerKeySelector');
	requireFunction(resultSelector, 'resultSelector');
}

export function orderedInnerJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter, TInner, TResult>,
	comparator?: KeyComparator<TKey> | null
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoinAsync(outer, inner, outerKeySelector, innerKeySelector,
		buildEmitters<TOuter, TInner, TResult>('inner', resultSelector),
		resolveComparator(comparator), 'inner');
}

export function orderedLeftJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter, TInner | null, TResult>,
	comparator?: KeyComparator<TKey> | null
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoinAsync(outer, inner, outerKeySelector, innerKeySelector,
		buildEmitters<TOuter, TInner, TResult>('left', resultSelector, { outerOnly: o => resultSelector(o, null) }),
		resolveComparator(comparator), 'left');
}

export function orderedRightJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter | null, TInner, TResult>,
	comparator?: KeyComparator<TKey> | null
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoinAsync(outer, inner, outerKeySelector, innerKeySelector,
		buildEmitters<TOuter, TInner, TResult>('right', resultSelector, { innerOnly: i => resultSelector(null, i) }),
		resolveComparator(comparator), 'right');
}

export function orderedFullJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter | null, TInner | null, TResult>,
	comparator?: KeyComparator<TKey> | null
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoinAsync(outer, inner, outerKeySelector, innerKeySelector,
		emittersFor<TOuter, TInner, TResult>('full', resultSelector),
		resolveComparator(comparator), 'full');
}

export function orderedJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: JoinResultSelector<TOuter | null, TInner | null, TResult>,
	type: JoinType = 'inner',
	comparator?: KeyComparator<TKey> | null
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return mergeJoinAsync(outer, inner, outerKeySelector, innerKeySelector,
		emittersFor<TOuter, TInner, TResult>(type, resultSelector),
		resolveComparator(comparator), type);
}
