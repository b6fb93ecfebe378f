import { createLogger } from '../common/logger.js';
import type {
	AnyIterable,
	GroupJoinOptions,
	GroupResultSelector,
	KeyComparator,
	KeyEqualityComparer,
	KeySelector,
} from '../common/types.js';
import { AsyncRunCursor } from '../cursor/async-run-cursor.js';
import type { RunTest } from '../cursor/run-test.js';
import { requireAnyIterable, requireFunction } from '../util/arguments.js';
import { resolveComparator, resolveEqualityComparer } from '../util/comparison.js';
import { getAsyncIterator } from '../util/iterable.js';
import { compareRunTests, equalityRunTests, type GroupJoinVariant } from './group-join.js';

const log = createLogger('group:async');

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

async function* replay<T>(items: readonly T[]): AsyncGenerator<T, void, undefined> {
	yield* items;
}

/**
 * Async form of {@link groupJoin}. Runs are async iterables with the same
 * single-drain precondition, unless `options.bufferRuns` is set, in which case each
 * run is read in full before the result selector is called and handed over as a
 * replay of that buffer.
 */
export async function* groupJoinAsync<TOuter, TInner, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	testFor: (outer: TOuter) => RunTest<TInner>,
	resultSelector: GroupResultSelector<TOuter, AsyncIterable<TInner>, TResult>,
	variant: GroupJoinVariant,
	options: GroupJoinOptions = {}
): AsyncGenerator<TResult, void, undefined> {
	const bufferRuns = options.bufferRuns ?? false;
	const outerIter = getAsyncIterator(outer);
	let cursor: AsyncRunCursor<TInner> | undefined;
	let groups = 0;

	log('Starting %s group join (bufferRuns=%s)', variant, bufferRuns);

	try {
		for (let next = await outerIter.next(); !next.done; next = await outerIter.next()) {
			if (!cursor) {
				cursor = await AsyncRunCursor.open(inner);
			}
			const run = cursor.takeWhileAfterSkip(testFor(next.value));
			groups++;
			if (bufferRuns) {
				const items: TInner[] = [];
				for await (const item of run) {
					items.push(item);
				}
				yield resultSelector(next.value, replay(items));
			} else {
				yield resultSelector(next.value, run);
			}
		}
	} finally {
		log('Finished %s group join: %d groups, %d inner elements read',
			variant, groups, cursor?.readCount ?? 0);
		try {
			await outerIter.return?.();
		} finally {
			await cursor?.dispose();
		}
	}
}

export function orderedEqualityGroupJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: GroupResultSelector<TOuter, AsyncIterable<TInner>, TResult>,
	equals?: KeyEqualityComparer<TKey> | null,
	options?: GroupJoinOptions
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return groupJoinAsync(outer, inner,
		equalityRunTests(outerKeySelector, innerKeySelector, resolveEqualityComparer(equals)),
		resultSelector, 'equality', options);
}

export function orderedCompareGroupJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: GroupResultSelector<TOuter, AsyncIterable<TInner>, TResult>,
	comparator?: KeyComparator<TKey> | null,
	options?: GroupJoinOptions
): AsyncGenerator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return groupJoinAsync(outer, inner,
		compareRunTests(outerKeySelector, innerKeySelector, resolveComparator(comparator)),
		resultSelector, 'compare', options);
}
