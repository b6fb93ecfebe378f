import { createLogger } from '../common/logger.js';
import type {
	GroupJoinOptions,
	GroupResultSelector,
	KeyComparator,
	KeyEqualityComparer,
	KeySelector,
} from '../common/types.js';
import { RunCursor } from '../cursor/run-cursor.js';
import type { RunTest } from '../cursor/run-test.js';
import { requireFunction, requireIterable } from '../util/arguments.js';
import { resolveComparator, resolveEqualityComparer } from '../util/comparison.js';

const log = createLogger('group');

/**
 * Group joins over two sequences ordered by the same key.
 *
 * Each outer element is paired with the run of inner elements sharing its key, read
 * straight from one forward-only cursor over the inner sequence. Neither side is
 * materialized.
 *
 * HAZARD: unless `options.bufferRuns` is set, a run is a live view over that shared
 * cursor. Each run must be fully enumerated before the next result is pulled, and
 * must not be kept for later. Results consumed out of order, or runs cached and read
 * after the next outer element, yield wrong groups. This is not detected.
 */

export type GroupJoinVariant = 'equality' | 'compare';

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
 * Shared group-join walk. `testFor` builds the run test for one outer element.
 * The inner cursor is opened on the first outer element and released when the
 * walk ends or is abandoned.
 */
export function* groupJoin<TOuter, TInner, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	testFor: (outer: TOuter) => RunTest<TInner>,
	resultSelector: GroupResultSelector<TOuter, Iterable<TInner>, TResult>,
	variant: GroupJoinVariant,
	options: GroupJoinOptions = {}
): Generator<TResult, void, undefined> {
	const bufferRuns = options.bufferRuns ?? false;
	let cursor: RunCursor<TInner> | undefined;
	let groups = 0;

	log('Starting %s group join (bufferRuns=%s)', variant, bufferRuns);

	try {
		for (const outerItem of outer) {
			if (!cursor) {
				cursor = new RunCursor(inner);
			}
			const run = cursor.takeWhileAfterSkip(testFor(outerItem));
			groups++;
			yield resultSelector(outerItem, bufferRuns ? Array.from(run) : run);
		}
	} finally {
		log('Finished %s group join: %d groups, %d inner elements read',
			variant, groups, cursor?.readCount ?? 0);
		cursor?.dispose();
	}
}

/**
 * Pairs each outer element with the inner elements whose key is equal to its key.
 *
 * Before a run is read, the leftovers of the previous outer key's run are discarded;
 * the run then takes inner elements while their key equals the outer key. An inner
 * key that equals no outer key stops progress at that point, so every inner key is
 * expected to appear among the outer keys. {@link orderedCompareGroupJoin} has no such
 * requirement.
 *
 * @param equals Key equality. Defaults to {@link keysEqual}.
 */
export function orderedEqualityGroupJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: GroupResultSelector<TOuter, Iterable<TInner>, TResult>,
	equals?: KeyEqualityComparer<TKey> | null,
	options?: GroupJoinOptions
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return groupJoin(outer, inner,
		equalityRunTests(outerKeySelector, innerKeySelector, resolveEqualityComparer(equals)),
		resultSelector, 'equality', options);
}

/**
 * Pairs each outer element with the inner elements that compare equal to its key.
 *
 * Before a run is read, inner elements whose key sorts below the outer key are
 * discarded; the run then takes inner elements while the keys compare equal.
 *
 * @param comparator Key ordering shared by both inputs. Defaults to {@link compareKeys}.
 */
export function orderedCompareGroupJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	resultSelector: GroupResultSelector<TOuter, Iterable<TInner>, TResult>,
	comparator?: KeyComparator<TKey> | null,
	options?: GroupJoinOptions
): Generator<TResult, void, undefined> {
	checkArguments(outer, inner, outerKeySelector, innerKeySelector, resultSelector);
	return groupJoin(outer, inner,
		compareRunTests(outerKeySelector, innerKeySelector, resolveComparator(comparator)),
		resultSelector, 'compare', options);
}

/**
 * Run tests for the equality variant. Remembers the previous outer key so that the
 * skip phase only discards what is left of that key's run.
 */
export function equalityRunTests<TOuter, TInner, TKey>(
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	equals: KeyEqualityComparer<TKey>
): (outer: TOuter) => RunTest<TInner> {
	let previous: { key: TKey } | undefined;

	return (outerItem) => {
		const key = outerKeySelector(outerItem);
		const stale = previous;
		previous = { key };

		const matches = (item: TInner) => equals(key, innerKeySelector(item));
		return {
			kind: 'predicate',
			matches,
			discard: item => stale !== undefined && !matches(item) && equals(stale.key, innerKeySelector(item)),
		};
	};
}

export function compareRunTests<TOuter, TInner, TKey>(
	outerKeySelector: KeySelector<TOuter, TKey>,
	innerKeySelector: KeySelector<TInner, TKey>,
	compare: KeyComparator<TKey>
): (outer: TOuter) => RunTest<TInner> {
	return (outerItem) => {
		const key = outerKeySelector(outerItem);
		return { kind: 'compare', compare: item => compare(key, innerKeySelector(item)) };
	};
}
