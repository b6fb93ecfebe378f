import { createLogger } from '../common/logger.js';
import type { AnyIterable, KeyComparator, KeySelector } from '../common/types.js';
import { getAsyncIterator } from '../util/iterable.js';
import type { JoinType, MergeEmitters } from './join-policy.js';

const log = createLogger('merge:async');

/**
 * Async form of {@link mergeJoin}: the same walk over sequences that may produce
 * their elements asynchronously. Either side may also be a plain iterable.
 */
export async function* mergeJoinAsync<TOuter, TInner, TKey, TResult>(
	outer: AnyIterable<TOuter>,
	inner: AnyIterable<TInner>,
	outerKey: KeySelector<TOuter, TKey>,
	innerKey: KeySelector<TInner, TKey>,
	emitters: MergeEmitters<TOuter, TInner, TResult>,
	compare: KeyComparator<TKey>,
	type: JoinType
): AsyncGenerator<TResult, void, undefined> {
	const { matched, outerOnly, innerOnly } = emitters;

	const outerIter = getAsyncIterator(outer);
	let innerIter: AsyncIterator<TInner> | undefined;
	let emitted = 0;
	let outerRead = 0;
	let innerRead = 0;

	log('Starting %s merge join', type.toUpperCase());

	try {
		innerIter = getAsyncIterator(inner);

		let outerNext = await outerIter.next();
		let innerNext = await innerIter.next();

		while (!outerNext.done || !innerNext.done) {
			if (outerNext.done) {
				if (innerNext.done || !innerOnly) break;
				innerRead++;
				emitted++;
				yield innerOnly(innerNext.value);
				innerNext = await innerIter.next();
			} else if (innerNext.done) {
				if (!outerOnly) break;
				outerRead++;
				emitted++;
				yield outerOnly(outerNext.value);
				outerNext = await outerIter.next();
			} else {
				const cmp = compare(outerKey(outerNext.value), innerKey(innerNext.value));

				if (cmp < 0) {
					outerRead++;
					if (outerOnly) {
						emitted++;
						yield outerOnly(outerNext.value);
					}
					outerNext = await outerIter.next();
				} else if (cmp > 0) {
					innerRead++;
					if (innerOnly) {
						emitted++;
						yield innerOnly(innerNext.value);
					}
					innerNext = await innerIter.next();
				} else {
					outerRead++;
					innerRead++;
					emitted++;
					yield matched(outerNext.value, innerNext.value);
					outerNext = await outerIter.next();
					innerNext = await innerIter.next();
				}
			}
		}
	} finally {
		log('Finished %s merge join: %d rows from %d outer and %d inner elements',
			type.toUpperCase(), emitted, outerRead, innerRead);
		// Cleanup iterators if they have return methods
		try {
			await outerIter.return?.();
		} finally {
			await innerIter?.return?.();
		}
	}
}
