import { createLogger } from '../common/logger.js';
import type { KeyComparator, KeySelector } from '../common/types.js';
import type { JoinType, MergeEmitters } from './join-policy.js';

const log = createLogger('merge');

/**
 * Walks two key-ordered sequences in lockstep, one cursor each.
 *
 * At each step:
 * - outer key < inner key: emit the unmatched outer (if wanted), advance outer
 * - outer key > inner key: emit the unmatched inner (if wanted), advance inner
 * - equal: emit the pair, advance both
 * Once one side is exhausted, the other side is drained as unmatched rows if the
 * join type wants them, otherwise the walk stops.
 *
 * Equal keys advance both cursors, so duplicate keys on both sides pair up
 * one-to-one in order rather than producing their cross product.
 *
 * Both inputs MUST be non-decreasing under `compare`. That is not checked; unordered
 * input produces wrong rows rather than an error.
 *
 * Nothing is read before the first output row is requested, and both iterators are
 * released when the walk ends, fails, or is abandoned by the consumer.
 */
export function* mergeJoin<TOuter, TInner, TKey, TResult>(
	outer: Iterable<TOuter>,
	inner: Iterable<TInner>,
	outerKey: KeySelector<TOuter, TKey>,
	innerKey: KeySelector<TInner, TKey>,
	emitters: MergeEmitters<TOuter, TInner, TResult>,
	compare: KeyComparator<TKey>,
	type: JoinType
): Generator<TResult, void, undefined> {
	const { matched, outerOnly, innerOnly } = emitters;

	const outerIter = outer[Symbol.iterator]();
	let innerIter: Iterator<TInner> | undefined;
	let emitted = 0;
	let outerRead = 0;
	let innerRead = 0;

	log('Starting %s merge join', type.toUpperCase());

	try {
		innerIter = inner[Symbol.iterator]();

		let outerNext = outerIter.next();
		let innerNext = innerIter.next();

		while (!outerNext.done || !innerNext.done) {
			if (outerNext.done) {
				// Only inner has elements
				if (innerNext.done || !innerOnly) break;
				innerRead++;
				emitted++;
				yield innerOnly(innerNext.value);
				innerNext = innerIter.next();
			} else if (innerNext.done) {
				// Only outer has elements
				if (!outerOnly) break;
				outerRead++;
				emitted++;
				yield outerOnly(outerNext.value);
				outerNext = outerIter.next();
			} else {
				const cmp = compare(outerKey(outerNext.value), innerKey(innerNext.value));

				if (cmp < 0) {
					// Outer key comes first; a later outer may still match this inner
					outerRead++;
					if (outerOnly) {
						emitted++;
						yield outerOnly(outerNext.value);
					}
					outerNext = outerIter.next();
				} else if (cmp > 0) {
					innerRead++;
					if (innerOnly) {
						emitted++;
						yield innerOnly(innerNext.value);
					}
					innerNext = innerIter.next();
				} else {
					outerRead++;
					innerRead++;
					emitted++;
					yield matched(outerNext.value, innerNext.value);
					outerNext = outerIter.next();
					innerNext = innerIter.next();
				}
			}
		}
	} finally {
		log('Finished %s merge join: %d rows from %d outer and %d inner elements',
			type.toUpperCase(), emitted, outerRead, innerRead);
		try {
			outerIter.return?.();
		} finally {
			innerIter?.return?.();
		}
	}
}
