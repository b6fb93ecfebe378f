/**
 * Selects the next run of a run-consuming cursor.
 *
 * - `predicate`: the skip phase discards elements while `discard` holds (by default,
 *   while `matches` does not), then the run yields elements while `matches` holds.
 * - `compare`: `compare(item)` compares the current outer key with the item's key.
 *   The skip phase discards while it is positive (item still below the outer key),
 *   then the run yields while it is zero. An outer key with no matching items
 *   therefore only discards the items that sort before it.
 */
export type RunTest<T> =
	| { kind: 'predicate'; matches: (item: T) => boolean; discard?: (item: T) => boolean }
	| { kind: 'compare'; compare: (item: T) => number };

export interface RunPhases<T> {
	discard: (item: T) => boolean;
	matches: (item: T) => boolean;
}

export function runPhases<T>(test: RunTest<T>): RunPhases<T> {
	switch (test.kind) {
		case 'predicate': {
			const { matches } = test;
			return { discard: test.discard ?? (item => !matches(item)), matches };
		}
		case 'compare': {
			const { compare } = test;
			return { discard: item => compare(item) > 0, matches: item => compare(item) === 0 };
		}
	}
}
