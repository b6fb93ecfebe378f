/**
 * Extracts the join key from an element of one of the inputs.
 */
export type KeySelector<T, K> = (item: T) => K;

/**
 * Three-way key comparison.
 * Returns negative if a < b, 0 if equal, positive if a > b.
 */
export type KeyComparator<K> = (a: K, b: K) => number;

/**
 * Key equality test used by the equality-keyed group join.
 */
export type KeyEqualityComparer<K> = (a: K, b: K) => boolean;

/** Either side of a join may be read synchronously or asynchronously. */
export type AnyIterable<T> = Iterable<T> | AsyncIterable<T>;

/**
 * Combines one row of a row join.
 * `null` stands in for the side that had no match.
 */
export type JoinResultSelector<TOuter, TInner, TResult> = (outer: TOuter, inner: TInner) => TResult;

/**
 * Combines an outer element with the run of inner elements sharing its key.
 */
export type GroupResultSelector<TOuter, TRun, TResult> = (outer: TOuter, run: TRun) => TResult;

/**
 * Options accepted by the group-join operators.
 */
export interface GroupJoinOptions {
	/**
	 * Drain each inner run into an array before the result selector sees it.
	 *
	 * Without this, a run is a live view over the shared inner cursor and must be
	 * fully consumed before the next outer element is pulled. Buffering removes that
	 * precondition but holds the current run in memory.
	 * Defaults to false.
	 */
	bufferRuns?: boolean;
}

/**
 * Status codes carried by errors raised from this package.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	MISUSE = 21,
}
