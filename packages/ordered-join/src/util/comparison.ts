import type { KeyComparator, KeyEqualityComparer } from '../common/types.js';

/** Ordering classes used by the default key comparison */
enum KeyClass {
	ABSENT = 0,
	NUMERIC = 1, // number, bigint, boolean, Date
	TEXT = 2,
	BINARY = 3,
	COMPOSITE = 4,
	OTHER = 99
}

/**
 * Determines the ordering class of a key.
 * Optimized with early returns for common cases.
 */
function getKeyClass(v: unknown): KeyClass {
	if (v === null || v === undefined) return KeyClass.ABSENT;

	const type = typeof v;
	// Fast path for numbers (most common case)
	if (type === 'number') return KeyClass.NUMERIC;
	if (type === 'string') return KeyClass.TEXT;
	if (type === 'bigint' || type === 'boolean') return KeyClass.NUMERIC;
	if (v instanceof Date) return KeyClass.NUMERIC;
	if (v instanceof Uint8Array) return KeyClass.BINARY;
	if (Array.isArray(v)) return KeyClass.COMPOSITE;

	return KeyClass.OTHER;
}

function toNumeric(v: unknown): number | bigint {
	if (typeof v === 'number' || typeof v === 'bigint') return v;
	if (typeof v === 'boolean') return v ? 1 : 0;
	if (v instanceof Date) return v.getTime();
	return 0;
}

function isNaNValue(v: number | bigint): boolean {
	return typeof v === 'number' && Number.isNaN(v);
}

/**
 * Fast path comparison for two numeric values. NaN sorts before every other
 * numeric and equals only NaN.
 * @returns -1 if a < b, 0 if a === b, 1 if a > b
 */
function compareNumbers(a: number | bigint, b: number | bigint): number {
	const aNaN = isNaNValue(a);
	const bNaN = isNaNValue(b);
	if (aNaN || bNaN) {
		return aNaN === bNaN ? 0 : aNaN ? -1 : 1;
	}
	return a < b ? -1 : a > b ? 1 : 0;
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		if (a[i] !== b[i]) {
			return a[i] < b[i] ? -1 : 1;
		}
	}
	return a.length < b.length ? -1 : a.length > b.length ? 1 : 0;
}

function compareComposite(a: readonly unknown[], b: readonly unknown[]): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		const cmp = compareKeys(a[i], b[i]);
		if (cmp !== 0) return cmp;
	}
	return a.length < b.length ? -1 : a.length > b.length ? 1 : 0;
}

/**
 * Default key ordering, used when a join is given no comparator.
 *
 * Keys order by class first: absent (null/undefined) < numeric (number, bigint,
 * boolean, Date) < text < binary (Uint8Array) < composite (arrays, element-wise).
 * Within a class, values compare naturally, with NaN first among numerics. Keys of
 * any other kind compare as equal to each other; joins over such keys need an
 * explicit comparator.
 *
 * @returns -1 if a < b, 0 if a === b, 1 if a > b
 */
export function compareKeys(a: unknown, b: unknown): number {
	const classA = getKeyClass(a);
	const classB = getKeyClass(b);

	if (classA !== classB) {
		return classA < classB ? -1 : 1;
	}

	switch (classA) {
		case KeyClass.NUMERIC:
			return compareNumbers(toNumeric(a), toNumeric(b));
		case KeyClass.TEXT:
			return typeof a === 'string' && typeof b === 'string'
				? (a < b ? -1 : a > b ? 1 : 0)
				: 0;
		case KeyClass.BINARY:
			return a instanceof Uint8Array && b instanceof Uint8Array ? compareBytes(a, b) : 0;
		case KeyClass.COMPOSITE:
			return Array.isArray(a) && Array.isArray(b) ? compareComposite(a, b) : 0;
		default:
			return 0;
	}
}

/**
 * Default key equality, used by the equality group join when no comparer is given.
 *
 * Agrees with {@link compareKeys} for every key it can order: `1`, `1n`, `true` and
 * `new Date(1)` are equal, as are `0` and `-0`, and NaN equals NaN. Keys of any other
 * kind compare by reference.
 */
export function keysEqual(a: unknown, b: unknown): boolean {
	if (a === b) return true;
	const keyClass = getKeyClass(a);
	if (keyClass === KeyClass.OTHER || keyClass !== getKeyClass(b)) return false;
	return compareKeys(a, b) === 0;
}

/**
 * Returns a comparator for inputs ordered descending by the given comparator.
 */
export function reverseComparator<K>(comparator: KeyComparator<K>): KeyComparator<K> {
	return (a, b) => comparator(b, a);
}

/**
 * Resolves an optional comparator. Absent is not an error: the default ordering applies.
 */
export function resolveComparator<K>(comparator?: KeyComparator<K> | null): KeyComparator<K> {
	return comparator ?? compareKeys;
}

/**
 * Resolves an optional equality comparer. Absent means default key equality.
 */
export function resolveEqualityComparer<K>(equals?: KeyEqualityComparer<K> | null): KeyEqualityComparer<K> {
	return equals ?? keysEqual;
}
