import type { AnyIterable } from '../common/types.js';

export function isIterable<T>(value: unknown): value is Iterable<T> {
	if (typeof value === 'string') {
		return true;
	}
	return typeof value === 'object'
		&& value !== null
		&& Symbol.iterator in value
		&& typeof value[Symbol.iterator] === 'function';
}

/**
 * Check if a value is an AsyncIterable.
 */
export function isAsyncIterable<T>(value: unknown): value is AsyncIterable<T> {
	return typeof value === 'object'
		&& value !== null
		&& Symbol.asyncIterator in value
		&& typeof value[Symbol.asyncIterator] === 'function';
}

/**
 * Get an AsyncIterator from either kind of iterable.
 * Sync iterables are lifted; their `return()` is forwarded so early exit still releases them.
 *
 * @throws TypeError if value is not iterable
 */
export function getAsyncIterator<T>(value: AnyIterable<T>): AsyncIterator<T> {
	if (isAsyncIterable<T>(value)) {
		return value[Symbol.asyncIterator]();
	}
	if (isIterable<T>(value)) {
		const iterator = value[Symbol.iterator]();
		return {
			async next() {
				return iterator.next();
			},
			async return() {
				iterator.return?.();
				return { done: true as const, value: undefined };
			},
		};
	}
	throw new TypeError('Value is not iterable');
}

export async function asyncIterableToArray<T>(iterable: AnyIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of iterable) {
		result.push(item);
	}
	return result;
}
