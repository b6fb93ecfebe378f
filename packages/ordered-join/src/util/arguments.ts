import { InvalidArgumentError } from '../common/errors.js';
import { isAsyncIterable, isIterable } from './iterable.js';

/**
 * Argument checks shared by the join operators. Each runs synchronously at
 * call time, before a generator is created, so bad arguments never surface
 * midway through an enumeration.
 */

export function requireIterable(value: unknown, name: string): void {
	if (value === null || value === undefined) {
		throw new InvalidArgumentError(name);
	}
	if (!isIterable(value)) {
		throw new InvalidArgumentError(name, `Argument '${name}' must be iterable`);
	}
}

export function requireAnyIterable(value: unknown, name: string): void {
	if (value === null || value === undefined) {
		throw new InvalidArgumentError(name);
	}
	if (!isAsyncIterable(value) && !isIterable(value)) {
		throw new InvalidArgumentError(name, `Argument '${name}' must be iterable or async iterable`);
	}
}

export function requireFunction(value: unknown, name: string): void {
	if (value === null || value === undefined) {
		throw new InvalidArgumentError(name);
	}
	if (typeof value !== 'function') {
		throw new InvalidArgumentError(name, `Argument '${name}' must be a function`);
	}
}
