import { misuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { AnyIterable } from '../common/types.js';
import { getAsyncIterator } from '../util/iterable.js';
import { runPhases, type RunTest } from './run-test.js';

const log = createLogger('cursor:async');

/**
 * Asynchronous counterpart of {@link RunCursor}, over an async (or sync) sequence.
 * The same single-drain precondition applies to every run it returns.
 */
export class AsyncRunCursor<T> {
	private pulled = 0;
	private disposed = false;

	private constructor(
		private readonly iterator: AsyncIterator<T>,
		private head: IteratorResult<T>
	) {
		if (!head.done) {
			this.pulled = 1;
		}
	}

	/** Opens a cursor, awaiting the first element. */
	static async open<T>(sequence: AnyIterable<T>): Promise<AsyncRunCursor<T>> {
		const iterator = getAsyncIterator(sequence);
		const first = await iterator.next();
		return new AsyncRunCursor(iterator, first);
	}

	get hasData(): boolean {
		return !this.head.done;
	}

	get current(): T {
		const head = this.head;
		if (head.done) {
			return misuseError('AsyncRunCursor has no current element: the sequence is exhausted');
		}
		return head.value;
	}

	get readCount(): number {
		return this.pulled;
	}

	async *takeWhileAfterSkip(test: RunTest<T>): AsyncGenerator<T, void, undefined> {
		const { discard, matches } = runPhases(test);

		while (!this.head.done && discard(this.head.value)) {
			await this.advance();
		}

		while (!this.head.done && matches(this.head.value)) {
			yield this.head.value;
			await this.advance();
		}
	}

	async dispose(): Promise<void> {
		if (this.disposed) return;
		this.disposed = true;
		log('Disposing cursor after %d elements', this.pulled);
		this.head = { done: true, value: undefined };
		await this.iterator.return?.();
	}

	private async advance(): Promise<void> {
		if (this.disposed) return;
		const next = await this.iterator.next();
		// dispose() may have run while the pull was pending
		if (this.disposed) return;
		this.head = next;
		if (!next.done) {
			this.pulled++;
		}
	}
}
