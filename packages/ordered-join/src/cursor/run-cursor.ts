import { misuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { runPhases, type RunTest } from './run-test.js';

const log = createLogger('cursor');

/**
 * Forward-only cursor over one ordered sequence that hands out consecutive runs of
 * matching elements.
 *
 * The cursor never rewinds. A run returned by {@link takeWhileAfterSkip} reads directly
 * from the shared underlying iterator, so it must be fully drained before the next call;
 * a run that is left half-read, or read after a later run was requested, yields
 * elements belonging to some other key. This is not detected.
 */
export class RunCursor<T> {
	private readonly iterator: Iterator<T>;
	private head: IteratorResult<T>;
	private pulled = 0;
	private disposed = false;

	/** Pulls the first element immediately. */
	constructor(sequence: Iterable<T>) {
		this.iterator = sequence[Symbol.iterator]();
		this.head = this.advance();
	}

	get hasData(): boolean {
		return !this.head.done;
	}

	/** The element the cursor is positioned on. */
	get current(): T {
		const head = this.head;
		if (head.done) {
			return misuseError('RunCursor has no current element: the sequence is exhausted');
		}
		return head.value;
	}

	/** Number of elements read from the underlying sequence so far. */
	get readCount(): number {
		return this.pulled;
	}

	/**
	 * Discards elements selected by the skip phase of `test`, then lazily yields
	 * the following elements that match, stopping (without discarding) at the first
	 * one that does not.
	 */
	*takeWhileAfterSkip(test: RunTest<T>): Generator<T, void, undefined> {
		const { discard, matches } = runPhases(test);

		while (!this.head.done && discard(this.head.value)) {
			this.advance();
		}

		while (!this.head.done && matches(this.head.value)) {
			yield this.head.value;
			this.advance();
		}
	}

	/** Releases the underlying iterator. Safe to call more than once. */
	dispose(): void {
		if (this.disposed) return;
		this.disposed = true;
		log('Disposing cursor after %d elements', this.pulled);
		this.head = { done: true, value: undefined };
		this.iterator.return?.();
	}

	private advance(): IteratorResult<T> {
		if (this.disposed) {
			return this.head;
		}
		this.head = this.iterator.next();
		if (!this.head.done) {
			this.pulled++;
		}
		return this.head;
	}
}
