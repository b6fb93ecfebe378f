import { expect } from 'chai';
import {
	orderedEqualityGroupJoin,
	orderedCompareGroupJoin,
	InvalidArgumentError,
	reverseComparator,
	compareKeys,
} from '../src/index.js';
import { probed, seededRandom, strictlyOrderedKeys, take } from './helpers/sequences.js';

interface Master {
	id: number;
}

interface Detail {
	masterId: number;
	detailId: number;
}

const id = (n: number) => n;
const drain = <O, I>(outer: O, run: Iterable<I>): [O, I[]] => [outer, [...run]];

/**
 * Materializing group join, for comparison.
 */
function referenceGroupJoin(outer: number[], inner: number[]): [number, number[]][] {
	return outer.map(key => [key, inner.filter(i => i === key)]);
}

describe('Ordered group joins', () => {
	const outer = [1, 2, 3, 5];
	const inner = [2, 2, 3, 4];

	describe('equality variant', () => {
		it('pairs every outer element with its run, empty runs included', () => {
			expect([...orderedEqualityGroupJoin(outer, inner, id, id, drain)]).to.deep.equal([
				[1, []],
				[2, [2, 2]],
				[3, [3]],
				[5, []],
			]);
		});

		it('stops at an inner key that appears among no outer keys', () => {
			expect([...orderedEqualityGroupJoin([3, 5], [4, 5], id, id, drain)]).to.deep.equal([
				[3, []],
				[5, []],
			]);
		});

		it('uses a supplied equality comparer', () => {
			const sameLetter = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();
			const result = [...orderedEqualityGroupJoin(['a', 'b'], ['A', 'a', 'B'], s => s, s => s, drain, sameLetter)];
			expect(result).to.deep.equal([['a', ['A', 'a']], ['b', ['B']]]);
		});
	});

	describe('compare variant', () => {
		it('pairs every outer element with its run, empty runs included', () => {
			expect([...orderedCompareGroupJoin(outer, inner, id, id, drain)]).to.deep.equal([
				[1, []],
				[2, [2, 2]],
				[3, [3]],
				[5, []],
			]);
		});

		it('skips only the inner elements ordered before each outer key', () => {
			expect([...orderedCompareGroupJoin([3, 5], [4, 5], id, id, drain)]).to.deep.equal([
				[3, []],
				[5, [5]],
			]);
		});

		it('walks descending inputs with a reversed comparator', () => {
			const result = [...orderedCompareGroupJoin([9, 5, 1], [9, 7, 5, 5], id, id, drain, reverseComparator(compareKeys))];
			expect(result).to.deep.equal([[9, [9]], [5, [5, 5]], [1, []]]);
		});

		it('matches a materializing group join on arbitrary ordered inputs', () => {
			const random = seededRandom(7);
			for (let trial = 0; trial < 20; trial++) {
				const outerKeys = strictlyOrderedKeys(random, 40, 0.5);
				const innerKeys = strictlyOrderedKeys(random, 40, 0.5)
					.flatMap(key => Array.from({ length: 1 + Math.floor(random() * 3) }, () => key));
				expect([...orderedCompareGroupJoin(outerKeys, innerKeys, id, id, drain)])
					.to.deep.equal(referenceGroupJoin(outerKeys, innerKeys));
			}
		});
	});

	describe('master / detail', () => {
		const masters: Master[] = [{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }];
		const details: Detail[] = [
			{ masterId: 1, detailId: 1 },
			{ masterId: 1, detailId: 2 },
			{ masterId: 2, detailId: 1 },
			{ masterId: 4, detailId: 1 },
			{ masterId: 4, detailId: 2 },
			{ masterId: 4, detailId: 3 },
		];
		const describeGroup = (m: Master, run: Iterable<Detail>) =>
			`${m.id}:${[...run].map(d => d.detailId).join(',')}`;

		it('both variants produce the same groups', () => {
			const expected = ['1:1,2', '2:1', '3:', '4:1,2,3'];
			expect([...orderedEqualityGroupJoin(masters, details, m => m.id, d => d.masterId, describeGroup)])
				.to.deep.equal(expected);
			expect([...orderedCompareGroupJoin(masters, details, m => m.id, d => d.masterId, describeGroup)])
				.to.deep.equal(expected);
		});

		it('both variants agree whenever every inner key has an outer counterpart', () => {
			const random = seededRandom(11);
			for (let trial = 0; trial < 20; trial++) {
				const outerKeys = strictlyOrderedKeys(random, 50, 0.6);
				const innerKeys = outerKeys.flatMap(key => Array.from({ length: Math.floor(random() * 4) }, () => key));
				const byEquality = [...orderedEqualityGroupJoin(outerKeys, innerKeys, id, id, drain)];
				const byComparison = [...orderedCompareGroupJoin(outerKeys, innerKeys, id, id, drain)];
				expect(byEquality).to.deep.equal(byComparison);
			}
		});
	});

	describe('default key equality', () => {
		it('both variants agree when keys mix numeric kinds', () => {
			const countRun = <O>(o: O, run: Iterable<unknown>) => `${String(o)}:${[...run].length}`;
			const numberKey = (n: number): number | bigint | Date => n;
			const bigintKey = (n: bigint): number | bigint | Date => n;
			const dateKey = (d: Date): number | bigint | Date => d;

			const byBigint = ['1:1', '2:1'];
			expect([...orderedEqualityGroupJoin([1, 2], [1n, 2n], numberKey, bigintKey, countRun)]).to.deep.equal(byBigint);
			expect([...orderedCompareGroupJoin([1, 2], [1n, 2n], numberKey, bigintKey, countRun)]).to.deep.equal(byBigint);

			const dates = [new Date(1000), new Date(1000), new Date(2000)];
			const byDate = ['1000:2', '2000:1'];
			expect([...orderedEqualityGroupJoin([1000, 2000], dates, numberKey, dateKey, countRun)]).to.deep.equal(byDate);
			expect([...orderedCompareGroupJoin([1000, 2000], dates, numberKey, dateKey, countRun)]).to.deep.equal(byDate);
		});
	});

	describe('duplicate outer keys', () => {
		it('gives the whole run to the first outer element of a key', () => {
			const expected = [[1, [1, 1]], [1, []], [2, [2]]];
			expect([...orderedCompareGroupJoin([1, 1, 2], [1, 1, 2], id, id, drain)]).to.deep.equal(expected);
			expect([...orderedEqualityGroupJoin([1, 1, 2], [1, 1, 2], id, id, drain)]).to.deep.equal(expected);
		});
	});

	describe('run consumption', () => {
		it('discards the unread part of a run before the next one', () => {
			const results = orderedEqualityGroupJoin([1, 2], [1, 1, 2], id, id, (o, run) => ({ o, run }));
			const first = results.next();
			const second = results.next();
			expect(first.done).to.be.false;
			expect(second.done).to.be.false;
			if (!second.done) {
				expect(second.value.o).to.equal(2);
				expect([...second.value.run]).to.deep.equal([2]);
			}
		});

		it('runs kept past the end of the walk are empty', () => {
			const cached = Array.from(orderedCompareGroupJoin([1, 2], [1, 2], id, id, (o, run) => ({ o, run })));
			expect(cached.map(({ o, run }) => [o, [...run]])).to.deep.equal([[1, []], [2, []]]);
		});

		it('bufferRuns hands each run over as an owned array', () => {
			const cached = Array.from(orderedCompareGroupJoin([1, 2], [1, 2], id, id,
				(o, run) => ({ o, run }), null, { bufferRuns: true }));
			expect(cached.map(({ o, run }) => [o, [...run]])).to.deep.equal([[1, [1]], [2, [2]]]);
			expect(Array.isArray(cached[0].run)).to.be.true;
		});

		it('bufferRuns applies to the equality variant as well', () => {
			const cached = Array.from(orderedEqualityGroupJoin([1, 2, 3], [1, 3, 3], id, id,
				(o, run) => ({ o, run }), null, { bufferRuns: true }));
			expect(cached.map(({ o, run }) => [o, [...run]])).to.deep.equal([[1, [1]], [2, []], [3, [3, 3]]]);
		});
	});

	describe('laziness and release', () => {
		it('reads nothing until the first group is requested', () => {
			const left = probed([1, 2]);
			const right = probed([1, 2]);
			orderedCompareGroupJoin(left.sequence, right.sequence, id, id, drain);
			expect(left.probe.pulled).to.equal(0);
			expect(right.probe.pulled).to.equal(0);
		});

		it('reads only what the groups taken require and releases both inputs', () => {
			const left = probed([1, 2, 3]);
			const right = probed([1, 1, 2, 2, 3, 3]);
			const groups = take(orderedCompareGroupJoin(left.sequence, right.sequence, id, id, drain), 1);

			expect(groups).to.deep.equal([[1, [1, 1]]]);
			expect(left.probe.pulled).to.equal(1);
			expect(right.probe.pulled).to.equal(3);
			expect(left.probe.released).to.be.true;
			expect(right.probe.released).to.be.true;
		});
	});

	describe('errors', () => {
		it('throws InvalidArgumentError at call time for a missing inner sequence', () => {
			const args: unknown[] = [outer, undefined, id, id, drain];
			expect(() => Reflect.apply(orderedEqualityGroupJoin, undefined, args))
				.to.throw(InvalidArgumentError, "Argument 'inner' is required");
		});

		it('throws InvalidArgumentError at call time for a missing result selector', () => {
			const args: unknown[] = [outer, inner, id, id, null];
			expect(() => Reflect.apply(orderedCompareGroupJoin, undefined, args))
				.to.throw(InvalidArgumentError, "Argument 'resultSelector' is required");
		});

		it('propagates a key selector failure from inside a run', () => {
			const failure = new Error('bad inner key');
			const innerKey = (n: number) => {
				if (n === 3) throw failure;
				return n;
			};
			const groups = orderedCompareGroupJoin(outer, inner, id, innerKey, drain);
			expect(() => [...groups]).to.throw(failure);
		});
	});
});
