import { expect } from 'chai';
import {
	compareKeys,
	keysEqual,
	reverseComparator,
	resolveComparator,
	resolveEqualityComparer,
	isIterable,
	isAsyncIterable,
} from '../src/index.js';
import { fromArray } from './helpers/sequences.js';

describe('Key comparison', () => {
	describe('compareKeys', () => {
		it('orders key classes: absent < numeric < text < binary < composite < other', () => {
			expect(compareKeys(null, 0)).to.equal(-1);
			expect(compareKeys(undefined, -Infinity)).to.equal(-1);
			expect(compareKeys(99, 'a')).to.equal(-1);
			expect(compareKeys('z', new Uint8Array([0]))).to.equal(-1);
			expect(compareKeys(new Uint8Array([255]), [0])).to.equal(-1);
			expect(compareKeys([1], {})).to.equal(-1);
			expect(compareKeys('a', null)).to.equal(1);
		});

		it('compares numbers, bigints, booleans and dates on one scale', () => {
			expect(compareKeys(1, 2)).to.equal(-1);
			expect(compareKeys(2n, 3)).to.equal(-1);
			expect(compareKeys(true, 1)).to.equal(0);
			expect(compareKeys(new Date(2000), new Date(1000))).to.equal(1);
			expect(compareKeys(new Date(5), 5)).to.equal(0);
		});

		it('places NaN before every other numeric and equal only to NaN', () => {
			expect(compareKeys(NaN, 1)).to.equal(-1);
			expect(compareKeys(1, NaN)).to.equal(1);
			expect(compareKeys(NaN, -Infinity)).to.equal(-1);
			expect(compareKeys(NaN, 0n)).to.equal(-1);
			expect(compareKeys(NaN, NaN)).to.equal(0);
			expect(compareKeys(null, NaN)).to.equal(-1);
			expect([3, NaN, 1].sort(compareKeys)).to.deep.equal([NaN, 1, 3]);
		});

		it('compares text by code unit', () => {
			expect(compareKeys('B', 'a')).to.equal(-1);
			expect(compareKeys('abc', 'abc')).to.equal(0);
		});

		it('compares bytes and arrays element-wise, shorter prefix first', () => {
			expect(compareKeys(new Uint8Array([1, 2]), new Uint8Array([1, 2, 0]))).to.equal(-1);
			expect(compareKeys(new Uint8Array([2]), new Uint8Array([1, 9]))).to.equal(1);
			expect(compareKeys([1, 'b'], [1, 'a'])).to.equal(1);
			expect(compareKeys([1], [1, 0])).to.equal(-1);
			expect(compareKeys([1, [2, 3]], [1, [2, 3]])).to.equal(0);
		});

		it('treats unclassified objects as equal', () => {
			expect(compareKeys({ a: 1 }, { b: 2 })).to.equal(0);
		});
	});

	describe('keysEqual', () => {
		it('uses same-value-zero identity', () => {
			expect(keysEqual(NaN, NaN)).to.be.true;
			expect(keysEqual(0, -0)).to.be.true;
			expect(keysEqual('1', 1)).to.be.false;
		});

		it('compares dates, bytes and arrays by content', () => {
			expect(keysEqual(new Date(10), new Date(10))).to.be.true;
			expect(keysEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).to.be.true;
			expect(keysEqual([1, [2]], [1, [2]])).to.be.true;
			expect(keysEqual([1, 2], [1])).to.be.false;
		});

		it('agrees with compareKeys across numeric kinds', () => {
			expect(keysEqual(1n, 1)).to.be.true;
			expect(keysEqual(true, 1)).to.be.true;
			expect(keysEqual(new Date(5), 5)).to.be.true;
			expect(keysEqual([1n, 'a'], [1, 'a'])).to.be.true;
			expect(keysEqual(null, undefined)).to.be.true;
			expect(keysEqual(NaN, 0)).to.be.false;
			expect(keysEqual(2n, 1)).to.be.false;
		});

		it('compares other objects by reference', () => {
			const key = { id: 1 };
			expect(keysEqual(key, key)).to.be.true;
			expect(keysEqual(key, { id: 1 })).to.be.false;
		});
	});

	describe('comparator helpers', () => {
		it('reverseComparator flips the order', () => {
			const descending = reverseComparator(compareKeys);
			expect(descending(1, 2)).to.equal(1);
			expect([3, 1, 2].sort(descending)).to.deep.equal([3, 2, 1]);
		});

		it('resolves absent comparators to the defaults', () => {
			expect(resolveComparator(null)).to.equal(compareKeys);
			expect(resolveComparator(undefined)).to.equal(compareKeys);
			expect(resolveEqualityComparer(null)).to.equal(keysEqual);
			const byLength = (a: string, b: string) => a.length - b.length;
			expect(resolveComparator(byLength)).to.equal(byLength);
		});
	});

	describe('iterable detection', () => {
		it('isIterable', () => {
			expect(isIterable([1])).to.be.true;
			expect(isIterable('abc')).to.be.true;
			expect(isIterable(new Set())).to.be.true;
			expect(isIterable({})).to.be.false;
			expect(isIterable(null)).to.be.false;
			expect(isIterable(fromArray([1]))).to.be.false;
		});

		it('isAsyncIterable', () => {
			expect(isAsyncIterable(fromArray([1]))).to.be.true;
			expect(isAsyncIterable([1])).to.be.false;
			expect(isAsyncIterable(undefined)).to.be.false;
		});
	});
});
