import { describe, expect, it } from 'vitest'
import { Random } from './random'

describe('Random', () => {
	it('produces the SplitMix64 stream', () => {
		const random = new Random(0n)
		expect(random.nextU64()).toBe(0xe220a8397b1dcdafn)
		expect(random.nextU64()).toBe(0x6e789e6aa1b965f4n)
		expect(random.nextU64()).toBe(0x06c45d188009454fn)
	})

	it('repeats for equal seeds', () => {
		const a = new Random(42n)
		const b = new Random(42n)
		const first = Array.from({ length: 8 }, () => a.next())
		const second = Array.from({ length: 8 }, () => b.next())
		expect(first).toEqual(second)
	})

	it('diverges for different seeds', () => {
		expect(new Random(1n).next()).not.toBe(new Random(2n).next())
	})

	it('keeps floats in [0, 1)', () => {
		const random = new Random(7n)
		for (let i = 0; i < 1000; i++) {
			const value = random.next()
			expect(value).toBeGreaterThanOrEqual(0)
			expect(value).toBeLessThan(1)
		}
	})

	it('keeps uniform values in range', () => {
		const random = new Random(3n)
		for (let i = 0; i < 200; i++) {
			const value = random.uniform(-2, 5)
			expect(value).toBeGreaterThanOrEqual(-2)
			expect(value).toBeLessThan(5)
		}
	})

	it('draws integers from a half-open range', () => {
		const random = new Random(9n)
		const seen = new Set<number>()
		for (let i = 0; i < 500; i++) seen.add(random.int(2, 5))
		expect([...seen].sort()).toEqual([2, 3, 4])
	})

	it('rejects empty integer ranges', () => {
		expect(() => new Random(0n).int(3, 3)).toThrow('Invalid integer range [3, 3)')
		expect(() => new Random(0n).int(0, 1.5)).toThrow('Invalid integer range [0, 1.5)')
	})

	it('respects bool probabilities at the extremes', () => {
		const random = new Random(5n)
		expect(random.bool(0)).toBe(false)
		expect(random.bool(1)).toBe(true)
	})

	it('returns finite normal samples', () => {
		const random = new Random(11n)
		for (let i = 0; i < 100; i++) {
			expect(Number.isFinite(random.normal(10, 2))).toBe(true)
		}
	})

	it('picks from the list', () => {
		const items = ['a', 'b', 'c']
		expect(items).toContain(new Random(1n).pick(items))
		expect(() => new Random(1n).pick([])).toThrow('Cannot pick from an empty list')
	})

	it('shuffles into a permutation without touching the input', () => {
		const items = [1, 2, 3, 4, 5, 6]
		const shuffled = new Random(8n).shuffle(items)
		expect(items).toEqual([1, 2, 3, 4, 5, 6])
		expect([...shuffled].sort()).toEqual(items)
		expect(new Random(8n).shuffle(items)).toEqual(shuffled)
	})
})
