/**
 * Seeded pseudo-random generator (SplitMix64).
 *
 * A trial owns exactly one generator; equal seeds give equal streams.
 */

import { MAX_SEED } from './seed'

const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n
const TWO_POW_53 = 2 ** 53

export class Random {
	private state: bigint

	constructor(readonly seed: bigint) {
		this.state = seed & MAX_SEED
	}

	/** Next raw 64-bit output */
	nextU64(): bigint {
		this.state = (this.state + GOLDEN_GAMMA) & MAX_SEED
		let z = this.state
		z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MAX_SEED
		z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MAX_SEED
		return z ^ (z >> 31n)
	}

	/** Uniform in [0, 1) with 53 bits of precision */
	next(): number {
		return Number(this.nextU64() >> 11n) / TWO_POW_53
	}

	/** Uniform in [lo, hi) */
	uniform(lo = 0, hi = 1): number {
		return lo + (hi - lo) * this.next()
	}

	/** Integer in [lo, hi) */
	int(lo: number, hi: number): number {
		if (!Number.isInteger(lo) || !Number.isInteger(hi) || hi <= lo) {
			throw new RangeError(`Invalid integer range [${lo}, ${hi})`)
		}
		return lo + Math.floor(this.next() * (hi - lo))
	}

	bool(p = 0.5): boolean {
		return this.next() < p
	}

	/** Normal distribution (Box-Muller) */
	normal(mean = 0, sd = 1): number {
		const u1 = 1 - this.next()
		const u2 = this.next()
		return mean + sd * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
	}

	pick<T>(items: readonly T[]): T {
		if (items.length === 0) {
			throw new RangeError('Cannot pick from an empty list')
		}
		return items[this.int(0, items.length)]!
	}

	/** Shuffled copy (Fisher-Yates) */
	shuffle<T>(items: readonly T[]): T[] {
		const result = [...items]
		for (let i = result.length - 1; i > 0; i--) {
			const j = this.int(0, i + 1)
			const tmp = result[i]!
			result[i] = result[j]!
			result[j] = tmp
		}
		return result
	}
}
