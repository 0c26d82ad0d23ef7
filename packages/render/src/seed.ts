/**
 * Seeds are unsigned 64-bit integers
 */

export const MAX_SEED = (1n << 64n) - 1n

export function isSeed(value: bigint): boolean {
	return value >= 0n && value <= MAX_SEED
}

/**
 * Use the given seed, or derive one from the wall clock in milliseconds
 */
export function resolveSeed(seed?: bigint, now: () => number = Date.now): bigint {
	if (seed !== undefined) return seed
	return BigInt(Math.floor(now()))
}

/**
 * Parse a decimal u64
 */
export function parseSeed(text: string): bigint {
	if (!/^\d+$/.test(text)) {
		throw new RangeError(`Seed must be an unsigned integer, got "${text}"`)
	}
	const seed = BigInt(text)
	if (!isSeed(seed)) {
		throw new RangeError(`Seed must be below 2^64, got ${text}`)
	}
	return seed
}
