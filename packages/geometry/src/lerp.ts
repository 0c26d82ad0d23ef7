/**
 * Linear interpolation
 */

export function lerp(a: number, b: number, t: number): number {
	return a + (b - a) * t
}

/**
 * `n` evenly spaced values from `a` to `b`, both included.
 * Fewer than two values cannot span the range: `n = 1` gives `[a]`.
 */
export function lerpMany(n: number, a: number, b: number): number[] {
	if (n <= 0) return []
	if (n === 1) return [a]

	const values: number[] = []
	for (let i = 0; i < n; i++) {
		values.push(i === n - 1 ? b : lerp(a, b, i / (n - 1)))
	}
	return values
}
