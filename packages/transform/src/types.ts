/**
 * Transform types
 */

/**
 * 3x3 affine matrix, stored as its top two rows:
 *
 * ```
 * | a b c |
 * | d e f |
 * | 0 0 1 |
 * ```
 *
 * so that `x' = a*x + b*y + c` and `y' = d*x + e*y + f`.
 */
export interface Matrix {
	readonly a: number
	readonly b: number
	readonly c: number
	readonly d: number
	readonly e: number
	readonly f: number
}

export type MatrixRows = readonly [
	readonly [number, number, number],
	readonly [number, number, number],
	readonly [number, number, number],
]

/**
 * Something that maps itself through a {@link Matrix}.
 *
 * `T` is the type of the result, which need not be the type of the input:
 * an arc, for example, becomes a path.
 */
export interface Affine<T> {
	transformed(matrix: Matrix): T
}
