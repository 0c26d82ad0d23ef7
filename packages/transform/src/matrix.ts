/**
 * Affine matrix algebra
 */

import type { Vec2 } from '@seedsketch/core'
import type { Matrix, MatrixRows } from './types'

/**
 * Build a matrix from its top two rows
 */
export function matrix(a: number, b: number, c: number, d: number, e: number, f: number): Matrix {
	return Object.freeze({ a, b, c, d, e, f })
}

export const identity: Matrix = matrix(1, 0, 0, 0, 1, 0)

/**
 * Full 3x3 form, bottom row included
 */
export function toRows(m: Matrix): MatrixRows {
	return [
		[m.a, m.b, m.c],
		[m.d, m.e, m.f],
		[0, 0, 1],
	]
}

/**
 * Product `l · r`: applying the result is applying `r` first, then `l`
 */
export function multiply(l: Matrix, r: Matrix): Matrix {
	return matrix(
		l.a * r.a + l.b * r.d,
		l.a * r.b + l.b * r.e,
		l.a * r.c + l.b * r.f + l.c,
		l.d * r.a + l.e * r.d,
		l.d * r.b + l.e * r.e,
		l.d * r.c + l.e * r.f + l.f
	)
}

/**
 * Compose matrices left to right as a product: `compose(A, B, C) = A · B · C`,
 * so the rightmost matrix is applied to a point first
 */
export function compose(...matrices: Matrix[]): Matrix {
	return matrices.reduce(multiply, identity)
}

/**
 * Apply a matrix to a point in homogeneous coordinates
 */
export function apply(m: Matrix, p: Vec2): Vec2 {
	return {
		x: m.a * p.x + m.b * p.y + m.c,
		y: m.d * p.x + m.e * p.y + m.f,
	}
}

export function determinant(m: Matrix): number {
	return m.a * m.e - m.b * m.d
}

export function approxEqual(l: Matrix, r: Matrix, eps = 1e-9): boolean {
	return (
		Math.abs(l.a - r.a) <= eps &&
		Math.abs(l.b - r.b) <= eps &&
		Math.abs(l.c - r.c) <= eps &&
		Math.abs(l.d - r.d) <= eps &&
		Math.abs(l.e - r.e) <= eps &&
		Math.abs(l.f - r.f) <= eps
	)
}

export function isIdentity(m: Matrix): boolean {
	return approxEqual(m, identity, 0)
}

// ─────────────────────────────────────────────────────────────────────────────
// Named transforms
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Rotation by `theta` radians about the origin
 */
export function rotation(theta: number): Matrix {
	const cos = Math.cos(theta)
	const sin = Math.sin(theta)
	return matrix(cos, -sin, 0, sin, cos, 0)
}

export function translation(v: Vec2): Matrix {
	return matrix(1, 0, v.x, 0, 1, v.y)
}

/**
 * Independent X/Y scale
 */
export function scalar(v: Vec2): Matrix {
	return matrix(v.x, 0, 0, 0, v.y, 0)
}

/** `x' = x + k*y` */
export function shearX(k: number): Matrix {
	return matrix(1, k, 0, 0, 1, 0)
}

/** `y' = y + k*x` */
export function shearY(k: number): Matrix {
	return matrix(1, 0, 0, k, 1, 0)
}

/**
 * Shear along both axes at once (`v.x` along X, `v.y` along Y)
 */
export function shear(v: Vec2): Matrix {
	return matrix(1, v.x, 0, v.y, 1, 0)
}

export const reflectOrigin: Matrix = scalar({ x: -1, y: -1 })
export const reflectX: Matrix = scalar({ x: 1, y: -1 })
export const reflectY: Matrix = scalar({ x: -1, y: 1 })
