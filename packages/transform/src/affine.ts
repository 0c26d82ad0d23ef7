/**
 * Transforming shapes and point-like records
 */

import { type Vec2, withPosition } from '@seedsketch/core'
import {
	apply,
	reflectOrigin,
	reflectX,
	reflectY,
	rotation,
	scalar,
	shear,
	shearX,
	shearY,
	translation,
} from './matrix'
import type { Affine, Matrix } from './types'

/**
 * Move a point-like record, keeping every field except its coordinates
 */
export function transformPoint<P extends Vec2>(m: Matrix, point: P): P {
	return withPosition(point, apply(m, point))
}

export function transformPoints<P extends Vec2>(m: Matrix, points: readonly P[]): P[] {
	return points.map((p) => transformPoint(m, p))
}

export function transform<T>(shape: Affine<T>, m: Matrix): T {
	return shape.transformed(m)
}

// ─────────────────────────────────────────────────────────────────────────────
// Applied transformations
// ─────────────────────────────────────────────────────────────────────────────

export function rotated<T>(shape: Affine<T>, theta: number): T {
	return shape.transformed(rotation(theta))
}

export function translated<T>(shape: Affine<T>, v: Vec2): T {
	return shape.transformed(translation(v))
}

export function scaled<T>(shape: Affine<T>, v: Vec2): T {
	return shape.transformed(scalar(v))
}

export function shearedX<T>(shape: Affine<T>, k: number): T {
	return shape.transformed(shearX(k))
}

export function shearedY<T>(shape: Affine<T>, k: number): T {
	return shape.transformed(shearY(k))
}

export function sheared<T>(shape: Affine<T>, v: Vec2): T {
	return shape.transformed(shear(v))
}

export function reflectedOrigin<T>(shape: Affine<T>): T {
	return shape.transformed(reflectOrigin)
}

export function reflectedX<T>(shape: Affine<T>): T {
	return shape.transformed(reflectX)
}

export function reflectedY<T>(shape: Affine<T>): T {
	return shape.transformed(reflectY)
}
