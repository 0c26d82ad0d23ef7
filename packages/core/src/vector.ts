/**
 * Vector helpers
 */

import type { Vec2 } from './types'

export function add(a: Vec2, b: Vec2): Vec2 {
	return { x: a.x + b.x, y: a.y + b.y }
}

export function mul(v: Vec2, k: number): Vec2 {
	return { x: v.x * k, y: v.y * k }
}

/**
 * Unit vector pointing at `theta` radians
 */
export function unit(theta: number): Vec2 {
	return { x: Math.cos(theta), y: Math.sin(theta) }
}

/**
 * Replace the coordinates of a point-like record, keeping its other fields
 */
export function withPosition<P extends Vec2>(point: P, position: Vec2): P {
	return { ...point, x: position.x, y: position.y }
}

export function approxEqualVec(a: Vec2, b: Vec2, eps = 1e-9): boolean {
	return Math.abs(a.x - b.x) <= eps && Math.abs(a.y - b.y) <= eps
}
