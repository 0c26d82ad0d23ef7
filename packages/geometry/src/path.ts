/**
 * Open and closed polylines
 */

import type { Vec2 } from '@seedsketch/core'
import { type ShapeOptions, type Surface, paintPolyline } from '@seedsketch/draw'
import { type Matrix, transformPoints } from '@seedsketch/transform'
import type { Shape } from './types'

/**
 * Open polyline through at least two points
 */
export class Path<P extends Vec2 = Vec2> implements Shape<Path<P>> {
	readonly kind = 'path'
	readonly points: readonly P[]

	constructor(points: readonly P[]) {
		if (points.length < 2) {
			throw new RangeError(`A path needs at least 2 points, got ${points.length}`)
		}
		this.points = [...points]
	}

	renderInto(surface: Surface, options?: ShapeOptions): void {
		paintPolyline(surface, this.points, options)
	}

	transformed(m: Matrix): Path<P> {
		return new Path(transformPoints(m, this.points))
	}
}

/**
 * Closed polyline through at least three points
 */
export class Polygon<P extends Vec2 = Vec2> implements Shape<Polygon<P>> {
	readonly kind = 'polygon'
	readonly points: readonly P[]

	constructor(points: readonly P[]) {
		if (points.length < 3) {
			throw new RangeError(`A polygon needs at least 3 points, got ${points.length}`)
		}
		this.points = [...points]
	}

	renderInto(surface: Surface, options?: ShapeOptions): void {
		paintPolyline(surface, this.points, options, true)
	}

	transformed(m: Matrix): Polygon<P> {
		return new Polygon(transformPoints(m, this.points))
	}
}

/**
 * Path through `points`, or `undefined` when there are fewer than two
 */
export function path<P extends Vec2>(points: readonly P[]): Path<P> | undefined {
	return points.length < 2 ? undefined : new Path(points)
}

/**
 * Polygon through `points`, or `undefined` when there are fewer than three
 */
export function polygon<P extends Vec2>(points: readonly P[]): Polygon<P> | undefined {
	return points.length < 3 ? undefined : new Polygon(points)
}
