/**
 * Arcs (partial circles)
 */

import { type Vec2, add, mul, unit, withPosition } from '@seedsketch/core'
import { type ShapeOptions, type Surface, paintArc } from '@seedsketch/draw'
import type { Matrix } from '@seedsketch/transform'
import { lerpMany } from './lerp'
import { type Path, path } from './path'
import type { Shape } from './types'

/** Points sampled by {@link arc} when no detail is given */
export const DEFAULT_ARC_DETAIL = 100

export class Arc<P extends Vec2 = Vec2> implements Shape<Path<P> | undefined> {
	readonly kind = 'arc'

	/**
	 * @param center - center of the arc's circle
	 * @param radius - radius of the arc's circle
	 * @param start - start angle, radians
	 * @param end - end angle, radians
	 * @param detail - number of points used when the arc is sampled
	 */
	constructor(
		readonly center: P,
		readonly radius: number,
		readonly start: number,
		readonly end: number,
		readonly detail: number = DEFAULT_ARC_DETAIL
	) {
		if (!Number.isFinite(radius) || radius < 0) {
			throw new RangeError(`Arc radius must be a finite number >= 0, got ${radius}`)
		}
		if (!Number.isFinite(start) || !Number.isFinite(end)) {
			throw new RangeError(`Arc angles must be finite, got ${start} and ${end}`)
		}
		if (!Number.isInteger(detail) || detail < 0) {
			throw new RangeError(`Arc detail must be a non-negative integer, got ${detail}`)
		}
	}

	renderInto(surface: Surface, options?: ShapeOptions): void {
		paintArc(surface, this.center, this.radius, this.start, this.end, options)
	}

	/**
	 * Affine maps do not keep arcs circular, so the arc is sampled and the
	 * samples are transformed into a path. Fewer than two samples give
	 * `undefined`.
	 */
	transformed(m: Matrix): Path<P> | undefined {
		const sampled = path(arcPoints(this))
		return sampled?.transformed(m)
	}
}

export function arc<P extends Vec2>(center: P, radius: number, start: number, end: number): Arc<P> {
	return new Arc(center, radius, start, end)
}

/**
 * `detail` points along the arc from its start angle to its end angle
 */
export function arcPoints<P extends Vec2>(a: Arc<P>): P[] {
	return lerpMany(a.detail, a.start, a.end).map((theta) =>
		withPosition(a.center, add(a.center, mul(unit(theta), a.radius)))
	)
}
