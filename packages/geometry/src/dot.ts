/**
 * Dots: a single point drawn as a small disc
 */

import { BLACK, type Vec2 } from '@seedsketch/core'
import { type ShapeOptions, type Surface, fillDot } from '@seedsketch/draw'
import { type Matrix, transformPoint } from '@seedsketch/transform'
import type { Shape } from './types'

export class Dot<P extends Vec2 = Vec2> implements Shape<Dot<P>> {
	readonly kind = 'dot'

	constructor(
		readonly center: P,
		readonly radius = 1
	) {
		if (!Number.isFinite(radius) || radius < 0) {
			throw new RangeError(`Dot radius must be a finite number >= 0, got ${radius}`)
		}
	}

	renderInto(surface: Surface, options: ShapeOptions = {}): void {
		fillDot(surface, this.center, this.radius, options.fill?.color ?? options.stroke?.color ?? BLACK)
	}

	/** Only the center moves; the radius stays in user units */
	transformed(m: Matrix): Dot<P> {
		return new Dot(transformPoint(m, this.center), this.radius)
	}
}

export function dot<P extends Vec2>(center: P, radius?: number): Dot<P> {
	return new Dot(center, radius)
}
