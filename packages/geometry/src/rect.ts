/**
 * Axis-aligned rectangles
 */

import type { Vec2 } from '@seedsketch/core'
import { type ShapeOptions, type Surface, paintPolyline } from '@seedsketch/draw'
import { type Matrix, transformPoints } from '@seedsketch/transform'
import { Polygon } from './path'
import type { Shape } from './types'

export class Rect implements Shape<Polygon> {
	readonly kind = 'rect'

	constructor(
		readonly x: number,
		readonly y: number,
		readonly width: number,
		readonly height: number
	) {
		if (![x, y, width, height].every(Number.isFinite) || width < 0 || height < 0) {
			throw new RangeError(`Invalid rect: ${x},${y} ${width}x${height}`)
		}
	}

	/** Corners, clockwise from the top-left in a y-down frame */
	corners(): Vec2[] {
		const { x, y, width, height } = this
		return [
			{ x, y },
			{ x: x + width, y },
			{ x: x + width, y: y + height },
			{ x, y: y + height },
		]
	}

	renderInto(surface: Surface, options?: ShapeOptions): void {
		paintPolyline(surface, this.corners(), options, true)
	}

	/** Rotated or sheared rects are no longer axis-aligned */
	transformed(m: Matrix): Polygon {
		return new Polygon(transformPoints(m, this.corners()))
	}
}

export function rect(x: number, y: number, width: number, height: number): Rect {
	return new Rect(x, y, width, height)
}
