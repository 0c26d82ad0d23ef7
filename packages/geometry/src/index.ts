/**
 * @seedsketch/geometry - parametric shapes
 */

import type { ShapeOptions, Surface } from '@seedsketch/draw'
import type { Arc } from './arc'
import type { Dot } from './dot'
import type { Path, Polygon } from './path'
import type { Rect } from './rect'
import type { Vec2 } from '@seedsketch/core'

export * from './types'
export * from './lerp'
export * from './path'
export * from './arc'
export * from './rect'
export * from './dot'

export type AnyShape<P extends Vec2 = Vec2> = Arc<P> | Path<P> | Polygon<P> | Rect | Dot<P>

/**
 * Render several shapes with the same options, in order
 */
export function renderAll(surface: Surface, shapes: Iterable<AnyShape>, options?: ShapeOptions): void {
	for (const shape of shapes) {
		shape.renderInto(surface, options)
	}
}
