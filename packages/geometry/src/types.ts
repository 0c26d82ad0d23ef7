/**
 * Shape contract
 */

import type { ShapeOptions, Surface } from '@seedsketch/draw'
import type { Affine } from '@seedsketch/transform'

export type ShapeKind = 'arc' | 'path' | 'polygon' | 'rect' | 'dot'

/**
 * Something that can draw itself and be mapped through a matrix.
 *
 * `T` is what the shape becomes under a transform. Shapes made only of
 * points map to their own type; shapes that affine maps do not preserve
 * (arcs, rects) map to a point-based shape instead.
 */
export interface Shape<T> extends Affine<T> {
	readonly kind: ShapeKind
	/** Draw through the surface's current matrix */
	renderInto(surface: Surface, options?: ShapeOptions): void
}
