/**
 * Drawing types
 */

import type { Color, ImageData, PixelFormat } from '@seedsketch/core'
import type { Matrix } from '@seedsketch/transform'

/** Line style */
export interface LineStyle {
	/** Line color */
	color?: Color
	/** Line width in user-space units */
	width?: number
}

/** Fill style */
export interface FillStyle {
	/** Fill color */
	color?: Color
}

/** Shape options */
export interface ShapeOptions {
	/** Stroke style, defaults to a 1-unit black line when no fill is given */
	stroke?: LineStyle
	/** Fill style */
	fill?: FillStyle
}

/**
 * Raster target with a current transformation matrix.
 *
 * `image` is the device-space pixel buffer. User-space drawing goes through
 * `matrix` first.
 */
export interface Surface {
	readonly image: ImageData
	readonly format: PixelFormat
	matrix: Matrix
}

/** Rectangle in user space */
export interface Rect {
	x: number
	y: number
	width: number
	height: number
}
