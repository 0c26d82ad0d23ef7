/**
 * Surfaces and their current transformation matrix
 */

import { type ImageData, type PixelFormat, type Vec2, createImageData } from '@seedsketch/core'
import { type Matrix, apply, determinant, identity, multiply, scalar } from '@seedsketch/transform'
import { clear } from './primitives'
import type { Surface } from './types'

export interface SurfaceOptions {
	/** Pixel layout (default: rgba) */
	format?: PixelFormat
}

/**
 * Create a surface of the given physical size.
 * `rgba` surfaces start transparent, `rgb` surfaces start opaque black.
 */
export function createSurface(width: number, height: number, options: SurfaceOptions = {}): Surface {
	const format = options.format ?? 'rgba'
	const surface: Surface = { image: createImageData(width, height), format, matrix: identity }
	if (format === 'rgb') clear(surface, [0, 0, 0, 255])
	return surface
}

/**
 * Draw straight into an existing pixel buffer (a window's, for instance)
 */
export function bindSurface(image: ImageData, format: PixelFormat = 'rgba'): Surface {
	if (image.data.length !== image.width * image.height * 4) {
		throw new RangeError(
			`Pixel buffer holds ${image.data.length} bytes, expected ${image.width * image.height * 4}`
		)
	}
	return { image, format, matrix: identity }
}

export function getMatrix(surface: Surface): Matrix {
	return surface.matrix
}

export function setMatrix(surface: Surface, m: Matrix): void {
	surface.matrix = m
}

/**
 * Post-multiply the current matrix: later drawing is mapped by `m` first
 */
export function transformSurface(surface: Surface, m: Matrix): void {
	surface.matrix = multiply(surface.matrix, m)
}

export function scaleSurface(surface: Surface, sx: number, sy: number = sx): void {
	transformSurface(surface, scalar({ x: sx, y: sy }))
}

/**
 * Run `draw` with `m` applied on top of the current matrix, restoring the
 * previous matrix afterwards
 */
export function withTransform<T>(surface: Surface, m: Matrix, draw: () => T): T {
	const previous = surface.matrix
	transformSurface(surface, m)
	try {
		return draw()
	} finally {
		surface.matrix = previous
	}
}

/**
 * {@link withTransform} for drawing that awaits; the matrix is restored once
 * `draw` settles
 */
export async function withTransformAsync<T>(
	surface: Surface,
	m: Matrix,
	draw: () => Promise<T>
): Promise<T> {
	const previous = surface.matrix
	transformSurface(surface, m)
	try {
		return await draw()
	} finally {
		surface.matrix = previous
	}
}

/**
 * Map a user-space point to device space
 */
export function toDevice(surface: Surface, p: Vec2): Vec2 {
	return apply(surface.matrix, p)
}

/**
 * Factor by which the current matrix scales lengths (on average)
 */
export function lineScale(surface: Surface): number {
	return Math.sqrt(Math.abs(determinant(surface.matrix)))
}
