/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/** RGBA color, each channel 0-255 */
export type Color = readonly [number, number, number, number]

/**
 * 2D vector / point in user space.
 *
 * Point-like records extend this with their own fields; anything that moves
 * such a record replaces `x` and `y` and keeps the rest.
 */
export interface Vec2 {
	readonly x: number
	readonly y: number
}

/**
 * Pixel layout of a drawing surface
 * - rgba: straight alpha, starts fully transparent
 * - rgb: alpha channel is ignored and always written as 255
 */
export type PixelFormat = 'rgba' | 'rgb'

export const BLACK: Color = [0, 0, 0, 255]
export const WHITE: Color = [255, 255, 255, 255]

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
		throw new RangeError(`Invalid image size: ${width}x${height}`)
	}
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Clone ImageData
 */
export function cloneImageData(image: ImageData): ImageData {
	return {
		width: image.width,
		height: image.height,
		data: new Uint8Array(image.data),
	}
}
