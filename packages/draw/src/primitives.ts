/**
 * Device-space drawing primitives
 */

import type { Color, Vec2 } from '@seedsketch/core'
import type { Surface } from './types'

/**
 * Set a pixel color, blending by the color's alpha
 */
export function setPixel(surface: Surface, x: number, y: number, color: Color): void {
	const { image } = surface
	const px = Math.floor(x)
	const py = Math.floor(y)
	if (px < 0 || px >= image.width || py < 0 || py >= image.height) return

	const idx = (py * image.width + px) * 4
	const [r, g, b, a] = color
	const data = image.data

	if (a === 255) {
		data[idx] = r
		data[idx + 1] = g
		data[idx + 2] = b
		data[idx + 3] = 255
	} else if (a > 0) {
		const alpha = a / 255
		const invAlpha = 1 - alpha
		data[idx] = Math.round(r * alpha + data[idx]! * invAlpha)
		data[idx + 1] = Math.round(g * alpha + data[idx + 1]! * invAlpha)
		data[idx + 2] = Math.round(b * alpha + data[idx + 2]! * invAlpha)
		data[idx + 3] = surface.format === 'rgb' ? 255 : Math.max(data[idx + 3]!, a)
	}
}

/**
 * Get a pixel color, or transparent black outside the surface
 */
export function getPixel(surface: Surface, x: number, y: number): Color {
	const { image } = surface
	const px = Math.floor(x)
	const py = Math.floor(y)
	if (px < 0 || px >= image.width || py < 0 || py >= image.height) {
		return [0, 0, 0, 0]
	}

	const idx = (py * image.width + px) * 4
	return [image.data[idx]!, image.data[idx + 1]!, image.data[idx + 2]!, image.data[idx + 3]!]
}

/**
 * Draw a line using Bresenham's algorithm
 */
export function drawLine(
	surface: Surface,
	x0: number,
	y0: number,
	x1: number,
	y1: number,
	color: Color,
	lineWidth = 1
): void {
	let px0 = Math.floor(x0)
	let py0 = Math.floor(y0)
	const px1 = Math.floor(x1)
	const py1 = Math.floor(y1)

	const dx = Math.abs(px1 - px0)
	const dy = Math.abs(py1 - py0)
	const sx = px0 < px1 ? 1 : -1
	const sy = py0 < py1 ? 1 : -1
	let err = dx - dy

	while (true) {
		if (lineWidth <= 1) {
			setPixel(surface, px0, py0, color)
		} else {
			// Thick lines are a disc at every step
			fillCircle(surface, px0, py0, lineWidth / 2, color)
		}

		if (px0 === px1 && py0 === py1) break

		const e2 = 2 * err
		if (e2 > -dy) {
			err -= dy
			px0 += sx
		}
		if (e2 < dx) {
			err += dx
			py0 += sy
		}
	}
}

/**
 * Fill a circle
 */
export function fillCircle(surface: Surface, cx: number, cy: number, radius: number, color: Color): void {
	const rcx = Math.floor(cx)
	const rcy = Math.floor(cy)
	const r = Math.round(radius)
	const r2 = r * r

	for (let dy = -r; dy <= r; dy++) {
		for (let dx = -r; dx <= r; dx++) {
			if (dx * dx + dy * dy <= r2) {
				setPixel(surface, rcx + dx, rcy + dy, color)
			}
		}
	}
}

/**
 * Fill a polygon using the scanline algorithm, sampling pixel centers
 */
export function fillPolygon(surface: Surface, points: readonly Vec2[], color: Color): void {
	if (points.length < 3) return
	const { width, height } = surface.image

	let minY = Number.POSITIVE_INFINITY
	let maxY = Number.NEGATIVE_INFINITY
	for (const p of points) {
		minY = Math.min(minY, p.y)
		maxY = Math.max(maxY, p.y)
	}

	const y0 = Math.max(0, Math.floor(minY))
	const y1 = Math.min(height - 1, Math.ceil(maxY))

	for (let y = y0; y <= y1; y++) {
		const sy = y + 0.5
		const intersections: number[] = []

		for (let i = 0; i < points.length; i++) {
			const p1 = points[i]!
			const p2 = points[(i + 1) % points.length]!

			if ((p1.y <= sy && p2.y > sy) || (p2.y <= sy && p1.y > sy)) {
				intersections.push(p1.x + ((sy - p1.y) / (p2.y - p1.y)) * (p2.x - p1.x))
			}
		}

		intersections.sort((a, b) => a - b)

		for (let i = 0; i + 1 < intersections.length; i += 2) {
			// Pixel x is covered when its center x + 0.5 lies inside the span
			const xa = Math.max(0, Math.ceil(intersections[i]! - 0.5))
			const xb = Math.min(width - 1, Math.ceil(intersections[i + 1]! - 0.5) - 1)

			for (let x = xa; x <= xb; x++) {
				setPixel(surface, x, y, color)
			}
		}
	}
}

/**
 * Clear the whole surface to a color, ignoring blending
 */
export function clear(surface: Surface, color: Color = [0, 0, 0, 0]): void {
	const [r, g, b, a] = color
	const data = surface.image.data
	const alpha = surface.format === 'rgb' ? 255 : a
	for (let i = 0; i < data.length; i += 4) {
		data[i] = r
		data[i + 1] = g
		data[i + 2] = b
		data[i + 3] = alpha
	}
}
