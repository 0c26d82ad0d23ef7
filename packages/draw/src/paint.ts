/**
 * User-space painting: every coordinate goes through the surface matrix
 */

import { BLACK, type Color, type Vec2 } from '@seedsketch/core'
import { drawLine, fillCircle, fillPolygon, setPixel } from './primitives'
import { lineScale, toDevice } from './surface'
import type { LineStyle, Rect, ShapeOptions, Surface } from './types'

/** Upper bound on the segments used to flatten one arc */
const MAX_ARC_SEGMENTS = 4096
const TAU = 2 * Math.PI

/**
 * Set the pixel under a user-space point
 */
export function plot(surface: Surface, p: Vec2, color: Color = BLACK): void {
	const d = toDevice(surface, p)
	setPixel(surface, d.x, d.y, color)
}

/**
 * Fill a disc whose radius is given in user units
 */
export function fillDot(surface: Surface, center: Vec2, radius: number, color: Color = BLACK): void {
	const d = toDevice(surface, center)
	fillCircle(surface, d.x, d.y, radius * lineScale(surface), color)
}

/**
 * Stroke straight segments through `points`
 */
export function strokePolyline(
	surface: Surface,
	points: readonly Vec2[],
	style: LineStyle = {},
	closed = false
): void {
	if (points.length < 2) return
	const color = style.color ?? BLACK
	const width = (style.width ?? 1) * lineScale(surface)
	const device = points.map((p) => toDevice(surface, p))

	const count = closed ? device.length : device.length - 1
	for (let i = 0; i < count; i++) {
		const p1 = device[i]!
		const p2 = device[(i + 1) % device.length]!
		drawLine(surface, p1.x, p1.y, p2.x, p2.y, color, width)
	}
}

/**
 * Fill the polygon closed by `points`
 */
export function fillPolyline(surface: Surface, points: readonly Vec2[], color: Color = BLACK): void {
	fillPolygon(
		surface,
		points.map((p) => toDevice(surface, p)),
		color
	)
}

/**
 * Fill then stroke a polyline. Without any style a 1-unit black stroke is used.
 */
export function paintPolyline(
	surface: Surface,
	points: readonly Vec2[],
	options: ShapeOptions = {},
	closed = false
): void {
	if (options.fill) {
		fillPolyline(surface, points, options.fill.color ?? BLACK)
	}
	if (options.stroke || !options.fill) {
		strokePolyline(surface, points, options.stroke, closed)
	}
}

/**
 * Flatten a circular arc into user-space points.
 *
 * Angles follow the usual arc convention: the arc runs with increasing angle,
 * and an end angle below the start is advanced by whole turns to the first
 * value not below it.
 */
export function arcOutline(
	surface: Surface,
	center: Vec2,
	radius: number,
	start: number,
	end: number
): Vec2[] {
	if (!Number.isFinite(start) || !Number.isFinite(end)) {
		throw new RangeError(`Arc angles must be finite, got ${start} and ${end}`)
	}
	const stop = end < start ? start + ((((end - start) % TAU) + TAU) % TAU) : end

	const sweep = stop - start
	const deviceRadius = radius * lineScale(surface)
	const segments = Math.min(MAX_ARC_SEGMENTS, Math.max(1, Math.ceil((sweep * deviceRadius) / 2)))

	const points: Vec2[] = []
	for (let i = 0; i <= segments; i++) {
		const theta = start + (sweep * i) / segments
		points.push({ x: center.x + Math.cos(theta) * radius, y: center.y + Math.sin(theta) * radius })
	}
	return points
}

export function paintArc(
	surface: Surface,
	center: Vec2,
	radius: number,
	start: number,
	end: number,
	options: ShapeOptions = {}
): void {
	paintPolyline(surface, arcOutline(surface, center, radius, start, end), options)
}

export function strokeArc(
	surface: Surface,
	center: Vec2,
	radius: number,
	start: number,
	end: number,
	style: LineStyle = {}
): void {
	strokePolyline(surface, arcOutline(surface, center, radius, start, end), style)
}

function rectCorners(rect: Rect): Vec2[] {
	const { x, y, width, height } = rect
	return [
		{ x, y },
		{ x: x + width, y },
		{ x: x + width, y: y + height },
		{ x, y: y + height },
	]
}

export function fillRect(surface: Surface, rect: Rect, color: Color = BLACK): void {
	fillPolyline(surface, rectCorners(rect), color)
}

export function strokeRect(surface: Surface, rect: Rect, style: LineStyle = {}): void {
	strokePolyline(surface, rectCorners(rect), style, true)
}
