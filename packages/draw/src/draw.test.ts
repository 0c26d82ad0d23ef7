import { describe, expect, it } from 'vitest'
import { createImageData } from '@seedsketch/core'
import { rotation, translation } from '@seedsketch/transform'
import {
	arcOutline,
	bindSurface,
	clear,
	createSurface,
	drawLine,
	fillPolygon,
	fillRect,
	getMatrix,
	getPixel,
	lineScale,
	paintPolyline,
	plot,
	scaleSurface,
	setMatrix,
	setPixel,
	strokeArc,
	strokePolyline,
	strokeRect,
	withTransform,
	withTransformAsync,
} from './index'
import type { Color } from '@seedsketch/core'

const RED: Color = [255, 0, 0, 255]

describe('Draw', () => {
	describe('surfaces', () => {
		it('starts rgba surfaces transparent', () => {
			const s = createSurface(2, 2)
			expect(getPixel(s, 1, 1)).toEqual([0, 0, 0, 0])
		})

		it('starts rgb surfaces opaque black', () => {
			const s = createSurface(2, 2, { format: 'rgb' })
			expect(getPixel(s, 0, 1)).toEqual([0, 0, 0, 255])
		})

		it('binds to an existing buffer', () => {
			const image = createImageData(2, 1)
			const s = bindSurface(image, 'rgb')
			setPixel(s, 1, 0, RED)
			expect(Array.from(image.data.subarray(4, 8))).toEqual([255, 0, 0, 255])
		})

		it('rejects buffers of the wrong length', () => {
			expect(() => bindSurface({ width: 2, height: 2, data: new Uint8Array(4) })).toThrow(
				'Pixel buffer holds 4 bytes, expected 16'
			)
		})
	})

	describe('pixel operations', () => {
		it('sets and gets pixels', () => {
			const s = createSurface(4, 4)
			setPixel(s, 1, 2, [10, 20, 30, 255])
			expect(getPixel(s, 1, 2)).toEqual([10, 20, 30, 255])
		})

		it('clips out-of-bounds pixels', () => {
			const s = createSurface(2, 2)
			setPixel(s, -1, 0, RED)
			setPixel(s, 2, 0, RED)
			expect(s.image.data.every((v) => v === 0)).toBe(true)
			expect(getPixel(s, 5, 5)).toEqual([0, 0, 0, 0])
		})

		it('alpha blends translucent colors', () => {
			const s = createSurface(1, 1)
			clear(s, [255, 255, 255, 255])
			setPixel(s, 0, 0, [0, 0, 0, 128])
			expect(getPixel(s, 0, 0)).toEqual([127, 127, 127, 255])
		})

		it('keeps rgb surfaces opaque', () => {
			const s = createSurface(1, 1, { format: 'rgb' })
			setPixel(s, 0, 0, [255, 0, 0, 128])
			expect(getPixel(s, 0, 0)).toEqual([128, 0, 0, 255])
		})

		it('clears rgb surfaces to opaque colors', () => {
			const s = createSurface(1, 1, { format: 'rgb' })
			clear(s, [1, 2, 3, 0])
			expect(getPixel(s, 0, 0)).toEqual([1, 2, 3, 255])
		})
	})

	describe('device primitives', () => {
		it('draws a horizontal line', () => {
			const s = createSurface(5, 1)
			drawLine(s, 0, 0, 3, 0, RED)
			expect([0, 1, 2, 3, 4].map((x) => getPixel(s, x, 0)[3])).toEqual([255, 255, 255, 255, 0])
		})

		it('fills a polygon by pixel centers', () => {
			const s = createSurface(6, 6)
			fillPolygon(
				s,
				[
					{ x: 1, y: 1 },
					{ x: 4, y: 1 },
					{ x: 4, y: 4 },
					{ x: 1, y: 4 },
				],
				RED
			)
			expect(getPixel(s, 1, 1)).toEqual(RED)
			expect(getPixel(s, 3, 3)).toEqual(RED)
			expect(getPixel(s, 4, 4)).toEqual([0, 0, 0, 0])
			expect(getPixel(s, 0, 2)).toEqual([0, 0, 0, 0])
		})
	})

	describe('user space', () => {
		it('maps user points through the scale', () => {
			const s = createSurface(100, 100)
			scaleSurface(s, 2)
			plot(s, { x: 25, y: 25 }, RED)
			expect(getPixel(s, 50, 50)).toEqual(RED)
			expect(getPixel(s, 49, 49)).toEqual([0, 0, 0, 0])
			expect(getPixel(s, 51, 51)).toEqual([0, 0, 0, 0])
		})

		it('fills scaled rectangles', () => {
			const s = createSurface(8, 8)
			scaleSurface(s, 2)
			fillRect(s, { x: 1, y: 1, width: 1, height: 1 }, RED)
			expect(getPixel(s, 2, 2)).toEqual(RED)
			expect(getPixel(s, 3, 3)).toEqual(RED)
			expect(getPixel(s, 4, 4)).toEqual([0, 0, 0, 0])
			expect(getPixel(s, 1, 1)).toEqual([0, 0, 0, 0])
		})

		it('scales line widths with the matrix', () => {
			const s = createSurface(4, 4)
			scaleSurface(s, 3)
			expect(lineScale(s)).toBe(3)
		})

		it('strokes thick lines as discs', () => {
			const s = createSurface(10, 10)
			strokePolyline(
				s,
				[
					{ x: 2, y: 5 },
					{ x: 6, y: 5 },
				],
				{ color: RED, width: 3 }
			)
			expect(getPixel(s, 4, 6)).toEqual(RED)
			expect(getPixel(s, 4, 8)).toEqual([0, 0, 0, 0])
		})

		it('strokes rectangle outlines', () => {
			const s = createSurface(5, 5)
			strokeRect(s, { x: 0, y: 0, width: 4, height: 4 }, { color: RED })
			expect(getPixel(s, 4, 2)).toEqual(RED)
			expect(getPixel(s, 2, 2)).toEqual([0, 0, 0, 0])
		})

		it('fills without stroking when only a fill is given', () => {
			const s = createSurface(6, 6)
			paintPolyline(
				s,
				[
					{ x: 0, y: 0 },
					{ x: 6, y: 0 },
					{ x: 6, y: 6 },
					{ x: 0, y: 6 },
				],
				{ fill: { color: RED } },
				true
			)
			expect(getPixel(s, 5, 5)).toEqual(RED)
		})
	})

	describe('arcs', () => {
		it('draws both arc endpoints', () => {
			const s = createSurface(12, 12)
			strokeArc(s, { x: 5, y: 5 }, 4, 0, Math.PI / 2, { color: RED })
			expect(getPixel(s, 9, 5)).toEqual(RED)
			expect(getPixel(s, 5, 9)).toEqual(RED)
			expect(getPixel(s, 1, 5)).toEqual([0, 0, 0, 0])
		})

		it('advances end angles below the start by a full turn', () => {
			const s = createSurface(4, 4)
			const points = arcOutline(s, { x: 0, y: 0 }, 1, 0, -Math.PI / 2)
			expect(points).toHaveLength(4)
			const last = points[points.length - 1]!
			expect(last.x).toBeCloseTo(0, 9)
			expect(last.y).toBeCloseTo(-1, 9)
		})

		it('normalises a start angle thousands of turns above the end', () => {
			const s = createSurface(4, 4)
			const start = 4000 * 2 * Math.PI + Math.PI / 2
			const points = arcOutline(s, { x: 0, y: 0 }, 1, start, 0)
			expect(points).toHaveLength(4)
			const last = points[points.length - 1]!
			expect(last.x).toBeCloseTo(1, 6)
			expect(last.y).toBeCloseTo(0, 6)
		})

		it('keeps the sweep under a full turn for huge start angles', () => {
			const s = createSurface(10, 10)
			const points = arcOutline(s, { x: 5, y: 5 }, 3, 1e12, 0)
			expect(points.length).toBeGreaterThanOrEqual(2)
			expect(points.length).toBeLessThanOrEqual(11)
			for (const p of points) {
				expect(Math.hypot(p.x - 5, p.y - 5)).toBeCloseTo(3, 9)
			}
		})

		it('rejects infinite angles', () => {
			const s = createSurface(4, 4)
			expect(() => arcOutline(s, { x: 0, y: 0 }, 1, 0, Number.POSITIVE_INFINITY)).toThrow(RangeError)
		})
	})

	describe('setMatrix', () => {
		it('replaces the current matrix', () => {
			const s = createSurface(4, 4)
			scaleSurface(s, 2)
			const m = translation({ x: 2, y: 1 })
			setMatrix(s, m)
			expect(getMatrix(s)).toBe(m)
			plot(s, { x: 0, y: 0 }, RED)
			expect(getPixel(s, 2, 1)).toEqual(RED)
		})
	})

	describe('withTransform', () => {
		it('restores the matrix afterwards', () => {
			const s = createSurface(4, 4)
			const before = getMatrix(s)
			withTransform(s, translation({ x: 1, y: 1 }), () => {
				plot(s, { x: 0, y: 0 }, RED)
			})
			expect(getPixel(s, 1, 1)).toEqual(RED)
			expect(getMatrix(s)).toBe(before)
		})

		it('restores the matrix when drawing throws', () => {
			const s = createSurface(4, 4)
			const before = getMatrix(s)
			expect(() =>
				withTransform(s, rotation(1), () => {
					throw new Error('boom')
				})
			).toThrow('boom')
			expect(getMatrix(s)).toBe(before)
		})

		it('keeps the matrix until async drawing settles', async () => {
			const s = createSurface(4, 4)
			const before = getMatrix(s)
			await withTransformAsync(s, translation({ x: 2, y: 0 }), async () => {
				await Promise.resolve()
				plot(s, { x: 0, y: 0 }, RED)
			})
			expect(getPixel(s, 2, 0)).toEqual(RED)
			expect(getMatrix(s)).toBe(before)
		})
	})
})
