import { describe, expect, it } from 'vitest'
import { createSurface, getPixel } from '@seedsketch/draw'
import {
	identity,
	rotated,
	scalar,
	shearX,
	shearedX,
	translation,
} from '@seedsketch/transform'
import {
	Arc,
	DEFAULT_ARC_DETAIL,
	Dot,
	Path,
	Polygon,
	Rect,
	arc,
	arcPoints,
	lerpMany,
	path,
	polygon,
	renderAll,
} from './index'

const RED = [255, 0, 0, 255] as const

describe('Geometry', () => {
	describe('lerpMany', () => {
		it('includes both endpoints', () => {
			expect(lerpMany(5, 0, 1)).toEqual([0, 0.25, 0.5, 0.75, 1])
			expect(lerpMany(3, 0, Math.PI)).toEqual([0, Math.PI / 2, Math.PI])
		})

		it('handles fewer than two values', () => {
			expect(lerpMany(0, 1, 2)).toEqual([])
			expect(lerpMany(1, 1, 2)).toEqual([1])
		})
	})

	describe('arcPoints', () => {
		it('samples a half circle', () => {
			const points = arcPoints(new Arc({ x: 0, y: 0 }, 10, 0, Math.PI, 3))
			expect(points).toHaveLength(3)
			const expected = [
				{ x: 10, y: 0 },
				{ x: 0, y: 10 },
				{ x: -10, y: 0 },
			]
			points.forEach((p, i) => {
				expect(p.x).toBeCloseTo(expected[i]!.x, 9)
				expect(p.y).toBeCloseTo(expected[i]!.y, 9)
			})
		})

		it('returns exactly `detail` points from start to end', () => {
			const a = new Arc({ x: 1, y: 2 }, 3, 0.25, 2.5, 7)
			const points = arcPoints(a)
			expect(points).toHaveLength(7)
			expect(Math.atan2(points[0]!.y - 2, points[0]!.x - 1)).toBeCloseTo(0.25, 9)
			expect(Math.atan2(points[6]!.y - 2, points[6]!.x - 1)).toBeCloseTo(2.5, 9)
		})

		it('is a pure function of the arc', () => {
			const a = new Arc({ x: 0, y: 0 }, 4, 0, 1, 9)
			expect(arcPoints(a)).toEqual(arcPoints(a))
		})

		it('keeps the fields of point-like centers', () => {
			const points = arcPoints(new Arc({ x: 0, y: 0, tag: 'ink' }, 1, 0, 1, 2))
			expect(points.map((p) => p.tag)).toEqual(['ink', 'ink'])
		})

		it('uses the default detail for arc()', () => {
			const a = arc({ x: 0, y: 0 }, 1, 0, Math.PI)
			expect(a.detail).toBe(DEFAULT_ARC_DETAIL)
			expect(arcPoints(a)).toHaveLength(100)
		})
	})

	describe('Arc', () => {
		it('becomes a path when transformed', () => {
			const result = new Arc({ x: 0, y: 0 }, 10, 0, Math.PI, 3).transformed(translation({ x: 5, y: 5 }))
			expect(result).toBeInstanceOf(Path)
			expect(result?.kind).toBe('path')
			const points = result?.points ?? []
			expect(points).toHaveLength(3)
			expect(points[0]!.x).toBeCloseTo(15, 9)
			expect(points[0]!.y).toBeCloseTo(5, 9)
			expect(points[2]!.x).toBeCloseTo(-5, 9)
			expect(points[2]!.y).toBeCloseTo(5, 9)
		})

		it('becomes a path even under the identity', () => {
			const result = arc({ x: 0, y: 0 }, 1, 0, 1).transformed(identity)
			expect(result).toBeInstanceOf(Path)
			expect(result).not.toBeInstanceOf(Arc)
		})

		it('degrades to undefined below two samples', () => {
			expect(new Arc({ x: 0, y: 0 }, 1, 0, 1, 1).transformed(shearX(2))).toBeUndefined()
			expect(new Arc({ x: 0, y: 0 }, 1, 0, 1, 0).transformed(identity)).toBeUndefined()
		})

		it('keeps point fields through the transform', () => {
			const result = new Arc({ x: 0, y: 0, weight: 2 }, 1, 0, 1, 4).transformed(scalar({ x: 2, y: 3 }))
			expect(result?.points.every((p) => p.weight === 2)).toBe(true)
		})

		it('supports the applied helpers', () => {
			const result = rotated(new Arc({ x: 0, y: 0 }, 1, 0, Math.PI, 2), Math.PI / 2)
			expect(result?.points[0]!.x).toBeCloseTo(0, 9)
			expect(result?.points[0]!.y).toBeCloseTo(1, 9)
		})

		it('validates its parameters', () => {
			expect(() => new Arc({ x: 0, y: 0 }, -1, 0, 1)).toThrow('Arc radius must be a finite number >= 0, got -1')
			expect(() => new Arc({ x: 0, y: 0 }, 1, 0, 1, 1.5)).toThrow(RangeError)
			expect(() => new Arc({ x: 0, y: 0 }, 1, Number.NaN, 1)).toThrow(RangeError)
		})

		it('renders as a circular arc', () => {
			const s = createSurface(12, 12)
			new Arc({ x: 5, y: 5 }, 4, 0, Math.PI / 2).renderInto(s, { stroke: { color: RED } })
			expect(getPixel(s, 9, 5)).toEqual(RED)
			expect(getPixel(s, 5, 9)).toEqual(RED)
		})
	})

	describe('paths and polygons', () => {
		it('requires enough points', () => {
			expect(path([])).toBeUndefined()
			expect(path([{ x: 0, y: 0 }])).toBeUndefined()
			expect(
				polygon([
					{ x: 0, y: 0 },
					{ x: 1, y: 0 },
				])
			).toBeUndefined()
			expect(() => new Path([{ x: 0, y: 0 }])).toThrow('A path needs at least 2 points, got 1')
		})

		it('keep their own copy of the points', () => {
			const points = [
				{ x: 0, y: 0 },
				{ x: 1, y: 0 },
				{ x: 0, y: 1 },
			]
			const p = new Path(points)
			const q = new Polygon(points)
			points.length = 0
			expect(p.points).toHaveLength(3)
			expect(q.points).toHaveLength(3)
		})

		it('map to their own type', () => {
			const p = new Path([
				{ x: 0, y: 0 },
				{ x: 1, y: 1 },
			]).transformed(scalar({ x: 2, y: 2 }))
			expect(p).toBeInstanceOf(Path)
			expect(p.points).toEqual([
				{ x: 0, y: 0 },
				{ x: 2, y: 2 },
			])

			const q = new Polygon([
				{ x: 0, y: 0 },
				{ x: 1, y: 0 },
				{ x: 0, y: 1 },
			]).transformed(translation({ x: 1, y: 1 }))
			expect(q).toBeInstanceOf(Polygon)
			expect(q.points).toEqual([
				{ x: 1, y: 1 },
				{ x: 2, y: 1 },
				{ x: 1, y: 2 },
			])
		})
	})

	describe('Rect', () => {
		it('becomes a polygon when transformed', () => {
			const result = shearedX(new Rect(0, 0, 2, 1), 1)
			expect(result).toBeInstanceOf(Polygon)
			expect(result.points).toEqual([
				{ x: 0, y: 0 },
				{ x: 2, y: 0 },
				{ x: 3, y: 1 },
				{ x: 1, y: 1 },
			])
		})

		it('fills without stroking when given only a fill', () => {
			const s = createSurface(5, 5)
			new Rect(1, 1, 2, 2).renderInto(s, { fill: { color: RED } })
			expect(getPixel(s, 1, 1)).toEqual(RED)
			expect(getPixel(s, 2, 2)).toEqual(RED)
			expect(getPixel(s, 3, 3)).toEqual([0, 0, 0, 0])
		})
	})

	describe('Dot', () => {
		it('moves its center and keeps its radius', () => {
			const d = new Dot({ x: 1, y: 1 }, 3).transformed(translation({ x: 1, y: 2 }))
			expect(d).toBeInstanceOf(Dot)
			expect(d.center).toEqual({ x: 2, y: 3 })
			expect(d.radius).toBe(3)
		})

		it('renders a small disc', () => {
			const s = createSurface(10, 10)
			renderAll(s, [new Dot({ x: 5, y: 5 })])
			expect(getPixel(s, 5, 6)).toEqual([0, 0, 0, 255])
			expect(getPixel(s, 6, 6)).toEqual([0, 0, 0, 0])
		})
	})
})
