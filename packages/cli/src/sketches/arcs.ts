/**
 * Demo: random arcs next to their sheared images, framed before saving
 */

import type { Color } from '@seedsketch/core'
import { Arc, type Path, rect } from '@seedsketch/geometry'
import type { RenderContext } from '@seedsketch/render'
import { shear } from '@seedsketch/transform'

const INK: Color = [24, 24, 32, 255]
const ACCENT: Color = [200, 64, 48, 200]
const FRAME: Color = [0, 0, 0, 255]

export function arcsSketch(ctx: RenderContext): void {
	const { random, surface, width, height } = ctx
	const count = random.int(8, 24)
	const images: Path[] = []

	for (let i = 0; i < count; i++) {
		const center = { x: random.uniform(0, width), y: random.uniform(0, height) }
		const radius = random.uniform(2, Math.min(width, height) / 4)
		const start = random.uniform(0, 2 * Math.PI)
		const sweep = random.uniform(Math.PI / 4, 2 * Math.PI)
		const shape = new Arc(center, radius, start, start + sweep, random.int(8, 64))

		shape.renderInto(surface, { stroke: { color: INK, width: 0.5 } })

		const image = shape.transformed(shear({ x: random.normal(0, 0.3), y: random.normal(0, 0.3) }))
		if (image) images.push(image)

		ctx.setProgress((i + 1) / count)
	}

	for (const image of images) {
		image.renderInto(surface, { stroke: { color: ACCENT, width: 0.25 } })
	}

	ctx.onBeforeSave(() => {
		const frame = rect(1, 1, Math.max(0, width - 2), Math.max(0, height - 2))
		frame.renderInto(surface, { stroke: { color: FRAME, width: 1 } })
	})
}
