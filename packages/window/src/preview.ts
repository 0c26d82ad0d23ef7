/**
 * ANSI preview of a pixel buffer: each text cell is an upper half block
 * whose foreground is one pixel row and background the row below it.
 */

import type { ImageData } from '@seedsketch/core'

const UPPER_HALF = '▀'
const RESET = '\x1b[0m'

function rgbAt(image: ImageData, x: number, y: number): string {
	const idx = (y * image.width + x) * 4
	return `${image.data[idx]!};${image.data[idx + 1]!};${image.data[idx + 2]!}`
}

/**
 * Nearest-neighbour downsample of `image` to at most `maxColumns` cells wide,
 * keeping the aspect ratio. Returns one string per text row.
 */
export function renderPreview(image: ImageData, maxColumns: number): string[] {
	const columns = Math.max(1, Math.min(image.width, Math.floor(maxColumns)))
	const step = image.width / columns
	const pixelRows = Math.max(1, Math.round(image.height / step))
	const lines: string[] = []

	for (let row = 0; row < pixelRows; row += 2) {
		const top = Math.floor((row * image.height) / pixelRows)
		const bottom = row + 1 < pixelRows ? Math.floor(((row + 1) * image.height) / pixelRows) : -1
		let line = ''

		for (let col = 0; col < columns; col++) {
			const x = Math.floor(col * step)
			line += `\x1b[38;2;${rgbAt(image, x, top)}m`
			line += bottom < 0 ? '\x1b[49m' : `\x1b[48;2;${rgbAt(image, x, bottom)}m`
			line += UPPER_HALF
		}

		lines.push(line + RESET)
	}

	return lines
}
