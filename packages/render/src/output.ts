/**
 * Output layout and persistence
 *
 * images/<name>/<seed>-<scale><metadata>.png
 * images/<name>/latest.png
 * images/<name>/progress/
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { encodePng } from '@seedsketch/codecs'
import type { Surface } from '@seedsketch/draw'

export interface OutputPaths {
	root: string
	dir: string
	progress: string
	image: string
	latest: string
}

/**
 * Decimal form in [0.1, 1e7) with at least one decimal (`1` -> `1.0`,
 * `0.5` -> `0.5`); scientific form outside it (`0.05` -> `5.0e-2`)
 */
export function formatScale(scale: number): string {
	if (scale >= 0.1 && scale < 1e7) {
		return Number.isInteger(scale) ? scale.toFixed(1) : String(scale)
	}
	const text = scale.toExponential()
	const at = text.indexOf('e')
	const digits = text.slice(0, at)
	const exponent = Number(text.slice(at + 1))
	return `${digits.includes('.') ? digits : `${digits}.0`}e${exponent}`
}

export function outputPaths(
	outputDir: string,
	name: string,
	seed: bigint,
	scale: number,
	metadata = ''
): OutputPaths {
	const root = join(outputDir, 'images')
	const dir = join(root, name)
	return {
		root,
		dir,
		progress: join(dir, 'progress'),
		image: join(dir, `${seed}-${formatScale(scale)}${metadata}.png`),
		latest: join(dir, 'latest.png'),
	}
}

export async function ensureOutputDirs(paths: OutputPaths): Promise<void> {
	for (const dir of [paths.root, paths.dir, paths.progress]) {
		try {
			await mkdir(dir, { recursive: true })
		} catch (err) {
			throw new Error(`Failed to create output directory ${dir}`, { cause: err })
		}
	}
}

/**
 * Write to a temporary file beside `path`, then rename it into place
 */
export async function writeFileAtomic(path: string, data: Uint8Array): Promise<void> {
	const tmp = `${path}.${process.pid}.tmp`
	try {
		await writeFile(tmp, data)
		await rename(tmp, path)
	} catch (err) {
		await rm(tmp, { force: true })
		throw new Error(`Failed to write ${path}`, { cause: err })
	}
}

export function encodeSurface(surface: Surface, seed: bigint, scale: number): Uint8Array {
	return encodePng(surface.image, {
		colorType: surface.format,
		text: { Seed: seed.toString(), Scale: formatScale(scale) },
	})
}
