/**
 * Render options and their defaults
 */

import { isSeed } from './seed'

export interface RenderOptions {
	/** Seed for every trial; a fresh time-based seed per trial when unset */
	seed?: bigint
	/** Scale applied to user space to produce the final image */
	scale: number
	/** Width in user space */
	width: number
	/** Height in user space */
	height: number
	/** How many trials to run, one after another */
	renderTimes: number
	/** Images are stored under `images/<name>/` */
	name: string
	/** Appended to the image file name, useful for tagging */
	metadata?: string
	/** Frames per second for callers that redraw */
	fps: number
	/** Directory that holds `images/` */
	outputDir: string
	/** Suppress progress output */
	quiet: boolean
}

export const defaultRenderOptions: Readonly<RenderOptions> = Object.freeze({
	scale: 1,
	width: 100,
	height: 100,
	renderTimes: 1,
	name: 'sketch',
	fps: 30,
	outputDir: '.',
	quiet: false,
})

function isPositiveInteger(value: number): boolean {
	return Number.isInteger(value) && value > 0
}

function hasPathSeparator(value: string): boolean {
	return value.includes('/') || value.includes('\\')
}

export function validateOptions(options: RenderOptions): void {
	if (options.seed !== undefined && !isSeed(options.seed)) {
		throw new RangeError(`Seed must be an unsigned 64-bit integer, got ${options.seed}`)
	}
	if (!Number.isFinite(options.scale) || options.scale <= 0) {
		throw new RangeError(`Scale must be a positive number, got ${options.scale}`)
	}
	for (const key of ['width', 'height', 'renderTimes', 'fps'] as const) {
		if (!isPositiveInteger(options[key])) {
			throw new RangeError(`${key} must be a positive integer, got ${options[key]}`)
		}
	}
	if (options.name === '' || options.name === '.' || options.name === '..' || hasPathSeparator(options.name)) {
		throw new RangeError(`Name must be a plain directory name, got "${options.name}"`)
	}
	if (options.metadata !== undefined && hasPathSeparator(options.metadata)) {
		throw new RangeError(`Metadata must not contain path separators, got "${options.metadata}"`)
	}
}

/**
 * Fill in defaults and validate
 */
export function resolveOptions(input: Partial<RenderOptions> = {}): RenderOptions {
	const options: RenderOptions = {
		seed: input.seed,
		scale: input.scale ?? defaultRenderOptions.scale,
		width: input.width ?? defaultRenderOptions.width,
		height: input.height ?? defaultRenderOptions.height,
		renderTimes: input.renderTimes ?? defaultRenderOptions.renderTimes,
		name: input.name ?? defaultRenderOptions.name,
		metadata: input.metadata,
		fps: input.fps ?? defaultRenderOptions.fps,
		outputDir: input.outputDir ?? defaultRenderOptions.outputDir,
		quiet: input.quiet ?? defaultRenderOptions.quiet,
	}
	validateOptions(options)
	return options
}

/** Round to the nearest integer, halves to the even neighbour */
export function roundHalfEven(value: number): number {
	const rounded = Math.round(value)
	return Math.abs(value % 1) === 0.5 && rounded % 2 !== 0 ? rounded - 1 : rounded
}

/**
 * Physical pixel size: user-space size times the scale, rounded half to even
 */
export function physicalSize(options: Pick<RenderOptions, 'width' | 'height' | 'scale'>): {
	width: number
	height: number
} {
	const width = roundHalfEven(options.width * options.scale)
	const height = roundHalfEven(options.height * options.scale)
	if (width < 1 || height < 1) {
		throw new Error(
			`Output image would be ${width}x${height} pixels (${options.width}x${options.height} at scale ${options.scale})`
		)
	}
	return { width, height }
}
