/**
 * Static render pipeline: seed -> surface -> sketch -> hook -> PNG files
 */

import { createSurface, scaleSurface } from '@seedsketch/draw'
import { RenderContext, type Sketch } from './context'
import { log } from './log'
import { type RenderOptions, physicalSize, resolveOptions } from './options'
import { type OutputPaths, encodeSurface, ensureOutputDirs, outputPaths, writeFileAtomic } from './output'
import { Random } from './random'
import { resolveSeed } from './seed'
import { createVideoState } from './video'

export interface TrialResult {
	seed: bigint
	scale: number
	/** Physical width in pixels */
	width: number
	/** Physical height in pixels */
	height: number
	/** Path of `<seed>-<scale><metadata>.png` */
	image: string
	/** Path of `latest.png` */
	latest: string
}

/**
 * Run `renderTimes` trials one after another. The first failure aborts the
 * remaining trials.
 */
export async function renderStatic(options: Partial<RenderOptions>, sketch: Sketch): Promise<TrialResult[]> {
	const resolved = resolveOptions(options)
	const results: TrialResult[] = []

	for (let trial = 0; trial < resolved.renderTimes; trial++) {
		results.push(await runStaticTrial(resolved, sketch))
	}

	return results
}

async function runStaticTrial(options: RenderOptions, sketch: Sketch): Promise<TrialResult> {
	const seed = resolveSeed(options.seed)
	const { width, height } = physicalSize(options)
	const surface = createSurface(width, height)
	const paths = outputPaths(options.outputDir, options.name, seed, options.scale, options.metadata)
	await ensureOutputDirs(paths)

	const ctx = new RenderContext({
		width: options.width,
		height: options.height,
		seed,
		scale: options.scale,
		name: options.name,
		surface,
		video: createVideoState(options.fps),
		random: new Random(seed),
	})

	try {
		scaleSurface(surface, options.scale)
		await sketch(ctx)
		await ctx.runBeforeSave()
		await persist(ctx, paths, options)
	} finally {
		ctx.close()
	}

	return { seed, scale: options.scale, width, height, image: paths.image, latest: paths.latest }
}

/**
 * Encode once, then write the seeded file and `latest.png`
 */
export async function persist(ctx: RenderContext, paths: OutputPaths, options: RenderOptions): Promise<void> {
	log(options, 'Generating art...')
	const png = encodeSurface(ctx.surface, ctx.seed, ctx.scale)

	log(options, `Writing ${paths.image}`)
	log(options, `Writing ${paths.latest}`)
	await writeFileAtomic(paths.image, png)
	await writeFileAtomic(paths.latest, png)
}
