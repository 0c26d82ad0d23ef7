/**
 * Interactive pipeline: render once into a live window, save, then idle
 * until the window is closed
 */

import { WHITE } from '@seedsketch/core'
import { bindSurface, scaleSurface } from '@seedsketch/draw'
import type { Window, WindowService } from '@seedsketch/window'
import { RenderContext, type Sketch } from './context'
import { type IdleOptions, idleUntilQuit } from './idle'
import { log } from './log'
import { type RenderOptions, physicalSize, resolveOptions } from './options'
import { ensureOutputDirs, outputPaths } from './output'
import { type TrialResult, persist } from './pipeline'
import { Random } from './random'
import { resolveSeed } from './seed'
import { createVideoState } from './video'

export interface InteractiveRun {
	trials: TrialResult[]
	/** Settles once every window has seen a quit event */
	idle: Promise<void>
}

type IdleOutcome = { ok: true } | { ok: false; error: unknown }

export async function renderInteractive(
	options: Partial<RenderOptions>,
	sketch: Sketch,
	windows: WindowService,
	idleOptions: Omit<IdleOptions, 'signal'> = {}
): Promise<InteractiveRun> {
	const resolved = resolveOptions(options)
	const controller = new AbortController()
	const trials: TrialResult[] = []
	// Outcomes are collected as they happen so an early idle failure is never unobserved
	const outcomes: Promise<IdleOutcome>[] = []

	try {
		for (let trial = 0; trial < resolved.renderTimes; trial++) {
			const { result, window } = await runInteractiveTrial(resolved, sketch, windows)
			trials.push(result)
			outcomes.push(
				idleUntilQuit(window, { ...idleOptions, signal: controller.signal }).then(
					(): IdleOutcome => ({ ok: true }),
					(error: unknown): IdleOutcome => ({ ok: false, error })
				)
			)
		}
	} catch (err) {
		controller.abort()
		await Promise.all(outcomes)
		throw err
	}

	const idle = Promise.all(outcomes).then((results) => {
		for (const outcome of results) {
			if (!outcome.ok) throw outcome.error
		}
	})

	return { trials, idle }
}

async function openWindow(windows: WindowService, options: RenderOptions, width: number, height: number) {
	try {
		return await windows.open({ title: options.name, width, height })
	} catch (err) {
		throw new Error(`Failed to open a ${width}x${height} window`, { cause: err })
	}
}

async function runInteractiveTrial(
	options: RenderOptions,
	sketch: Sketch,
	windows: WindowService
): Promise<{ result: TrialResult; window: Window }> {
	const seed = resolveSeed(options.seed)
	const { width, height } = physicalSize(options)
	const paths = outputPaths(options.outputDir, options.name, seed, options.scale, options.metadata)
	await ensureOutputDirs(paths)

	const window = await openWindow(windows, options, width, height)
	let ctx: RenderContext | undefined

	try {
		window.fill(WHITE)
		const surface = bindSurface(window.pixels, 'rgb')
		ctx = new RenderContext({
			width: options.width,
			height: options.height,
			seed,
			scale: options.scale,
			name: options.name,
			surface,
			window,
			video: createVideoState(options.fps),
			random: new Random(seed),
		})

		scaleSurface(surface, options.scale)
		await sketch(ctx)
		await ctx.runBeforeSave()
		await window.present()
		await persist(ctx, paths, options)
	} catch (err) {
		await window.close()
		throw err
	} finally {
		ctx?.close()
	}

	log(options, 'Waiting for the window to quit...')
	return { result: { seed, scale: options.scale, width, height, image: paths.image, latest: paths.latest }, window }
}
