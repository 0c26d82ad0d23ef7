/**
 * Per-trial render state
 */

import type { Surface } from '@seedsketch/draw'
import type { Window } from '@seedsketch/window'
import type { Random } from './random'
import type { VideoState } from './video'

export type BeforeSaveHook = () => void | Promise<void>

/**
 * Drawing logic run once per trial. `ctx.random` is its only source of
 * randomness.
 */
export type Sketch = (ctx: RenderContext) => void | Promise<void>

export interface RenderContextInit {
	width: number
	height: number
	seed: bigint
	scale: number
	name: string
	surface: Surface
	window?: Window
	video: VideoState
	random: Random
}

export class RenderContext {
	/** Width in user space */
	readonly width: number
	/** Height in user space */
	readonly height: number
	readonly seed: bigint
	readonly scale: number
	readonly name: string
	readonly surface: Surface
	readonly window: Window | undefined
	readonly video: VideoState
	readonly random: Random

	private progressValue = 0
	private beforeSave: BeforeSaveHook | undefined
	private hookRegistered = false
	private closed = false

	constructor(init: RenderContextInit) {
		this.width = init.width
		this.height = init.height
		this.seed = init.seed
		this.scale = init.scale
		this.name = init.name
		this.surface = init.surface
		this.window = init.window
		this.video = init.video
		this.random = init.random
	}

	/** Completion fraction reported by the sketch, in [0, 1] */
	get progress(): number {
		return this.progressValue
	}

	setProgress(value: number): void {
		this.assertOpen()
		if (Number.isNaN(value)) {
			throw new RangeError('Progress must be a number')
		}
		this.progressValue = Math.min(1, Math.max(0, value))
	}

	/**
	 * Register the hook run right before the image is saved. One per trial.
	 */
	onBeforeSave(hook: BeforeSaveHook): void {
		this.assertOpen()
		if (this.hookRegistered) {
			throw new Error('A before-save hook is already registered for this trial')
		}
		this.hookRegistered = true
		this.beforeSave = hook
	}

	/** @internal */
	async runBeforeSave(): Promise<void> {
		this.assertOpen()
		const hook = this.beforeSave
		this.beforeSave = undefined
		if (hook) {
			await hook()
		}
	}

	get isClosed(): boolean {
		return this.closed
	}

	/** @internal */
	close(): void {
		this.closed = true
		this.beforeSave = undefined
	}

	private assertOpen(): void {
		if (this.closed) {
			throw new Error(`Render context for seed ${this.seed} is closed`)
		}
	}
}
