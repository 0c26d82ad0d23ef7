/**
 * Entry point shared by sketch scripts
 */

import { type RenderOptions, type Sketch, type TrialResult, renderInteractive, renderStatic } from '@seedsketch/render'
import { TerminalWindowService, type WindowService } from '@seedsketch/window'
import { HELP, VERSION, parseArgs } from './args'

export type OptionsModifier = (options: Partial<RenderOptions>) => Partial<RenderOptions>

export interface RunSketchOptions {
	/** Arguments without the node and script paths (default: process.argv.slice(2)) */
	argv?: readonly string[]
	/** Adjust the parsed options before rendering */
	modify?: OptionsModifier
	/** Window backend for --interactive (default: the terminal) */
	windows?: WindowService
	/** Milliseconds between window event polls */
	pollInterval?: number
}

/**
 * Parse arguments, then render statically or in windows.
 * In interactive mode this resolves once every window has been closed.
 */
export async function runSketch(sketch: Sketch, run: RunSketchOptions = {}): Promise<TrialResult[]> {
	const args = parseArgs(run.argv ?? process.argv.slice(2))

	if (args.help) {
		console.log(HELP)
		return []
	}

	if (args.version) {
		console.log(`seedsketch v${VERSION}`)
		return []
	}

	const options = run.modify ? run.modify(args.options) : args.options

	if (!args.interactive) {
		return renderStatic(options, sketch)
	}

	const windows = run.windows ?? new TerminalWindowService()
	const { trials, idle } = await renderInteractive(options, sketch, windows, { pollInterval: run.pollInterval })
	await idle
	return trials
}
