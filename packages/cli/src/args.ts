/**
 * Command-line arguments
 */

import { type RenderOptions, parseSeed } from '@seedsketch/render'

export const VERSION = '0.1.0'

export const HELP = `
seedsketch - Seeded generative art renderer

USAGE:
  seedsketch [options]

OPTIONS:
  --seed <u64>          Seed for every trial (default: current time in ms)
  --scale <float>       Scale from user space to pixels (default: 1)
  -w, --width <int>     Width in user space (default: 100)
  -h, --height <int>    Height in user space (default: 100)
  --times <int>         Number of trials (default: 1)
  --name <string>       Output directory under images/ (default: sketch)
  --metadata <string>   Suffix appended to the image file name
  --fps <int>           Frames per second (default: 30)
  -i, --interactive     Show each render in the terminal until q is pressed
  --quiet               Suppress output
  --help                Show this help
  --version             Show version

EXAMPLES:
  seedsketch --seed 42                 # Render images/sketch/42-1.0.png
  seedsketch --scale 4 --times 3       # Three large trials, fresh seeds
  seedsketch --name arcs -i            # Preview in the terminal
`

/** Bad command-line input; reported with the help text */
export class UsageError extends Error {
	override readonly name = 'UsageError'
}

export interface CliArgs {
	options: Partial<RenderOptions>
	interactive: boolean
	help: boolean
	version: boolean
}

function parseInteger(flag: string, value: string): number {
	if (!/^\d+$/.test(value)) {
		throw new UsageError(`${flag} expects a positive integer, got "${value}"`)
	}
	const n = parseInt(value, 10)
	if (n <= 0) {
		throw new UsageError(`${flag} expects a positive integer, got "${value}"`)
	}
	return n
}

function parseScale(value: string): number {
	const n = Number(value)
	if (value.trim() === '' || !Number.isFinite(n) || n <= 0) {
		throw new UsageError(`--scale expects a positive number, got "${value}"`)
	}
	return n
}

function parseName(flag: string, value: string): string {
	if (value.includes('/') || value.includes('\\')) {
		throw new UsageError(`${flag} must not contain path separators, got "${value}"`)
	}
	return value
}

export function parseArgs(args: readonly string[]): CliArgs {
	const parsed: CliArgs = { options: {}, interactive: false, help: false, version: false }
	const options = parsed.options

	let i = 0
	const value = (flag: string): string => {
		const next = args[i + 1]
		if (next === undefined) {
			throw new UsageError(`${flag} requires a value`)
		}
		i++
		return next
	}

	while (i < args.length) {
		const arg = args[i]!

		if (arg === '--help' || arg === '-?') {
			parsed.help = true
		} else if (arg === '--version' || arg === '-V') {
			parsed.version = true
		} else if (arg === '--interactive' || arg === '-i') {
			parsed.interactive = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--seed') {
			const text = value(arg)
			try {
				options.seed = parseSeed(text)
			} catch (err) {
				throw new UsageError(err instanceof Error ? err.message : String(err), { cause: err })
			}
		} else if (arg === '--scale') {
			options.scale = parseScale(value(arg))
		} else if (arg === '--width' || arg === '-w') {
			options.width = parseInteger(arg, value(arg))
		} else if (arg === '--height' || arg === '-h') {
			options.height = parseInteger(arg, value(arg))
		} else if (arg === '--times') {
			options.renderTimes = parseInteger(arg, value(arg))
		} else if (arg === '--fps') {
			options.fps = parseInteger(arg, value(arg))
		} else if (arg === '--name') {
			const name = parseName(arg, value(arg))
			if (name === '' || name === '.' || name === '..') {
				throw new UsageError(`--name must be a plain directory name, got "${name}"`)
			}
			options.name = name
		} else if (arg === '--metadata') {
			options.metadata = parseName(arg, value(arg))
		} else {
			throw new UsageError(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`)
		}

		i++
	}

	return parsed
}
