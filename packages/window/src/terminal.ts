/**
 * Terminal-backed windows: the display is an ANSI preview, input comes from
 * key presses on the input stream
 */

import { emitKeypressEvents } from 'node:readline'
import { type Color, type ImageData, createImageData } from '@seedsketch/core'
import { renderPreview } from './preview'
import type { Window, WindowEvent, WindowOptions, WindowService } from './types'

export type TerminalInput = NodeJS.ReadableStream & {
	isTTY?: boolean
	setRawMode?: (mode: boolean) => unknown
}

export interface TerminalOutput {
	columns?: number
	write(chunk: string): unknown
}

/** Key description emitted with `keypress` events */
interface Keypress {
	name?: string
	ctrl?: boolean
}

export interface TerminalWindowOptions {
	input?: TerminalInput
	output?: TerminalOutput
	/** Refuse to open unless the input is a TTY (default: true) */
	requireTty?: boolean
	/** Also treat SIGINT as a quit event (default: true) */
	handleSigint?: boolean
}

const CLEAR_SCREEN = '\x1b[H\x1b[2J'

function toEvent(str: string | undefined, key: Keypress | undefined): WindowEvent {
	const name = key?.name ?? str ?? ''
	if ((key?.ctrl && name === 'c') || name === 'q' || name === 'escape') {
		return { type: 'quit' }
	}
	return { type: 'key', key: name }
}

class TerminalWindow implements Window {
	readonly pixels: ImageData
	private readonly queue: WindowEvent[] = []
	private closed = false

	private readonly onKeypress = (str: string | undefined, key: Keypress | undefined): void => {
		this.queue.push(toEvent(str, key))
	}

	private readonly onSigint = (): void => {
		this.queue.push({ type: 'quit' })
	}

	constructor(
		private readonly title: string,
		private readonly input: TerminalInput,
		private readonly output: TerminalOutput,
		private readonly handleSigint: boolean,
		width: number,
		height: number
	) {
		this.pixels = createImageData(width, height)
	}

	get width(): number {
		return this.pixels.width
	}

	get height(): number {
		return this.pixels.height
	}

	attach(): void {
		emitKeypressEvents(this.input)
		if (this.input.isTTY && this.input.setRawMode) {
			this.input.setRawMode(true)
		}
		this.input.on('keypress', this.onKeypress)
		this.input.resume()
		if (this.handleSigint) {
			process.on('SIGINT', this.onSigint)
		}
	}

	fill(color: Color): void {
		const [r, g, b, a] = color
		const data = this.pixels.data
		for (let i = 0; i < data.length; i += 4) {
			data[i] = r
			data[i + 1] = g
			data[i + 2] = b
			data[i + 3] = a
		}
	}

	present(): void {
		if (this.closed) {
			throw new Error(`Window "${this.title}" is closed`)
		}
		const preview = renderPreview(this.pixels, this.output.columns ?? 80)
		this.output.write(`${CLEAR_SCREEN}${this.title} (${this.width}x${this.height}) - press q to quit\n`)
		this.output.write(`${preview.join('\n')}\n`)
	}

	pollEvents(): WindowEvent[] {
		return this.queue.splice(0, this.queue.length)
	}

	close(): void {
		if (this.closed) return
		this.closed = true
		this.input.removeListener('keypress', this.onKeypress)
		if (this.handleSigint) {
			process.removeListener('SIGINT', this.onSigint)
		}
		if (this.input.isTTY && this.input.setRawMode) {
			this.input.setRawMode(false)
		}
		this.input.pause()
		this.output.write('\x1b[0m\n')
	}
}

export class TerminalWindowService implements WindowService {
	private readonly input: TerminalInput
	private readonly output: TerminalOutput
	private readonly requireTty: boolean
	private readonly handleSigint: boolean

	constructor(options: TerminalWindowOptions = {}) {
		this.input = options.input ?? process.stdin
		this.output = options.output ?? process.stdout
		this.requireTty = options.requireTty ?? true
		this.handleSigint = options.handleSigint ?? true
	}

	async open(options: WindowOptions): Promise<Window> {
		if (this.requireTty && !this.input.isTTY) {
			throw new Error('Cannot open a terminal window: input is not a TTY')
		}
		const window = new TerminalWindow(
			options.title,
			this.input,
			this.output,
			this.handleSigint,
			options.width,
			options.height
		)
		window.attach()
		return window
	}
}
