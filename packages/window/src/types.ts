/**
 * Window service contract
 */

import type { Color, ImageData } from '@seedsketch/core'

export type WindowEvent =
	| { readonly type: 'quit' }
	| { readonly type: 'key'; readonly key: string }

export interface WindowOptions {
	title: string
	/** Physical width in pixels */
	width: number
	/** Physical height in pixels */
	height: number
}

/**
 * A live display with a directly writable pixel buffer.
 * Drawing into `pixels` changes what the next `present()` shows.
 */
export interface Window {
	readonly width: number
	readonly height: number
	/** RGBA backing buffer of the display */
	readonly pixels: ImageData
	fill(color: Color): void
	/** Push the pixel buffer to the display */
	present(): void | Promise<void>
	/** Drain the queued input events */
	pollEvents(): WindowEvent[] | Promise<WindowEvent[]>
	close(): void | Promise<void>
}

export interface WindowService {
	open(options: WindowOptions): Promise<Window>
}
