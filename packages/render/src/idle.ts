/**
 * Idle loop that keeps a window responsive until it is asked to quit
 */

import { setTimeout as sleep } from 'node:timers/promises'
import type { Window } from '@seedsketch/window'

export const DEFAULT_POLL_INTERVAL = 16

export interface IdleOptions {
	/** Milliseconds between event polls */
	pollInterval?: number
	/** Stops the loop from outside, e.g. when a later trial fails */
	signal?: AbortSignal
}

/**
 * Poll `window` until a quit event arrives, then close it
 */
export async function idleUntilQuit(window: Window, options: IdleOptions = {}): Promise<void> {
	const pollInterval = options.pollInterval ?? DEFAULT_POLL_INTERVAL
	try {
		while (!options.signal?.aborted) {
			const events = await window.pollEvents()
			if (events.some((event) => event.type === 'quit')) return
			await sleep(pollInterval)
		}
	} finally {
		await window.close()
	}
}
