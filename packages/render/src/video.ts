/**
 * Frame pacing for callers that redraw repeatedly.
 * The pipeline only carries this state; it never waits on it.
 */

import { setTimeout as sleep } from 'node:timers/promises'

export interface VideoState {
	readonly fps: number
	/** Time of the last frame, in `performance.now()` milliseconds */
	lastFrameTimestamp: number
}

export function createVideoState(fps: number): VideoState {
	return { fps, lastFrameTimestamp: 0 }
}

/** Minimum milliseconds between two frames */
export function frameInterval(video: VideoState): number {
	return 1000 / video.fps
}

export function isFrameDue(video: VideoState, now: number = performance.now()): boolean {
	return now - video.lastFrameTimestamp >= frameInterval(video)
}

export function markFrame(video: VideoState, now: number = performance.now()): void {
	video.lastFrameTimestamp = now
}

/**
 * Wait until a frame is due, then mark it
 */
export async function waitForNextFrame(
	video: VideoState,
	now: () => number = () => performance.now()
): Promise<void> {
	const wait = video.lastFrameTimestamp + frameInterval(video) - now()
	if (wait > 0) {
		await sleep(wait)
	}
	markFrame(video, now())
}
