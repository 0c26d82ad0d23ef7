#!/usr/bin/env -S node --import tsx
/**
 * seedsketch CLI - renders the bundled arcs sketch
 */

import { HELP, UsageError } from './args'
import { runSketch } from './run'
import { arcsSketch } from './sketches/arcs'

async function main(): Promise<void> {
	await runSketch(arcsSketch)
}

main().catch((err: unknown) => {
	if (err instanceof UsageError) {
		console.error(`Error: ${err.message}`)
		console.error(HELP)
	} else {
		console.error('Fatal error:', err)
	}
	process.exit(1)
})
