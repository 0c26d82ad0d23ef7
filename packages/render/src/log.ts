export interface LogOptions {
	quiet: boolean
}

export function log(options: LogOptions, message: string): void {
	if (!options.quiet) {
		console.log(message)
	}
}
