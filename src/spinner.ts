/**
 * Spinner handling for long-running CLI steps
 *
 * While an ora spinner is active, every line of output goes through
 * spinnerSafeLog() so it does not get overwritten by the spinner frame.
 */

import ora, { type Ora } from "ora"
import { log } from "./logger.js"

let activeSpinner: Ora | null = null

// Serializes log operations so concurrent downloads do not interleave stop/start
let logLock = Promise.resolve()

/**
 * Print a line, pausing the active spinner around it.
 */
export function spinnerSafeLog(message: string): void {
	log.cli.debug(message)

	const spinner = activeSpinner
	if (!spinner) {
		console.log(message)
		return
	}

	logLock = logLock.then(
		() =>
			new Promise<void>(resolve => {
				const text = spinner.text
				spinner.stop()
				console.log(message)
				if (activeSpinner === spinner) spinner.start(text)
				// Let the terminal render before the next frame
				setImmediate(resolve)
			}),
	)
}

/** Wait for queued spinner-safe output to be written */
export function drainSpinnerLog(): Promise<void> {
	return logLock
}

/**
 * Start a spinner for a single operation. Returns null in quiet mode.
 */
export function createSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet) return null
	const spinner = ora(text).start()
	activeSpinner = spinner
	return spinner
}

/** Forget the active spinner once it has been stopped */
export function releaseSpinner(spinner: Ora | null): void {
	if (spinner && activeSpinner === spinner) activeSpinner = null
}
