/**
 * Multi-bar progress display for concurrent downloads (cli-progress)
 *
 * Driven by the engine's download events: one overall bar counting finished
 * packages, plus one bar per transfer that has received bytes.
 */

import cliProgress from "cli-progress"
import chalk from "chalk"
import { formatBytes, formatEta } from "./format.js"

export interface ProgressTracker {
	/** A transfer entered the requesting phase */
	start(name: string): void
	/** Bytes arrived; `total` is null when the size is unknown */
	update(name: string, received: number, total: number | null): void
	complete(name: string, success: boolean): void
	stop(): void
}

interface BarPayload {
	label: string
	transfer: string
}

interface TransferBar {
	bar: cliProgress.SingleBar | null
	startTime: number
}

const LABEL_WIDTH = 32

function fitLabel(label: string): string {
	return label.length > LABEL_WIDTH
		? label.slice(0, LABEL_WIDTH - 3) + "..."
		: label.padEnd(LABEL_WIDTH)
}

/**
 * Byte count, speed and, when the total is known, time remaining
 */
export function transferText(
	received: number,
	total: number | null,
	startTime: number,
	now: number = Date.now(),
): string {
	const elapsed = (now - startTime) / 1000
	const speed = elapsed > 0 ? received / elapsed : 0
	const size = total ? `${formatBytes(received)}/${formatBytes(total)}` : formatBytes(received)
	if (speed <= 0) return size

	const rate = chalk.cyan(`${formatBytes(speed)}/s`)
	if (!total || received >= total) return `${size} ${rate}`
	const eta = formatEta((total - received) / speed)
	return `${size} ${rate} ${chalk.gray(`ETA ${eta}`)}`
}

const NOOP_TRACKER: ProgressTracker = {
	start: () => {},
	update: () => {},
	complete: () => {},
	stop: () => {},
}

/**
 * Create a tracker for `expected` downloads. Quiet mode returns a no-op.
 */
export function createProgressTracker(
	label: string,
	expected: number,
	quiet: boolean = false,
): ProgressTracker {
	if (quiet) return NOOP_TRACKER

	const multibar = new cliProgress.MultiBar(
		{
			clearOnComplete: true,
			hideCursor: true,
			// 10 Hz matches the coordinator's default progress interval
			fps: 10,
			format: `{label} {bar} ${chalk.yellow("{percentage}%")} {transfer}`,
			barsize: 30,
		},
		cliProgress.Presets.shades_grey,
	)

	const overallPayload = (done: number, failed: number): BarPayload => ({
		label: chalk.bold(fitLabel(label)),
		transfer:
			`${done}/${expected} packages` +
			(failed > 0 ? chalk.red(` (${failed} failed)`) : ""),
	})

	const overall = multibar.create(Math.max(expected, 1), 0, overallPayload(0, 0))
	const transfers = new Map<string, TransferBar>()
	let done = 0
	let failed = 0

	return {
		start(name) {
			if (!transfers.has(name)) {
				transfers.set(name, { bar: null, startTime: Date.now() })
			}
		},

		update(name, received, total) {
			const transfer = transfers.get(name)
			if (!transfer) return

			const payload: BarPayload = {
				label: chalk.gray(fitLabel(name)),
				transfer: transferText(received, total, transfer.startTime),
			}
			// Unknown totals show a full bar with the running byte count
			const barTotal = total ?? Math.max(received, 1)

			// Bars are created lazily so quick failures never flash a 0% bar
			if (!transfer.bar) {
				if (received === 0) return
				transfer.bar = multibar.create(barTotal, received, payload)
				return
			}
			transfer.bar.setTotal(barTotal)
			transfer.bar.update(received, payload)
		},

		complete(name, success) {
			const transfer = transfers.get(name)
			if (transfer?.bar) multibar.remove(transfer.bar)
			transfers.delete(name)

			done++
			if (!success) failed++
			overall.update(done, overallPayload(done, failed))
		},

		stop() {
			multibar.stop()
		},
	}
}
