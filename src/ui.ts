/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import { formatBytes, formatEntrySize } from "./format.js"
import { spinnerSafeLog } from "./spinner.js"
import type { DownloadOutcome, EntryView } from "./types.js"

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Banner for startup */
	banner(version: string, catalogUrl: string, jobs: number): void {
		console.log(chalk.bold("Asset Catalog Sync") + ` v${version}`)
		console.log(`Catalog: ${chalk.cyan(catalogUrl)}`)
		console.log(`Jobs: ${chalk.cyan(String(jobs))} parallel downloads`)
		console.log()
	},

	/** One catalog entry, as shown by `list` */
	entry(view: EntryView, showPreview: boolean): void {
		const { entry } = view
		const version = entry.version ? chalk.gray(` v${entry.version}`) : ""
		const category = entry.category ? chalk.magenta(` [${entry.category}]`) : ""
		console.log(`${chalk.bold(entry.name)}${version}${category}`)
		if (entry.description) {
			console.log(`  ${entry.description}`)
		}
		console.log(chalk.gray(`  Size: ${formatEntrySize(view.fileSize)}`))
		if (showPreview && entry.imageUrl) {
			const preview = view.preview
				? `${view.preview.format}, ${formatBytes(view.preview.bytes.length)}`
				: "unavailable"
			console.log(chalk.gray(`  Preview: ${preview}`))
		}
	},

	/** Result line for one finished download */
	outcome(name: string, outcome: DownloadOutcome): void {
		switch (outcome.kind) {
			case "succeeded":
				ui.success(`${name} ${chalk.gray(`(${formatBytes(outcome.bytes)})`)}`)
				break
			case "import-failed":
				ui.warn(`${name}: downloaded but import failed: ${outcome.error.message}`)
				break
			case "skipped":
				ui.info(`${name}: skipped (${outcome.reason})`)
				break
			case "failed":
			case "timed-out":
			case "cancelled":
				ui.error(`${name}: ${outcome.error.message}`)
				break
		}
	},

	/** Format a list of results for summary */
	summarySection(title: string, items: string[], color: "green" | "red"): void {
		if (items.length === 0) return
		const colorFn = color === "green" ? chalk.green : chalk.red
		const symbol = color === "green" ? "✓" : "✗"
		console.log(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ${symbol} ${item}`)
		}
	},

	/** Final status line */
	finalStatus(allSuccess: boolean): void {
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ All operations completed successfully!"))
		} else {
			console.log(
				chalk.yellow.bold("⚠ Some operations failed. See above for details."),
			)
		}
		console.log()
	},
}
