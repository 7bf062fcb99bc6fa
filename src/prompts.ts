/**
 * Interactive prompts using the prompts library
 */

import prompts from "prompts"
import { formatEntrySize } from "./format.js"
import type { EntryView } from "./types.js"

function stringValues(value: unknown): string[] {
	if (!Array.isArray(value)) return []
	return value.filter((item): item is string => typeof item === "string")
}

/**
 * Prompt user to pick catalog entries to download.
 * Returns the selected names in catalog order; empty when cancelled.
 */
export async function promptEntries(views: readonly EntryView[]): Promise<string[]> {
	if (views.length === 0) return []

	const response = await prompts({
		type: "multiselect",
		name: "names",
		message: "Select packages to download",
		choices: views.map(view => ({
			title: `${view.entry.name}${view.entry.version ? ` v${view.entry.version}` : ""}`,
			description: [
				view.entry.category,
				formatEntrySize(view.fileSize),
				view.entry.description,
			]
				.filter(Boolean)
				.join(" · "),
			value: view.entry.name,
		})),
		hint: "- Space to select. Return to submit",
		instructions: false,
	})

	const selected = new Set(stringValues(response["names"]))
	return views.map(view => view.entry.name).filter(name => selected.has(name))
}

/**
 * Prompt user to confirm the download
 */
export async function promptConfirmDownload(count: number, totalBytes: string): Promise<boolean> {
	const response = await prompts({
		type: "confirm",
		name: "confirm",
		message: `Download ${count} package${count === 1 ? "" : "s"} (${totalBytes})?`,
		initial: true,
	})

	return response["confirm"] === true
}

/**
 * Route Ctrl+C during a prompt to `onAbort` instead of leaving the terminal
 * in raw mode
 */
export function setupPromptHandlers(onAbort: () => void): void {
	process.on("SIGINT", () => {
		console.log("\n\nAborted.")
		onAbort()
	})
}
