#!/usr/bin/env node
/**
 * assetsync CLI - browse a remote asset catalog and import packages
 */

import { Command } from "commander"
import { z, ZodError } from "zod"
import { loadConfig, resolveConfig, type Config } from "../config.js"
import { CatalogSyncEngine } from "../core/sync-engine.js"
import { errorMessage } from "../errors.js"
import { formatBytes } from "../format.js"
import { closeHttpAgent } from "../http.js"
import { DirectoryImporter } from "../importer.js"
import { configureLogging, flushLogs, log } from "../logger.js"
import { createProgressTracker } from "../progress.js"
import { promptConfirmDownload, promptEntries, setupPromptHandlers } from "../prompts.js"
import { createSpinner, drainSpinnerLog, releaseSpinner } from "../spinner.js"
import type { DownloadOutcome } from "../types.js"
import { ui } from "../ui.js"

const VERSION = "1.0.0"

// ─────────────────────────────────────────────────────────────────────────────
// Option parsing
// ─────────────────────────────────────────────────────────────────────────────

const GlobalOptionsSchema = z.object({
	catalogUrl: z.string().optional(),
	scratchDir: z.string().optional(),
	importDir: z.string().optional(),
	timeout: z.coerce.number().optional(),
	timeoutMultiplier: z.coerce.number().optional(),
	maxSize: z.coerce.number().optional(),
	allowPrivateHosts: z.boolean().optional(),
	jobs: z.coerce.number().optional(),
	userAgent: z.string().optional(),
	verbose: z.boolean().default(false),
	quiet: z.boolean().default(false),
	logFile: z.string().optional(),
})

type GlobalOptions = z.infer<typeof GlobalOptionsSchema>

const ListOptionsSchema = z.object({
	sizes: z.boolean().default(false),
	previews: z.boolean().default(false),
	json: z.boolean().default(false),
})

const DownloadOptionsSchema = z.object({
	all: z.boolean().default(false),
})

function globalOptions(command: Command): GlobalOptions {
	return GlobalOptionsSchema.parse(command.optsWithGlobals())
}

function configFor(options: GlobalOptions): Config {
	return resolveConfig(loadConfig(), {
		catalogUrl: options.catalogUrl,
		scratchDir: options.scratchDir,
		importDir: options.importDir,
		requestTimeoutMs: options.timeout,
		downloadTimeoutMultiplier: options.timeoutMultiplier,
		maxDownloadBytes: options.maxSize,
		allowPrivateHosts: options.allowPrivateHosts,
		jobs: options.jobs,
		userAgent: options.userAgent,
	})
}

function describeError(err: unknown): string {
	if (err instanceof ZodError) {
		return err.issues
			.map(issue => `${issue.path.join(".") || "config"}: ${issue.message}`)
			.join("; ")
	}
	return errorMessage(err)
}

// ─────────────────────────────────────────────────────────────────────────────
// Command plumbing
// ─────────────────────────────────────────────────────────────────────────────

interface CommandContext {
	engine: CatalogSyncEngine
	options: GlobalOptions
}

/**
 * Build the engine for a command, run it, and always release the engine,
 * the HTTP pool and the log destination afterwards.
 */
async function runWithEngine(
	command: Command,
	fn: (ctx: CommandContext) => Promise<boolean>,
): Promise<void> {
	let engine: CatalogSyncEngine | null = null
	try {
		const options = globalOptions(command)
		configureLogging({
			logFilePath: options.logFile,
			level: options.verbose ? "debug" : options.quiet ? "warn" : undefined,
		})

		const config = configFor(options)
		const current = new CatalogSyncEngine({
			config,
			importer: new DirectoryImporter(config.importDir),
		})
		engine = current

		setupPromptHandlers(() => {
			current.shutdown()
			process.exitCode = 130
		})

		const ok = await fn({ engine: current, options })
		if (!ok && process.exitCode === undefined) process.exitCode = 1
	} catch (err) {
		ui.error(describeError(err))
		log.cli.error({ err }, "command failed")
		process.exitCode = 1
	} finally {
		engine?.shutdown()
		await drainSpinnerLog()
		await closeHttpAgent()
		await flushLogs()
	}
}

async function loadCatalog(engine: CatalogSyncEngine, quiet: boolean): Promise<boolean> {
	const spinner = createSpinner("Loading catalog...", quiet)
	const result = await engine.sync()
	releaseSpinner(spinner)

	if (result.status === "ok") {
		spinner?.succeed(engine.getStatusMessage())
		return true
	}
	if (spinner) spinner.fail(engine.getStatusMessage())
	else ui.error(engine.getStatusMessage())
	return false
}

/**
 * Download the named entries concurrently with a progress display, then
 * print one result line per entry.
 */
async function runDownloads(
	engine: CatalogSyncEngine,
	names: string[],
	quiet: boolean,
): Promise<boolean> {
	const tracker = createProgressTracker("Downloading", names.length, quiet)
	const unsubscribe = engine.subscribe(event => {
		switch (event.type) {
			case "download:start":
				tracker.start(event.name)
				break
			case "download:progress":
				tracker.update(event.name, event.received, event.total)
				break
			case "download:finish":
				tracker.complete(event.name, event.outcome.kind === "succeeded")
				break
		}
	})

	let results: { name: string; outcome: DownloadOutcome }[]
	try {
		results = await Promise.all(
			names.map(async name => ({ name, outcome: await engine.startDownload(name) })),
		)
	} finally {
		unsubscribe()
		tracker.stop()
	}

	const succeeded: string[] = []
	const failed: string[] = []
	for (const { name, outcome } of results) {
		if (!quiet) ui.outcome(name, outcome)
		if (outcome.kind === "succeeded") succeeded.push(name)
		else failed.push(name)
	}

	if (!quiet) {
		console.log()
		ui.summarySection("Imported", succeeded, "green")
		ui.summarySection("Failed", failed, "red")
		ui.finalStatus(failed.length === 0)
	}
	return failed.length === 0
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program.enablePositionalOptions()

program
	.name("assetsync")
	.version(VERSION)
	.description("Browse a remote asset catalog and import packages into a project")
	.option("--catalog-url <url>", "Catalog document URL")
	.option("--scratch-dir <dir>", "Directory for downloads in progress")
	.option("--import-dir <dir>", "Directory packages are imported into")
	.option("--timeout <ms>", "Per-request timeout in milliseconds")
	.option(
		"--timeout-multiplier <n>",
		"Downloads may take the request timeout times this",
	)
	.option("--max-size <bytes>", "Largest package accepted, in bytes")
	.option("--allow-private-hosts", "Permit downloads from loopback/private hosts")
	.option("--no-allow-private-hosts", "Refuse loopback/private hosts even for a local catalog")
	.option("-j, --jobs <number>", "Number of parallel downloads")
	.option("--user-agent <ua>", "User-Agent header for all requests")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Debug output", false)
	.option("--log-file <path>", "Write logs to a file instead of the console")

program
	.command("list")
	.description("Fetch the catalog and list its packages")
	.option("--sizes", "Look up sizes the catalog does not give", false)
	.option("--previews", "Fetch preview images and report their format", false)
	.option("--json", "Print JSON instead of text", false)
	.action(async (rawOptions: unknown, command: Command) => {
		await runWithEngine(command, async ({ engine, options }) => {
			const listOptions = ListOptionsSchema.parse(rawOptions)
			const quiet = options.quiet || listOptions.json
			if (!(await loadCatalog(engine, quiet))) return false

			const catalog = engine.getCatalog()
			if (listOptions.sizes) {
				await Promise.all(catalog.map(entry => engine.probeSize(entry)))
			}
			if (listOptions.previews) {
				await Promise.all(catalog.map(entry => engine.probeImage(entry)))
			}

			const views = engine.getViews()
			if (listOptions.json) {
				const rows = views.map(view => ({
					...view.entry,
					fileSize: view.fileSize,
					preview: view.preview
						? {
								format: view.preview.format,
								bytes: view.preview.bytes.length,
								contentType: view.preview.contentType,
							}
						: null,
				}))
				console.log(JSON.stringify(rows, null, 2))
				return true
			}

			ui.header(`Catalog (${views.length} assets)`)
			for (const view of views) {
				ui.entry(view, listOptions.previews)
			}
			return true
		})
	})

program
	.command("download")
	.description("Download and import packages by name")
	.argument("[names...]", "Package names as listed in the catalog")
	.option("--all", "Download every package in the catalog", false)
	.action(async (names: string[], rawOptions: unknown, command: Command) => {
		await runWithEngine(command, async ({ engine, options }) => {
			const downloadOptions = DownloadOptionsSchema.parse(rawOptions)
			if (!downloadOptions.all && names.length === 0) {
				ui.error("Name at least one package, or pass --all")
				return false
			}
			if (!(await loadCatalog(engine, options.quiet))) return false

			const requested = downloadOptions.all
				? engine.getCatalog().map(entry => entry.name)
				: names
			const targets = [...new Set(requested)]

			const missing = targets.filter(name => !engine.getEntry(name))
			for (const name of missing) {
				ui.error(`Not in catalog: ${name}`)
			}

			const available = targets.filter(name => engine.getEntry(name))
			if (available.length === 0) return missing.length === 0

			const ok = await runDownloads(engine, available, options.quiet)
			return ok && missing.length === 0
		})
	})

program
	.command("browse")
	.description("Pick packages interactively and import them")
	.action(async (_rawOptions: unknown, command: Command) => {
		await runWithEngine(command, async ({ engine, options }) => {
			if (!(await loadCatalog(engine, options.quiet))) return false

			const spinner = createSpinner("Looking up package sizes...", options.quiet)
			await Promise.all(engine.getCatalog().map(entry => engine.probeSize(entry)))
			spinner?.stop()
			releaseSpinner(spinner)

			const views = engine.getViews()
			const names = await promptEntries(views)
			if (names.length === 0) {
				ui.info("Nothing selected")
				return true
			}

			const totalBytes = views
				.filter(view => names.includes(view.entry.name))
				.reduce((sum, view) => sum + view.fileSize, 0)
			const confirmed = await promptConfirmDownload(names.length, formatBytes(totalBytes))
			if (!confirmed) return true

			return runDownloads(engine, names, options.quiet)
		})
	})

await program.parseAsync()
