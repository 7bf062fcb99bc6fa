/**
 * Download Coordinator
 *
 * Per-entry download state machine, keyed by entry name:
 *
 *   idle → requesting → (succeeded | failed | timed-out | cancelled) → idle
 *
 * Key features:
 * - At most one transfer per name; a second start while requesting is a no-op
 * - Pre-flight and post-flight size limits
 * - Whole-operation timeout via AbortController
 * - Streams to a .part file, renames, re-verifies, imports, then deletes
 * - Every exit path clears the in-flight marker and scratch files
 */

import { createWriteStream } from "node:fs"
import { mkdir, rename, rm, stat } from "node:fs/promises"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import pLimit from "p-limit"

import {
	CancelledError,
	ImportError,
	IntegrityError,
	NetworkError,
	SizeLimitExceeded,
	errorMessage,
	toAssetSyncError,
} from "../errors.js"
import { scratchPathFor } from "../filename.js"
import {
	armTimeout,
	discardBody,
	failureReason,
	parseContentLength,
	type FetchFn,
} from "../http.js"
import type { Importer } from "../importer.js"
import { log } from "../logger.js"
import type {
	CatalogEntry,
	DownloadOutcome,
	DownloadPhase,
	DownloadSnapshot,
} from "../types.js"
import type { DownloadEvent, DownloadFinishEvent } from "./types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CoordinatorOptions {
	/** Directory for in-progress and completed downloads */
	scratchDir: string
	requestTimeoutMs: number
	/** Downloads may take requestTimeoutMs × this */
	downloadTimeoutMultiplier: number
	maxDownloadBytes: number
	/** Concurrent transfers */
	jobs: number
	/** Minimum interval between progress events */
	progressIntervalMs: number
	userAgent: string
	fetch: FetchFn
	importer: Importer
	onEvent?: ((event: DownloadEvent) => void) | undefined
}

type FinishedOutcome = Exclude<DownloadOutcome, { kind: "skipped" }>

interface ActiveTransfer {
	readonly entry: CatalogEntry
	readonly controller: AbortController
	lastProgressAt: number
}

interface PathClaim {
	readonly transfer: ActiveTransfer
	/** Settles once the holder has removed its scratch files */
	readonly released: Promise<void>
}

interface DownloadRecord {
	phase: DownloadPhase
	progress: number
	bytesReceived: number
	lastOutcome: DownloadOutcome | null
	/** The attempt that owns this record; null once finalized */
	transfer: ActiveTransfer | null
}

const IDLE_SNAPSHOT: DownloadSnapshot = Object.freeze({
	phase: "idle",
	progress: 0,
	bytesReceived: 0,
	lastOutcome: null,
})

function terminalPhase(outcome: FinishedOutcome): DownloadFinishEvent["phase"] {
	switch (outcome.kind) {
		case "succeeded":
		case "import-failed":
			return "succeeded"
		case "timed-out":
			return "timed-out"
		case "cancelled":
			return "cancelled"
		case "failed":
			return "failed"
	}
}

function outcomeFor(reason: unknown): FinishedOutcome {
	const error = toAssetSyncError(reason)
	switch (error.kind) {
		case "timeout":
			return { kind: "timed-out", error }
		case "cancelled":
			return { kind: "cancelled", error }
		default:
			return { kind: "failed", error }
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Coordinator
// ─────────────────────────────────────────────────────────────────────────────

export class DownloadCoordinator {
	private readonly records = new Map<string, DownloadRecord>()
	private readonly inFlight = new Map<string, ActiveTransfer>()
	/** Scratch paths currently being written, across all names */
	private readonly pathsInUse = new Map<string, PathClaim>()
	private readonly limit: ReturnType<typeof pLimit>
	private closed = false

	constructor(private readonly options: CoordinatorOptions) {
		this.limit = pLimit(options.jobs)
	}

	/** Whole-operation bound for one download */
	get downloadTimeoutMs(): number {
		return Math.round(
			this.options.requestTimeoutMs * this.options.downloadTimeoutMultiplier,
		)
	}

	getSnapshot(name: string): DownloadSnapshot {
		const record = this.records.get(name)
		if (!record) return IDLE_SNAPSHOT
		return {
			phase: record.phase,
			progress: record.progress,
			bytesReceived: record.bytesReceived,
			lastOutcome: record.lastOutcome,
		}
	}

	isDownloading(name: string): boolean {
		return this.inFlight.has(name)
	}

	/** Names with a transfer in flight */
	activeNames(): string[] {
		return [...this.inFlight.keys()]
	}

	/**
	 * Start downloading an entry. The returned promise settles once the
	 * attempt is finalized and never rejects for network, size or import
	 * failures; those are reported in the outcome.
	 */
	async startDownload(entry: CatalogEntry): Promise<DownloadOutcome> {
		if (this.closed) {
			return { kind: "skipped", reason: "downloads are shut down" }
		}
		if (!entry.downloadUrl) {
			return { kind: "skipped", reason: "entry has no download URL" }
		}
		if (this.inFlight.has(entry.name)) {
			return { kind: "skipped", reason: "download already in progress" }
		}

		const transfer: ActiveTransfer = {
			entry,
			controller: new AbortController(),
			lastProgressAt: 0,
		}
		this.inFlight.set(entry.name, transfer)
		this.records.set(entry.name, {
			phase: "requesting",
			progress: 0,
			bytesReceived: 0,
			lastOutcome: null,
			transfer,
		})
		this.emit({ type: "download:start", name: entry.name, url: entry.downloadUrl })

		let outcome: FinishedOutcome | undefined
		try {
			const max = this.options.maxDownloadBytes
			if (entry.fileSize > max) {
				outcome = {
					kind: "failed",
					error: new SizeLimitExceeded(max, entry.fileSize, "pre-flight"),
				}
			} else {
				outcome = await this.limit(() => this.run(transfer))
			}
			return outcome
		} finally {
			this.finalize(
				transfer,
				outcome ?? {
					kind: "failed",
					error: new IntegrityError(`Internal fault while downloading ${entry.name}`),
				},
			)
		}
	}

	/**
	 * Abort one in-flight download. Returns false when nothing was running.
	 */
	cancel(name: string, reason = "Download cancelled"): boolean {
		const transfer = this.inFlight.get(name)
		if (!transfer) return false

		this.inFlight.delete(name)
		const record = this.records.get(name)
		if (record && record.transfer === transfer) {
			record.phase = "cancelled"
		}
		transfer.controller.abort(new CancelledError(reason))
		return true
	}

	/** Abort every in-flight download. Safe to call at any time. */
	cancelAll(reason = "Download cancelled"): void {
		for (const name of this.activeNames()) {
			try {
				this.cancel(name, reason)
			} catch (err) {
				log.download.error({ name, err }, "cancel failed")
			}
		}
		this.inFlight.clear()
	}

	/**
	 * Reset state for a freshly published catalog: downloads for names that
	 * are gone are cancelled and forgotten, idle records are reset.
	 * Records of transfers still running for retained names are kept.
	 */
	retain(names: ReadonlySet<string>): void {
		for (const name of this.activeNames()) {
			if (!names.has(name)) {
				this.cancel(name, "Entry removed from catalog")
			}
		}
		for (const [name, record] of this.records) {
			if (!names.has(name) || record.transfer === null) {
				this.records.delete(name)
			}
		}
	}

	/** Cancel everything and refuse new work */
	shutdown(): void {
		this.closed = true
		this.cancelAll("Shutting down")
	}

	// ───────────────────────────────────────────────────────────────────────
	// Transfer
	// ───────────────────────────────────────────────────────────────────────

	private async run(transfer: ActiveTransfer): Promise<FinishedOutcome> {
		const { entry, controller } = transfer
		const { signal } = controller

		// Cancelled while waiting for a slot
		if (signal.aborted) return outcomeFor(signal.reason)

		const disarm = armTimeout(
			controller,
			this.downloadTimeoutMs,
			`Download of ${entry.name}`,
		)
		// Only set once this transfer owns the path; cleanup never touches another's files
		let finalPath: string | null = null
		let partPath: string | null = null
		let releasePath: (() => void) | null = null

		try {
			const target = scratchPathFor(this.options.scratchDir, entry)
			releasePath = await this.claimPath(target, transfer)
			finalPath = target
			partPath = `${target}.part`

			const bytes = await this.fetchToFile(transfer, partPath)
			disarm()

			if (bytes === 0) {
				throw new IntegrityError(`Downloaded file for ${entry.name} is empty`)
			}

			await rename(partPath, finalPath)
			partPath = null
			await verifyFile(finalPath)

			// Re-check ownership after the last suspend point before importing
			if (signal.aborted) return outcomeFor(signal.reason)
			this.markComplete(transfer, bytes)

			return await this.importFile(entry, finalPath, bytes)
		} catch (err) {
			return outcomeFor(failureReason(signal, err))
		} finally {
			disarm()
			try {
				await removeScratchFile(partPath)
				await removeScratchFile(finalPath)
			} finally {
				releasePath?.()
			}
		}
	}

	/**
	 * Take exclusive ownership of a scratch path. A holder that was aborted is
	 * only cleaning up, so wait for it instead of failing; a live holder is a
	 * different entry writing the same file.
	 */
	private async claimPath(
		target: string,
		transfer: ActiveTransfer,
	): Promise<() => void> {
		for (;;) {
			const holder = this.pathsInUse.get(target)
			if (!holder) break
			if (!holder.transfer.controller.signal.aborted) {
				throw new IntegrityError(`Another download is already writing ${target}`)
			}
			await holder.released
		}
		transfer.controller.signal.throwIfAborted()

		let release: () => void = () => {}
		const released = new Promise<void>(resolve => {
			release = resolve
		})
		const claim: PathClaim = { transfer, released }
		this.pathsInUse.set(target, claim)
		return () => {
			if (this.pathsInUse.get(target) === claim) this.pathsInUse.delete(target)
			release()
		}
	}

	private async fetchToFile(
		transfer: ActiveTransfer,
		partPath: string,
	): Promise<number> {
		const { entry, controller } = transfer
		const { signal } = controller
		const max = this.options.maxDownloadBytes

		log.download.debug({ name: entry.name, url: entry.downloadUrl }, "requesting")

		const response = await this.options.fetch(entry.downloadUrl, {
			signal,
			redirect: "follow",
			headers: { "User-Agent": this.options.userAgent },
		})

		if (!response.ok) {
			await discardBody(response)
			throw new NetworkError(
				`HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ""}`,
				{ statusCode: response.status },
			)
		}

		// A declared length over the limit is rejected before reading the body
		const declared = parseContentLength(response.headers.get("content-length"))
		if (declared !== undefined && declared > max) {
			await discardBody(response)
			throw new SizeLimitExceeded(max, declared, "post-flight")
		}

		if (!response.body) {
			throw new IntegrityError(`No response body for ${entry.name}`)
		}

		const total = declared ?? (entry.fileSize > 0 ? entry.fileSize : null)
		await mkdir(this.options.scratchDir, { recursive: true })

		let received = 0
		// The server may send more than it declared; count what actually arrives
		const meter = (size: number): void => {
			received += size
			if (received > max) {
				throw new SizeLimitExceeded(max, received, "post-flight")
			}
			this.reportProgress(transfer, received, total)
		}

		await pipeline(
			Readable.fromWeb(response.body),
			async function* (source: AsyncIterable<unknown>) {
				for await (const chunk of source) {
					if (!(chunk instanceof Uint8Array)) continue
					meter(chunk.byteLength)
					yield chunk
				}
			},
			createWriteStream(partPath),
			{ signal },
		)

		return received
	}

	private async importFile(
		entry: CatalogEntry,
		path: string,
		bytes: number,
	): Promise<FinishedOutcome> {
		try {
			await this.options.importer.import(path, entry)
		} catch (err) {
			const error =
				err instanceof ImportError
					? err
					: new ImportError(errorMessage(err), { cause: err })
			log.download.error({ name: entry.name, path, error: error.message }, "import failed")
			return { kind: "import-failed", path, bytes, error }
		}

		log.download.info({ name: entry.name, bytes }, "downloaded and imported")
		return { kind: "succeeded", path, bytes }
	}

	// ───────────────────────────────────────────────────────────────────────
	// State
	// ───────────────────────────────────────────────────────────────────────

	private ownedRecord(transfer: ActiveTransfer): DownloadRecord | undefined {
		const record = this.records.get(transfer.entry.name)
		return record && record.transfer === transfer ? record : undefined
	}

	private reportProgress(
		transfer: ActiveTransfer,
		received: number,
		total: number | null,
	): void {
		const record = this.ownedRecord(transfer)
		if (!record) return

		record.bytesReceived = received
		if (total !== null && total > 0) {
			record.progress = Math.max(record.progress, Math.min(1, received / total))
		}

		const now = Date.now()
		if (now - transfer.lastProgressAt < this.options.progressIntervalMs) return
		transfer.lastProgressAt = now

		this.emit({
			type: "download:progress",
			name: transfer.entry.name,
			received,
			total,
			progress: record.progress,
		})
	}

	private markComplete(transfer: ActiveTransfer, bytes: number): void {
		const record = this.ownedRecord(transfer)
		if (!record) return
		record.bytesReceived = bytes
		record.progress = 1
		this.emit({
			type: "download:progress",
			name: transfer.entry.name,
			received: bytes,
			total: bytes,
			progress: 1,
		})
	}

	private finalize(transfer: ActiveTransfer, outcome: FinishedOutcome): void {
		const { name } = transfer.entry
		if (this.inFlight.get(name) === transfer) {
			this.inFlight.delete(name)
		}

		if (outcome.kind !== "succeeded") {
			log.download.warn(
				{ name, outcome: outcome.kind, error: outcome.error.message },
				"download did not complete",
			)
		}

		// Dropped by a refresh, or superseded by a newer attempt
		const record = this.ownedRecord(transfer)
		if (!record) return

		const phase = terminalPhase(outcome)
		record.transfer = null
		record.phase = phase
		record.lastOutcome = outcome
		this.emit({ type: "download:finish", name, phase, outcome })
		record.phase = "idle"
	}

	private emit(event: DownloadEvent): void {
		if (!this.options.onEvent) return
		try {
			this.options.onEvent(event)
		} catch (err) {
			log.download.error({ err, event: event.type }, "download listener failed")
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

async function verifyFile(path: string): Promise<void> {
	let size: number
	try {
		const stats = await stat(path)
		if (!stats.isFile()) {
			throw new IntegrityError(`${path} is not a regular file`)
		}
		size = stats.size
	} catch (err) {
		if (err instanceof IntegrityError) throw err
		throw new IntegrityError(`Downloaded file is missing: ${path}`, { cause: err })
	}
	if (size === 0) {
		throw new IntegrityError(`Downloaded file is empty: ${path}`)
	}
}

/** Best-effort delete; a failure is logged, never escalated */
async function removeScratchFile(path: string | null): Promise<void> {
	if (!path) return
	try {
		await rm(path, { force: true })
	} catch (err) {
		log.download.warn({ path, err }, "failed to remove scratch file")
	}
}
