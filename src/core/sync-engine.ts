/**
 * Catalog Sync Engine
 *
 * Owns the published catalog, the download coordinator and the metadata
 * prober, and exposes them to a presentation layer as synchronous reads plus
 * async submits. Observers subscribe to a typed event stream.
 *
 * Key features:
 * - Catalog replaced wholesale, only after a fully validated fetch
 * - Re-entrant sync() calls return "in-progress" instead of racing
 * - Transient download/probe state reset on every successful refresh
 * - Rolling human-readable status message
 */

import type { Config } from "../config.js"
import { isApiEnvelopeSource } from "../envelope.js"
import { decodeCatalog } from "../catalog.js"
import {
	CancelledError,
	NetworkError,
	toAssetSyncError,
} from "../errors.js"
import {
	armTimeout,
	defaultFetch,
	discardBody,
	failureReason,
	type FetchFn,
} from "../http.js"
import type { Importer } from "../importer.js"
import { log } from "../logger.js"
import type {
	Catalog,
	CatalogEntry,
	DownloadOutcome,
	EntryView,
	SyncResult,
	SyncStatus,
} from "../types.js"
import { isPrivateUrl } from "../url-policy.js"
import { DownloadCoordinator } from "./coordinator.js"
import { MetadataProber } from "./prober.js"
import type { DownloadEvent, EngineEvent, EngineListener } from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface EngineOptions {
	config: Config
	/** Receives every verified download before its scratch file is deleted */
	importer: Importer
	/** HTTP seam; defaults to undici fetch on the shared keep-alive agent */
	fetch?: FetchFn | undefined
}

/** Anything that names a catalog entry */
export type EntryRef = string | CatalogEntry

const EMPTY_CATALOG: Catalog = Object.freeze([])

function downloadMessage(name: string, outcome: DownloadOutcome): string | null {
	switch (outcome.kind) {
		case "succeeded":
			return `Successfully downloaded and imported ${name}`
		case "import-failed":
			return `Downloaded ${name} but import failed: ${outcome.error.message}`
		case "failed":
			return `Failed to download ${name}: ${outcome.error.message}`
		case "timed-out":
			return `Download of ${name} timed out`
		case "cancelled":
			return `Download of ${name} cancelled`
		case "skipped":
			return null
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Engine
// ═══════════════════════════════════════════════════════════════════════════════

export class CatalogSyncEngine {
	readonly config: Config
	/** Effective private-host policy for this engine's catalog */
	readonly allowPrivateHosts: boolean

	private readonly fetch: FetchFn
	private readonly coordinator: DownloadCoordinator
	private readonly prober: MetadataProber
	private readonly listeners = new Set<EngineListener>()

	private catalog: Catalog = EMPTY_CATALOG
	private byName = new Map<string, CatalogEntry>()
	private status: SyncStatus = { state: "idle" }
	private statusMessage = ""
	/** Set while a sync is running; doubles as the re-entrancy guard */
	private syncController: AbortController | null = null
	private closed = false

	constructor(options: EngineOptions) {
		this.config = options.config
		this.fetch = options.fetch ?? defaultFetch
		this.allowPrivateHosts =
			options.config.allowPrivateHosts ?? isPrivateUrl(options.config.catalogUrl)

		this.coordinator = new DownloadCoordinator({
			scratchDir: this.config.scratchDir,
			requestTimeoutMs: this.config.requestTimeoutMs,
			downloadTimeoutMultiplier: this.config.downloadTimeoutMultiplier,
			maxDownloadBytes: this.config.maxDownloadBytes,
			jobs: this.config.jobs,
			progressIntervalMs: this.config.progressIntervalMs,
			userAgent: this.config.userAgent,
			fetch: this.fetch,
			importer: options.importer,
			onEvent: event => this.onDownloadEvent(event),
		})

		this.prober = new MetadataProber({
			requestTimeoutMs: this.config.requestTimeoutMs,
			userAgent: this.config.userAgent,
			allowPrivateHosts: this.allowPrivateHosts,
			fetch: this.fetch,
			onEvent: event => this.emit(event),
		})
	}

	// ───────────────────────────────────────────────────────────────────────────
	// Sync
	// ───────────────────────────────────────────────────────────────────────────

	/**
	 * Fetch, validate and publish the remote catalog. Never rejects: a failed
	 * refresh leaves the previous catalog in place and is reported in the
	 * result and the status.
	 */
	async sync(): Promise<SyncResult> {
		if (this.closed) {
			return { status: "failed", error: new CancelledError("Engine is shut down") }
		}
		if (this.syncController) {
			return { status: "in-progress" }
		}

		const controller = new AbortController()
		this.syncController = controller
		const url = this.config.catalogUrl
		const startTime = Date.now()

		this.setStatus({ state: "loading" }, "Loading catalog...")
		this.emit({ type: "sync:start", url })
		log.sync.info({ url }, "sync started")

		const disarm = armTimeout(
			controller,
			this.config.requestTimeoutMs,
			"Catalog request",
		)

		try {
			const body = await this.fetchCatalog(url, controller.signal)
			disarm()

			const decoded = decodeCatalog(body, {
				sourceIsApiEnvelope: isApiEnvelopeSource(url),
				allowPrivateHosts: this.allowPrivateHosts,
			})

			// Shut down while the body was in flight
			if (controller.signal.aborted) {
				throw toAssetSyncError(controller.signal.reason)
			}

			this.publish(decoded.entries)

			const count = decoded.entries.length
			const durationMs = Date.now() - startTime
			this.setStatus(
				{ state: "ok", count, rejected: decoded.rejected },
				`Loaded ${count} assets`,
			)
			this.emit({
				type: "sync:complete",
				count,
				total: decoded.total,
				rejected: decoded.rejected,
				durationMs,
			})
			log.sync.info(
				{ count, total: decoded.total, rejected: decoded.rejected, durationMs },
				"catalog loaded",
			)

			return { status: "ok", count, total: decoded.total, rejected: decoded.rejected }
		} catch (err) {
			const error = toAssetSyncError(failureReason(controller.signal, err))
			const durationMs = Date.now() - startTime

			this.setStatus(
				{ state: "failed", reason: error.message, error },
				`Failed to load catalog: ${error.message}`,
			)
			this.emit({ type: "sync:failed", error, durationMs })
			log.sync.error({ url, kind: error.kind, error: error.message }, "sync failed")

			return { status: "failed", error }
		} finally {
			disarm()
			if (this.syncController === controller) {
				this.syncController = null
			}
		}
	}

	private async fetchCatalog(url: string, signal: AbortSignal): Promise<Uint8Array> {
		const response = await this.fetch(url, {
			signal,
			redirect: "follow",
			headers: {
				"User-Agent": this.config.userAgent,
				Accept: "application/json",
			},
		})

		if (!response.ok) {
			await discardBody(response)
			throw new NetworkError(
				`HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ""}`,
				{ statusCode: response.status },
			)
		}

		return new Uint8Array(await response.arrayBuffer())
	}

	private publish(entries: CatalogEntry[]): void {
		const frozen = Object.freeze(entries.map(entry => Object.freeze({ ...entry })))
		const byName = new Map<string, CatalogEntry>()
		for (const entry of frozen) {
			// Duplicate names share download state; the first occurrence is canonical
			if (!byName.has(entry.name)) byName.set(entry.name, entry)
		}

		this.catalog = frozen
		this.byName = byName
		this.coordinator.retain(new Set(byName.keys()))
		this.prober.reset()
	}

	// ───────────────────────────────────────────────────────────────────────────
	// Submits
	// ───────────────────────────────────────────────────────────────────────────

	/**
	 * Download and import one entry of the current catalog.
	 */
	async startDownload(ref: EntryRef): Promise<DownloadOutcome> {
		if (this.closed) {
			return { kind: "skipped", reason: "engine is shut down" }
		}
		const entry = this.resolve(ref)
		if (!entry) {
			return { kind: "skipped", reason: "entry is not in the current catalog" }
		}
		// A probed size counts for the pre-flight limit just like a catalog one
		const fileSize = this.knownSize(entry)
		return this.coordinator.startDownload(
			fileSize === entry.fileSize ? entry : { ...entry, fileSize },
		)
	}

	/** Cancel an in-flight download. Returns false when none was running. */
	cancelDownload(ref: EntryRef): boolean {
		const name = typeof ref === "string" ? ref : ref.name
		return this.coordinator.cancel(name)
	}

	async probeSize(ref: EntryRef): Promise<void> {
		const entry = this.closed ? undefined : this.resolve(ref)
		if (entry) await this.prober.probeSize(entry)
	}

	async probeImage(ref: EntryRef): Promise<void> {
		const entry = this.closed ? undefined : this.resolve(ref)
		if (entry) await this.prober.probeImage(entry)
	}

	private resolve(ref: EntryRef): CatalogEntry | undefined {
		return this.byName.get(typeof ref === "string" ? ref : ref.name)
	}

	// ───────────────────────────────────────────────────────────────────────────
	// Reads
	// ───────────────────────────────────────────────────────────────────────────

	getCatalog(): Catalog {
		return this.catalog
	}

	getEntry(name: string): CatalogEntry | undefined {
		return this.byName.get(name)
	}

	getView(name: string): EntryView | undefined {
		const entry = this.byName.get(name)
		return entry ? this.viewOf(entry) : undefined
	}

	/** One view per catalog entry, in catalog order */
	getViews(): EntryView[] {
		return this.catalog.map(entry => this.viewOf(entry))
	}

	getStatus(): SyncStatus {
		return this.status
	}

	getStatusMessage(): string {
		return this.statusMessage
	}

	isSyncing(): boolean {
		return this.syncController !== null
	}

	isClosed(): boolean {
		return this.closed
	}

	/** Catalog size, else a probed one, else 0 */
	private knownSize(entry: CatalogEntry): number {
		return entry.fileSize > 0
			? entry.fileSize
			: (this.prober.getSize(entry.downloadUrl) ?? 0)
	}

	private viewOf(entry: CatalogEntry): EntryView {
		return {
			entry,
			fileSize: this.knownSize(entry),
			download: this.coordinator.getSnapshot(entry.name),
			preview: entry.imageUrl ? this.prober.getPreview(entry.imageUrl) : null,
		}
	}

	// ───────────────────────────────────────────────────────────────────────────
	// Events & lifecycle
	// ───────────────────────────────────────────────────────────────────────────

	/**
	 * Observe engine events. Returns an unsubscribe function.
	 */
	subscribe(listener: EngineListener): () => void {
		if (this.closed) return () => {}
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	/**
	 * Abort the sync fetch and all downloads, release probe results and drop
	 * listeners. Idempotent.
	 */
	shutdown(): void {
		if (this.closed) return
		this.closed = true
		log.sync.debug("engine shutting down")

		this.syncController?.abort(new CancelledError("Shutting down"))
		this.coordinator.shutdown()
		this.prober.shutdown()
		this.listeners.clear()
	}

	private onDownloadEvent(event: DownloadEvent): void {
		this.emit(event)
		if (event.type === "download:start") {
			this.setMessage(`Downloading ${event.name}...`)
		} else if (event.type === "download:finish") {
			const message = downloadMessage(event.name, event.outcome)
			if (message) this.setMessage(message)
		}
	}

	private setStatus(status: SyncStatus, message: string): void {
		this.status = status
		this.setMessage(message)
	}

	private setMessage(message: string): void {
		this.statusMessage = message
		this.emit({ type: "status", status: this.status, message })
	}

	private emit(event: EngineEvent): void {
		for (const listener of this.listeners) {
			try {
				listener(event)
			} catch (err) {
				log.sync.error({ err, event: event.type }, "engine listener failed")
			}
		}
	}
}
