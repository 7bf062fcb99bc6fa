/**
 * Core event types
 *
 * These types define the event-based interface between the engine
 * (sync, downloads, probes) and whatever presents its state.
 */

import type { AssetSyncError } from "../errors.js"
import type {
	DownloadOutcome,
	DownloadPhase,
	ImageFormat,
	SyncStatus,
} from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Download Events
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Events emitted by the download coordinator
 */
export type DownloadEvent =
	| DownloadStartEvent
	| DownloadProgressEvent
	| DownloadFinishEvent

/** Emitted when an entry enters the requesting phase */
export interface DownloadStartEvent {
	type: "download:start"
	name: string
	url: string
}

/** Emitted periodically while bytes arrive */
export interface DownloadProgressEvent {
	type: "download:progress"
	name: string
	received: number
	/** Expected size, null when neither the server nor the catalog knows it */
	total: number | null
	progress: number
}

/** Emitted once per attempt with the terminal phase, before returning to idle */
export interface DownloadFinishEvent {
	type: "download:finish"
	name: string
	phase: Exclude<DownloadPhase, "idle" | "requesting">
	outcome: DownloadOutcome
}

// ─────────────────────────────────────────────────────────────────────────────
// Probe Events
// ─────────────────────────────────────────────────────────────────────────────

export type ProbeEvent = ProbeSizeEvent | ProbeImageEvent

export interface ProbeSizeEvent {
	type: "probe:size"
	url: string
	size: number
}

export interface ProbeImageEvent {
	type: "probe:image"
	url: string
	format: ImageFormat
	bytes: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Sync Events
// ─────────────────────────────────────────────────────────────────────────────

export type CatalogSyncEvent =
	| { type: "sync:start"; url: string }
	| {
			type: "sync:complete"
			count: number
			total: number
			rejected: number
			durationMs: number
	  }
	| { type: "sync:failed"; error: AssetSyncError; durationMs: number }

export interface StatusEvent {
	type: "status"
	status: SyncStatus
	message: string
}

/** Everything an engine subscriber can observe */
export type EngineEvent = CatalogSyncEvent | DownloadEvent | ProbeEvent | StatusEvent

export type EngineListener = (event: EngineEvent) => void
