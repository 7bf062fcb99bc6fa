/**
 * Shared type definitions for assetsync
 */

import type { AssetSyncError, ValidationRejected } from "./errors.js"

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

/** One downloadable package as published by the remote catalog */
export interface CatalogEntry {
	/** Coordination key; expected unique within a catalog */
	readonly name: string
	readonly description: string
	readonly version: string
	readonly category: string
	/** Absolute http(s) URL of the package */
	readonly downloadUrl: string
	/** Preview image URL, empty when the catalog has none */
	readonly imageUrl: string
	/** Byte size, 0 when unknown */
	readonly fileSize: number
}

export type Catalog = readonly CatalogEntry[]

export interface DecodedCatalog {
	entries: CatalogEntry[]
	/** Entries present in the document */
	total: number
	/** Entries dropped as invalid or rejected by the URL policy */
	rejected: number
	/** Entries dropped by the URL policy, in document order */
	rejections: ValidationRejected[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Downloads
// ─────────────────────────────────────────────────────────────────────────────

export type DownloadPhase =
	| "idle"
	| "requesting"
	| "succeeded"
	| "failed"
	| "timed-out"
	| "cancelled"

export type DownloadOutcome =
	| { kind: "succeeded"; path: string; bytes: number }
	| { kind: "import-failed"; path: string; bytes: number; error: AssetSyncError }
	| { kind: "failed"; error: AssetSyncError }
	| { kind: "timed-out"; error: AssetSyncError }
	| { kind: "cancelled"; error: AssetSyncError }
	| { kind: "skipped"; reason: string }

/** Read-only view of one entry's download state */
export interface DownloadSnapshot {
	readonly phase: DownloadPhase
	/** 0.0 – 1.0, never decreases during an attempt */
	readonly progress: number
	readonly bytesReceived: number
	readonly lastOutcome: DownloadOutcome | null
}

// ─────────────────────────────────────────────────────────────────────────────
// Probes
// ─────────────────────────────────────────────────────────────────────────────

export type ImageFormat = "png" | "jpeg" | "gif" | "webp" | "unknown"

export interface PreviewImage {
	readonly bytes: Uint8Array
	readonly format: ImageFormat
	readonly contentType: string | null
}

// ─────────────────────────────────────────────────────────────────────────────
// Presentation views
// ─────────────────────────────────────────────────────────────────────────────

export interface EntryView {
	readonly entry: CatalogEntry
	/** Catalog size, else probed size, else 0 */
	readonly fileSize: number
	readonly download: DownloadSnapshot
	readonly preview: PreviewImage | null
}

export type SyncStatus =
	| { state: "idle" }
	| { state: "loading" }
	| { state: "ok"; count: number; rejected: number }
	| { state: "failed"; reason: string; error: AssetSyncError }

export type SyncResult =
	| { status: "ok"; count: number; total: number; rejected: number }
	| { status: "failed"; error: AssetSyncError }
	| { status: "in-progress" }
