/**
 * Core module exports
 *
 * The engine, its download coordinator and metadata prober. All state changes
 * are reported as typed events that a presentation layer can subscribe to.
 */

// Catalog sync engine
export { CatalogSyncEngine } from "./sync-engine.js"
export type { EngineOptions, EntryRef } from "./sync-engine.js"

// Downloads
export { DownloadCoordinator } from "./coordinator.js"
export type { CoordinatorOptions } from "./coordinator.js"

// Probes
export { MetadataProber, detectImageFormat, looksLikeErrorPage } from "./prober.js"
export type { ProberOptions } from "./prober.js"

// Shared types
export type {
	CatalogSyncEvent,
	DownloadEvent,
	DownloadFinishEvent,
	DownloadProgressEvent,
	DownloadStartEvent,
	EngineEvent,
	EngineListener,
	ProbeEvent,
	StatusEvent,
} from "./types.js"
