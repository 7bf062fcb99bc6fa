/**
 * Metadata Prober
 *
 * Lazily fills in what the catalog leaves out: the byte size of a package
 * (HEAD request) and its preview image (GET). Probes are deduplicated by URL
 * and their results are released on every catalog refresh.
 */

import { errorMessage, toAssetSyncError, CancelledError } from "../errors.js"
import {
	armTimeout,
	discardBody,
	failureReason,
	parseContentLength,
	type FetchFn,
} from "../http.js"
import { log } from "../logger.js"
import type { CatalogEntry, ImageFormat, PreviewImage } from "../types.js"
import { isPermitted, isSafeRemoteUrl } from "../url-policy.js"
import type { ProbeEvent } from "./types.js"

export interface ProberOptions {
	requestTimeoutMs: number
	userAgent: string
	allowPrivateHosts: boolean
	fetch: FetchFn
	onEvent?: ((event: ProbeEvent) => void) | undefined
}

interface ProbeToken {
	readonly generation: number
	readonly controller: AbortController
}

type ProbeKind = "size" | "image"

// ─────────────────────────────────────────────────────────────────────────────
// Content sniffing
// ─────────────────────────────────────────────────────────────────────────────

function startsWith(bytes: Uint8Array, signature: readonly number[], offset = 0): boolean {
	if (bytes.length < offset + signature.length) return false
	return signature.every((value, i) => bytes[offset + i] === value)
}

const PNG = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]
const JPEG = [0xff, 0xd8, 0xff]
const GIF = [0x47, 0x49, 0x46, 0x38] // "GIF8"
const RIFF = [0x52, 0x49, 0x46, 0x46]
const WEBP = [0x57, 0x45, 0x42, 0x50]

/** Identify an image by its magic bytes */
export function detectImageFormat(bytes: Uint8Array): ImageFormat {
	if (startsWith(bytes, PNG)) return "png"
	if (startsWith(bytes, JPEG)) return "jpeg"
	if (startsWith(bytes, GIF)) return "gif"
	if (startsWith(bytes, RIFF) && startsWith(bytes, WEBP, 8)) return "webp"
	return "unknown"
}

/**
 * Error pages served with a 200: HTML documents and JSON error bodies.
 */
export function looksLikeErrorPage(bytes: Uint8Array): boolean {
	const head = new TextDecoder()
		.decode(bytes.subarray(0, 512))
		.trimStart()
		.toLowerCase()
	if (head.startsWith("<!doctype") || head.startsWith("<html")) return true
	if (head.startsWith("{") && head.includes('"error"')) return true
	return false
}

// ─────────────────────────────────────────────────────────────────────────────
// Prober
// ─────────────────────────────────────────────────────────────────────────────

export class MetadataProber {
	private generation = 0
	private closed = false

	private readonly sizes = new Map<string, number>()
	private readonly previews = new Map<string, PreviewImage>()
	// Failures are remembered until the next reset so a dead host is not retried on every render
	private readonly sizeFailures = new Set<string>()
	private readonly previewFailures = new Set<string>()

	private readonly inFlight: Record<ProbeKind, Map<string, ProbeToken>> = {
		size: new Map(),
		image: new Map(),
	}

	constructor(private readonly options: ProberOptions) {}

	getSize(url: string): number | undefined {
		return this.sizes.get(url)
	}

	getPreview(url: string): PreviewImage | null {
		return this.previews.get(url) ?? null
	}

	isProbing(kind: ProbeKind, url: string): boolean {
		return this.inFlight[kind].has(url)
	}

	/**
	 * Fetch Content-Length for an entry whose size the catalog does not give.
	 */
	async probeSize(entry: CatalogEntry): Promise<void> {
		const url = entry.downloadUrl
		if (this.closed || entry.fileSize > 0) return
		if (this.sizes.has(url) || this.sizeFailures.has(url)) return
		if (this.inFlight.size.has(url)) return
		if (!isPermitted(url, this.options.allowPrivateHosts)) return

		const token = this.begin("size", url)
		const { signal } = token.controller
		const disarm = armTimeout(
			token.controller,
			this.options.requestTimeoutMs,
			"Size probe",
		)

		try {
			const response = await this.options.fetch(url, {
				method: "HEAD",
				signal,
				redirect: "follow",
				headers: { "User-Agent": this.options.userAgent },
			})
			await discardBody(response)

			const size = response.ok
				? parseContentLength(response.headers.get("content-length"))
				: undefined

			if (!this.owns("size", url, token)) return
			if (size === undefined || size === 0) {
				this.sizeFailures.add(url)
				log.probe.debug({ url, status: response.status }, "no usable content-length")
				return
			}

			this.sizes.set(url, size)
			this.emit({ type: "probe:size", url, size })
		} catch (err) {
			if (this.owns("size", url, token)) this.sizeFailures.add(url)
			log.probe.debug(
				{ url, error: errorMessage(toAssetSyncError(failureReason(signal, err))) },
				"size probe failed",
			)
		} finally {
			disarm()
			this.end("size", url, token)
		}
	}

	/**
	 * Fetch and sniff the preview image for an entry.
	 */
	async probeImage(entry: CatalogEntry): Promise<void> {
		const url = entry.imageUrl
		if (this.closed || !url) return
		if (this.previews.has(url) || this.previewFailures.has(url)) return
		if (this.inFlight.image.has(url)) return
		if (!isSafeRemoteUrl(url, this.options.allowPrivateHosts)) return

		const token = this.begin("image", url)
		const { signal } = token.controller
		const disarm = armTimeout(
			token.controller,
			this.options.requestTimeoutMs,
			"Image probe",
		)

		try {
			const response = await this.options.fetch(url, {
				signal,
				redirect: "follow",
				headers: { "User-Agent": this.options.userAgent },
			})
			if (!response.ok) {
				await discardBody(response)
				throw new Error(`HTTP ${response.status}`)
			}

			const bytes = new Uint8Array(await response.arrayBuffer())
			if (bytes.length === 0) throw new Error("Empty image body")
			if (looksLikeErrorPage(bytes)) throw new Error("Response is not an image")

			if (!this.owns("image", url, token)) return

			const preview: PreviewImage = {
				bytes,
				format: detectImageFormat(bytes),
				contentType: response.headers.get("content-type"),
			}
			this.previews.set(url, preview)
			this.emit({
				type: "probe:image",
				url,
				format: preview.format,
				bytes: bytes.length,
			})
		} catch (err) {
			if (this.owns("image", url, token)) this.previewFailures.add(url)
			log.probe.debug(
				{ url, error: errorMessage(toAssetSyncError(failureReason(signal, err))) },
				"image probe failed",
			)
		} finally {
			disarm()
			this.end("image", url, token)
		}
	}

	/**
	 * Release all results and abandon running probes. Anything still in
	 * flight finishes into a stale generation and is dropped.
	 */
	reset(): void {
		this.generation++
		for (const probes of Object.values(this.inFlight)) {
			for (const token of probes.values()) {
				token.controller.abort(new CancelledError("Probe abandoned"))
			}
			probes.clear()
		}
		this.sizes.clear()
		this.previews.clear()
		this.sizeFailures.clear()
		this.previewFailures.clear()
	}

	shutdown(): void {
		this.closed = true
		this.reset()
	}

	private begin(kind: ProbeKind, url: string): ProbeToken {
		const token: ProbeToken = {
			generation: this.generation,
			controller: new AbortController(),
		}
		this.inFlight[kind].set(url, token)
		return token
	}

	private owns(kind: ProbeKind, url: string, token: ProbeToken): boolean {
		return (
			!this.closed &&
			token.generation === this.generation &&
			this.inFlight[kind].get(url) === token
		)
	}

	private end(kind: ProbeKind, url: string, token: ProbeToken): void {
		if (this.inFlight[kind].get(url) === token) {
			this.inFlight[kind].delete(url)
		}
	}

	private emit(event: ProbeEvent): void {
		if (!this.options.onEvent) return
		try {
			this.options.onEvent(event)
		} catch (err) {
			log.probe.error({ err, event: event.type }, "probe listener failed")
		}
	}
}
