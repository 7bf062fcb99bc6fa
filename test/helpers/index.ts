/**
 * Test utilities for assetsync
 */

import { mkdtemp, readFile, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { Headers, Response, type RequestInit } from "undici"
import { DEFAULT_CONFIG, resolveConfig, type Config, type ConfigOverrides } from "../../src/config.js"
import type { FetchFn } from "../../src/http.js"
import type { Importer } from "../../src/importer.js"
import type { CatalogEntry } from "../../src/types.js"

/**
 * Create a temporary directory for test isolation.
 * Returns cleanup function.
 */
export async function withTempDir<T>(
	fn: (dir: string) => Promise<T>,
): Promise<T> {
	const dir = await mkdtemp(join(tmpdir(), "assetsync-test-"))
	try {
		return await fn(dir)
	} finally {
		await rm(dir, { recursive: true, force: true })
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Data builders
// ─────────────────────────────────────────────────────────────────────────────

export const CATALOG_URL = "https://catalog.example.com/data/catalog.json"

export function makeEntry(overrides: Partial<CatalogEntry> = {}): CatalogEntry {
	const name = overrides.name ?? "Alpha"
	return {
		name,
		description: "",
		version: "1.0",
		category: "",
		downloadUrl: `https://cdn.example.com/packages/${name.toLowerCase()}.unitypackage`,
		imageUrl: "",
		fileSize: 0,
		...overrides,
	}
}

/** Raw catalog document as served over HTTP */
export function catalogDocument(entries: readonly Partial<CatalogEntry>[]): string {
	return JSON.stringify({ assets: entries })
}

export function testConfig(dir: string, overrides: ConfigOverrides = {}): Config {
	return resolveConfig(DEFAULT_CONFIG, {
		catalogUrl: CATALOG_URL,
		scratchDir: join(dir, "scratch"),
		importDir: join(dir, "imported"),
		progressIntervalMs: 0,
		...overrides,
	})
}

export function bytesOf(text: string): Uint8Array {
	return new TextEncoder().encode(text)
}

// ─────────────────────────────────────────────────────────────────────────────
// HTTP fakes
// ─────────────────────────────────────────────────────────────────────────────

export type RouteHandler = (init: RequestInit | undefined) => Response | Promise<Response>

export interface RecordedRequest {
	url: string
	method: string
	userAgent: string | null
}

export interface FakeFetch {
	fetch: FetchFn
	requests: RecordedRequest[]
	route(url: string, handler: RouteHandler): void
	/** Requests made to `url`, optionally filtered by method */
	count(url: string, method?: string): number
}

function headerValue(init: RequestInit | undefined, name: string): string | null {
	const headers = init?.headers
	if (!headers || Array.isArray(headers)) return null
	if (headers instanceof Headers) return headers.get(name)
	for (const [key, value] of Object.entries(headers)) {
		if (key.toLowerCase() === name.toLowerCase() && typeof value === "string") {
			return value
		}
	}
	return null
}

/**
 * In-process stand-in for the HTTP seam. Unrouted URLs answer 404.
 */
export function createFakeFetch(routes: Record<string, RouteHandler> = {}): FakeFetch {
	const table = new Map(Object.entries(routes))
	const requests: RecordedRequest[] = []

	const fetch: FetchFn = async (url, init) => {
		requests.push({
			url,
			method: init?.method ?? "GET",
			userAgent: headerValue(init, "user-agent"),
		})
		const handler = table.get(url)
		if (!handler) return new Response("not found", { status: 404, statusText: "Not Found" })
		return handler(init)
	}

	return {
		fetch,
		requests,
		route(url, handler) {
			table.set(url, handler)
		},
		count(url, method) {
			return requests.filter(
				request => request.url === url && (method === undefined || request.method === method),
			).length
		},
	}
}

export function textResponse(body: string, init: { status?: number; headers?: Record<string, string> } = {}): Response {
	return new Response(body, { status: init.status ?? 200, headers: init.headers ?? {} })
}

export function bytesResponse(bytes: Uint8Array, headers: Record<string, string> = {}): Response {
	return new Response(bytes, { status: 200, headers })
}

/**
 * Never answers; rejects with the abort reason once the request's signal fires.
 */
export function hang(init: RequestInit | undefined): Promise<Response> {
	return new Promise<Response>((_resolve, reject) => {
		const signal = init?.signal
		if (!signal) return
		if (signal.aborted) {
			reject(signal.reason)
			return
		}
		signal.addEventListener("abort", () => reject(signal.reason), { once: true })
	})
}

export interface Deferred<T> {
	promise: Promise<T>
	resolve(value: T): void
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {}
	const promise = new Promise<T>(r => {
		resolve = r
	})
	return { promise, resolve }
}

/** Let pending promise callbacks and I/O callbacks run */
export function flush(): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, 10))
}

// ─────────────────────────────────────────────────────────────────────────────
// Importer fakes
// ─────────────────────────────────────────────────────────────────────────────

export interface ImportedPackage {
	name: string
	path: string
	content: string
}

/**
 * Importer that records what it was given. The file content is read during
 * the call because the engine deletes the scratch file right after.
 */
export class RecordingImporter implements Importer {
	readonly imported: ImportedPackage[] = []

	constructor(private readonly failure: Error | null = null) {}

	async import(localPath: string, entry: CatalogEntry): Promise<void> {
		const content = await readFile(localPath, "utf-8")
		this.imported.push({ name: entry.name, path: localPath, content })
		if (this.failure) throw this.failure
	}
}
