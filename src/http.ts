/**
 * HTTP plumbing shared by the catalog fetch, probes and downloads
 *
 * All requests go through a single `FetchFn` so the engine can be driven by
 * an in-process fake in tests. The default is undici's fetch on a keep-alive
 * agent.
 */

import {
	Agent,
	fetch as undiciFetch,
	type RequestInit,
	type Response,
} from "undici"
import { TimeoutError } from "./errors.js"
import { createLogger } from "./logger.js"

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>

export const HTTP_AGENT = new Agent({
	keepAliveTimeout: 30_000,
	keepAliveMaxTimeout: 60_000,
	pipelining: 1,
})

export const defaultFetch: FetchFn = (url, init) =>
	undiciFetch(url, { ...init, dispatcher: HTTP_AGENT })

/** Close pooled connections so the process can exit promptly */
export async function closeHttpAgent(): Promise<void> {
	await HTTP_AGENT.close()
}

/**
 * Parse a Content-Length header. Returns undefined for missing, negative or
 * non-numeric values.
 */
export function parseContentLength(header: string | null): number | undefined {
	if (header === null) return undefined
	const trimmed = header.trim()
	if (!/^\d+$/.test(trimmed)) return undefined
	const value = Number(trimmed)
	return Number.isSafeInteger(value) ? value : undefined
}

/**
 * Abort `controller` with a TimeoutError after `timeoutMs`.
 * Returns a function that disarms the timer; call it on every exit path.
 */
export function armTimeout(
	controller: AbortController,
	timeoutMs: number,
	what: string,
): () => void {
	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(timeoutMs, what))
	}, timeoutMs)
	return () => clearTimeout(timer)
}

/**
 * The error that actually ended an operation: when our own signal fired, its
 * reason (timeout, cancellation, size limit) wins over whatever abort error
 * fetch or the stream surfaced.
 */
export function failureReason(signal: AbortSignal, err: unknown): unknown {
	return signal.aborted ? signal.reason : err
}

/**
 * Release a response body we are not going to read.
 */
export async function discardBody(response: Response): Promise<void> {
	try {
		await response.body?.cancel()
	} catch (err) {
		createLogger("http").debug({ url: response.url, err }, "failed to discard response body")
	}
}
