/**
 * Error taxonomy for catalog sync and downloads
 *
 * Every failure the engine reports is an AssetSyncError subclass with a
 * `kind` literal, so callers can switch on it instead of matching messages.
 */

export type AssetSyncErrorKind =
	| "network"
	| "timeout"
	| "envelope"
	| "malformed-catalog"
	| "validation-rejected"
	| "size-limit"
	| "integrity"
	| "import"
	| "cancelled"

export interface AssetSyncErrorOptions {
	retryable?: boolean
	cause?: unknown
}

export abstract class AssetSyncError extends Error {
	abstract readonly kind: AssetSyncErrorKind
	readonly retryable: boolean

	constructor(message: string, options: AssetSyncErrorOptions = {}) {
		super(
			message,
			options.cause !== undefined ? { cause: options.cause } : undefined,
		)
		this.name = new.target.name
		this.retryable = options.retryable ?? false
	}
}

/** Connection, DNS, protocol or HTTP status failure */
export class NetworkError extends AssetSyncError {
	readonly kind = "network" as const
	readonly statusCode: number | undefined

	constructor(
		message: string,
		options: AssetSyncErrorOptions & { statusCode?: number } = {},
	) {
		super(message, {
			...options,
			retryable:
				options.retryable ??
				(options.statusCode === undefined ||
					options.statusCode >= 500 ||
					options.statusCode === 429),
		})
		this.statusCode = options.statusCode
	}
}

export class TimeoutError extends AssetSyncError {
	readonly kind = "timeout" as const
	readonly timeoutMs: number

	constructor(timeoutMs: number, what = "Request") {
		super(`${what} timed out after ${timeoutMs}ms`, { retryable: true })
		this.timeoutMs = timeoutMs
	}
}

/** Source-hosting API envelope present but unusable */
export class EnvelopeError extends AssetSyncError {
	readonly kind = "envelope" as const
}

export class MalformedCatalogError extends AssetSyncError {
	readonly kind = "malformed-catalog" as const
}

/** URL failed the security policy. Counted and logged, never shown to users. */
export class ValidationRejected extends AssetSyncError {
	readonly kind = "validation-rejected" as const
	readonly url: string

	constructor(url: string, reason: string) {
		super(`Rejected ${url}: ${reason}`)
		this.url = url
	}
}

export class SizeLimitExceeded extends AssetSyncError {
	readonly kind = "size-limit" as const
	readonly limit: number
	readonly actual: number

	constructor(limit: number, actual: number, stage: "pre-flight" | "post-flight") {
		super(
			stage === "pre-flight"
				? `File size ${actual} bytes exceeds the ${limit} byte limit`
				: `Received more than the ${limit} byte limit (${actual} bytes)`,
		)
		this.limit = limit
		this.actual = actual
	}
}

/** Empty or missing result after a transfer reported success */
export class IntegrityError extends AssetSyncError {
	readonly kind = "integrity" as const
}

/** The importer rejected an otherwise good file */
export class ImportError extends AssetSyncError {
	readonly kind = "import" as const
}

export class CancelledError extends AssetSyncError {
	readonly kind = "cancelled" as const

	constructor(message = "Operation cancelled") {
		super(message)
	}
}

function isAbortError(err: unknown): boolean {
	return (
		typeof err === "object" &&
		err !== null &&
		"name" in err &&
		(err.name === "AbortError" || err.name === "TimeoutError")
	)
}

/**
 * Normalize anything thrown by fetch, streams or the filesystem.
 * undici reports socket failures as `TypeError: fetch failed` with the real
 * reason in `cause`, so the cause message is folded in.
 */
export function toAssetSyncError(err: unknown): AssetSyncError {
	if (err instanceof AssetSyncError) return err
	if (isAbortError(err)) return new CancelledError("Request aborted")

	if (err instanceof Error) {
		const cause = err.cause instanceof Error ? err.cause.message : undefined
		const message =
			cause && cause !== err.message ? `${err.message}: ${cause}` : err.message
		return new NetworkError(message, { cause: err })
	}

	return new NetworkError(String(err))
}

/** Message helper matching the `err instanceof Error ? ... : String(err)` idiom */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
