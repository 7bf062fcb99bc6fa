/**
 * Catalog document parsing and filtering
 *
 * raw body → (envelope unwrap) → JSON document → entries → permitted entries
 *
 * Entries are parsed one by one so a single bad record only drops itself;
 * only a document without an `assets` array fails as a whole.
 */

import { z } from "zod"
import { MalformedCatalogError, ValidationRejected } from "./errors.js"
import { unwrapEnvelope } from "./envelope.js"
import { log } from "./logger.js"
import type { CatalogEntry, DecodedCatalog } from "./types.js"
import { checkUrl } from "./url-policy.js"

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const text = z
	.string()
	.nullish()
	.transform(value => value?.trim() ?? "")

// Anything but a positive whole number means "unknown"
const size = z
	.unknown()
	.transform(value =>
		typeof value === "number" && Number.isSafeInteger(value) && value > 0
			? value
			: 0,
	)

export const CatalogEntrySchema = z.object({
	name: text,
	description: text,
	version: text,
	downloadUrl: text,
	imageUrl: text,
	category: text,
	fileSize: size,
})

const CatalogDocumentSchema = z.object({
	assets: z.array(z.unknown()),
})

// ─────────────────────────────────────────────────────────────────────────────
// Decoding
// ─────────────────────────────────────────────────────────────────────────────

export interface DecodeOptions {
	/** Body is a source-hosting API envelope around the document */
	sourceIsApiEnvelope: boolean
	/** Permit loopback/private download hosts (development catalogs) */
	allowPrivateHosts: boolean
}

/**
 * Parse catalog document text into entries, without URL filtering.
 * @throws MalformedCatalogError
 */
export function parseCatalogDocument(documentText: string): {
	entries: CatalogEntry[]
	total: number
} {
	let json: unknown
	try {
		json = JSON.parse(documentText)
	} catch (err) {
		throw new MalformedCatalogError("Catalog is not valid JSON", { cause: err })
	}

	const document = CatalogDocumentSchema.safeParse(json)
	if (!document.success) {
		throw new MalformedCatalogError(
			"Catalog must be an object with an \"assets\" array",
		)
	}

	const entries: CatalogEntry[] = []
	document.data.assets.forEach((raw, index) => {
		const parsed = CatalogEntrySchema.safeParse(raw)
		if (parsed.success) {
			entries.push(parsed.data)
		} else {
			log.sync.debug(
				{ index, issues: parsed.error.issues.map(issue => issue.message) },
				"dropping invalid catalog entry",
			)
		}
	})

	return { entries, total: document.data.assets.length }
}

/**
 * Decode a fetched catalog body and keep only entries whose download URL
 * passes the security policy.
 *
 * @throws EnvelopeError when envelope mode is on and the envelope is unusable
 * @throws MalformedCatalogError when the document is structurally invalid
 */
export function decodeCatalog(
	raw: string | Uint8Array,
	options: DecodeOptions,
): DecodedCatalog {
	const body = typeof raw === "string" ? raw : new TextDecoder().decode(raw)
	const documentText = options.sourceIsApiEnvelope
		? unwrapEnvelope(body)
		: body

	const { entries, total } = parseCatalogDocument(documentText)

	const rejections: ValidationRejected[] = []
	const permitted = entries.filter(entry => {
		const check = checkUrl(entry.downloadUrl, options.allowPrivateHosts)
		if (!check.ok) {
			const rejection = new ValidationRejected(entry.downloadUrl, check.reason)
			rejections.push(rejection)
			log.sync.debug(
				{ name: entry.name, err: rejection },
				"download URL rejected by policy",
			)
		}
		return check.ok
	})

	const duplicates = findDuplicateNames(permitted)
	if (duplicates.length > 0) {
		log.sync.warn({ duplicates }, "catalog contains duplicate entry names")
	}

	return { entries: permitted, total, rejected: total - permitted.length, rejections }
}

function findDuplicateNames(entries: readonly CatalogEntry[]): string[] {
	const seen = new Set<string>()
	const duplicates = new Set<string>()
	for (const entry of entries) {
		if (seen.has(entry.name)) duplicates.add(entry.name)
		seen.add(entry.name)
	}
	return [...duplicates]
}
