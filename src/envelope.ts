/**
 * Source-hosting API envelope decoding
 *
 * The contents API of a source-hosting platform does not return the file
 * itself but a JSON object carrying it as base64:
 *
 * ```json
 * { "content": "eyJhc3NldHMiOltdfQ==\n", "encoding": "base64", ... }
 * ```
 */

import { z } from "zod"
import { EnvelopeError } from "./errors.js"

const API_ENVELOPE_HOSTS = ["api.github.com"]

const EnvelopeSchema = z.object({
	content: z.string().nullish(),
	encoding: z.string().nullish(),
})

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

/**
 * Whether a catalog URL serves the envelope format rather than the raw document
 */
export function isApiEnvelopeSource(catalogUrl: string): boolean {
	try {
		const host = new URL(catalogUrl).hostname.toLowerCase()
		return API_ENVELOPE_HOSTS.includes(host)
	} catch {
		return false
	}
}

function decodeBase64Utf8(content: string): string {
	// The API wraps base64 at 60 columns
	const compact = content.replace(/\s+/g, "")
	if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
		throw new EnvelopeError("Envelope content is not valid base64")
	}

	const bytes = Buffer.from(compact, "base64")
	try {
		return new TextDecoder("utf-8", { fatal: true }).decode(bytes)
	} catch (err) {
		throw new EnvelopeError("Envelope content is not valid UTF-8", {
			cause: err,
		})
	}
}

/**
 * Unwrap an envelope body into the embedded document text.
 * @throws EnvelopeError when the body is not an envelope or carries no usable payload
 */
export function unwrapEnvelope(raw: string): string {
	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch (err) {
		throw new EnvelopeError("Envelope is not valid JSON", { cause: err })
	}

	const parsed = EnvelopeSchema.safeParse(json)
	if (!parsed.success) {
		throw new EnvelopeError("Envelope is not a JSON object with a content field")
	}

	const { content, encoding } = parsed.data
	if (!content || !content.trim()) {
		throw new EnvelopeError("Envelope has no content")
	}
	if (encoding && encoding.toLowerCase() !== "base64") {
		throw new EnvelopeError(`Unsupported envelope encoding: ${encoding}`)
	}

	return decodeBase64Utf8(content)
}
