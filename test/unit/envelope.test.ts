/**
 * Unit tests for source-hosting envelope decoding
 */

import { describe, it, expect } from "vitest"
import { isApiEnvelopeSource, unwrapEnvelope } from "../../src/envelope.js"
import { EnvelopeError } from "../../src/errors.js"

function envelope(content: unknown, encoding: unknown = "base64"): string {
	return JSON.stringify({ name: "catalog.json", content, encoding })
}

function base64(text: string): string {
	return Buffer.from(text, "utf-8").toString("base64")
}

describe("isApiEnvelopeSource", () => {
	it("matches the contents API host only", () => {
		expect(
			isApiEnvelopeSource("https://api.github.com/repos/o/r/contents/catalog.json"),
		).toBe(true)
		expect(isApiEnvelopeSource("https://raw.githubusercontent.com/o/r/main/catalog.json")).toBe(
			false,
		)
		expect(isApiEnvelopeSource("https://example.com/api.github.com/catalog.json")).toBe(false)
		expect(isApiEnvelopeSource("not a url")).toBe(false)
	})
})

describe("unwrapEnvelope", () => {
	it("decodes base64 content", () => {
		expect(unwrapEnvelope(envelope(base64('{"assets":[]}')))).toBe('{"assets":[]}')
	})

	it("ignores line breaks in the content", () => {
		const encoded = base64('{"assets":[{"name":"Alpha"}]}')
		const wrapped = `${encoded.slice(0, 12)}\n${encoded.slice(12)}\n`
		expect(unwrapEnvelope(envelope(wrapped))).toBe('{"assets":[{"name":"Alpha"}]}')
	})

	it("accepts a missing encoding field", () => {
		expect(unwrapEnvelope(JSON.stringify({ content: base64("{}") }))).toBe("{}")
	})

	it("decodes multi-byte UTF-8", () => {
		expect(unwrapEnvelope(envelope(base64('{"name":"Café ☕"}')))).toBe('{"name":"Café ☕"}')
	})

	it.each([
		["not json", "Envelope is not valid JSON"],
		["[1,2]", "Envelope is not a JSON object with a content field"],
		[JSON.stringify({ content: 42 }), "Envelope is not a JSON object with a content field"],
		[envelope(null), "Envelope has no content"],
		[envelope("   "), "Envelope has no content"],
		[envelope(base64("{}"), "utf-16"), "Unsupported envelope encoding: utf-16"],
		[envelope("abc"), "Envelope content is not valid base64"],
		[envelope("ab!d"), "Envelope content is not valid base64"],
		[envelope("/w=="), "Envelope content is not valid UTF-8"],
	])("rejects %s", (raw, message) => {
		expect(() => unwrapEnvelope(raw)).toThrow(EnvelopeError)
		expect(() => unwrapEnvelope(raw)).toThrow(message)
	})
})
