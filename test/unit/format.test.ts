/**
 * Unit tests for human-readable formatting
 */

import { describe, it, expect } from "vitest"
import { formatBytes, formatEntrySize, formatEta } from "../../src/format.js"

describe("formatBytes", () => {
	it.each([
		[0, "0 B"],
		[1000, "1000 B"],
		[1024, "1 KB"],
		[1536, "1.5 KB"],
		[1264, "1.23 KB"],
		[1048576, "1 MB"],
		[500 * 1024 * 1024, "500 MB"],
		[3 * 1024 * 1024 * 1024, "3 GB"],
		[2048 * 1024 * 1024 * 1024, "2048 GB"],
	])("formats %d as %s", (bytes, expected) => {
		expect(formatBytes(bytes)).toBe(expected)
	})
})

describe("formatEntrySize", () => {
	it("shows a placeholder while the size is unknown", () => {
		expect(formatEntrySize(0)).toBe("Calculating...")
		expect(formatEntrySize(2048)).toBe("2 KB")
	})
})

describe("formatEta", () => {
	it.each([
		[42, "42s"],
		[150, "3m"],
		[3900, "1h 5m"],
	])("formats %d seconds as %s", (seconds, expected) => {
		expect(formatEta(seconds)).toBe(expected)
	})
})
