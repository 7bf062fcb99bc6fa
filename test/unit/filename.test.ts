/**
 * Unit tests for scratch file naming
 */

import { describe, it, expect } from "vitest"
import { dirname, join, resolve } from "node:path"
import { packageFileName, sanitizeFileComponent, scratchPathFor } from "../../src/filename.js"
import { makeEntry } from "../helpers/index.js"

describe("sanitizeFileComponent", () => {
	it.each([
		["Cool Shader", "Cool_Shader"],
		["a/b\\c", "abc"],
		['what?*<>:"|', "what"],
		["../../evil", "evil"],
		["v1..2", "v1.2"],
		["  spaced  out  ", "spaced_out"],
		["tab\there", "tabhere"],
		["...", "fallback"],
		["", "fallback"],
	])("cleans %j to %j", (input, expected) => {
		expect(sanitizeFileComponent(input, "fallback")).toBe(expected)
	})
})

describe("packageFileName", () => {
	it("joins name, version and extension", () => {
		const entry = makeEntry({
			name: "Cool Shader",
			version: "2.1",
			downloadUrl: "https://cdn.example.com/files/shader.zip",
		})
		expect(packageFileName(entry)).toBe("Cool_Shader_2.1.zip")
	})

	it("falls back for empty name and version", () => {
		const entry = makeEntry({
			name: "",
			version: "",
			downloadUrl: "https://cdn.example.com/download?id=1",
		})
		expect(packageFileName(entry)).toBe("package_latest.unitypackage")
	})
})

describe("scratchPathFor", () => {
	const scratch = join("/tmp", "assetsync-scratch")

	it("keeps traversal names inside the scratch directory", () => {
		const entry = makeEntry({
			name: "../../evil",
			version: "../1",
			downloadUrl: "https://cdn.example.com/evil.unitypackage",
		})
		const path = scratchPathFor(scratch, entry)
		expect(path).toBe(join(resolve(scratch), "evil_1.unitypackage"))
		expect(dirname(path)).toBe(resolve(scratch))
	})

	it("resolves relative scratch directories", () => {
		const path = scratchPathFor("scratch", makeEntry({ name: "Alpha", version: "1.0" }))
		expect(path).toBe(resolve("scratch", "Alpha_1.0.unitypackage"))
	})
})
