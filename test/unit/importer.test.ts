/**
 * Unit tests for the directory importer
 */

import { describe, it, expect } from "vitest"
import { readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { ImportError } from "../../src/errors.js"
import { DirectoryImporter } from "../../src/importer.js"
import { makeEntry, withTempDir } from "../helpers/index.js"
import { buildZip } from "../helpers/zip.js"

describe("DirectoryImporter", () => {
	const entry = makeEntry({ name: "Alpha Pack" })

	it("copies a package into the import directory", async () => {
		await withTempDir(async dir => {
			const source = join(dir, "Alpha_Pack_1.0.unitypackage")
			await writeFile(source, "package-bytes")
			const importDir = join(dir, "project", "Imported")

			await new DirectoryImporter(importDir).import(source, entry)

			expect(await readFile(join(importDir, "Alpha_Pack_1.0.unitypackage"), "utf-8")).toBe(
				"package-bytes",
			)
		})
	})

	it("extracts a zip into a folder named after the entry", async () => {
		await withTempDir(async dir => {
			const source = join(dir, "Alpha_Pack_1.0.zip")
			await writeFile(source, buildZip({ "Textures/wood.txt": "grain" }))
			const importDir = join(dir, "Imported")

			await new DirectoryImporter(importDir).import(source, entry)

			expect(await readFile(join(importDir, "Alpha_Pack", "Textures", "wood.txt"), "utf-8")).toBe(
				"grain",
			)
		})
	})

	it("fails on an archive without files", async () => {
		await withTempDir(async dir => {
			const source = join(dir, "empty.zip")
			await writeFile(source, buildZip({ "only-a-folder/": "" }))
			const importer = new DirectoryImporter(join(dir, "Imported"))

			await expect(importer.import(source, entry)).rejects.toThrow(
				"Archive empty.zip contained no files",
			)
		})
	})

	it("fails on a corrupt archive", async () => {
		await withTempDir(async dir => {
			const source = join(dir, "bad.zip")
			await writeFile(source, "not a zip")
			const importer = new DirectoryImporter(join(dir, "Imported"))

			const failure = importer.import(source, entry)
			await expect(failure).rejects.toBeInstanceOf(ImportError)
			await expect(failure).rejects.toThrow(/^Failed to extract bad\.zip: /)
		})
	})

	it("propagates a missing source file", async () => {
		await withTempDir(async dir => {
			const importer = new DirectoryImporter(join(dir, "Imported"))

			await expect(importer.import(join(dir, "gone.unitypackage"), entry)).rejects.toThrow(
				"ENOENT",
			)
		})
	})
})
