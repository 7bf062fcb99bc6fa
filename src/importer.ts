/**
 * Package importers
 *
 * The engine hands every verified download to an Importer and deletes the
 * scratch file afterwards, so an importer must copy or extract whatever it
 * wants to keep before returning.
 */

import { copyFile, mkdir } from "node:fs/promises"
import { basename, join } from "node:path"
import { ImportError } from "./errors.js"
import { extractZip, isZipArchive } from "./extract.js"
import { sanitizeFileComponent } from "./filename.js"
import { log } from "./logger.js"
import type { CatalogEntry } from "./types.js"

export interface Importer {
	/**
	 * Import a downloaded package. Throwing marks the download as
	 * "downloaded but import failed".
	 */
	import(localPath: string, entry: CatalogEntry): Promise<void>
}

/**
 * Imports into a project directory: `.zip` packages are extracted into a
 * folder named after the entry, anything else is copied as-is.
 */
export class DirectoryImporter implements Importer {
	constructor(private readonly importDir: string) {}

	async import(localPath: string, entry: CatalogEntry): Promise<void> {
		await mkdir(this.importDir, { recursive: true })

		if (isZipArchive(localPath)) {
			const destDir = join(
				this.importDir,
				sanitizeFileComponent(entry.name, "package"),
			)
			const result = await extractZip(localPath, destDir)
			if (!result.success) {
				throw new ImportError(
					`Failed to extract ${basename(localPath)}: ${result.error ?? "unknown error"}`,
				)
			}
			if (result.extractedFiles.length === 0) {
				throw new ImportError(`Archive ${basename(localPath)} contained no files`)
			}
			log.importer.info(
				{ name: entry.name, destDir, files: result.extractedFiles.length },
				"extracted package",
			)
			return
		}

		const destPath = join(this.importDir, basename(localPath))
		await copyFile(localPath, destPath)
		log.importer.info({ name: entry.name, destPath }, "copied package")
	}
}
