/**
 * Streaming ZIP extraction using yauzl
 *
 * Used by the directory importer for `.zip` packages. Entries stream to
 * .part files and are renamed into place; entries whose path would land
 * outside the destination are skipped.
 */

import {
	createWriteStream,
	existsSync,
	renameSync,
	unlinkSync,
	mkdirSync,
} from "node:fs"
import { pipeline } from "node:stream/promises"
import { dirname, extname, isAbsolute, relative, resolve } from "node:path"
import yauzl from "yauzl"
import { log } from "./logger.js"

export interface ExtractResult {
	success: boolean
	extractedFiles: string[]
	skippedFiles: string[]
	error?: string
}

/**
 * Promisified yauzl.open
 */
function openZip(path: string): Promise<yauzl.ZipFile> {
	return new Promise((resolve, reject) => {
		yauzl.open(
			path,
			{ lazyEntries: true, autoClose: false },
			(err, zipFile) => {
				if (err) reject(err)
				else if (!zipFile) reject(new Error("Failed to open zip file"))
				else resolve(zipFile)
			},
		)
	})
}

/**
 * Get readable stream for a zip entry
 */
function openReadStream(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
): Promise<NodeJS.ReadableStream> {
	return new Promise((resolve, reject) => {
		zipFile.openReadStream(entry, (err, stream) => {
			if (err) reject(err)
			else if (!stream) reject(new Error("Failed to open read stream"))
			else resolve(stream)
		})
	})
}

/**
 * Resolve an archive entry name under destDir, or null if it escapes it
 */
export function safeEntryPath(destDir: string, entryName: string): string | null {
	const root = resolve(destDir)
	const normalized = entryName.replace(/\\/g, "/")
	if (normalized.startsWith("/") || /^[a-zA-Z]:/.test(normalized)) return null
	const target = resolve(root, normalized)
	const rel = relative(root, target)
	if (!rel || rel.startsWith("..") || isAbsolute(rel)) return null
	return target
}

/**
 * Extract a ZIP archive into destDir, keeping its directory structure
 */
export async function extractZip(
	archivePath: string,
	destDir: string,
): Promise<ExtractResult> {
	const extractedFiles: string[] = []
	const skippedFiles: string[] = []

	// Ensure destination exists
	mkdirSync(destDir, { recursive: true })

	let zipFile: yauzl.ZipFile | null = null

	try {
		zipFile = await openZip(archivePath)

		// Process entries one by one (streaming, low memory)
		await new Promise<void>((resolve, reject) => {
			if (!zipFile) return reject(new Error("Zip file not opened"))

			const zf = zipFile

			zf.on("error", reject)
			zf.on("end", resolve)

			zf.on("entry", (entry: yauzl.Entry) => {
				void (async () => {
					// Skip directories
					if (entry.fileName.endsWith("/")) {
						zf.readEntry()
						return
					}

					const outputPath = safeEntryPath(destDir, entry.fileName)
					if (!outputPath) {
						skippedFiles.push(entry.fileName)
						zf.readEntry()
						return
					}

					const partPath = `${outputPath}.part.${process.pid}`

					// Ensure parent directory exists
					mkdirSync(dirname(outputPath), { recursive: true })

					// Stream extract to .part file
					const readStream = await openReadStream(zf, entry)
					const writeStream = createWriteStream(partPath)

					await pipeline(readStream, writeStream)

					// Atomic rename
					if (existsSync(outputPath)) {
						unlinkSync(outputPath) // Remove existing file
					}
					renameSync(partPath, outputPath)
					extractedFiles.push(entry.fileName)

					// Continue to next entry
					zf.readEntry()
				})().catch(reject)
			})

			// Start reading entries
			zf.readEntry()
		})

		zipFile.close()

		if (skippedFiles.length > 0) {
			log.importer.warn(
				{ archivePath, skippedFiles },
				"skipped archive entries outside the destination",
			)
		}

		return { success: true, extractedFiles, skippedFiles }
	} catch (err) {
		if (zipFile) {
			try {
				zipFile.close()
			} catch (closeErr) {
				log.importer.debug({ archivePath, closeErr }, "zip close failed")
			}
		}

		return {
			success: false,
			extractedFiles,
			skippedFiles,
			error: err instanceof Error ? err.message : String(err),
		}
	}
}

/**
 * Check if a file is a ZIP archive by extension
 */
export function isZipArchive(filename: string): boolean {
	return extname(filename).toLowerCase() === ".zip"
}
