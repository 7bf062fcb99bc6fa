/**
 * Scratch file naming
 *
 * Catalog names and versions are untrusted text. Everything that ends up in a
 * path goes through sanitizeFileComponent, and the final path is checked to be
 * a direct child of the scratch directory.
 */

import { isAbsolute, relative, resolve, sep } from "node:path"
import { IntegrityError } from "./errors.js"
import type { CatalogEntry } from "./types.js"
import { packageExtension } from "./url-policy.js"

// Reserved on at least one common filesystem, plus ASCII control characters
// eslint-disable-next-line no-control-regex
const UNSAFE_CHARS = /[\u0000-\u001f\u007f<>:"/\\|?*]/g

/**
 * Strip filesystem-unsafe characters and dot runs from one path component.
 * Never returns "", "." or "..".
 */
export function sanitizeFileComponent(value: string, fallback: string): string {
	const cleaned = value
		.replace(UNSAFE_CHARS, "")
		.replace(/\s+/g, "_")
		.replace(/\.{2,}/g, ".")
		.replace(/^[._]+|[._]+$/g, "")
	return cleaned || fallback
}

/** `<name>_<version>.<ext>` */
export function packageFileName(entry: CatalogEntry): string {
	const name = sanitizeFileComponent(entry.name, "package")
	const version = sanitizeFileComponent(entry.version, "latest")
	return `${name}_${version}.${packageExtension(entry.downloadUrl)}`
}

/**
 * Absolute destination path for an entry inside `scratchDir`.
 * @throws IntegrityError if the name would resolve anywhere else
 */
export function scratchPathFor(scratchDir: string, entry: CatalogEntry): string {
	const root = resolve(scratchDir)
	const target = resolve(root, packageFileName(entry))
	const rel = relative(root, target)
	if (!rel || rel.startsWith("..") || isAbsolute(rel) || rel.includes(sep)) {
		throw new IntegrityError(
			`Refusing to write outside the scratch directory: ${entry.name}`,
		)
	}
	return target
}
