/**
 * Configuration management with Zod validation
 */

import { existsSync, readFileSync } from "node:fs"
import { homedir, tmpdir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { errorMessage } from "./errors.js"
import { log } from "./logger.js"

export const DEFAULT_CATALOG_URL = "http://vrton.org/data/catalog.json"

export const USER_AGENT = "assetsync/1.0.0 (+catalog sync)"

export const ConfigSchema = z.object({
	catalogUrl: z.string().url().default(DEFAULT_CATALOG_URL),
	scratchDir: z.string().min(1).default(join(tmpdir(), "assetsync")),
	importDir: z.string().min(1).default(join("Assets", "Imported")),
	requestTimeoutMs: z.number().int().min(100).max(600_000).default(30_000),
	downloadTimeoutMultiplier: z.number().min(1).max(100).default(10),
	maxDownloadBytes: z
		.number()
		.int()
		.positive()
		.default(500 * 1024 * 1024),
	// Unset means: allow only when the catalog itself lives on a private host
	allowPrivateHosts: z.boolean().optional(),
	jobs: z.number().int().min(1).max(16).default(4),
	progressIntervalMs: z.number().int().min(0).max(10_000).default(100),
	userAgent: z.string().min(1).default(USER_AGENT),
})

export type Config = z.infer<typeof ConfigSchema>

/** CLI-style overrides; undefined values leave the base value in place */
export type ConfigOverrides = { [K in keyof Config]?: Config[K] | undefined }

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({})

export interface LoadConfigOptions {
	cwd?: string
	home?: string
	env?: NodeJS.ProcessEnv
}

/**
 * Load configuration from .assetsyncrc (JSON format)
 * Checks current directory first, then home directory.
 * ASSETSYNC_CATALOG_URL overrides the catalog URL from any file.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
	const cwd = options.cwd ?? process.cwd()
	const home = options.home ?? homedir()
	const env = options.env ?? process.env

	const paths = [
		join(cwd, ".assetsyncrc"),
		join(cwd, ".assetsyncrc.json"),
		join(home, ".assetsyncrc"),
		join(home, ".assetsyncrc.json"),
	]

	let config = DEFAULT_CONFIG
	for (const path of paths) {
		if (!existsSync(path)) continue
		try {
			const raw = readFileSync(path, "utf-8")
			config = ConfigSchema.parse(JSON.parse(raw))
			break
		} catch (err) {
			// Continue to next path if invalid
			log.config.warn({ path, error: errorMessage(err) }, "ignoring invalid config file")
		}
	}

	const catalogUrl = env["ASSETSYNC_CATALOG_URL"]
	return catalogUrl ? resolveConfig(config, { catalogUrl }) : config
}

/**
 * Merge overrides onto a base configuration and validate the result.
 * @throws ZodError when an override is out of range
 */
export function resolveConfig(
	base: Config,
	overrides: ConfigOverrides = {},
): Config {
	const defined = Object.fromEntries(
		Object.entries(overrides).filter(([, value]) => value !== undefined),
	)
	return ConfigSchema.parse({ ...base, ...defined })
}
