/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output
 *
 * Log levels:
 * - fatal: System crash
 * - error: Operation failed
 * - warn: Recoverable issue
 * - info: Key milestones (default for production)
 * - debug: Detailed operation info (--verbose)
 * - trace: Very detailed debugging
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** Redirect logs to this file instead of the console */
	logFilePath?: string | undefined
	/** Override the level for this run (e.g. "debug" for --verbose) */
	level?: string | undefined
}

let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function createConsoleLogger(logLevel: string) {
	return isDev
		? pino({
				level: logLevel,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
						destination: 2,
					},
				},
			})
		: pino(
				{
					level: logLevel,
					base: { pid: undefined, hostname: undefined },
				},
				pino.destination(2),
			)
}

function createFileLogger(path: string, logLevel: string) {
	ensureDirExists(path)
	// The CLI sets process.exitCode on failure; sync writes keep the tail of the log.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel = process.env["LOG_LEVEL_FILE"] ?? logLevel
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger(level)

/** Reconfigure logging for a CLI run. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	const nextLevel = options.level ?? level
	if (options.logFilePath) {
		currentLogFilePath = options.logFilePath
		logger = createFileLogger(options.logFilePath, nextLevel)
	} else {
		currentLogFilePath = null
		logger = createConsoleLogger(nextLevel)
	}
	return { logFilePath: currentLogFilePath }
}

/** Returns the current log file path if file logging is enabled. */
export function getLogFilePath(): string | null {
	return currentLogFilePath
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("download")
 * log.debug({ name }, "starting transfer")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get sync() {
		return createLogger("sync")
	},
	get download() {
		return createLogger("download")
	},
	get probe() {
		return createLogger("probe")
	},
	get importer() {
		return createLogger("import")
	},
	get config() {
		return createLogger("config")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
