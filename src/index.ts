// This module is a library entry point
// For CLI usage, run: npx assetsync list
// Or: npm run cli -- list

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./url-policy.js"
export * from "./envelope.js"
export * from "./catalog.js"
export * from "./filename.js"
export * from "./importer.js"
export * from "./format.js"
export {
	HTTP_AGENT,
	closeHttpAgent,
	defaultFetch,
	parseContentLength,
	type FetchFn,
} from "./http.js"
export { configureLogging, createLogger, flushLogs } from "./logger.js"
export * from "./core/index.js"
