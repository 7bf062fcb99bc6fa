/**
 * Human-readable formatting for sizes and durations
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB"] as const

/**
 * Format a byte count with up to two decimals, trailing zeros dropped:
 * 1536 → "1.5 KB", 1048576 → "1 MB". GB is the largest unit.
 */
export function formatBytes(bytes: number): string {
	let value = Math.max(0, bytes)
	let order = 0
	while (value >= 1024 && order < SIZE_UNITS.length - 1) {
		value /= 1024
		order++
	}
	const rounded = Math.round(value * 100) / 100
	return `${rounded} ${SIZE_UNITS[order] ?? "B"}`
}

/** Size label for an entry view; 0 means the size is not known yet */
export function formatEntrySize(bytes: number): string {
	return bytes > 0 ? formatBytes(bytes) : "Calculating..."
}

/**
 * Format ETA in seconds to human-readable string
 */
export function formatEta(seconds: number): string {
	if (seconds < 60) return `${Math.round(seconds)}s`
	if (seconds < 3600) return `${Math.round(seconds / 60)}m`
	const h = Math.floor(seconds / 3600)
	const m = Math.round((seconds % 3600) / 60)
	return `${h}h ${m}m`
}
