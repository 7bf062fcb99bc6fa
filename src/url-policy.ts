/**
 * Download URL security policy
 *
 * Keeps the catalog from being used to reach internal services or arbitrary
 * pages: only http(s) URLs on public hosts that look like package downloads
 * are permitted. Pure functions, no DNS or network access.
 */

export type UrlRejection =
	| "invalid-url"
	| "unsupported-scheme"
	| "private-host"
	| "unrecognized-target"

export type UrlCheck = { ok: true; url: URL } | { ok: false; reason: UrlRejection }

const PACKAGE_EXTENSIONS = [".unitypackage", ".zip", ".tar.gz"] as const

const DOWNLOAD_PATH_MARKERS = ["/download", "/releases/", "/attachments/"]

const SOURCE_HOSTING_HOSTS = ["github.com", "gitlab.com", "codeberg.org"]

const SOURCE_HOSTING_MARKERS = ["/releases/", "/download/"]

/** Package extension used when the URL does not name one */
export const DEFAULT_PACKAGE_EXTENSION = "unitypackage"

function parseIpv4(hostname: string): [number, number, number, number] | null {
	const parts = hostname.split(".")
	if (parts.length !== 4) return null
	const octets: number[] = []
	for (const part of parts) {
		if (!/^\d{1,3}$/.test(part)) return null
		const value = Number(part)
		if (value > 255) return null
		octets.push(value)
	}
	const [a = 0, b = 0, c = 0, d = 0] = octets
	return [a, b, c, d]
}

/**
 * Loopback and RFC 1918 ranges.
 * `URL.hostname` keeps IPv6 brackets, so both `[::1]` and `::1` are accepted.
 */
export function isPrivateHost(hostname: string): boolean {
	const host = hostname.toLowerCase().replace(/^\[|\]$/g, "").replace(/\.$/, "")

	if (host === "localhost" || host.endsWith(".localhost")) return true
	if (host === "::1" || host === "0.0.0.0") return true

	const ip = parseIpv4(host)
	if (!ip) return false

	const [a, b] = ip
	if (a === 127) return true
	if (a === 10) return true
	if (a === 172 && b >= 16 && b <= 31) return true
	if (a === 192 && b === 168) return true
	return false
}

/** True when the URL parses and points at a loopback or private host */
export function isPrivateUrl(url: string): boolean {
	try {
		return isPrivateHost(new URL(url).hostname)
	} catch {
		return false
	}
}

function isSourceHostingHost(hostname: string): boolean {
	const host = hostname.toLowerCase()
	if (host.endsWith(".githubusercontent.com")) return true
	return SOURCE_HOSTING_HOSTS.some(
		known => host === known || host.endsWith(`.${known}`),
	)
}

function checkRemote(url: string, allowPrivateHosts: boolean): UrlCheck {
	if (!url) return { ok: false, reason: "invalid-url" }

	let parsed: URL
	try {
		parsed = new URL(url)
	} catch {
		return { ok: false, reason: "invalid-url" }
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		return { ok: false, reason: "unsupported-scheme" }
	}

	if (!allowPrivateHosts && isPrivateHost(parsed.hostname)) {
		return { ok: false, reason: "private-host" }
	}

	return { ok: true, url: parsed }
}

/**
 * Classify a download URL, returning the first rule it fails.
 */
export function checkUrl(url: string, allowPrivateHosts: boolean): UrlCheck {
	const remote = checkRemote(url, allowPrivateHosts)
	if (!remote.ok) return remote

	const path = remote.url.pathname.toLowerCase()
	const query = remote.url.search.toLowerCase()

	const hasExtension = PACKAGE_EXTENSIONS.some(
		ext => path.endsWith(ext) || query.endsWith(ext),
	)
	const hasMarker = DOWNLOAD_PATH_MARKERS.some(
		marker => path.includes(marker) || query.includes(marker),
	)
	const isHostedRelease =
		isSourceHostingHost(remote.url.hostname) &&
		SOURCE_HOSTING_MARKERS.some(marker => path.includes(marker))

	if (hasExtension || hasMarker || isHostedRelease) {
		return remote
	}
	return { ok: false, reason: "unrecognized-target" }
}

export function isPermitted(url: string, allowPrivateHosts: boolean): boolean {
	return checkUrl(url, allowPrivateHosts).ok
}

/**
 * Scheme and host rules only. Preview images are ordinary image URLs and
 * would never pass the package-target rule.
 */
export function isSafeRemoteUrl(
	url: string,
	allowPrivateHosts: boolean,
): boolean {
	return checkRemote(url, allowPrivateHosts).ok
}

/**
 * File extension (without dot) for a download, taken from the URL path when
 * it ends in a known package extension.
 */
export function packageExtension(url: string): string {
	let path: string
	try {
		path = new URL(url).pathname.toLowerCase()
	} catch {
		return DEFAULT_PACKAGE_EXTENSION
	}
	const ext = PACKAGE_EXTENSIONS.find(candidate => path.endsWith(candidate))
	return ext ? ext.slice(1) : DEFAULT_PACKAGE_EXTENSION
}
