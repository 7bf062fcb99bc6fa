/**
 * Unit tests for the download URL policy
 */

import { describe, it, expect } from "vitest"
import {
	checkUrl,
	isPermitted,
	isPrivateHost,
	isPrivateUrl,
	isSafeRemoteUrl,
	packageExtension,
} from "../../src/url-policy.js"

describe("isPrivateHost", () => {
	it.each([
		"localhost",
		"api.localhost",
		"127.0.0.1",
		"127.12.0.9",
		"10.0.0.5",
		"172.16.0.1",
		"172.31.255.255",
		"192.168.1.20",
		"0.0.0.0",
		"::1",
		"[::1]",
	])("treats %s as private", host => {
		expect(isPrivateHost(host)).toBe(true)
	})

	it.each(["cdn.example.com", "172.15.0.1", "172.32.0.1", "192.169.0.1", "8.8.8.8", "1.2.3"])(
		"treats %s as public",
		host => {
			expect(isPrivateHost(host)).toBe(false)
		},
	)
})

describe("isPrivateUrl", () => {
	it("reads the host from the URL", () => {
		expect(isPrivateUrl("http://localhost:8080/catalog.json")).toBe(true)
		expect(isPrivateUrl("https://catalog.example.com/catalog.json")).toBe(false)
	})

	it("is false for unparsable input", () => {
		expect(isPrivateUrl("not a url")).toBe(false)
	})
})

describe("checkUrl", () => {
	// ─────────────────────────────────────────────────────────────────────────
	// Scheme and host
	// ─────────────────────────────────────────────────────────────────────────

	it("rejects empty and relative URLs", () => {
		expect(checkUrl("", false)).toEqual({ ok: false, reason: "invalid-url" })
		expect(checkUrl("/packages/a.zip", false)).toEqual({ ok: false, reason: "invalid-url" })
	})

	it.each([
		"ftp://cdn.example.com/pack.unitypackage",
		"file:///tmp/pack.unitypackage",
		"javascript:alert(1)//.zip",
	])("rejects non-http scheme %s regardless of path", url => {
		expect(checkUrl(url, false)).toEqual({ ok: false, reason: "unsupported-scheme" })
		expect(isPermitted(url, true)).toBe(false)
	})

	it.each([
		"http://localhost/download/pack",
		"http://127.0.0.1/pack.unitypackage",
		"http://[::1]/releases/pack.zip",
		"https://192.168.0.10/attachments/pack.tar.gz",
	])("rejects private host %s regardless of path", url => {
		expect(checkUrl(url, false)).toEqual({ ok: false, reason: "private-host" })
	})

	it("permits private hosts when allowed", () => {
		expect(isPermitted("http://localhost:8000/pack.unitypackage", true)).toBe(true)
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Download target
	// ─────────────────────────────────────────────────────────────────────────

	it.each([
		"https://cdn.example.com/files/Pack.UnityPackage",
		"https://cdn.example.com/files/pack.zip",
		"https://cdn.example.com/files/pack.tar.gz",
		"https://cdn.example.com/get?file=pack.zip",
		"https://cdn.example.com/download?id=7",
		"https://cdn.example.com/downloads/7",
		"https://cdn.example.com/a/releases/latest",
		"https://cdn.example.com/attachments/42",
		"https://github.com/owner/repo/releases/latest",
		"https://objects.githubusercontent.com/x/releases/y",
		"https://codeberg.org/owner/repo/releases/tag/v1",
	])("permits package target %s", url => {
		const result = checkUrl(url, false)
		expect(result.ok).toBe(true)
	})

	it.each([
		"https://cdn.example.com/index.html",
		"https://cdn.example.com/pack.zip.html",
		"https://github.com/owner/repo",
		"https://cdn.example.com/",
	])("rejects non-package target %s", url => {
		expect(checkUrl(url, false)).toEqual({ ok: false, reason: "unrecognized-target" })
	})

	it("returns the parsed URL on success", () => {
		const result = checkUrl("https://cdn.example.com/pack.zip", false)
		expect(result.ok && result.url.hostname).toBe("cdn.example.com")
	})
})

describe("isSafeRemoteUrl", () => {
	it("applies scheme and host rules only", () => {
		expect(isSafeRemoteUrl("https://img.example.com/preview.png", false)).toBe(true)
		expect(isSafeRemoteUrl("http://10.1.2.3/preview.png", false)).toBe(false)
		expect(isSafeRemoteUrl("data:image/png;base64,AAAA", false)).toBe(false)
	})
})

describe("packageExtension", () => {
	it("takes the extension from the path", () => {
		expect(packageExtension("https://cdn.example.com/a/pack.zip")).toBe("zip")
		expect(packageExtension("https://cdn.example.com/a/pack.TAR.GZ")).toBe("tar.gz")
		expect(packageExtension("https://cdn.example.com/a/pack.unitypackage")).toBe("unitypackage")
	})

	it("falls back to unitypackage", () => {
		expect(packageExtension("https://cdn.example.com/download?id=3")).toBe("unitypackage")
		expect(packageExtension("nonsense")).toBe("unitypackage")
	})
})
