import { describe, it, expect } from "vitest"
import { ResponseCache, TtlCache } from "./response_cache.js"
import type { Response } from "./types.js"

function fakeClock(start = 1_000) {
	let now = start
	return {
		clock: () => now,
		advance: (ms: number) => {
			now += ms
		},
	}
}

function response(question: string): Response {
	return {
		queryId: `q-${question}`,
		sessionId: "s1",
		question,
		statement: "SELECT count(*) FROM patients",
		execution: {
			success: true,
			rows: [{ count: 3 }],
			columns: ["count"],
			rowCount: 1,
			executionTimeMs: 4,
			complete: true,
			warnings: [],
			attempts: 1,
		},
		answer: "The count is 3.",
		latencyMs: 20,
		cacheHit: false,
		intent: "count",
		confidence: 0.9,
		validationWarnings: [],
	}
}

describe("TtlCache", () => {
	it("expires entries after their ttl", () => {
		const t = fakeClock()
		const cache = new TtlCache<number>(10, 100, t.clock)
		cache.set("a", 1)
		t.advance(99)
		expect(cache.get("a")).toBe(1)
		t.advance(1)
		expect(cache.get("a")).toBeUndefined()
		expect(cache.size).toBe(0)
	})

	it("evicts the least recently used entry when full", () => {
		const cache = new TtlCache<number>(2, 1000)
		cache.set("a", 1)
		cache.set("b", 2)
		cache.get("a")
		cache.set("c", 3)
		expect(cache.get("b")).toBeUndefined()
		expect(cache.get("a")).toBe(1)
		expect(cache.get("c")).toBe(3)
	})

	it("accepts a per-entry ttl and prunes expired entries", () => {
		const t = fakeClock()
		const cache = new TtlCache<string>(10, 1000, t.clock)
		cache.set("short", "x", 10)
		cache.set("long", "y")
		t.advance(50)
		expect(cache.prune()).toBe(1)
		expect(cache.values()).toEqual(["y"])
	})
})

describe("ResponseCache", () => {
	it("hits for identical normalized text and schema version within ttl", () => {
		const t = fakeClock()
		const cache = new ResponseCache({ maxEntries: 10, ttlMs: 5000 }, t.clock)
		const r = response("how many patients")
		cache.set("how many patients", "v1", r)
		t.advance(4999)
		expect(cache.get("how many patients", "v1")).toBe(r)
		t.advance(1)
		expect(cache.get("how many patients", "v1")).toBeUndefined()
		expect(cache.stats()).toEqual({ entries: 0, hits: 1, misses: 1, schemaVersion: "v1" })
	})

	it("clears every entry when the schema version changes", () => {
		const cache = new ResponseCache({ maxEntries: 10, ttlMs: 5000 })
		cache.set("a", "v1", response("a"))
		cache.set("b", "v1", response("b"))
		expect(cache.get("a", "v2")).toBeUndefined()
		expect(cache.stats().entries).toBe(0)
		expect(cache.get("b", "v1")).toBeUndefined()
	})

	it("derives distinct fingerprints per schema version", () => {
		expect(ResponseCache.fingerprint("q", "v1")).not.toBe(ResponseCache.fingerprint("q", "v2"))
		expect(ResponseCache.fingerprint("q", "v1")).toMatch(/^[0-9a-f]{64}$/)
	})
})
