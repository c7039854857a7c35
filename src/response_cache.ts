/**
 * Caches
 *
 * TtlCache is the bounded store behind every cache in the pipeline
 * (responses, embeddings, validation results, schema snapshots, sessions):
 * per-entry expiry plus least-recently-used eviction. A Map keeps insertion
 * order, so re-inserting on access moves an entry to the most-recent end.
 *
 * All mutation is synchronous; nothing awaits between a read and a write.
 */

import { createHash } from "crypto"
import { systemClock, type Clock } from "./deadline.js"
import type { Response } from "./types.js"

interface Entry<V> {
	value: V
	expiresAt: number
}

export class TtlCache<V> {
	private entries = new Map<string, Entry<V>>()

	constructor(
		private readonly maxEntries: number,
		private readonly ttlMs: number,
		private readonly clock: Clock = systemClock,
	) {}

	get(key: string): V | undefined {
		const entry = this.entries.get(key)
		if (!entry) return undefined
		if (entry.expiresAt <= this.clock()) {
			this.entries.delete(key)
			return undefined
		}
		this.entries.delete(key)
		this.entries.set(key, entry)
		return entry.value
	}

	set(key: string, value: V, ttlMs: number = this.ttlMs): void {
		this.entries.delete(key)
		while (this.entries.size >= this.maxEntries) {
			const oldest = this.entries.keys().next()
			if (oldest.done) break
			this.entries.delete(oldest.value)
		}
		this.entries.set(key, { value, expiresAt: this.clock() + ttlMs })
	}

	has(key: string): boolean {
		return this.get(key) !== undefined
	}

	delete(key: string): boolean {
		return this.entries.delete(key)
	}

	clear(): void {
		this.entries.clear()
	}

	/** Drop expired entries; returns how many were removed */
	prune(): number {
		const now = this.clock()
		let removed = 0
		for (const [key, entry] of this.entries) {
			if (entry.expiresAt <= now) {
				this.entries.delete(key)
				removed++
			}
		}
		return removed
	}

	/** Live entries, most recently used last */
	values(): V[] {
		this.prune()
		return Array.from(this.entries.values(), (e) => e.value)
	}

	get size(): number {
		return this.entries.size
	}
}

export function sha256(text: string): string {
	return createHash("sha256").update(text).digest("hex")
}

// ============================================================================
// Response cache
// ============================================================================

export interface ResponseCacheStats {
	entries: number
	hits: number
	misses: number
	schemaVersion: string | null
}

/**
 * Final responses keyed by fingerprint(normalized text, schema version).
 * Seeing a new schema version clears every entry.
 */
export class ResponseCache {
	private cache: TtlCache<Response>
	private schemaVersion: string | null = null
	private hits = 0
	private misses = 0

	constructor(options: { maxEntries: number; ttlMs: number }, clock: Clock = systemClock) {
		this.cache = new TtlCache(options.maxEntries, options.ttlMs, clock)
	}

	static fingerprint(normalizedText: string, schemaVersion: string): string {
		return sha256(`${normalizedText}\u0000${schemaVersion}`)
	}

	get(normalizedText: string, schemaVersion: string): Response | undefined {
		this.syncVersion(schemaVersion)
		const hit = this.cache.get(ResponseCache.fingerprint(normalizedText, schemaVersion))
		if (hit) {
			this.hits++
		} else {
			this.misses++
		}
		return hit
	}

	set(normalizedText: string, schemaVersion: string, response: Response): void {
		this.syncVersion(schemaVersion)
		this.cache.set(ResponseCache.fingerprint(normalizedText, schemaVersion), response)
	}

	stats(): ResponseCacheStats {
		return { entries: this.cache.size, hits: this.hits, misses: this.misses, schemaVersion: this.schemaVersion }
	}

	private syncVersion(schemaVersion: string): void {
		if (this.schemaVersion !== null && this.schemaVersion !== schemaVersion) {
			this.cache.clear()
		}
		this.schemaVersion = schemaVersion
	}
}
