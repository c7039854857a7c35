import { describe, it, expect } from "vitest"
import { SessionStore } from "./session_store.js"
import type { ConversationTurn } from "./types.js"

function turn(n: number): ConversationTurn {
	const question = `question ${n}`
	return {
		query: {
			id: `q${n}`,
			sessionId: "s1",
			text: question,
			normalizedText: question,
			timestamp: "2024-03-15T10:00:00.000Z",
			intent: "count",
			confidence: 0.9,
			entities: { dates: [], numbers: [n], comparators: [], tableHints: [] },
			isFollowUp: false,
		},
		response: {
			queryId: `q${n}`,
			sessionId: "s1",
			question,
			statement: "SELECT 1",
			execution: {
				success: true, rows: [], columns: [], rowCount: 0, executionTimeMs: 1,
				complete: true, warnings: [], attempts: 1,
			},
			answer: "No matching records were found.",
			latencyMs: 3,
			cacheHit: false,
			intent: "count",
			confidence: 0.9,
			validationWarnings: [],
		},
	}
}

describe("SessionStore", () => {
	it("never keeps more turns than the bound, evicting the oldest", () => {
		const store = new SessionStore({ maxHistory: 3, idleTtlMs: 60_000, maxSessions: 10 })
		for (let i = 1; i <= 5; i++) store.append("s1", turn(i))
		expect(store.history("s1").map((t) => t.query.id)).toEqual(["q3", "q4", "q5"])
	})

	it("returns the most recent window", () => {
		const store = new SessionStore({ maxHistory: 10, idleTtlMs: 60_000, maxSessions: 10 })
		for (let i = 1; i <= 4; i++) store.append("s1", turn(i))
		expect(store.window("s1", 2).map((t) => t.query.id)).toEqual(["q3", "q4"])
		expect(store.window("s1", 0)).toEqual([])
		expect(store.window("unknown", 3)).toEqual([])
	})

	it("returns a copy that callers cannot use to mutate the session", () => {
		const store = new SessionStore({ maxHistory: 10, idleTtlMs: 60_000, maxSessions: 10 })
		store.append("s1", turn(1))
		store.history("s1").push(turn(2))
		expect(store.history("s1")).toHaveLength(1)
	})

	it("expires idle sessions", () => {
		let now = 0
		const store = new SessionStore({ maxHistory: 10, idleTtlMs: 1000, maxSessions: 10 }, () => now)
		store.append("s1", turn(1))
		now = 999
		store.append("s1", turn(2))
		now = 1998
		expect(store.history("s1")).toHaveLength(2)
		now = 1999
		expect(store.history("s1")).toEqual([])
	})

	it("prunes sessions that have been idle past the ttl", () => {
		let now = 0
		const store = new SessionStore({ maxHistory: 10, idleTtlMs: 1000, maxSessions: 10 }, () => now)
		store.append("a", turn(1))
		now = 500
		store.append("b", turn(2))
		now = 1000
		expect(store.prune()).toBe(1)
		expect(store.size).toBe(1)
		expect(store.history("b")).toHaveLength(1)
	})

	it("evicts the least recently active session past the limit", () => {
		const store = new SessionStore({ maxHistory: 10, idleTtlMs: 60_000, maxSessions: 2 })
		store.append("a", turn(1))
		store.append("b", turn(2))
		store.append("a", turn(3))
		store.append("c", turn(4))
		expect(store.history("b")).toEqual([])
		expect(store.history("a")).toHaveLength(2)
		expect(store.size).toBe(2)
	})
})
