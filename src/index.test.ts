import { describe, it, expect } from "vitest"
import { formatOutcome } from "./index.js"

describe("formatOutcome", () => {
	it("renders an answer with its statement and rows", () => {
		const { text, isError } = formatOutcome({
			kind: "answer",
			response: {
				queryId: "q1",
				sessionId: "s1",
				question: "How many wards are there?",
				statement: "SELECT count(*) FROM wards",
				execution: {
					success: true,
					rows: [{ count: "40" }],
					columns: ["count"],
					rowCount: 1,
					executionTimeMs: 3,
					complete: true,
					warnings: [],
					attempts: 1,
				},
				answer: "The count is 40.",
				latencyMs: 12,
				cacheHit: false,
				intent: "count",
				confidence: 0.9,
				validationWarnings: ["Query may be expensive"],
			},
		})

		expect(isError).toBe(false)
		expect(JSON.parse(text)).toEqual({
			query_id: "q1",
			answer: "The count is 40.",
			sql: "SELECT count(*) FROM wards",
			columns: ["count"],
			rows: [{ count: "40" }],
			row_count: 1,
			complete: true,
			warnings: ["Query may be expensive"],
			confidence: 0.9,
			cache_hit: false,
			latency_ms: 12,
		})
	})

	it("flags errors for the client", () => {
		const { text, isError } = formatOutcome({
			kind: "error",
			error: {
				queryId: "q2",
				kind: "circuit_open",
				message: "The database is temporarily unavailable",
				suggestions: ["Try again in 30 seconds"],
				traceId: "q2",
			},
		})

		expect(isError).toBe(true)
		expect(JSON.parse(text)).toEqual({
			query_id: "q2",
			error: "circuit_open",
			message: "The database is temporarily unavailable",
			suggestions: ["Try again in 30 seconds"],
			trace_id: "q2",
		})
	})

	it("lists clarification questions", () => {
		const { text } = formatOutcome({
			kind: "clarification",
			clarification: { queryId: "q3", question: "Show me discharges", intent: "list", confidence: 0.4, questions: ["Which period?"] },
		})
		expect(JSON.parse(text)).toEqual({
			query_id: "q3",
			clarification_needed: true,
			confidence: 0.4,
			questions: ["Which period?"],
		})
	})
})
