import { describe, it, expect } from "vitest"
import { ContextRetriever, chooseTopK, fillBudget, selectTables, type ContextRetrieverOptions, type TokenEstimator } from "./context_retriever.js"
import { toContextElement } from "./vector_store.js"
import { FakeEmbeddingService, FakeVectorStore, hits, recordingLogger } from "./test_support.js"
import type { ContextElement, ConversationTurn, RelationshipElement, TableElement } from "./types.js"

const OPTIONS: ContextRetrieverOptions = {
	topKSimple: 5,
	topKComplex: 15,
	threshold: 0.3,
	maxTables: 6,
	walkDepth: 2,
	maxContextTokens: 3000,
	promptOverheadTokens: 600,
}

function corpus() {
	return [
		hits.table("patients", 0.9, "Patient demographics"),
		hits.table("admissions", 0.8, "Inpatient stays"),
		hits.table("visits", 0.5),
		hits.table("departments", 0.35),
		hits.table("wards", 0.2),
		hits.column("patients", "id", "integer", 0.7),
		hits.column("patients", "name", "text", 0.6),
		hits.column("admissions", "admitted_at", "timestamp", 0.75),
		hits.column("wards", "name", "text", 0.4),
		hits.column("visits", "reason", "text", 0.2),
		hits.relationship("admissions", "patient_id", "patients", "id", 0.1),
		hits.relationship("admissions", "ward_id", "wards", "id", 0.05),
		hits.relationship("wards", "department_id", "departments", "id", 0.05),
		hits.relationship("visits", "patient_id", "patients", "id", 0.05),
		hits.example("How many patients are there", "SELECT count(*) FROM patients", 0.6, "count"),
		hits.example("List all wards", "SELECT name FROM wards", 0.5, "list"),
		hits.rule("Timestamps are stored in UTC", 0.4),
		hits.rule("Count distinct patients, not admissions", 0.35, ["count"]),
		hits.rule("Break ranking ties by name", 0.45, ["ranking"]),
	]
}

function setup(options: Partial<ContextRetrieverOptions> = {}, estimator?: TokenEstimator) {
	const embeddings = new FakeEmbeddingService()
	const store = new FakeVectorStore(corpus())
	const { logger, lines } = recordingLogger()
	const retriever = new ContextRetriever(embeddings, store, { ...OPTIONS, ...options }, estimator, logger)
	return { embeddings, store, retriever, lines }
}

function ids(elements: ContextElement[]): string[] {
	return elements.map((e) => e.id)
}

function tableElement(name: string, score: number): TableElement {
	const element = toContextElement(hits.table(name, score))
	if (element?.kind !== "table") throw new Error("fixture")
	return element
}

function relationshipElement(from: string, to: string): RelationshipElement {
	const element = toContextElement(hits.relationship(from, `${to}_id`, to, "id", 0.1))
	if (element?.kind !== "relationship") throw new Error("fixture")
	return element
}

describe("chooseTopK", () => {
	const history: ConversationTurn[] = []

	it("uses the small K for single-clause questions", () => {
		expect(chooseTopK("how many patients were admitted yesterday", history, OPTIONS)).toBe(5)
	})

	it("uses the large K for join indicators", () => {
		expect(chooseTopK("admissions per ward", history, OPTIONS)).toBe(15)
		expect(chooseTopK("patients, wards and departments", history, OPTIONS)).toBe(15)
	})
})

describe("selectTables", () => {
	it("walks relationships from the best table before filling by similarity", () => {
		const tables = [tableElement("a", 0.9), tableElement("b", 0.8), tableElement("c", 0.7)]
		const relationships = [relationshipElement("c", "a")]

		expect(selectTables(tables, relationships, { maxTables: 2, walkDepth: 2 }).map((t) => t.metadata.table)).toEqual(["a", "c"])
		expect(selectTables(tables, relationships, { maxTables: 2, walkDepth: 0 }).map((t) => t.metadata.table)).toEqual(["a", "b"])
	})

	it("ignores relationships to tables that are not candidates", () => {
		const tables = [tableElement("a", 0.9), tableElement("b", 0.8)]
		const relationships = [relationshipElement("a", "z")]
		expect(selectTables(tables, relationships, { maxTables: 5, walkDepth: 2 }).map((t) => t.metadata.table)).toEqual(["a", "b"])
	})

	it("returns nothing without candidates", () => {
		expect(selectTables([], [], { maxTables: 5, walkDepth: 2 })).toEqual([])
	})
})

describe("fillBudget", () => {
	it("stops at the first element that does not fit", () => {
		const elements = [tableElement("a", 0.9), tableElement("b", 0.8), tableElement("c", 0.7)]
		const estimate = (text: string) => (text.endsWith(" b") ? 100 : 10)
		const result = fillBudget(elements, 45, estimate)
		expect(ids(result.elements)).toEqual(["table:a"])
		expect(result.totalTokens).toBe(10)
	})
})

describe("ContextRetriever", () => {
	it("searches each kind with K-derived sizes", async () => {
		const { store, retriever } = setup()
		await retriever.retrieve("how many patients were admitted yesterday", "count")
		expect(store.searches).toEqual([
			{ kind: "table", topK: 5 },
			{ kind: "column", topK: 20 },
			{ kind: "relationship", topK: 10 },
			{ kind: "example", topK: 3 },
			{ kind: "rule", topK: 3 },
		])
	})

	it("assembles the context for the selected tables in score order", async () => {
		const { retriever } = setup()
		const context = await retriever.retrieve("how many patients were admitted yesterday", "count")

		expect(context.degraded).toBe(false)
		expect(context.tokenBudget).toBe(2400)
		expect(ids(context.elements)).toEqual([
			"table:patients",
			"table:admissions",
			"column:admissions.admitted_at",
			"column:patients.id",
			"column:patients.name",
			"example:How many patients are there",
			"table:visits",
			"rule:Timestamps are stored in UTC",
			"table:departments",
			"rule:Count distinct patients, not admissions",
			"relationship:admissions.patient_id",
			"relationship:visits.patient_id",
		])
	})

	it("keeps the total within the token budget", async () => {
		const { retriever } = setup({ maxContextTokens: 45, promptOverheadTokens: 0 }, () => 10)
		const context = await retriever.retrieve("how many patients were admitted yesterday", "count")

		expect(context.tokenBudget).toBe(45)
		expect(context.totalTokens).toBe(40)
		expect(ids(context.elements)).toEqual([
			"table:patients",
			"table:admissions",
			"column:admissions.admitted_at",
			"column:patients.id",
		])
	})

	it.each([0, 10, 25, 60, 120])("never exceeds a budget of %i tokens", async (budget) => {
		const { retriever } = setup({ maxContextTokens: budget, promptOverheadTokens: 0 })
		const context = await retriever.retrieve("admissions per ward and department", "count")
		expect(context.totalTokens).toBeLessThanOrEqual(context.tokenBudget)
	})

	it("returns a degraded context when embedding fails", async () => {
		const { embeddings, retriever, lines } = setup()
		embeddings.failWith = new Error("connection refused")

		const context = await retriever.retrieve("how many patients", "count")

		expect(context).toEqual({
			queryText: "how many patients",
			intent: "count",
			elements: [],
			totalTokens: 0,
			tokenBudget: 2400,
			degraded: true,
		})
		expect(lines.some((l) => l.level === "warn" && l.message === "Context retrieval failed, continuing without schema context")).toBe(true)
	})

	it("rethrows when the caller cancelled", async () => {
		const { store, retriever } = setup()
		store.failWith = new Error("aborted")
		const controller = new AbortController()
		controller.abort()

		await expect(retriever.retrieve("how many patients", "count", [], controller.signal)).rejects.toMatchObject({
			kind: "cancelled",
		})
	})

	it("skips hits whose metadata does not match their kind", async () => {
		const { store, retriever, lines } = setup()
		store.hits.push({ id: "column:broken", kind: "column", content: "broken", metadata: {}, score: 0.99 })

		const context = await retriever.retrieve("how many patients", "count")

		expect(ids(context.elements)).not.toContain("column:broken")
		expect(lines.find((l) => l.message === "Skipped vector hits with malformed metadata")?.fields).toEqual({ count: 1 })
	})
})
