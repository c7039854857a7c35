/**
 * Context Retriever
 *
 * Flow:
 * 1. Embed the question (cached by normalized text)
 * 2. Pick K: small for single-clause questions, large for multi-clause or
 *    follow-up questions
 * 3. Search the vector store once per element kind
 * 4. Drop hits under the similarity threshold (relationships exempt)
 * 5. Select tables: best table first, breadth-first over relationships among
 *    the candidates, then the rest by similarity, capped at maxTables
 * 6. Keep columns/relationships of selected tables, examples and rules for
 *    the intent
 * 7. Fill the token budget in descending score order
 *
 * A failing embedding service or vector store yields an empty, degraded
 * context rather than an error.
 */

import { cancelledError } from "./deadline.js"
import { errorMessage } from "./errors.js"
import { silentLogger, type Logger } from "./logger.js"
import { toContextElement, type VectorStore } from "./vector_store.js"
import type { EmbeddingService } from "./embedding_client.js"
import type {
	ContextElement,
	ContextKind,
	ConversationTurn,
	IntentKind,
	RelationshipElement,
	RetrievalContext,
	TableElement,
} from "./types.js"

export interface ContextRetrieverOptions {
	topKSimple: number
	topKComplex: number
	threshold: number
	maxTables: number
	walkDepth: number
	maxContextTokens: number
	promptOverheadTokens: number
}

export type TokenEstimator = (text: string) => number

export function charRatioEstimator(charsPerToken: number): TokenEstimator {
	return (text) => Math.ceil(text.length / charsPerToken)
}

const MULTI_CLAUSE = /\b(per|by|each|with|and|along with|for every|join|joined|across|versus|vs)\b|,/i

/** Larger K for questions that likely span several tables */
export function chooseTopK(text: string, history: ConversationTurn[], options: Pick<ContextRetrieverOptions, "topKSimple" | "topKComplex">): number {
	return history.length > 0 || MULTI_CLAUSE.test(text) ? options.topKComplex : options.topKSimple
}

function searchPlan(k: number): Array<[ContextKind, number]> {
	return [
		["table", k],
		["column", 4 * k],
		["relationship", 2 * k],
		["example", 3],
		["rule", 3],
	]
}

// ============================================================================
// Table selection
// ============================================================================

/**
 * Start from the best-scoring table and walk relationships breadth-first
 * (bounded depth) among the candidates, then fill by similarity.
 */
export function selectTables(
	tables: TableElement[],
	relationships: RelationshipElement[],
	options: Pick<ContextRetrieverOptions, "maxTables" | "walkDepth">,
): TableElement[] {
	const ranked = [...tables].sort((a, b) => b.score - a.score)
	if (ranked.length === 0 || options.maxTables <= 0) return []

	const byName = new Map<string, TableElement>()
	for (const t of ranked) {
		if (!byName.has(t.metadata.table)) byName.set(t.metadata.table, t)
	}

	const neighbors = new Map<string, Set<string>>()
	const link = (a: string, b: string) => {
		if (a === b || !byName.has(a) || !byName.has(b)) return
		let set = neighbors.get(a)
		if (!set) {
			set = new Set()
			neighbors.set(a, set)
		}
		set.add(b)
	}
	for (const r of relationships) {
		link(r.metadata.fromTable, r.metadata.toTable)
		link(r.metadata.toTable, r.metadata.fromTable)
	}

	const scoreOf = (name: string) => byName.get(name)?.score ?? 0
	const selected: string[] = [ranked[0].metadata.table]
	const queue: Array<{ table: string; depth: number }> = [{ table: ranked[0].metadata.table, depth: 0 }]

	while (queue.length > 0 && selected.length < options.maxTables) {
		const current = queue.shift()
		if (!current || current.depth >= options.walkDepth) continue
		const next = [...(neighbors.get(current.table) ?? [])].sort((a, b) => scoreOf(b) - scoreOf(a))
		for (const name of next) {
			if (selected.includes(name)) continue
			selected.push(name)
			queue.push({ table: name, depth: current.depth + 1 })
			if (selected.length >= options.maxTables) break
		}
	}

	for (const name of byName.keys()) {
		if (selected.length >= options.maxTables) break
		if (!selected.includes(name)) selected.push(name)
	}

	return selected.flatMap((name) => {
		const element = byName.get(name)
		return element ? [element] : []
	})
}

// ============================================================================
// Budget
// ============================================================================

/** Greedy fill in descending score order; stops at the first element that does not fit */
export function fillBudget(
	elements: ContextElement[],
	budget: number,
	estimate: TokenEstimator,
): { elements: ContextElement[]; totalTokens: number } {
	const ordered = [...elements].sort((a, b) => b.score - a.score)
	const kept: ContextElement[] = []
	let totalTokens = 0
	for (const element of ordered) {
		const cost = estimate(element.content)
		if (totalTokens + cost > budget) break
		kept.push(element)
		totalTokens += cost
	}
	return { elements: kept, totalTokens }
}

// ============================================================================
// Retriever
// ============================================================================

export class ContextRetriever {
	constructor(
		private readonly embeddings: EmbeddingService,
		private readonly store: VectorStore,
		private readonly options: ContextRetrieverOptions,
		private readonly estimate: TokenEstimator = charRatioEstimator(4),
		private readonly logger: Logger = silentLogger,
	) {}

	get tokenBudget(): number {
		return Math.max(0, this.options.maxContextTokens - this.options.promptOverheadTokens)
	}

	async retrieve(
		text: string,
		intent: IntentKind,
		history: ConversationTurn[] = [],
		signal?: AbortSignal,
	): Promise<RetrievalContext> {
		const startTime = Date.now()
		const tokenBudget = this.tokenBudget

		let candidates: ContextElement[]
		try {
			candidates = await this.search(text, history, signal)
		} catch (error) {
			if (signal?.aborted) throw cancelledError()
			this.logger.warn("Context retrieval failed, continuing without schema context", {
				error: errorMessage(error),
			})
			return { queryText: text, intent, elements: [], totalTokens: 0, tokenBudget, degraded: true }
		}

		const relevant = candidates.filter((e) => e.kind === "relationship" || e.score >= this.options.threshold)

		const tables: TableElement[] = []
		const relationships: RelationshipElement[] = []
		for (const e of relevant) {
			if (e.kind === "table") tables.push(e)
			if (e.kind === "relationship") relationships.push(e)
		}

		const selected = selectTables(tables, relationships, this.options)
		const selectedNames = new Set(selected.map((t) => t.metadata.table))

		const attached = relevant.filter((e) => {
			switch (e.kind) {
				case "table":
					return false
				case "column":
					return selectedNames.has(e.metadata.table)
				case "relationship":
					return selectedNames.has(e.metadata.fromTable) && selectedNames.has(e.metadata.toTable)
				case "example":
					return e.metadata.intent === undefined || e.metadata.intent === intent
				case "rule":
					return e.metadata.intents === undefined || e.metadata.intents.includes(intent)
			}
		})

		const { elements, totalTokens } = fillBudget([...selected, ...attached], tokenBudget, this.estimate)

		this.logger.info("Context retrieved", {
			candidates: candidates.length,
			tables: selected.map((t) => t.metadata.table),
			elements: elements.length,
			dropped_for_budget: selected.length + attached.length - elements.length,
			total_tokens: totalTokens,
			token_budget: tokenBudget,
			latency_ms: Date.now() - startTime,
		})

		return { queryText: text, intent, elements, totalTokens, tokenBudget, degraded: false }
	}

	private async search(text: string, history: ConversationTurn[], signal?: AbortSignal): Promise<ContextElement[]> {
		const vector = await this.embeddings.embed(text, signal)
		const k = chooseTopK(text, history, this.options)

		const results = await Promise.all(
			searchPlan(k).map(([kind, topK]) => this.store.search(vector, topK, kind, signal)),
		)

		const elements: ContextElement[] = []
		let malformed = 0
		for (const hit of results.flat()) {
			const element = toContextElement(hit)
			if (element) {
				elements.push(element)
			} else {
				malformed++
			}
		}
		if (malformed > 0) {
			this.logger.warn("Skipped vector hits with malformed metadata", { count: malformed })
		}
		return elements
	}
}
