/**
 * Prompt construction for SQL generation
 *
 * Sections, each omitted when empty:
 *   Instructions, Schema, Relationships, Rules, Examples, Conversation,
 *   Correction (retries only), Question, SQL
 *
 * Tables render compactly as `name (col type, col type) -- description`.
 */

import type { ContextElement, ConversationTurn, RetrievalContext } from "./types.js"

export const NO_SQL_MARKER = "NO_SQL"

export interface Correction {
	sql: string
	notes: string[]
}

export interface PromptInput {
	question: string
	dialect: string
	context: RetrievalContext
	history: ConversationTurn[]
	correction?: Correction
}

const DIALECT_NAMES: Record<string, string> = {
	postgres: "PostgreSQL",
}

function section(title: string, lines: string[]): string[] {
	return lines.length > 0 ? [`### ${title}`, ...lines, ""] : []
}

/** One line per table, with the columns retrieved for it */
export function renderSchema(elements: ContextElement[]): string[] {
	const order: string[] = []
	const descriptions = new Map<string, string>()
	const columns = new Map<string, string[]>()

	const touch = (table: string) => {
		if (!order.includes(table)) order.push(table)
	}

	for (const e of elements) {
		if (e.kind === "table") {
			touch(e.metadata.table)
			if (e.metadata.description) descriptions.set(e.metadata.table, e.metadata.description)
		} else if (e.kind === "column") {
			touch(e.metadata.table)
			const list = columns.get(e.metadata.table) ?? []
			list.push(`${e.metadata.column} ${e.metadata.dataType}`)
			columns.set(e.metadata.table, list)
		}
	}

	return order.map((table) => {
		const cols = columns.get(table)
		const description = descriptions.get(table)
		return `${table}${cols ? ` (${cols.join(", ")})` : ""}${description ? ` -- ${description}` : ""}`
	})
}

export function buildPrompt(input: PromptInput): string {
	const { context } = input
	const dialect = DIALECT_NAMES[input.dialect] ?? input.dialect
	const elements = context.elements

	const schema = renderSchema(elements)
	const relationships = elements.flatMap((e) =>
		e.kind === "relationship"
			? [`${e.metadata.fromTable}.${e.metadata.fromColumn} = ${e.metadata.toTable}.${e.metadata.toColumn}`]
			: [],
	)
	const rules = elements.flatMap((e) => (e.kind === "rule" ? [`- ${e.content}`] : []))
	const examples = elements.flatMap((e) =>
		e.kind === "example" ? [`Question: ${e.metadata.question}`, `SQL: ${e.metadata.sql}`, ""] : [],
	)
	const conversation = input.history.flatMap((turn) => [
		`Question: ${turn.query.text}`,
		`SQL: ${turn.response.statement}`,
	])

	const lines = [
		...section("Instructions", [
			`Write one read-only ${dialect} query (SELECT or WITH) that answers the question.`,
			"Use only the tables and columns listed under Schema.",
			`If the schema cannot answer the question, reply with ${NO_SQL_MARKER} and nothing else.`,
		]),
		...section("Schema", schema.length > 0 ? schema : ["(no schema context available)"]),
		...section("Relationships", relationships),
		...section("Rules", rules),
		...section("Examples", examples.slice(0, -1)),
		...section("Conversation", conversation),
		...(input.correction
			? section("Correction", [
					"The previous query was rejected:",
					input.correction.sql,
					...input.correction.notes.map((n) => `- ${n}`),
					"Write a corrected query.",
				])
			: []),
		...section("Question", [input.question]),
		"### SQL",
	]

	return lines.join("\n")
}
