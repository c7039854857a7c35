/**
 * Context Documents
 *
 * Builds the retrieval corpus the context retriever searches:
 *   - one table document per table (description, columns, size)
 *   - one column document per column
 *   - one relationship document per foreign key
 *   - curated examples and rules from a YAML corpus file
 *
 * Ids are stable, so re-ingesting upserts in place.
 */

import * as yaml from "js-yaml"
import { z } from "zod"
import { sha256 } from "./response_cache.js"
import type { SchemaSnapshot } from "./schema_provider.js"
import type { VectorRecord } from "./vector_store.js"

export type ContextDocument = Omit<VectorRecord, "embedding">

const intentSchema = z.enum(["count", "aggregate", "ranking", "comparison", "trend", "list", "lookup", "unknown"])

export const corpusSchema = z.object({
	examples: z
		.array(
			z.object({
				question: z.string().min(1),
				sql: z.string().min(1),
				intent: intentSchema.optional(),
			}),
		)
		.default([]),
	rules: z
		.array(
			z.object({
				text: z.string().min(1),
				intents: z.array(intentSchema).optional(),
			}),
		)
		.default([]),
})

export type Corpus = z.infer<typeof corpusSchema>

function shortHash(text: string): string {
	return sha256(text).slice(0, 16)
}

// ============================================================================
// Schema documents
// ============================================================================

export function schemaDocuments(snapshot: SchemaSnapshot, exclude: string[] = []): ContextDocument[] {
	const skipped = new Set(exclude.map((t) => t.toLowerCase()))
	const documents: ContextDocument[] = []

	for (const table of snapshot.tables.values()) {
		if (skipped.has(table.name.toLowerCase())) continue

		const columnNames = table.columns.map((c) => c.name).join(", ")
		documents.push({
			id: `table:${table.schema}.${table.name}`,
			kind: "table",
			content: `Table ${table.name}${table.comment ? `: ${table.comment}` : ""}. Columns: ${columnNames}`,
			metadata: {
				table: table.name,
				schema: table.schema,
				...(table.comment ? { description: table.comment } : {}),
				rowCount: table.rowCount,
			},
		})

		for (const column of table.columns) {
			documents.push({
				id: `column:${table.schema}.${table.name}.${column.name}`,
				kind: "column",
				content: `Column ${table.name}.${column.name} (${column.dataType})${column.comment ? `: ${column.comment}` : ""}`,
				metadata: { table: table.name, column: column.name, dataType: column.dataType },
			})
		}
	}

	for (const fk of snapshot.foreignKeys) {
		if (skipped.has(fk.fromTable.toLowerCase()) || skipped.has(fk.toTable.toLowerCase())) continue
		documents.push({
			id: `relationship:${fk.fromTable}.${fk.fromColumn}`,
			kind: "relationship",
			content: `${fk.fromTable}.${fk.fromColumn} references ${fk.toTable}.${fk.toColumn}`,
			metadata: { ...fk },
		})
	}

	return documents
}

// ============================================================================
// Curated corpus
// ============================================================================

export function parseCorpus(text: string): Corpus {
	const result = corpusSchema.safeParse(yaml.load(text) ?? {})
	if (!result.success) {
		const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
		throw new Error(`Invalid corpus file: ${details}`)
	}
	return result.data
}

export function corpusDocuments(corpus: Corpus): ContextDocument[] {
	const examples = corpus.examples.map(
		(e): ContextDocument => ({
			id: `example:${shortHash(e.question)}`,
			kind: "example",
			content: `Question: ${e.question}\nSQL: ${e.sql}`,
			metadata: { question: e.question, sql: e.sql, ...(e.intent ? { intent: e.intent } : {}) },
		}),
	)
	const rules = corpus.rules.map(
		(r): ContextDocument => ({
			id: `rule:${shortHash(r.text)}`,
			kind: "rule",
			content: r.text,
			metadata: r.intents ? { intents: r.intents } : {},
		}),
	)
	return [...examples, ...rules]
}
