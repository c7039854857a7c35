/**
 * Vector store
 *
 * Context elements live in one pgvector table (see sql/001_context_elements.sql)
 * with a kind discriminator, so a single cosine-distance query serves every
 * element kind. Metadata is validated on the way out, turning each hit into a
 * typed ContextElement.
 */

import type { Pool, PoolClient } from "pg"
import { z } from "zod"
import { throwIfAborted } from "./deadline.js"
import { CONTEXT_KINDS, type ContextElement, type ContextKind } from "./types.js"

export interface VectorHit {
	id: string
	kind: ContextKind
	content: string
	metadata: Record<string, unknown>
	score: number
}

export interface VectorRecord {
	id: string
	kind: ContextKind
	content: string
	metadata: Record<string, unknown>
	embedding: number[]
}

export interface VectorStore {
	search(vector: number[], topK: number, kind?: ContextKind, signal?: AbortSignal): Promise<VectorHit[]>
	upsert(records: VectorRecord[], signal?: AbortSignal): Promise<number>
}

// ============================================================================
// Metadata decoding
// ============================================================================

const intentSchema = z.enum(["count", "aggregate", "ranking", "comparison", "trend", "list", "lookup", "unknown"])

const metadataSchemas = {
	table: z.object({
		table: z.string(),
		schema: z.string().default("public"),
		description: z.string().optional(),
		rowCount: z.number().optional(),
	}),
	column: z.object({
		table: z.string(),
		column: z.string(),
		dataType: z.string(),
	}),
	relationship: z.object({
		fromTable: z.string(),
		fromColumn: z.string(),
		toTable: z.string(),
		toColumn: z.string(),
	}),
	example: z.object({
		question: z.string(),
		sql: z.string(),
		intent: intentSchema.optional(),
	}),
	rule: z.object({
		intents: z.array(intentSchema).optional(),
	}),
}

export function isContextKind(value: unknown): value is ContextKind {
	return typeof value === "string" && CONTEXT_KINDS.some((k) => k === value)
}

/** Decode a hit into a typed element; null when its metadata does not fit its kind */
export function toContextElement(hit: VectorHit): ContextElement | null {
	const base = { id: hit.id, content: hit.content, score: hit.score }
	switch (hit.kind) {
		case "table": {
			const m = metadataSchemas.table.safeParse(hit.metadata)
			return m.success ? { ...base, kind: "table", metadata: { ...m.data, table: m.data.table.toLowerCase() } } : null
		}
		case "column": {
			const m = metadataSchemas.column.safeParse(hit.metadata)
			return m.success
				? {
						...base,
						kind: "column",
						metadata: { ...m.data, table: m.data.table.toLowerCase(), column: m.data.column.toLowerCase() },
					}
				: null
		}
		case "relationship": {
			const m = metadataSchemas.relationship.safeParse(hit.metadata)
			return m.success
				? {
						...base,
						kind: "relationship",
						metadata: {
							fromTable: m.data.fromTable.toLowerCase(),
							fromColumn: m.data.fromColumn.toLowerCase(),
							toTable: m.data.toTable.toLowerCase(),
							toColumn: m.data.toColumn.toLowerCase(),
						},
					}
				: null
		}
		case "example": {
			const m = metadataSchemas.example.safeParse(hit.metadata)
			return m.success ? { ...base, kind: "example", metadata: m.data } : null
		}
		case "rule": {
			const m = metadataSchemas.rule.safeParse(hit.metadata)
			if (!m.success) return null
			return { ...base, kind: "rule", metadata: m.data.intents ? { intents: m.data.intents } : {} }
		}
	}
}

// ============================================================================
// pgvector
// ============================================================================

interface HitRow {
	id: string
	kind: string
	content: string
	metadata: unknown
	score: number | string
}

function toVectorLiteral(vector: number[]): string {
	return `[${vector.join(",")}]`
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

export class PgVectorStore implements VectorStore {
	/**
	 * @param table schema-qualified table name, validated by the config schema
	 */
	constructor(
		private readonly pool: Pool,
		private readonly table: string,
	) {}

	async search(vector: number[], topK: number, kind?: ContextKind, signal?: AbortSignal): Promise<VectorHit[]> {
		throwIfAborted(signal)
		const query = `
			SELECT
				id,
				kind,
				content,
				metadata,
				1 - (embedding <=> $1::vector) AS score
			FROM ${this.table}
			WHERE ($3::text IS NULL OR kind = $3)
			ORDER BY embedding <=> $1::vector
			LIMIT $2
		`
		const result = await this.pool.query<HitRow>(query, [toVectorLiteral(vector), topK, kind ?? null])

		const hits: VectorHit[] = []
		for (const row of result.rows) {
			if (!isContextKind(row.kind)) continue
			hits.push({
				id: row.id,
				kind: row.kind,
				content: row.content,
				metadata: isRecord(row.metadata) ? row.metadata : {},
				score: Number(row.score),
			})
		}
		return hits
	}

	async upsert(records: VectorRecord[], signal?: AbortSignal): Promise<number> {
		throwIfAborted(signal)
		if (records.length === 0) return 0

		const query = `
			INSERT INTO ${this.table} (id, kind, content, metadata, embedding, updated_at)
			VALUES ($1, $2, $3, $4::jsonb, $5::vector, now())
			ON CONFLICT (id) DO UPDATE SET
				kind = EXCLUDED.kind,
				content = EXCLUDED.content,
				metadata = EXCLUDED.metadata,
				embedding = EXCLUDED.embedding,
				updated_at = now()
		`

		const client: PoolClient = await this.pool.connect()
		try {
			await client.query("BEGIN")
			for (const record of records) {
				await client.query(query, [
					record.id,
					record.kind,
					record.content,
					JSON.stringify(record.metadata),
					toVectorLiteral(record.embedding),
				])
			}
			await client.query("COMMIT")
			return records.length
		} catch (err) {
			await client.query("ROLLBACK")
			throw err
		} finally {
			client.release()
		}
	}
}
