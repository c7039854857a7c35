/**
 * In-process stand-ins for the pipeline's external collaborators, shared by
 * the unit tests. Nothing here touches the network or a database.
 */

import { CachedSchemaProvider, type SchemaSnapshot, type SchemaSource, type TableInfo } from "./schema_provider.js"
import type { EmbeddingService } from "./embedding_client.js"
import type { VectorHit, VectorStore } from "./vector_store.js"
import type { GenerationRequest, GenerativeBackend } from "./ollama_client.js"
import type { ExecuteOptions, RawResult, StatementExecutor } from "./pg_executor.js"
import type { LogFields, Logger, LogLevel } from "./logger.js"
import type { ContextKind, IntentKind } from "./types.js"

// ============================================================================
// Schema fixture
// ============================================================================

function table(name: string, rowCount: number, columns: Array<[string, string]>, comment: string | null = null): TableInfo {
	return {
		schema: "public",
		name,
		comment,
		rowCount,
		columns: columns.map(([column, dataType]) => ({
			name: column,
			dataType,
			nullable: column !== "id",
			isPrimaryKey: column === "id",
			comment: null,
		})),
	}
}

export function fixtureTables(): TableInfo[] {
	return [
		table("patients", 50_000, [["id", "integer"], ["name", "text"], ["birth_date", "date"], ["gender", "text"]], "Patient demographics"),
		table("admissions", 120_000, [
			["id", "integer"],
			["patient_id", "integer"],
			["ward_id", "integer"],
			["admitted_at", "timestamp without time zone"],
			["discharged_at", "timestamp without time zone"],
		], "Inpatient stays"),
		table("wards", 40, [["id", "integer"], ["name", "text"], ["department_id", "integer"]]),
		table("departments", 12, [["id", "integer"], ["name", "text"]]),
		table("visits", 2_000_000, [["id", "integer"], ["patient_id", "integer"], ["visited_at", "timestamp without time zone"], ["reason", "text"]]),
	]
}

export const FIXTURE_FOREIGN_KEYS = [
	{ fromTable: "admissions", fromColumn: "patient_id", toTable: "patients", toColumn: "id" },
	{ fromTable: "admissions", fromColumn: "ward_id", toTable: "wards", toColumn: "id" },
	{ fromTable: "wards", fromColumn: "department_id", toTable: "departments", toColumn: "id" },
	{ fromTable: "visits", fromColumn: "patient_id", toTable: "patients", toColumn: "id" },
]

export class FixtureSchemaSource implements SchemaSource {
	version = "v1"
	versionLoads = 0
	snapshotLoads = 0
	tables = fixtureTables()

	async loadVersion(): Promise<string> {
		this.versionLoads++
		return this.version
	}

	async loadSnapshot(): Promise<Omit<SchemaSnapshot, "loadedAt">> {
		this.snapshotLoads++
		return {
			version: this.version,
			tables: new Map(this.tables.map((t) => [t.name, t])),
			foreignKeys: [...FIXTURE_FOREIGN_KEYS],
		}
	}
}

export function fixtureSchema(source: SchemaSource = new FixtureSchemaSource()): CachedSchemaProvider {
	return new CachedSchemaProvider(source, { ttlMs: 3_600_000, versionCheckMs: 60_000 })
}

// ============================================================================
// Retrieval
// ============================================================================

export class FakeEmbeddingService implements EmbeddingService {
	calls: string[] = []
	failWith: Error | null = null

	async embed(text: string): Promise<number[]> {
		this.calls.push(text)
		if (this.failWith) throw this.failWith
		return [1, 0, 0]
	}
}

export class FakeVectorStore implements VectorStore {
	searches: Array<{ kind?: ContextKind; topK: number }> = []
	failWith: Error | null = null

	constructor(public hits: VectorHit[] = []) {}

	async search(_vector: number[], topK: number, kind?: ContextKind): Promise<VectorHit[]> {
		this.searches.push({ kind, topK })
		if (this.failWith) throw this.failWith
		return this.hits
			.filter((h) => kind === undefined || h.kind === kind)
			.sort((a, b) => b.score - a.score)
			.slice(0, topK)
	}

	async upsert(): Promise<number> {
		return 0
	}
}

export const hits = {
	table: (name: string, score: number, description = ""): VectorHit => ({
		id: `table:${name}`,
		kind: "table",
		content: `Table ${name}${description ? `: ${description}` : ""}`,
		metadata: { table: name, schema: "public", ...(description ? { description } : {}) },
		score,
	}),
	column: (tableName: string, column: string, dataType: string, score: number): VectorHit => ({
		id: `column:${tableName}.${column}`,
		kind: "column",
		content: `Column ${tableName}.${column} (${dataType})`,
		metadata: { table: tableName, column, dataType },
		score,
	}),
	relationship: (fromTable: string, fromColumn: string, toTable: string, toColumn: string, score: number): VectorHit => ({
		id: `relationship:${fromTable}.${fromColumn}`,
		kind: "relationship",
		content: `${fromTable}.${fromColumn} references ${toTable}.${toColumn}`,
		metadata: { fromTable, fromColumn, toTable, toColumn },
		score,
	}),
	example: (question: string, sql: string, score: number, intent?: IntentKind): VectorHit => ({
		id: `example:${question}`,
		kind: "example",
		content: `Question: ${question}\nSQL: ${sql}`,
		metadata: { question, sql, ...(intent ? { intent } : {}) },
		score,
	}),
	rule: (text: string, score: number, intents?: IntentKind[]): VectorHit => ({
		id: `rule:${text}`,
		kind: "rule",
		content: text,
		metadata: intents ? { intents } : {},
		score,
	}),
}

// ============================================================================
// Generation
// ============================================================================

/** Replays completions in order; an Error entry is thrown instead */
export class ScriptedBackend implements GenerativeBackend {
	requests: GenerationRequest[] = []

	constructor(private readonly script: Array<string | Error>) {}

	get prompts(): string[] {
		return this.requests.map((r) => r.prompt)
	}

	async generate(request: GenerationRequest): Promise<string> {
		this.requests.push(request)
		const next = this.script.length > 1 ? this.script.shift() : this.script[0]
		if (next === undefined) return ""
		if (next instanceof Error) throw next
		return next
	}
}

// ============================================================================
// Execution
// ============================================================================

export type ExecuteHandler = (sql: string, options: ExecuteOptions) => RawResult | Promise<RawResult>

export class FakeExecutor implements StatementExecutor {
	calls: string[] = []
	pingResult = true

	constructor(private handler: ExecuteHandler = () => ({ rows: [], columns: [] })) {}

	respond(handler: ExecuteHandler): void {
		this.handler = handler
	}

	async execute(sql: string, options: ExecuteOptions): Promise<RawResult> {
		this.calls.push(sql)
		return this.handler(sql, options)
	}

	async ping(): Promise<boolean> {
		return this.pingResult
	}
}

/** Error shaped like the ones pg raises, carrying a SQLSTATE or socket code */
export function pgError(code: string, message = `error ${code}`): Error {
	return Object.assign(new Error(message), { code })
}

// ============================================================================
// Logging
// ============================================================================

export interface LogLine {
	level: LogLevel
	message: string
	fields?: LogFields
}

export function recordingLogger(): { logger: Logger; lines: LogLine[] } {
	const lines: LogLine[] = []
	const record = (level: LogLevel) => (message: string, fields?: LogFields) => {
		lines.push({ level, message, fields })
	}
	return {
		lines,
		logger: {
			debug: record("debug"),
			info: record("info"),
			warn: record("warn"),
			error: record("error"),
		},
	}
}
