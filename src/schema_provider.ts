/**
 * Schema Provider
 *
 * Authoritative table/column facts for validation and correction:
 * - PgSchemaSource introspects information_schema + pg_catalog
 * - CachedSchemaProvider keeps the snapshot for a TTL and drops it early
 *   when the schema version (md5 over the column listing) changes
 * - rankSimilarNames() produces "did you mean" candidates
 */

import type { Pool, PoolClient } from "pg"
import { systemClock, throwIfAborted, type Clock } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"

// ============================================================================
// Types
// ============================================================================

export interface ColumnInfo {
	name: string
	dataType: string
	nullable: boolean
	isPrimaryKey: boolean
	comment: string | null
}

export interface TableInfo {
	schema: string
	name: string
	comment: string | null
	/** Planner estimate from pg_class.reltuples (0 when never analyzed) */
	rowCount: number
	columns: ColumnInfo[]
}

export interface ForeignKey {
	fromTable: string
	fromColumn: string
	toTable: string
	toColumn: string
}

export interface SchemaSnapshot {
	version: string
	/** Keyed by lower-case table name */
	tables: Map<string, TableInfo>
	foreignKeys: ForeignKey[]
	loadedAt: number
}

export interface SchemaProvider {
	snapshot(signal?: AbortSignal): Promise<SchemaSnapshot>
	schemaVersion(signal?: AbortSignal): Promise<string>
	tableExists(name: string, signal?: AbortSignal): Promise<boolean>
	suggestSimilar(name: string, options?: SuggestOptions, signal?: AbortSignal): Promise<string[]>
}

export interface SuggestOptions {
	limit?: number
	/** Names to rank first, e.g. tables already in the retrieval context */
	preferred?: string[]
}

/** Where snapshots come from (the datastore in production, a fixture in tests) */
export interface SchemaSource {
	loadVersion(signal?: AbortSignal): Promise<string>
	loadSnapshot(signal?: AbortSignal): Promise<Omit<SchemaSnapshot, "loadedAt">>
}

// ============================================================================
// Name similarity
// ============================================================================

export function levenshtein(a: string, b: string): number {
	if (a === b) return 0
	if (a.length === 0) return b.length
	if (b.length === 0) return a.length

	let previous = Array.from({ length: b.length + 1 }, (_, i) => i)
	for (let i = 1; i <= a.length; i++) {
		const current = [i]
		for (let j = 1; j <= b.length; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1
			current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost)
		}
		previous = current
	}
	return previous[b.length]
}

export function nameSimilarity(a: string, b: string): number {
	const x = a.toLowerCase()
	const y = b.toLowerCase()
	const longest = Math.max(x.length, y.length)
	if (longest === 0) return 1
	let score = 1 - levenshtein(x, y) / longest
	// "patient" vs "patients", "adm" vs "admissions"
	if (x.length >= 3 && y.length >= 3 && (x.startsWith(y) || y.startsWith(x))) {
		score = Math.max(score, 0.8)
	}
	return score
}

/**
 * Rank `candidates` by similarity to `name`. Names in `preferred` (e.g. the
 * tables already in the retrieval context) sort ahead of the rest.
 */
export function rankSimilarNames(
	name: string,
	candidates: Iterable<string>,
	options: SuggestOptions = {},
): string[] {
	const { limit = 3, preferred = [] } = options
	const target = name.toLowerCase()
	return Array.from(new Set(candidates))
		.filter((c) => c.toLowerCase() !== target)
		.map((c) => ({ name: c, score: nameSimilarity(target, c) + (preferred.includes(c) ? 1 : 0) }))
		.sort((a, b) => b.score - a.score || a.name.localeCompare(b.name))
		.slice(0, limit)
		.map((c) => c.name)
}

// ============================================================================
// Cached provider
// ============================================================================

export interface CachedSchemaProviderOptions {
	ttlMs: number
	/** Minimum gap between version probes while a snapshot is cached */
	versionCheckMs: number
}

export class CachedSchemaProvider implements SchemaProvider {
	private cached: SchemaSnapshot | null = null
	private lastVersionCheck = 0
	private loading: Promise<SchemaSnapshot> | null = null

	constructor(
		private readonly source: SchemaSource,
		private readonly options: CachedSchemaProviderOptions,
		private readonly logger: Logger = silentLogger,
		private readonly clock: Clock = systemClock,
	) {}

	async snapshot(signal?: AbortSignal): Promise<SchemaSnapshot> {
		throwIfAborted(signal)
		const now = this.clock()
		const cached = this.cached
		if (cached && now - cached.loadedAt < this.options.ttlMs) {
			if (now - this.lastVersionCheck < this.options.versionCheckMs) return cached
			this.lastVersionCheck = now
			const version = await this.source.loadVersion(signal)
			if (version === cached.version) return cached
			this.logger.info("Schema version changed, reloading snapshot", {
				previous: cached.version,
				current: version,
			})
		}
		return this.reload(signal)
	}

	async schemaVersion(signal?: AbortSignal): Promise<string> {
		return (await this.snapshot(signal)).version
	}

	async tableExists(name: string, signal?: AbortSignal): Promise<boolean> {
		const snapshot = await this.snapshot(signal)
		return snapshot.tables.has(name.toLowerCase())
	}

	async suggestSimilar(name: string, options: SuggestOptions = {}, signal?: AbortSignal): Promise<string[]> {
		const snapshot = await this.snapshot(signal)
		return rankSimilarNames(name, snapshot.tables.keys(), options)
	}

	private reload(signal?: AbortSignal): Promise<SchemaSnapshot> {
		// Concurrent requests share one load
		if (this.loading) return this.loading
		const started = this.clock()
		this.loading = this.source
			.loadSnapshot(signal)
			.then((loaded) => {
				const snapshot: SchemaSnapshot = { ...loaded, loadedAt: this.clock() }
				this.cached = snapshot
				this.lastVersionCheck = snapshot.loadedAt
				this.logger.info("Schema snapshot loaded", {
					version: snapshot.version,
					tables: snapshot.tables.size,
					foreign_keys: snapshot.foreignKeys.length,
					latency_ms: this.clock() - started,
				})
				return snapshot
			})
			.finally(() => {
				this.loading = null
			})
		return this.loading
	}
}

// ============================================================================
// PostgreSQL source
// ============================================================================

interface ColumnRow {
	table_schema: string
	table_name: string
	table_comment: string | null
	row_estimate: string | number | null
	column_name: string
	data_type: string
	is_nullable: boolean
	is_pk: boolean
	column_comment: string | null
}

interface ForeignKeyRow {
	table_name: string
	column_name: string
	ref_table_name: string
	ref_column_name: string
}

const VERSION_SQL = `
	SELECT md5(coalesce(string_agg(
		c.table_schema || '.' || c.table_name || '.' || c.column_name || ':' || c.data_type,
		',' ORDER BY c.table_schema, c.table_name, c.ordinal_position
	), '')) AS version
	FROM information_schema.columns c
	WHERE c.table_schema = ANY($1)
`

const COLUMNS_SQL = `
	WITH pk_columns AS (
		SELECT kcu.table_schema, kcu.table_name, kcu.column_name
		FROM information_schema.table_constraints tc
		JOIN information_schema.key_column_usage kcu
			ON tc.constraint_name = kcu.constraint_name
			AND tc.table_schema = kcu.table_schema
		WHERE tc.constraint_type = 'PRIMARY KEY'
			AND tc.table_schema = ANY($1)
	)
	SELECT
		c.table_schema,
		c.table_name,
		pg_catalog.obj_description(cls.oid, 'pg_class') AS table_comment,
		cls.reltuples AS row_estimate,
		c.column_name,
		c.data_type,
		(c.is_nullable = 'YES') AS is_nullable,
		(pk.column_name IS NOT NULL) AS is_pk,
		pg_catalog.col_description(cls.oid, c.ordinal_position) AS column_comment
	FROM information_schema.columns c
	JOIN pg_catalog.pg_namespace ns ON ns.nspname = c.table_schema
	JOIN pg_catalog.pg_class cls ON cls.relnamespace = ns.oid AND cls.relname = c.table_name
	LEFT JOIN pk_columns pk
		ON pk.table_schema = c.table_schema
		AND pk.table_name = c.table_name
		AND pk.column_name = c.column_name
	WHERE c.table_schema = ANY($1)
		AND cls.relkind IN ('r', 'v', 'm', 'p')
	ORDER BY c.table_schema, c.table_name, c.ordinal_position
`

const FOREIGN_KEYS_SQL = `
	SELECT
		kcu.table_name,
		kcu.column_name,
		ccu.table_name AS ref_table_name,
		ccu.column_name AS ref_column_name
	FROM information_schema.table_constraints tc
	JOIN information_schema.key_column_usage kcu
		ON tc.constraint_name = kcu.constraint_name
		AND tc.table_schema = kcu.table_schema
	JOIN information_schema.constraint_column_usage ccu
		ON ccu.constraint_name = tc.constraint_name
	WHERE tc.constraint_type = 'FOREIGN KEY'
		AND tc.table_schema = ANY($1)
	ORDER BY kcu.table_name, kcu.column_name
`

export class PgSchemaSource implements SchemaSource {
	constructor(
		private readonly pool: Pool,
		private readonly schemas: string[],
	) {}

	async loadVersion(signal?: AbortSignal): Promise<string> {
		throwIfAborted(signal)
		const result = await this.pool.query<{ version: string }>(VERSION_SQL, [this.schemas])
		return result.rows[0]?.version ?? ""
	}

	async loadSnapshot(signal?: AbortSignal): Promise<Omit<SchemaSnapshot, "loadedAt">> {
		throwIfAborted(signal)
		let client: PoolClient | null = null
		try {
			client = await this.pool.connect()
			const version = await client.query<{ version: string }>(VERSION_SQL, [this.schemas])
			const columns = await client.query<ColumnRow>(COLUMNS_SQL, [this.schemas])
			const fks = await client.query<ForeignKeyRow>(FOREIGN_KEYS_SQL, [this.schemas])

			return {
				version: version.rows[0]?.version ?? "",
				tables: groupColumns(columns.rows),
				foreignKeys: fks.rows.map((r) => ({
					fromTable: r.table_name.toLowerCase(),
					fromColumn: r.column_name.toLowerCase(),
					toTable: r.ref_table_name.toLowerCase(),
					toColumn: r.ref_column_name.toLowerCase(),
				})),
			}
		} finally {
			if (client) {
				client.release()
			}
		}
	}
}

function groupColumns(rows: ColumnRow[]): Map<string, TableInfo> {
	const tables = new Map<string, TableInfo>()
	for (const row of rows) {
		const key = row.table_name.toLowerCase()
		let table = tables.get(key)
		if (!table) {
			// First schema (alphabetically) wins on a name clash
			table = {
				schema: row.table_schema,
				name: row.table_name,
				comment: row.table_comment,
				rowCount: Math.max(0, Math.round(Number(row.row_estimate ?? 0))),
				columns: [],
			}
			tables.set(key, table)
		} else if (table.schema !== row.table_schema) {
			continue
		}
		table.columns.push({
			name: row.column_name,
			dataType: row.data_type,
			nullable: row.is_nullable,
			isPrimaryKey: row.is_pk,
			comment: row.column_comment,
		})
	}
	return tables
}
