/**
 * SQL Validator
 *
 * Ordered layers over a candidate statement:
 *   1. injection     critical, short-circuits
 *   2. allow_list    critical, short-circuits
 *   3. schema        error     (unknown tables/columns, ranked candidates)
 *   4. complexity    warning   (joins, subquery depth, unions)
 *   5. cost          warning   (LARGE_RESULT, HIGH_COST)
 *
 * Layers 1–2 only need the text. Layers 3–5 read one schema snapshot and run
 * synchronously over it; their results are cached by statement hash and
 * schema version.
 */

import { systemClock, type Clock } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"
import { estimateCost } from "./cost_estimator.js"
import { TtlCache, sha256 } from "./response_cache.js"
import { rankSimilarNames, type SchemaProvider, type SchemaSnapshot } from "./schema_provider.js"
import {
	analyzeStatement,
	codeText,
	hasComments,
	semicolonPositions,
	stripTerminator,
	type StatementStructure,
} from "./sql_parser.js"
import type { RetrievalContext, RiskLevel, ValidationIssue, ValidationLayer, ValidationResult } from "./types.js"

export interface SqlValidatorOptions {
	maxJoins: number
	maxSubqueryDepth: number
	maxUnions: number
	largeTableRows: number
	cacheSize: number
	cacheTtlMs: number
}

// ============================================================================
// Pattern sets
// ============================================================================

const DYNAMIC_SQL = /\b(exec|execute|prepare|deallocate|sp_executesql)\b/i

const PRIVILEGED_FUNCTIONS = [
	// File I/O
	"pg_read_file",
	"pg_read_binary_file",
	"pg_ls_dir",
	"pg_stat_file",
	"pg_file_write",
	"lo_import",
	"lo_export",
	"lo_get",
	"lo_put",
	// Server control
	"pg_sleep",
	"pg_sleep_for",
	"pg_sleep_until",
	"pg_terminate_backend",
	"pg_cancel_backend",
	"pg_reload_conf",
	"pg_rotate_logfile",
	"pg_stat_reset",
	"set_config",
	"pg_execute_server_program",
	// External connections
	"dblink",
	"dblink_connect",
	"dblink_exec",
	"postgres_fdw",
]

const PRIVILEGED_CALL = new RegExp(`\\b(${PRIVILEGED_FUNCTIONS.join("|")})\\s*\\(`, "i")
const EXTENDED_PROCEDURE = /\bxp_\w+/i

const FORBIDDEN_KEYWORDS = [
	// DDL
	"DROP", "CREATE", "ALTER", "TRUNCATE", "RENAME",
	// DML
	"INSERT", "UPDATE", "DELETE", "MERGE", "UPSERT", "INTO",
	// DCL
	"GRANT", "REVOKE",
	// TCL
	"BEGIN", "COMMIT", "ROLLBACK", "SAVEPOINT",
	// Administrative
	"COPY", "VACUUM", "REINDEX", "CLUSTER", "CALL", "REFRESH", "LISTEN", "NOTIFY", "LOCK",
]

const FORBIDDEN_SOURCE = `\\b(${FORBIDDEN_KEYWORDS.join("|")})\\b`

const READ_ONLY_KEYWORDS = ["SELECT", "WITH"]

const REJECTED_RISK: RiskLevel = "very-high"

function issue(
	layer: ValidationLayer,
	severity: ValidationIssue["severity"],
	ruleId: string,
	message: string,
	extra: Pick<ValidationIssue, "suggestion" | "candidates"> = {},
): ValidationIssue {
	return { layer, severity, ruleId, message, ...extra }
}

export function isBlocking(i: ValidationIssue): boolean {
	return i.severity === "error" || i.severity === "critical"
}

// ============================================================================
// Layers
// ============================================================================

function injectionLayer(statement: string, code: string): ValidationIssue[] {
	const issues: ValidationIssue[] = []

	if (semicolonPositions(statement).length > 0) {
		issues.push(issue("injection", "critical", "INJ_STATEMENT_CHAINING", "Multiple statements are not allowed", {
			suggestion: "Return a single SELECT statement",
		}))
	}
	if (hasComments(statement)) {
		issues.push(issue("injection", "critical", "INJ_COMMENT", "Comments are not allowed in generated statements"))
	}
	const dynamic = DYNAMIC_SQL.exec(code)
	if (dynamic) {
		issues.push(issue("injection", "critical", "INJ_DYNAMIC_SQL", `Dynamic execution is not allowed (${dynamic[1].toUpperCase()})`))
	}
	const privileged = PRIVILEGED_CALL.exec(code) ?? EXTENDED_PROCEDURE.exec(code)
	if (privileged) {
		issues.push(issue("injection", "critical", "INJ_PRIVILEGED_FUNCTION", `Privileged function is not allowed: ${privileged[0].replace(/\s*\($/, "")}`))
	}
	if (/\bor\s+(\d+)\s*=\s*\1\b/i.test(code) || /\bor\s+true\b/i.test(code) || /\bor\s+'([^']*)'\s*=\s*'\1'/i.test(statement)) {
		issues.push(issue("injection", "critical", "INJ_TAUTOLOGY", "Always-true condition detected"))
	}
	const charCalls = (code.match(/\b(chr|char)\s*\(/gi) ?? []).length
	if (charCalls >= 2 || /\b0x[0-9a-f]+\b/i.test(code) || /\bconvert_from\s*\(\s*decode\s*\(/i.test(code)) {
		issues.push(issue("injection", "critical", "INJ_OBFUSCATION", "Character-code obfuscation detected"))
	}
	return issues
}

function allowListLayer(structure: StatementStructure, code: string): ValidationIssue[] {
	const issues: ValidationIssue[] = []
	if (!READ_ONLY_KEYWORDS.includes(structure.firstKeyword)) {
		issues.push(issue(
			"allow_list",
			"critical",
			"SEC_NOT_READ_ONLY",
			`Only read-only SELECT statements are allowed (found ${structure.firstKeyword || "nothing"})`,
		))
	}
	const found = new Set<string>()
	let m: RegExpExecArray | null
	const pattern = new RegExp(FORBIDDEN_SOURCE, "gi")
	while ((m = pattern.exec(code)) !== null) {
		found.add(m[1].toUpperCase())
	}
	for (const keyword of found) {
		issues.push(issue("allow_list", "critical", "SEC_FORBIDDEN_KEYWORD", `Write or administrative keyword is not allowed: ${keyword}`))
	}
	return issues
}

function schemaLayer(structure: StatementStructure, snapshot: SchemaSnapshot, preferred: string[]): ValidationIssue[] {
	const issues: ValidationIssue[] = []

	for (const table of structure.tables) {
		if (snapshot.tables.has(table)) continue
		const candidates = rankSimilarNames(table, snapshot.tables.keys(), { preferred })
		issues.push(issue("schema", "error", "SCHEMA_UNKNOWN_TABLE", `Table "${table}" does not exist.`, {
			suggestion: candidates.length > 0 ? `Valid candidates: ${candidates.join(", ")}` : undefined,
			candidates,
		}))
	}

	const reported = new Set<string>()
	for (const ref of structure.qualifiedColumns) {
		const table = snapshot.tables.get(ref.table)
		if (!table) continue
		const key = `${ref.table}.${ref.column}`
		if (reported.has(key)) continue
		const columns = table.columns.map((c) => c.name.toLowerCase())
		if (columns.includes(ref.column)) continue
		reported.add(key)
		const candidates = rankSimilarNames(ref.column, columns)
		issues.push(issue("schema", "error", "SCHEMA_UNKNOWN_COLUMN", `Column "${ref.column}" does not exist on table "${ref.table}".`, {
			suggestion: candidates.length > 0 ? `Valid candidates: ${candidates.join(", ")}` : undefined,
			candidates,
		}))
	}
	return issues
}

function complexityLayer(structure: StatementStructure, options: SqlValidatorOptions): ValidationIssue[] {
	const issues: ValidationIssue[] = []
	if (structure.joinCount > options.maxJoins) {
		issues.push(issue("complexity", "warning", "COMPLEXITY_JOINS", `${structure.joinCount} joins exceed the limit of ${options.maxJoins}`, {
			suggestion: "Simplify the query or split it into smaller questions",
		}))
	}
	if (structure.maxSubqueryDepth > options.maxSubqueryDepth) {
		issues.push(issue("complexity", "warning", "COMPLEXITY_SUBQUERY_DEPTH", `Subquery nesting depth ${structure.maxSubqueryDepth} exceeds ${options.maxSubqueryDepth}`))
	}
	if (structure.unionCount > options.maxUnions) {
		issues.push(issue("complexity", "warning", "COMPLEXITY_UNIONS", `${structure.unionCount} set operations exceed the limit of ${options.maxUnions}`))
	}
	return issues
}

function costLayer(
	structure: StatementStructure,
	snapshot: SchemaSnapshot,
	options: SqlValidatorOptions,
): { issues: ValidationIssue[]; risk: RiskLevel } {
	const estimate = estimateCost(structure, snapshot.tables, { largeTableRows: options.largeTableRows })
	const issues: ValidationIssue[] = []
	if (estimate.unbounded && estimate.largeTables.length > 0) {
		issues.push(issue("cost", "warning", "LARGE_RESULT", `Reads large table ${estimate.largeTables.join(", ")} without a filter, limit or aggregate`, {
			suggestion: "Add a WHERE clause, a LIMIT, or aggregate the rows",
		}))
	}
	if (estimate.risk === "high" || estimate.risk === "very-high") {
		issues.push(issue("cost", "warning", "HIGH_COST", `Estimated cost is ${estimate.risk} (score ${estimate.score})`))
	}
	return { issues, risk: estimate.risk }
}

// ============================================================================
// Validator
// ============================================================================

export class SqlValidator {
	private cache: TtlCache<ValidationResult>

	constructor(
		private readonly schema: SchemaProvider,
		private readonly options: SqlValidatorOptions,
		private readonly logger: Logger = silentLogger,
		clock: Clock = systemClock,
	) {
		this.cache = new TtlCache(options.cacheSize, options.cacheTtlMs, clock)
	}

	/** Security layers only (1–2); needs no schema access */
	screen(sql: string): ValidationResult {
		const statement = stripTerminator(sql)
		const code = codeText(statement)
		const injection = injectionLayer(statement, code)
		const issues = injection.length > 0 ? injection : allowListLayer(analyzeStatement(statement), code)
		return {
			passed: !issues.some(isBlocking),
			issues,
			statement,
			risk: issues.length > 0 ? REJECTED_RISK : "low",
		}
	}

	async validate(sql: string, context?: RetrievalContext, signal?: AbortSignal): Promise<ValidationResult> {
		const screened = this.screen(sql)
		if (!screened.passed) {
			this.logger.warn("Statement rejected by security layers", {
				rules: screened.issues.map((i) => i.ruleId),
			})
			return screened
		}

		const statement = screened.statement
		const snapshot = await this.schema.snapshot(signal)
		const key = `${sha256(statement)}:${snapshot.version}`
		const cached = this.cache.get(key)
		if (cached) return cached

		const structure = analyzeStatement(statement)
		const preferred = (context?.elements ?? []).flatMap((e) => (e.kind === "table" ? [e.metadata.table] : []))
		const cost = costLayer(structure, snapshot, this.options)
		const issues = [
			...schemaLayer(structure, snapshot, preferred),
			...complexityLayer(structure, this.options),
			...cost.issues,
		]

		const result: ValidationResult = {
			passed: !issues.some(isBlocking),
			issues,
			statement,
			risk: cost.risk,
		}
		this.cache.set(key, result)

		this.logger.debug("Statement validated", {
			passed: result.passed,
			risk: result.risk,
			rules: issues.map((i) => i.ruleId),
		})
		return result
	}

	cacheSize(): number {
		return this.cache.size
	}
}

/**
 * Turn blocking issues into short correction instructions for a regeneration prompt
 */
export function correctionNotes(issues: ValidationIssue[]): string[] {
	const notes: string[] = []
	for (const i of issues.filter(isBlocking)) {
		const note = i.suggestion ? `${i.message} ${i.suggestion}.` : i.message
		if (!notes.includes(note)) notes.push(note)
	}
	return notes
}
