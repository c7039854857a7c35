/**
 * Generation Controller
 *
 * Drives the generate → extract → screen → pre-check → validate loop as an
 * explicit state machine over (attempt, lastFailure):
 *
 *   NO_SQL               → unanswerable
 *   empty output         → regenerate while attempts remain
 *   security finding     → rejected, never regenerated
 *   unknown table        → regenerate with ranked candidates while attempts remain
 *   other schema errors  → regenerate once with corrective notes
 *   anything else        → rejected
 *
 * The loop never runs more than maxAttempts backend calls.
 */

import { PipelineError } from "./errors.js"
import { DeadlineExceededError, withTimeout } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"
import { buildPrompt, type Correction } from "./prompt_builder.js"
import { analyzeStatement, extractStatement, type StatementStructure } from "./sql_parser.js"
import { correctionNotes, isBlocking, type SqlValidator } from "./sql_validator.js"
import type { GenerativeBackend } from "./ollama_client.js"
import type { SchemaProvider } from "./schema_provider.js"
import type {
	ComplexityTier,
	ConversationTurn,
	GeneratedStatement,
	Query,
	RetrievalContext,
	ValidationResult,
} from "./types.js"

export interface GenerationControllerOptions {
	dialect: string
	maxAttempts: number
	timeoutMs: number
	temperature: number
	maxTokens: number
	stop: string[]
	/** Subtracted from confidence for every attempt after the first */
	confidencePenalty: number
}

export type GenerationOutcome =
	| { kind: "generated"; statement: GeneratedStatement; validation: ValidationResult }
	| { kind: "unanswerable"; attempts: number }
	| { kind: "rejected"; attempts: number; validation: ValidationResult; error: PipelineError }
	| { kind: "failed"; attempts: number; error: PipelineError }

type AttemptFailure = { kind: "empty" } | { kind: "schema"; sql: string; notes: string[] }

// ============================================================================
// Scoring
// ============================================================================

export function complexityTier(structure: StatementStructure): ComplexityTier {
	if (structure.joinCount >= 3 || structure.subqueryCount >= 2 || structure.hasWindow) return "complex"
	if (structure.joinCount === 0 && structure.subqueryCount === 0) return "simple"
	return "moderate"
}

const COMPLEXITY_FACTOR: Record<ComplexityTier, number> = {
	simple: 1,
	moderate: 0.7,
	complex: 0.4,
}

function contextTables(context: RetrievalContext): string[] {
	const tables = new Set<string>()
	for (const e of context.elements) {
		if (e.kind === "table" || e.kind === "column") tables.add(e.metadata.table)
	}
	return [...tables]
}

/**
 * 0.5 · share of referenced tables present in the context
 * + 0.3 · mean context similarity
 * + 0.2 · complexity factor
 * − penalty per extra attempt, clamped to [0, 1]
 */
export function scoreConfidence(
	referencedTables: string[],
	context: RetrievalContext,
	complexity: ComplexityTier,
	attempt: number,
	penalty: number,
): number {
	const known = new Set(contextTables(context))
	const schemaMatch =
		referencedTables.length === 0 ? 0 : referencedTables.filter((t) => known.has(t)).length / referencedTables.length
	const meanSimilarity =
		context.elements.length === 0 ? 0 : context.elements.reduce((sum, e) => sum + e.score, 0) / context.elements.length

	const raw = 0.5 * schemaMatch + 0.3 * meanSimilarity + 0.2 * COMPLEXITY_FACTOR[complexity] - penalty * (attempt - 1)
	return Math.round(Math.min(1, Math.max(0, raw)) * 100) / 100
}

// ============================================================================
// Controller
// ============================================================================

export class GenerationController {
	constructor(
		private readonly backend: GenerativeBackend,
		private readonly validator: SqlValidator,
		private readonly schema: SchemaProvider,
		private readonly options: GenerationControllerOptions,
		private readonly logger: Logger = silentLogger,
	) {}

	async generate(
		query: Query,
		context: RetrievalContext,
		history: ConversationTurn[] = [],
		signal?: AbortSignal,
	): Promise<GenerationOutcome> {
		const { maxAttempts, dialect } = this.options
		const preferred = contextTables(context)
		let attempt = 0
		let lastFailure: AttemptFailure | null = null
		// Schema-existence errors earn one regeneration, from the pre-check or full validation
		let schemaCorrections = 0

		while (attempt < maxAttempts) {
			attempt++
			const prompt = buildPrompt({
				question: query.text,
				dialect,
				context,
				history,
				correction: correctionFor(lastFailure),
			})

			let completion: string
			try {
				completion = await withTimeout(
					(s) =>
						this.backend.generate({
							prompt,
							stop: this.options.stop,
							maxTokens: this.options.maxTokens,
							temperature: this.options.temperature,
							signal: s,
						}),
					this.options.timeoutMs,
					{ label: "generation", signal },
				)
			} catch (error) {
				if (error instanceof DeadlineExceededError) {
					this.logger.warn("Generation timed out", { query_id: query.id, attempt, timeout_ms: error.timeoutMs })
					return {
						kind: "failed",
						attempts: attempt,
						error: new PipelineError(
							"generation_timeout",
							`The language model did not answer within ${Math.round(this.options.timeoutMs / 1000)}s`,
							["Try again in a moment", "Ask a simpler question"],
							true,
						),
					}
				}
				if (error instanceof PipelineError && error.kind !== "cancelled") {
					return { kind: "failed", attempts: attempt, error }
				}
				throw error
			}

			// --- Extract ---
			const extracted = extractStatement(completion)
			if (extracted.kind === "no_sql") {
				this.logger.info("Model reported the question as unanswerable", { query_id: query.id, attempt })
				return { kind: "unanswerable", attempts: attempt }
			}
			if (extracted.kind === "empty") {
				this.logger.warn("Completion contained no SQL", { query_id: query.id, attempt })
				lastFailure = { kind: "empty" }
				continue
			}

			// --- Security screen: never regenerate ---
			const screened = this.validator.screen(extracted.sql)
			if (!screened.passed) {
				this.logger.warn("Generated statement failed security screening", {
					query_id: query.id,
					attempt,
					rules: screened.issues.map((i) => i.ruleId),
				})
				return {
					kind: "rejected",
					attempts: attempt,
					validation: screened,
					error: new PipelineError(
						"security_violation",
						"The generated query was blocked by security checks",
						["Ask a question that only reads data"],
						false,
						{ rules: screened.issues.map((i) => i.ruleId) },
					),
				}
			}

			// --- Table pre-check ---
			const structure = analyzeStatement(screened.statement)
			if (schemaCorrections === 0 && attempt < maxAttempts) {
				const notes = await this.missingTableNotes(structure.tables, preferred, signal)
				if (notes.length > 0) {
					schemaCorrections++
					this.logger.info("Unknown table in generated statement, regenerating", {
						query_id: query.id,
						attempt,
						notes,
					})
					lastFailure = { kind: "schema", sql: screened.statement, notes }
					continue
				}
			}

			// --- Full validation ---
			const validation = await this.validator.validate(screened.statement, context, signal)
			if (!validation.passed) {
				const blocking = validation.issues.filter(isBlocking)
				const schemaOnly = blocking.every((i) => i.layer === "schema")
				if (schemaOnly && schemaCorrections === 0 && attempt < maxAttempts) {
					schemaCorrections++
					lastFailure = { kind: "schema", sql: validation.statement, notes: correctionNotes(blocking) }
					this.logger.info("Schema errors in generated statement, regenerating", {
						query_id: query.id,
						attempt,
						rules: blocking.map((i) => i.ruleId),
					})
					continue
				}
				this.logger.warn("Generated statement failed validation", {
					query_id: query.id,
					attempt,
					rules: blocking.map((i) => i.ruleId),
				})
				return {
					kind: "rejected",
					attempts: attempt,
					validation,
					error: new PipelineError(
						"validation_failed",
						`The generated query failed validation: ${blocking[0]?.message ?? "unknown problem"}`,
						[
							...blocking.flatMap((i) => (i.suggestion ? [i.suggestion] : [])),
							"Rephrase the question using the table and column names of the schema",
						],
						false,
						{ rules: blocking.map((i) => i.ruleId) },
					),
				}
			}

			const complexity = complexityTier(structure)
			const statement: GeneratedStatement = {
				sql: validation.statement,
				dialect,
				complexity,
				referencedTables: structure.tables,
				attempt,
				confidence: scoreConfidence(structure.tables, context, complexity, attempt, this.options.confidencePenalty),
			}
			this.logger.info("SQL generated", {
				query_id: query.id,
				attempt,
				complexity,
				confidence: statement.confidence,
				risk: validation.risk,
			})
			return { kind: "generated", statement, validation }
		}

		// Only empty completions run the loop out
		return {
			kind: "failed",
			attempts: attempt,
			error: new PipelineError(
				"generation_failed",
				"The language model did not return a SQL query",
				["Rephrase the question", "Name the measure and the records you are interested in"],
				true,
			),
		}
	}

	private async missingTableNotes(tables: string[], preferred: string[], signal?: AbortSignal): Promise<string[]> {
		const notes: string[] = []
		for (const table of tables) {
			if (await this.schema.tableExists(table, signal)) continue
			const candidates = await this.schema.suggestSimilar(table, { preferred }, signal)
			notes.push(
				candidates.length > 0
					? `Table "${table}" does not exist. Valid candidates: ${candidates.join(", ")}.`
					: `Table "${table}" does not exist.`,
			)
		}
		return notes
	}
}

function correctionFor(failure: AttemptFailure | null): Correction | undefined {
	if (!failure) return undefined
	if (failure.kind === "empty") {
		return { sql: "(no SQL in the previous answer)", notes: ["Reply with a single SQL query, or NO_SQL."] }
	}
	return { sql: failure.sql, notes: failure.notes }
}
