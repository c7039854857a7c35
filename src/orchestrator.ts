/**
 * Orchestrator
 *
 * One `process` call per question:
 *
 *   input checks → intent analysis → response-cache lookup → ambiguity gate
 *   → context retrieval → generation (validator in the loop) → execution
 *   → answer synthesis → cache write → session update
 *
 * Every stage failure becomes an ErrorResult with a stable kind; only
 * unexpected errors are reported as `internal`, with a trace id in the log.
 */

import { v4 as uuidv4 } from "uuid"
import { PipelineError, errorMessage } from "./errors.js"
import { createDeadline, systemClock, type Clock, type Deadline } from "./deadline.js"
import { analyzeIntent, clarificationQuestions } from "./intent_analyzer.js"
import { synthesizeAnswer } from "./answer_synthesizer.js"
import { silentLogger, type Logger } from "./logger.js"
import type { CircuitState } from "./circuit_breaker.js"
import type { ContextRetriever } from "./context_retriever.js"
import type { ExecutionGuard } from "./execution_guard.js"
import type { GenerationController, GenerationOutcome } from "./generation_controller.js"
import type { ResponseCache, ResponseCacheStats } from "./response_cache.js"
import type { SchemaProvider } from "./schema_provider.js"
import type { SessionStore } from "./session_store.js"
import type { SqlValidator } from "./sql_validator.js"
import type { ConversationTurn, ErrorResult, ExecutionFailure, ProcessOutcome, Query, Response } from "./types.js"

export interface OrchestratorOptions {
	confidenceThreshold: number
	maxQueryLength: number
	requestTimeoutMs: number
	/** Turns of history included in generation prompts */
	historyWindow: number
}

export interface OrchestratorDeps {
	schema: SchemaProvider
	retriever: ContextRetriever
	generator: GenerationController
	validator: SqlValidator
	guard: ExecutionGuard
	cache: ResponseCache
	sessions: SessionStore
	logger?: Logger
	clock?: Clock
	newId?: () => string
}

export interface HealthReport {
	status: "ok" | "degraded"
	datastore: boolean
	circuit: CircuitState
	caches: {
		responses: ResponseCacheStats
		validations: number
		sessions: number
	}
}

type Stage = "schema" | "retrieval" | "generation" | "execution"

export class Orchestrator {
	private readonly logger: Logger
	private readonly clock: Clock
	private readonly newId: () => string

	constructor(
		private readonly deps: OrchestratorDeps,
		private readonly options: OrchestratorOptions,
	) {
		this.logger = deps.logger ?? silentLogger
		this.clock = deps.clock ?? systemClock
		this.newId = deps.newId ?? (() => uuidv4())
	}

	async process(text: string, sessionId: string, options: { signal?: AbortSignal } = {}): Promise<ProcessOutcome> {
		const queryId = this.newId()
		const startTime = this.clock()
		const question = text.trim()

		const invalid = this.checkInput(question, sessionId)
		if (invalid) {
			this.logger.warn("Rejected query input", { query_id: queryId, reason: invalid.message })
			return this.errorOutcome(queryId, invalid)
		}

		const deadline = createDeadline(this.options.requestTimeoutMs, options.signal)
		let stage: Stage = "schema"
		try {
			const { signal } = deadline
			const { schema, cache, sessions } = this.deps
			this.pruneSessions()
			const history = sessions.history(sessionId)
			const snapshot = await schema.snapshot(signal)

			const analysis = analyzeIntent(question, history, {
				knownTables: [...snapshot.tables.keys()],
				now: new Date(this.clock()),
			})
			const query: Query = {
				id: queryId,
				sessionId,
				text: question,
				normalizedText: analysis.normalizedText,
				timestamp: new Date(startTime).toISOString(),
				intent: analysis.intent,
				confidence: analysis.confidence,
				entities: analysis.entities,
				isFollowUp: analysis.isFollowUp,
			}

			// Follow-ups depend on the conversation, so they never share cache entries
			if (!analysis.isFollowUp) {
				const cached = cache.get(analysis.normalizedText, snapshot.version)
				if (cached) {
					const response: Response = {
						...cached,
						queryId,
						sessionId,
						question,
						latencyMs: this.clock() - startTime,
						cacheHit: true,
					}
					sessions.append(sessionId, { query, response })
					this.logger.info("Served from response cache", { query_id: queryId, session_id: sessionId })
					return { kind: "answer", response }
				}
			}

			if (analysis.confidence < this.options.confidenceThreshold) {
				this.logger.info("Question is ambiguous, asking for clarification", {
					query_id: queryId,
					intent: analysis.intent,
					confidence: analysis.confidence,
				})
				return {
					kind: "clarification",
					clarification: {
						queryId,
						question,
						intent: analysis.intent,
						confidence: analysis.confidence,
						questions: clarificationQuestions(analysis),
					},
				}
			}

			stage = "retrieval"
			const context = await this.deps.retriever.retrieve(question, analysis.intent, history, signal)

			stage = "generation"
			const recent = sessions.window(sessionId, this.options.historyWindow)
			const outcome = await this.deps.generator.generate(query, context, recent, signal)
			if (outcome.kind !== "generated") {
				return this.errorOutcome(queryId, generationError(outcome))
			}

			stage = "execution"
			const execution = await this.deps.guard.execute(outcome.statement.sql, signal)
			if (!execution.success) {
				return this.errorOutcome(queryId, executionError(execution.failure))
			}

			const response: Response = {
				queryId,
				sessionId,
				question,
				statement: outcome.statement.sql,
				execution,
				answer: synthesizeAnswer(execution),
				latencyMs: this.clock() - startTime,
				cacheHit: false,
				intent: analysis.intent,
				confidence: outcome.statement.confidence,
				validationWarnings: outcome.validation.issues.filter((i) => i.severity === "warning").map((i) => i.message),
			}

			if (!analysis.isFollowUp) {
				cache.set(analysis.normalizedText, snapshot.version, response)
			}
			sessions.append(sessionId, { query, response })

			this.logger.info("Query answered", {
				query_id: queryId,
				session_id: sessionId,
				rows: execution.rowCount,
				complete: execution.complete,
				attempts: outcome.statement.attempt,
				latency_ms: response.latencyMs,
			})
			return { kind: "answer", response }
		} catch (error) {
			return this.errorOutcome(queryId, this.classify(error, deadline, stage))
		} finally {
			deadline.dispose()
		}
	}

	history(sessionId: string): ConversationTurn[] {
		return this.deps.sessions.history(sessionId)
	}

	async health(signal?: AbortSignal): Promise<HealthReport> {
		this.pruneSessions()
		const datastore = await this.deps.guard.ping(signal)
		const circuit = this.deps.guard.circuitState()
		return {
			status: datastore && circuit.status === "closed" ? "ok" : "degraded",
			datastore,
			circuit,
			caches: {
				responses: this.deps.cache.stats(),
				validations: this.deps.validator.cacheSize(),
				sessions: this.deps.sessions.size,
			},
		}
	}

	private pruneSessions(): void {
		const expired = this.deps.sessions.prune()
		if (expired > 0) {
			this.logger.debug("Dropped idle sessions", { count: expired })
		}
	}

	// ==========================================================================
	// Errors
	// ==========================================================================

	private checkInput(question: string, sessionId: string): PipelineError | null {
		if (sessionId.trim() === "") {
			return new PipelineError("invalid_input", "A session id is required", ["Pass the id of the conversation"])
		}
		if (question === "") {
			return new PipelineError("invalid_input", "Please enter a question", [
				"For example: How many patients were admitted yesterday?",
			])
		}
		if (question.length > this.options.maxQueryLength) {
			return new PipelineError("invalid_input", `Questions are limited to ${this.options.maxQueryLength} characters`, [
				"Shorten the question",
				"Split it into several smaller questions",
			])
		}
		return null
	}

	private classify(error: unknown, deadline: Deadline, stage: Stage): PipelineError {
		if (deadline.expired()) {
			const seconds = Math.round(this.options.requestTimeoutMs / 1000)
			return stage === "execution"
				? new PipelineError("execution_timeout", `The query did not finish within ${seconds}s`, [
						"Add filters to narrow the result",
						"Try again in a moment",
					], true)
				: new PipelineError("generation_timeout", `The question could not be answered within ${seconds}s`, [
						"Try again in a moment",
						"Ask a simpler question",
					], true)
		}
		if (error instanceof PipelineError) return error
		if (stage === "schema") {
			this.logger.error("Could not load the database schema", { error: errorMessage(error) })
			return new PipelineError("execution_failed", "Could not read the database schema", ["Try again in a moment"], true)
		}
		return new PipelineError("internal", errorMessage(error), [], false, {
			stage,
			stack: error instanceof Error ? error.stack : undefined,
		})
	}

	private errorOutcome(queryId: string, error: PipelineError): ProcessOutcome {
		let result: ErrorResult
		if (error.kind === "internal") {
			const traceId = this.newId()
			this.logger.error("Internal error while processing query", {
				query_id: queryId,
				trace_id: traceId,
				error: error.message,
				...error.context,
			})
			result = {
				queryId,
				kind: "internal",
				message: "Something went wrong while answering the question",
				suggestions: [`Report trace id ${traceId} if the problem persists`],
				traceId,
			}
		} else {
			this.logger.warn("Query failed", { query_id: queryId, kind: error.kind, message: error.message })
			result = { queryId, kind: error.kind, message: error.message, suggestions: error.suggestions, traceId: queryId }
		}
		return { kind: "error", error: result }
	}
}

function generationError(outcome: Exclude<GenerationOutcome, { kind: "generated" }>): PipelineError {
	if (outcome.kind === "unanswerable") {
		return new PipelineError("unanswerable", "This question cannot be answered from the available data", [
			"Ask about information stored in the database",
			"Name the records you are interested in",
		])
	}
	return outcome.error
}

function executionError(failure: ExecutionFailure | undefined): PipelineError {
	if (!failure) {
		return new PipelineError("internal", "Execution failed without a reason")
	}
	return new PipelineError(failure.kind, failure.message, failure.suggestions, true, {
		retry_after_ms: failure.retryAfterMs,
	})
}
