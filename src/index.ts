/**
 * askdb MCP server
 *
 * Wires the pipeline from AskDbConfig and exposes it as MCP tools:
 *   nl_query         question + session_id → answer, SQL and rows
 *   session_history  session_id → previous turns
 *   health           datastore, circuit and cache status
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import { Pool } from "pg"
import { z } from "zod"
import { CachedSchemaProvider, PgSchemaSource } from "./schema_provider.js"
import { CachedEmbeddingService, OllamaEmbeddingClient } from "./embedding_client.js"
import { PgVectorStore } from "./vector_store.js"
import { ContextRetriever, charRatioEstimator } from "./context_retriever.js"
import { RateLimiter } from "./rate_limiter.js"
import { OllamaClient } from "./ollama_client.js"
import { GenerationController } from "./generation_controller.js"
import { SqlValidator } from "./sql_validator.js"
import { PgExecutor } from "./pg_executor.js"
import { CircuitBreaker } from "./circuit_breaker.js"
import { ExecutionGuard } from "./execution_guard.js"
import { ResponseCache, TtlCache } from "./response_cache.js"
import { SessionStore } from "./session_store.js"
import { Orchestrator } from "./orchestrator.js"
import { createLogger, type Logger } from "./logger.js"
import type { AskDbConfig } from "./config/loadConfig.js"
import type { ConversationTurn, ProcessOutcome } from "./types.js"

export { configSchema, getConfig, loadConfig, type AskDbConfig } from "./config/loadConfig.js"

export interface Pipeline {
	orchestrator: Orchestrator
	llm: OllamaClient
	close(): Promise<void>
}

// ============================================================================
// Pipeline
// ============================================================================

export function createPipeline(config: AskDbConfig, logger: Logger = createLogger(config.logging.level)): Pipeline {
	const { database, model, generation, retrieval, validation, execution } = config

	const pool = new Pool({
		host: database.host,
		port: database.port,
		database: database.name,
		user: database.user,
		password: database.password,
		max: database.pool_max,
		connectionTimeoutMillis: database.connection_timeout_ms,
		idleTimeoutMillis: database.idle_timeout_ms,
	})
	// An idle client losing its connection must not crash the process
	pool.on("error", (err) => {
		logger.error("Idle database client error", { error: err.message })
	})

	const schema = new CachedSchemaProvider(
		new PgSchemaSource(pool, database.schemas),
		{ ttlMs: validation.schema_cache_ttl_ms, versionCheckMs: validation.schema_version_check_ms },
		logger,
	)

	const embeddings = new CachedEmbeddingService(
		new OllamaEmbeddingClient(
			{ baseUrl: model.ollama_url, model: model.embedding, timeoutMs: model.embedding_timeout_ms },
			logger,
		),
		new TtlCache(retrieval.embedding_cache_size, retrieval.embedding_cache_ttl_ms),
	)
	const retriever = new ContextRetriever(
		embeddings,
		new PgVectorStore(pool, retrieval.vector_table),
		{
			topKSimple: retrieval.top_k_simple,
			topKComplex: retrieval.top_k_complex,
			threshold: retrieval.threshold,
			maxTables: retrieval.max_tables,
			walkDepth: retrieval.walk_depth,
			maxContextTokens: retrieval.max_context_tokens,
			promptOverheadTokens: retrieval.prompt_overhead_tokens,
		},
		charRatioEstimator(retrieval.chars_per_token),
		logger,
	)

	const validator = new SqlValidator(
		schema,
		{
			maxJoins: validation.max_joins,
			maxSubqueryDepth: validation.max_subquery_depth,
			maxUnions: validation.max_unions,
			largeTableRows: validation.large_table_rows,
			cacheSize: validation.cache_size,
			cacheTtlMs: validation.schema_cache_ttl_ms,
		},
		logger,
	)

	const llm = new OllamaClient(
		{ baseUrl: model.ollama_url, model: model.llm },
		new RateLimiter({
			maxCalls: config.rate_limit.max_calls,
			periodMs: config.rate_limit.period_ms,
			acquireTimeoutMs: config.rate_limit.acquire_timeout_ms,
		}),
		logger,
	)
	const generator = new GenerationController(
		llm,
		validator,
		schema,
		{
			dialect: generation.dialect,
			maxAttempts: generation.max_attempts,
			timeoutMs: model.timeout_ms,
			temperature: generation.temperature,
			maxTokens: generation.max_tokens,
			stop: generation.stop,
			confidencePenalty: generation.confidence_penalty,
		},
		logger,
	)

	const guard = new ExecutionGuard(
		new PgExecutor(pool, logger),
		new CircuitBreaker(
			{
				failureThreshold: config.circuit_breaker.failure_threshold,
				cooldownMs: config.circuit_breaker.cooldown_ms,
				successThreshold: config.circuit_breaker.success_threshold,
			},
			undefined,
			logger,
		),
		{
			timeoutMs: execution.timeout_ms,
			lockTimeoutMs: execution.lock_timeout_ms,
			maxRetries: execution.max_retries,
			backoffBaseMs: execution.backoff_base_ms,
			backoffMaxMs: execution.backoff_max_ms,
			batchSize: execution.batch_size,
			hardCap: execution.hard_cap,
			largeResultCeiling: execution.large_result_ceiling,
		},
		logger,
	)

	const orchestrator = new Orchestrator(
		{
			schema,
			retriever,
			generator,
			validator,
			guard,
			cache: new ResponseCache({ maxEntries: config.cache.max_entries, ttlMs: config.cache.ttl_ms }),
			sessions: new SessionStore({
				maxHistory: config.session.max_history,
				idleTtlMs: config.session.idle_ttl_ms,
				maxSessions: config.session.max_sessions,
			}),
			logger,
		},
		{
			confidenceThreshold: config.intent.confidence_threshold,
			maxQueryLength: config.intent.max_query_length,
			requestTimeoutMs: config.request.timeout_ms,
			historyWindow: generation.history_window,
		},
	)

	return {
		orchestrator,
		llm,
		close: () => pool.end(),
	}
}

// ============================================================================
// Tool output
// ============================================================================

export function formatOutcome(outcome: ProcessOutcome): { text: string; isError: boolean } {
	switch (outcome.kind) {
		case "answer": {
			const { response } = outcome
			return {
				isError: false,
				text: JSON.stringify(
					{
						query_id: response.queryId,
						answer: response.answer,
						sql: response.statement,
						columns: response.execution.columns,
						rows: response.execution.rows,
						row_count: response.execution.rowCount,
						complete: response.execution.complete,
						estimated_row_count: response.execution.estimatedRowCount,
						warnings: [...response.execution.warnings, ...response.validationWarnings],
						confidence: response.confidence,
						cache_hit: response.cacheHit,
						latency_ms: response.latencyMs,
					},
					null,
					2,
				),
			}
		}
		case "clarification":
			return {
				isError: false,
				text: JSON.stringify(
					{
						query_id: outcome.clarification.queryId,
						clarification_needed: true,
						confidence: outcome.clarification.confidence,
						questions: outcome.clarification.questions,
					},
					null,
					2,
				),
			}
		case "error":
			return {
				isError: true,
				text: JSON.stringify(
					{
						query_id: outcome.error.queryId,
						error: outcome.error.kind,
						message: outcome.error.message,
						suggestions: outcome.error.suggestions,
						trace_id: outcome.error.traceId,
					},
					null,
					2,
				),
			}
	}
}

export function formatHistory(turns: ConversationTurn[]): string {
	return JSON.stringify(
		turns.map((turn) => ({
			query_id: turn.query.id,
			question: turn.query.text,
			asked_at: turn.query.timestamp,
			sql: turn.response.statement,
			answer: turn.response.answer,
			row_count: turn.response.execution.rowCount,
		})),
		null,
		2,
	)
}

// ============================================================================
// Server
// ============================================================================

export default function createServer({ pipeline, logger }: { pipeline: Pipeline; logger: Logger }): McpServer {
	const server = new McpServer({ name: "askdb", version: "0.1.0" })
	const { orchestrator } = pipeline

	server.tool(
		"nl_query",
		"Answer a natural-language question about the database with a validated, read-only SQL query",
		{
			question: z.string().describe("The question, in plain language"),
			session_id: z.string().default("default").describe("Conversation id; follow-up questions resolve against it"),
		},
		async ({ question, session_id }, extra) => {
			logger.info("nl_query called", { session_id, question_length: question.length })
			const { text, isError } = formatOutcome(await orchestrator.process(question, session_id, { signal: extra.signal }))
			return { content: [{ type: "text", text }], isError }
		},
	)

	server.tool(
		"session_history",
		"List the previous questions and answers of a conversation",
		{
			session_id: z.string().describe("Conversation id"),
		},
		async ({ session_id }) => ({
			content: [{ type: "text", text: formatHistory(orchestrator.history(session_id)) }],
		}),
	)

	server.tool("health", "Report datastore, language model, circuit breaker and cache status", async (extra) => {
		const [report, llm] = await Promise.all([orchestrator.health(extra.signal), pipeline.llm.healthCheck(extra.signal)])
		return { content: [{ type: "text", text: JSON.stringify({ ...report, llm }, null, 2) }] }
	})

	return server
}
