/**
 * Execution Guard
 *
 * Wraps the StatementExecutor with:
 * - a circuit breaker checked before every datastore call
 * - capped exponential backoff for transient failures (SQLSTATE-classified)
 * - tiered fetching so a huge result never lands in memory:
 *     1. LIMIT batchSize          fewer rows than the batch → complete
 *     2. bounded count            > largeResultCeiling → return the batch, incomplete
 *     3. LIMIT hardCap            complete when the estimate fits, else truncated
 *
 * Failures come back as an ExecutionResult with `success: false` and a
 * classified `failure`; only cancellation is thrown.
 */

import { classifyDatabaseError, DatabaseError, PipelineError, type DatabaseErrorClassification } from "./errors.js"
import { DeadlineExceededError, sleep, withTimeout } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"
import type { CircuitBreaker, CircuitState } from "./circuit_breaker.js"
import type { RawResult, StatementExecutor } from "./pg_executor.js"
import type { ExecutionFailure, ExecutionResult } from "./types.js"

export interface ExecutionGuardOptions {
	timeoutMs: number
	lockTimeoutMs: number
	maxRetries: number
	backoffBaseMs: number
	backoffMaxMs: number
	batchSize: number
	hardCap: number
	largeResultCeiling: number
}

type Attempted = { ok: true; raw: RawResult } | { ok: false; failure: ExecutionFailure }

// Extra wait on top of statement_timeout before the client gives up
const CLIENT_GRACE_MS = 1000

const RESULT_ALIAS = "askdb_result"

export function limitedStatement(sql: string, limit: number): string {
	return `SELECT * FROM (${sql}) AS ${RESULT_ALIAS} LIMIT ${limit}`
}

export function boundedCountStatement(sql: string, bound: number): string {
	return `SELECT count(*) AS row_count FROM (SELECT 1 FROM (${sql}) AS ${RESULT_ALIAS} LIMIT ${bound}) AS askdb_bounded`
}

function readCount(raw: RawResult): number {
	const value = Number(raw.rows[0]?.row_count ?? 0)
	return Number.isFinite(value) ? value : 0
}

function plural(n: number, word: string): string {
	return `${n} ${word}${n === 1 ? "" : "s"}`
}

export class ExecutionGuard {
	constructor(
		private readonly executor: StatementExecutor,
		private readonly breaker: CircuitBreaker,
		private readonly options: ExecutionGuardOptions,
		private readonly logger: Logger = silentLogger,
		private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
	) {}

	async execute(sql: string, signal?: AbortSignal): Promise<ExecutionResult> {
		const startTime = Date.now()
		const stats = { attempts: 0 }
		const { batchSize, hardCap, largeResultCeiling } = this.options

		const result = (raw: RawResult, fields: Pick<ExecutionResult, "complete" | "warnings" | "estimatedRowCount">): ExecutionResult => ({
			success: true,
			rows: raw.rows,
			columns: raw.columns,
			rowCount: raw.rows.length,
			executionTimeMs: Date.now() - startTime,
			attempts: stats.attempts,
			...fields,
		})
		const failed = (failure: ExecutionFailure): ExecutionResult => ({
			success: false,
			rows: [],
			columns: [],
			rowCount: 0,
			executionTimeMs: Date.now() - startTime,
			complete: false,
			warnings: [],
			attempts: stats.attempts,
			failure,
		})

		// --- Tier 1: initial batch ---
		const batch = await this.run(limitedStatement(sql, batchSize), signal, stats)
		if (!batch.ok) return failed(batch.failure)
		if (batch.raw.rows.length < batchSize) {
			return result(batch.raw, { complete: true, warnings: [] })
		}

		// --- Tier 2: bounded size estimate ---
		const counted = await this.run(boundedCountStatement(sql, largeResultCeiling + 1), signal, stats)
		if (!counted.ok) return failed(counted.failure)
		const estimate = readCount(counted.raw)

		if (estimate > largeResultCeiling) {
			this.logger.warn("Result exceeds the large-result ceiling", {
				ceiling: largeResultCeiling,
				returned: batch.raw.rows.length,
			})
			return result(batch.raw, {
				complete: false,
				estimatedRowCount: estimate,
				warnings: [
					`More than ${largeResultCeiling} rows match; showing the first ${batch.raw.rows.length}. Export the data or add filters to narrow the result.`,
				],
			})
		}

		// --- Tier 3: capped fetch ---
		const full = await this.run(limitedStatement(sql, hardCap), signal, stats)
		if (!full.ok) return failed(full.failure)
		if (estimate <= hardCap) {
			return result(full.raw, { complete: true, estimatedRowCount: estimate, warnings: [] })
		}
		return result(full.raw, {
			complete: false,
			estimatedRowCount: estimate,
			warnings: [
				`Result truncated to the first ${hardCap} of ${estimate} rows. Add filters or export the data for the full result.`,
			],
		})
	}

	/** Datastore reachability, bypassing the breaker */
	ping(signal?: AbortSignal): Promise<boolean> {
		return this.executor.ping(signal)
	}

	circuitState(): CircuitState {
		return this.breaker.state()
	}

	private async run(sql: string, signal: AbortSignal | undefined, stats: { attempts: number }): Promise<Attempted> {
		const { timeoutMs, lockTimeoutMs, maxRetries, backoffBaseMs, backoffMaxMs } = this.options

		for (let retry = 0; ; retry++) {
			const ticket = this.breaker.tryAcquire()
			if (!ticket) {
				const retryAfterMs = this.breaker.retryAfterMs()
				this.logger.warn("Circuit open, failing fast", { retry_after_ms: retryAfterMs })
				return {
					ok: false,
					failure: {
						kind: "circuit_open",
						message: "The database is temporarily unavailable",
						suggestions: [`Try again in ${Math.max(1, Math.ceil(retryAfterMs / 1000))} seconds`],
						retryAfterMs,
					},
				}
			}

			stats.attempts++
			try {
				const raw = await withTimeout(
					(s) => this.executor.execute(sql, { timeoutMs, lockTimeoutMs, signal: s }),
					timeoutMs + CLIENT_GRACE_MS,
					{ label: "execution", signal },
				)
				this.breaker.recordSuccess(ticket)
				return { ok: true, raw }
			} catch (error) {
				if (error instanceof PipelineError && error.kind === "cancelled") {
					this.breaker.release(ticket)
					throw error
				}

				const classification =
					error instanceof DeadlineExceededError
						? classifyDatabaseError(new DatabaseError(error.message, "57014"))
						: classifyDatabaseError(error)

				// A statement or permission error proves the datastore answered
				if (classification.countsAsFailure) {
					this.breaker.recordFailure(ticket)
				} else {
					this.breaker.recordSuccess(ticket)
				}

				if (classification.retryable && retry < maxRetries) {
					const delay = Math.min(backoffMaxMs, backoffBaseMs * 2 ** retry)
					this.logger.warn("Transient database error, retrying", {
						code: classification.code,
						reason: classification.reason,
						retry: retry + 1,
						delay_ms: delay,
					})
					await this.wait(delay, signal)
					continue
				}

				this.logger.error("Statement execution failed", {
					error_class: classification.errorClass,
					code: classification.code,
					reason: classification.reason,
					attempts: stats.attempts,
				})
				return { ok: false, failure: this.toFailure(classification, stats.attempts) }
			}
		}
	}

	private toFailure(classification: DatabaseErrorClassification, attempts: number): ExecutionFailure {
		switch (classification.errorClass) {
			case "timeout":
				return {
					kind: "execution_timeout",
					message: `The query took longer than ${Math.round(this.options.timeoutMs / 1000)}s and was cancelled`,
					suggestions: ["Add a filter or a narrower date range", "Ask for an aggregate instead of individual rows"],
				}
			case "transient":
				return {
					kind: "execution_failed",
					message: `The database connection failed after ${plural(attempts, "attempt")}`,
					suggestions: ["Try again in a moment"],
				}
			case "statement":
				return {
					kind: "execution_failed",
					message: `The database rejected the query: ${classification.reason}`,
					suggestions: ["Rephrase the question using the table and column names of the schema"],
				}
			case "permission":
				return {
					kind: "execution_failed",
					message: "The database user is not allowed to run this query",
					suggestions: ["Ask an administrator for read access to the tables involved"],
				}
			case "infrastructure":
			case "unknown":
				return {
					kind: "execution_failed",
					message: "The database reported an internal error",
					suggestions: ["Try again later"],
				}
		}
	}
}
