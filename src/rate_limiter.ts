/**
 * Token-bucket rate limiter for calls to the generative backend.
 *
 * Tokens refill continuously at maxCalls / periodMs. acquire() waits for a
 * token up to `acquireTimeoutMs` and rejects once that wait would be
 * exceeded or the caller's signal aborts.
 */

import { PipelineError } from "./errors.js"
import { sleep, systemClock, type Clock } from "./deadline.js"

export interface RateLimiterOptions {
	maxCalls: number
	periodMs: number
	acquireTimeoutMs: number
}

export class RateLimiter {
	private tokens: number
	private lastRefill: number

	constructor(
		private readonly options: RateLimiterOptions,
		private readonly clock: Clock = systemClock,
		private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void> = sleep,
	) {
		this.tokens = options.maxCalls
		this.lastRefill = clock()
	}

	/** Take a token if one is available right now */
	tryAcquire(): boolean {
		this.refill()
		if (this.tokens >= 1) {
			this.tokens -= 1
			return true
		}
		return false
	}

	async acquire(signal?: AbortSignal): Promise<void> {
		const started = this.clock()
		while (!this.tryAcquire()) {
			const waitMs = this.msUntilNextToken()
			const waited = this.clock() - started
			if (waited + waitMs > this.options.acquireTimeoutMs) {
				throw new PipelineError(
					"generation_failed",
					"The language model is receiving too many requests",
					["Wait a moment and try again"],
					true,
					{ retry_after_ms: waitMs },
				)
			}
			await this.wait(waitMs, signal)
		}
	}

	available(): number {
		this.refill()
		return Math.floor(this.tokens)
	}

	private msUntilNextToken(): number {
		const perToken = this.options.periodMs / this.options.maxCalls
		return Math.ceil((1 - this.tokens) * perToken)
	}

	private refill(): void {
		const now = this.clock()
		const elapsed = now - this.lastRefill
		if (elapsed <= 0) return
		const refill = elapsed * (this.options.maxCalls / this.options.periodMs)
		this.tokens = Math.min(this.options.maxCalls, this.tokens + refill)
		this.lastRefill = now
	}
}
