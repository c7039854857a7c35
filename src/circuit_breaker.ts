/**
 * Circuit breaker for datastore access
 *
 *   closed ──(N consecutive failures)──▶ open
 *   open ──(cool-down elapsed, next call)──▶ half-open (one probe in flight)
 *   half-open ──(M consecutive probe successes)──▶ closed
 *   half-open ──(any probe failure)──▶ open
 *
 * Transitions are synchronous, so each one is atomic with respect to other
 * requests on the event loop. Every admitted call holds a ticket stamped
 * with the epoch it was admitted in; the epoch advances on each transition,
 * and outcomes reported with a ticket from an earlier epoch are ignored.
 */

import { systemClock, type Clock } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"

export type CircuitStatus = "closed" | "open" | "half-open"

export interface CircuitState {
	status: CircuitStatus
	consecutiveFailures: number
	lastFailureAt: number | null
	halfOpenSuccesses: number
	probeInFlight: boolean
}

/** Permission for one datastore call, handed back with its outcome */
export interface CircuitTicket {
	epoch: number
	probe: boolean
}

export interface CircuitBreakerOptions {
	failureThreshold: number
	cooldownMs: number
	successThreshold: number
}

export class CircuitBreaker {
	private status: CircuitStatus = "closed"
	private consecutiveFailures = 0
	private lastFailureAt: number | null = null
	private openedAt = 0
	private halfOpenSuccesses = 0
	private probeInFlight = false
	private epoch = 0

	constructor(
		private readonly options: CircuitBreakerOptions,
		private readonly clock: Clock = systemClock,
		private readonly logger: Logger = silentLogger,
	) {}

	/**
	 * Ask permission for one datastore call. Returns null while open (or
	 * while the half-open probe is still in flight); the caller must then
	 * fail fast without contacting the datastore.
	 */
	tryAcquire(): CircuitTicket | null {
		switch (this.status) {
			case "closed":
				return { epoch: this.epoch, probe: false }
			case "open":
				if (this.clock() - this.openedAt < this.options.cooldownMs) return null
				this.transition("half-open")
				this.probeInFlight = true
				return { epoch: this.epoch, probe: true }
			case "half-open":
				if (this.probeInFlight) return null
				this.probeInFlight = true
				return { epoch: this.epoch, probe: true }
		}
	}

	recordSuccess(ticket: CircuitTicket): void {
		if (this.isStale(ticket)) return
		if (this.status === "closed") {
			this.consecutiveFailures = 0
			return
		}
		if (this.status === "half-open" && ticket.probe) {
			this.probeInFlight = false
			this.halfOpenSuccesses++
			if (this.halfOpenSuccesses >= this.options.successThreshold) {
				this.transition("closed")
			}
		}
	}

	recordFailure(ticket: CircuitTicket): void {
		if (this.isStale(ticket)) return
		this.lastFailureAt = this.clock()
		if (this.status === "closed") {
			this.consecutiveFailures++
			if (this.consecutiveFailures >= this.options.failureThreshold) {
				this.transition("open")
			}
			return
		}
		if (this.status === "half-open" && ticket.probe) {
			this.transition("open")
		}
	}

	/** Give back a probe slot whose outcome says nothing about health (cancellation) */
	release(ticket: CircuitTicket): void {
		if (this.isStale(ticket)) return
		if (this.status === "half-open" && ticket.probe) this.probeInFlight = false
	}

	/** Time until an open circuit admits a probe */
	retryAfterMs(): number {
		if (this.status !== "open") return 0
		return Math.max(0, this.options.cooldownMs - (this.clock() - this.openedAt))
	}

	state(): CircuitState {
		return {
			status: this.status,
			consecutiveFailures: this.consecutiveFailures,
			lastFailureAt: this.lastFailureAt,
			halfOpenSuccesses: this.halfOpenSuccesses,
			probeInFlight: this.probeInFlight,
		}
	}

	private isStale(ticket: CircuitTicket): boolean {
		return ticket.epoch !== this.epoch
	}

	private transition(next: CircuitStatus): void {
		const previous = this.status
		this.status = next
		this.epoch++
		this.halfOpenSuccesses = 0
		this.probeInFlight = false
		if (next === "open") {
			this.openedAt = this.clock()
		}
		if (next === "closed") {
			this.consecutiveFailures = 0
		}
		this.logger.warn("Circuit breaker transition", {
			from: previous,
			to: next,
			consecutive_failures: this.consecutiveFailures,
		})
	}
}
