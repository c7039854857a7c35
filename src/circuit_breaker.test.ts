import { describe, it, expect } from "vitest"
import { CircuitBreaker, type CircuitTicket } from "./circuit_breaker.js"

function setup(options = { failureThreshold: 3, cooldownMs: 1000, successThreshold: 2 }) {
	let now = 0
	const breaker = new CircuitBreaker(options, () => now)

	const admit = (): CircuitTicket => {
		const ticket = breaker.tryAcquire()
		if (!ticket) throw new Error("call was not admitted")
		return ticket
	}

	return {
		breaker,
		admit,
		fail: (times: number) => {
			for (let i = 0; i < times; i++) breaker.recordFailure(admit())
		},
		succeed: () => breaker.recordSuccess(admit()),
		advance: (ms: number) => {
			now += ms
		},
	}
}

describe("CircuitBreaker", () => {
	it("opens after exactly N consecutive failures", () => {
		const { breaker, fail } = setup()
		fail(2)
		expect(breaker.state().status).toBe("closed")
		expect(breaker.tryAcquire()).toEqual({ epoch: 0, probe: false })
		fail(1)
		expect(breaker.state().status).toBe("open")
		expect(breaker.tryAcquire()).toBeNull()
	})

	it("resets the failure streak on success", () => {
		const { breaker, fail, succeed } = setup()
		fail(2)
		succeed()
		fail(1)
		expect(breaker.state()).toMatchObject({ status: "closed", consecutiveFailures: 1 })
	})

	it("half-opens only after the cool-down and admits a single probe", () => {
		const { breaker, fail, advance } = setup()
		fail(3)
		advance(999)
		expect(breaker.tryAcquire()).toBeNull()
		expect(breaker.retryAfterMs()).toBe(1)
		advance(1)
		expect(breaker.tryAcquire()).toEqual({ epoch: 2, probe: true })
		expect(breaker.state()).toMatchObject({ status: "half-open", probeInFlight: true })
		expect(breaker.tryAcquire()).toBeNull()
	})

	it("closes after M consecutive probe successes", () => {
		const { breaker, fail, succeed, advance } = setup()
		fail(3)
		advance(1000)
		succeed()
		expect(breaker.state()).toMatchObject({ status: "half-open", halfOpenSuccesses: 1, probeInFlight: false })
		succeed()
		expect(breaker.state()).toEqual({
			status: "closed",
			consecutiveFailures: 0,
			lastFailureAt: 0,
			halfOpenSuccesses: 0,
			probeInFlight: false,
		})
	})

	it("reopens on any probe failure and restarts the cool-down", () => {
		const { breaker, fail, succeed, advance } = setup()
		fail(3)
		advance(1000)
		succeed()
		fail(1)
		expect(breaker.state().status).toBe("open")
		advance(500)
		expect(breaker.tryAcquire()).toBeNull()
		expect(breaker.retryAfterMs()).toBe(500)
	})

	it("frees the probe slot on release without counting an outcome", () => {
		const { breaker, admit, fail, advance } = setup()
		fail(3)
		advance(1000)
		breaker.release(admit())
		expect(breaker.state()).toMatchObject({ status: "half-open", halfOpenSuccesses: 0, probeInFlight: false })
		expect(breaker.tryAcquire()).not.toBeNull()
	})
})

describe("CircuitBreaker with overlapping calls", () => {
	it("ignores a late success from a call admitted before the circuit opened", () => {
		const { breaker, admit, fail, advance } = setup({ failureThreshold: 5, cooldownMs: 1000, successThreshold: 2 })
		const slow = admit()
		fail(5)
		advance(1000)
		const probe = admit()

		breaker.recordSuccess(slow)
		expect(breaker.state()).toMatchObject({ status: "half-open", halfOpenSuccesses: 0, probeInFlight: true })
		expect(breaker.tryAcquire()).toBeNull()

		breaker.recordSuccess(probe)
		expect(breaker.state()).toMatchObject({ status: "half-open", halfOpenSuccesses: 1, probeInFlight: false })
	})

	it("does not close on a stale success when one probe success would suffice", () => {
		const { breaker, admit, fail, advance } = setup({ failureThreshold: 5, cooldownMs: 1000, successThreshold: 1 })
		const slow = admit()
		fail(5)
		advance(1000)
		const probe = admit()

		breaker.recordSuccess(slow)
		expect(breaker.state().status).toBe("half-open")

		breaker.recordSuccess(probe)
		expect(breaker.state().status).toBe("closed")
	})

	it("does not reopen on a stale failure while the probe is running", () => {
		const { breaker, admit, fail, advance } = setup()
		const slow = admit()
		fail(3)
		advance(1000)
		const probe = admit()

		breaker.recordFailure(slow)
		expect(breaker.state()).toMatchObject({ status: "half-open", probeInFlight: true, lastFailureAt: 0 })

		breaker.recordFailure(probe)
		expect(breaker.state().status).toBe("open")
	})

	it("does not count failures that land after the circuit has opened", () => {
		const { breaker, admit, fail } = setup()
		const pending = [admit(), admit()]
		fail(3)
		expect(breaker.state()).toMatchObject({ status: "open", consecutiveFailures: 3 })

		for (const ticket of pending) breaker.recordFailure(ticket)
		expect(breaker.state()).toMatchObject({ status: "open", consecutiveFailures: 3 })
	})

	it("ignores a release from an earlier epoch", () => {
		const { breaker, admit, fail, advance } = setup()
		const slow = admit()
		fail(3)
		advance(1000)
		admit()

		breaker.release(slow)
		expect(breaker.state().probeInFlight).toBe(true)
		expect(breaker.tryAcquire()).toBeNull()
	})
})
