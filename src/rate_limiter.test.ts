import { describe, it, expect } from "vitest"
import { RateLimiter } from "./rate_limiter.js"
import { PipelineError } from "./errors.js"

function setup(options = { maxCalls: 2, periodMs: 1000, acquireTimeoutMs: 1000 }) {
	let now = 0
	const waits: number[] = []
	const limiter = new RateLimiter(options, () => now, async (ms) => {
		waits.push(ms)
		now += ms
	})
	return { limiter, waits, advance: (ms: number) => { now += ms } }
}

describe("RateLimiter", () => {
	it("allows a burst up to the bucket size", () => {
		const { limiter } = setup()
		expect(limiter.tryAcquire()).toBe(true)
		expect(limiter.tryAcquire()).toBe(true)
		expect(limiter.tryAcquire()).toBe(false)
	})

	it("refills continuously", () => {
		const { limiter, advance } = setup()
		limiter.tryAcquire()
		limiter.tryAcquire()
		advance(499)
		expect(limiter.tryAcquire()).toBe(false)
		advance(1)
		expect(limiter.available()).toBe(1)
		expect(limiter.tryAcquire()).toBe(true)
	})

	it("never holds more than the bucket size", () => {
		const { limiter, advance } = setup()
		advance(10_000)
		expect(limiter.available()).toBe(2)
	})

	it("waits for the next token", async () => {
		const { limiter, waits } = setup()
		await limiter.acquire()
		await limiter.acquire()
		await limiter.acquire()
		expect(waits).toEqual([500])
	})

	it("rejects when the wait would exceed the acquire timeout", async () => {
		const { limiter } = setup({ maxCalls: 1, periodMs: 10_000, acquireTimeoutMs: 100 })
		await limiter.acquire()
		const err = await limiter.acquire().catch((e: unknown) => e)
		expect(err).toBeInstanceOf(PipelineError)
		expect(err).toMatchObject({ kind: "generation_failed", recoverable: true })
	})
})
