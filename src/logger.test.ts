import { describe, it, expect } from "vitest"
import { createLogger, isLogLevel } from "./logger.js"

function capture(level: string) {
	const lines: string[] = []
	const logger = createLogger(level, (line) => lines.push(line))
	return { lines, logger }
}

describe("createLogger", () => {
	it("writes the level tag, message and fields on one line", () => {
		const { lines, logger } = capture("info")
		logger.info("Query answered", { query_id: "q1", rows: 3 })
		logger.error("Pool error")

		expect(lines).toEqual(['[INFO] Query answered {"query_id":"q1","rows":3}', "[ERROR] Pool error"])
	})

	it("drops messages below the configured level", () => {
		const { lines, logger } = capture("warn")
		logger.debug("noise")
		logger.info("noise")
		logger.warn("Circuit opened", { failures: 5 })

		expect(lines).toEqual(['[WARN] Circuit opened {"failures":5}'])
	})

	it("falls back to info for an unknown level", () => {
		const { lines, logger } = capture("verbose")
		logger.debug("hidden")
		logger.info("shown")

		expect(lines).toEqual(["[INFO] shown"])
	})

	it("survives fields that cannot be serialized", () => {
		const { lines, logger } = capture("info")
		const cyclic: Record<string, unknown> = {}
		cyclic.self = cyclic
		logger.info("Odd fields", cyclic)

		expect(lines).toEqual(["[INFO] Odd fields [unserializable fields]"])
	})
})

describe("isLogLevel", () => {
	it("accepts only the four levels", () => {
		expect(isLogLevel("debug")).toBe(true)
		expect(isLogLevel("error")).toBe(true)
		expect(isLogLevel("trace")).toBe(false)
		expect(isLogLevel("toString")).toBe(false)
	})
})
