import { describe, it, expect } from "vitest"
import { OllamaClient, type GenerationRequest } from "./ollama_client.js"
import { CachedEmbeddingService, OllamaEmbeddingClient } from "./embedding_client.js"
import { RateLimiter } from "./rate_limiter.js"
import { TtlCache } from "./response_cache.js"
import { FakeEmbeddingService } from "./test_support.js"

const BASE_URL = "http://ollama.test"

interface Call {
	url: string
	body: unknown
}

function fakeFetch(reply: () => Response | Promise<Response>) {
	const calls: Call[] = []
	const fetchImpl: typeof fetch = async (input, init) => {
		calls.push({ url: String(input), body: typeof init?.body === "string" ? JSON.parse(init.body) : null })
		return reply()
	}
	return { calls, fetchImpl }
}

function json(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } })
}

const REQUEST: GenerationRequest = { prompt: "### SQL", stop: ["\n\n"], maxTokens: 256, temperature: 0.1 }

describe("OllamaClient", () => {
	it("posts a non-streaming completion request", async () => {
		const { calls, fetchImpl } = fakeFetch(() => json({ response: "SELECT 1", eval_count: 4 }))
		const client = new OllamaClient({ baseUrl: BASE_URL, model: "sqlcoder:7b" }, null, undefined, fetchImpl)

		expect(await client.generate(REQUEST)).toBe("SELECT 1")
		expect(calls).toEqual([
			{
				url: "http://ollama.test/api/generate",
				body: {
					model: "sqlcoder:7b",
					prompt: "### SQL",
					stream: false,
					options: { temperature: 0.1, num_predict: 256, stop: ["\n\n"] },
				},
			},
		])
	})

	it("reports server errors as recoverable generation failures", async () => {
		const { fetchImpl } = fakeFetch(() => new Response("overloaded", { status: 503 }))
		const client = new OllamaClient({ baseUrl: BASE_URL, model: "sqlcoder:7b" }, null, undefined, fetchImpl)

		await expect(client.generate(REQUEST)).rejects.toMatchObject({
			kind: "generation_failed",
			message: "Language model returned error: 503",
			recoverable: true,
		})
	})

	it("rejects an unexpected payload", async () => {
		const { fetchImpl } = fakeFetch(() => json({ text: "SELECT 1" }))
		const client = new OllamaClient({ baseUrl: BASE_URL, model: "sqlcoder:7b" }, null, undefined, fetchImpl)

		await expect(client.generate(REQUEST)).rejects.toMatchObject({
			kind: "generation_failed",
			message: "Language model returned an unexpected payload",
		})
	})

	it("explains an unreachable server", async () => {
		const { fetchImpl } = fakeFetch(() => {
			throw new TypeError("fetch failed")
		})
		const client = new OllamaClient({ baseUrl: BASE_URL, model: "sqlcoder:7b" }, null, undefined, fetchImpl)

		await expect(client.generate(REQUEST)).rejects.toMatchObject({
			kind: "generation_failed",
			message: "Cannot reach the language model at http://ollama.test. Is Ollama running?",
		})
	})

	it("refuses calls beyond the rate limit without contacting the server", async () => {
		const { calls, fetchImpl } = fakeFetch(() => json({ response: "SELECT 1" }))
		const limiter = new RateLimiter({ maxCalls: 1, periodMs: 60_000, acquireTimeoutMs: 0 }, () => 0)
		const client = new OllamaClient({ baseUrl: BASE_URL, model: "sqlcoder:7b" }, limiter, undefined, fetchImpl)

		await client.generate(REQUEST)
		await expect(client.generate(REQUEST)).rejects.toMatchObject({
			kind: "generation_failed",
			message: "The language model is receiving too many requests",
		})
		expect(calls).toHaveLength(1)
	})

	it("checks that the configured model is pulled", async () => {
		const tags = { models: [{ name: "sqlcoder:7b" }, { name: "nomic-embed-text:latest" }] }
		const present = new OllamaClient({ baseUrl: BASE_URL, model: "sqlcoder:7b" }, null, undefined, fakeFetch(() => json(tags)).fetchImpl)
		const missing = new OllamaClient({ baseUrl: BASE_URL, model: "llama3" }, null, undefined, fakeFetch(() => json(tags)).fetchImpl)

		expect(await present.healthCheck()).toBe(true)
		expect(await missing.healthCheck()).toBe(false)
	})
})

describe("OllamaEmbeddingClient", () => {
	it("returns the embedding vector", async () => {
		const { calls, fetchImpl } = fakeFetch(() => json({ embedding: [0.1, 0.2, 0.3] }))
		const client = new OllamaEmbeddingClient({ baseUrl: BASE_URL, model: "nomic-embed-text", timeoutMs: 1000 }, undefined, fetchImpl)

		expect(await client.embed("admissions per ward")).toEqual([0.1, 0.2, 0.3])
		expect(calls).toEqual([
			{ url: "http://ollama.test/api/embeddings", body: { model: "nomic-embed-text", prompt: "admissions per ward" } },
		])
	})

	it("rejects an empty embedding", async () => {
		const { fetchImpl } = fakeFetch(() => json({ embedding: [] }))
		const client = new OllamaEmbeddingClient({ baseUrl: BASE_URL, model: "nomic-embed-text", timeoutMs: 1000 }, undefined, fetchImpl)

		await expect(client.embed("x")).rejects.toMatchObject({
			kind: "internal",
			message: "Embedding service returned an unexpected payload",
		})
	})
})

describe("CachedEmbeddingService", () => {
	it("serves repeated text from the cache regardless of case and spacing", async () => {
		const inner = new FakeEmbeddingService()
		const cached = new CachedEmbeddingService(inner, new TtlCache<number[]>(10, 60_000))

		await cached.embed("How many  patients")
		expect(await cached.embed(" how many patients ")).toEqual([1, 0, 0])
		expect(inner.calls).toEqual(["How many  patients"])
		expect(cached.stats()).toEqual({ entries: 1, hits: 1, misses: 1 })
	})
})
