/**
 * Embedding service
 *
 * OllamaEmbeddingClient calls POST /api/embeddings; CachedEmbeddingService
 * memoizes vectors by normalized text so repeated and follow-up questions
 * skip the round trip.
 */

import { z } from "zod"
import { PipelineError, isAbortError } from "./errors.js"
import { DeadlineExceededError, withTimeout } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"
import type { TtlCache } from "./response_cache.js"

export interface EmbeddingService {
	embed(text: string, signal?: AbortSignal): Promise<number[]>
}

export interface OllamaEmbeddingOptions {
	baseUrl: string
	model: string
	timeoutMs: number
}

const embeddingResponseSchema = z.object({
	embedding: z.array(z.number()).min(1),
})

export class OllamaEmbeddingClient implements EmbeddingService {
	constructor(
		private readonly options: OllamaEmbeddingOptions,
		private readonly logger: Logger = silentLogger,
		private readonly fetchImpl: typeof fetch = fetch,
	) {}

	async embed(text: string, signal?: AbortSignal): Promise<number[]> {
		const url = `${this.options.baseUrl}/api/embeddings`
		const startTime = Date.now()

		try {
			const body: unknown = await withTimeout(
				async (s) => {
					const response = await this.fetchImpl(url, {
						method: "POST",
						headers: { "Content-Type": "application/json", Accept: "application/json" },
						body: JSON.stringify({ model: this.options.model, prompt: text }),
						signal: s,
					})
					if (!response.ok) {
						const errorText = await response.text()
						throw new PipelineError(
							"internal",
							`Embedding service returned error: ${response.status} ${errorText}`,
							[],
							response.status >= 500,
							{ status_code: response.status },
						)
					}
					return response.json()
				},
				this.options.timeoutMs,
				{ label: "embedding", signal },
			)

			const parsed = embeddingResponseSchema.safeParse(body)
			if (!parsed.success) {
				throw new PipelineError("internal", "Embedding service returned an unexpected payload", [], false, {
					issues: parsed.error.issues.map((i) => i.message),
				})
			}

			this.logger.debug("Embedding computed", {
				dimensions: parsed.data.embedding.length,
				latency_ms: Date.now() - startTime,
			})
			return parsed.data.embedding
		} catch (error) {
			if (error instanceof PipelineError || error instanceof DeadlineExceededError || isAbortError(error)) {
				throw error
			}
			throw new PipelineError(
				"internal",
				`Cannot reach embedding service at ${this.options.baseUrl}: ${String(error)}`,
				[],
				true,
				{ base_url: this.options.baseUrl },
			)
		}
	}
}

export function embeddingCacheKey(text: string): string {
	return text.toLowerCase().replace(/\s+/g, " ").trim()
}

export class CachedEmbeddingService implements EmbeddingService {
	private hits = 0
	private misses = 0

	constructor(
		private readonly inner: EmbeddingService,
		private readonly cache: TtlCache<number[]>,
	) {}

	async embed(text: string, signal?: AbortSignal): Promise<number[]> {
		const key = embeddingCacheKey(text)
		const cached = this.cache.get(key)
		if (cached) {
			this.hits++
			return cached
		}
		this.misses++
		const vector = await this.inner.embed(text, signal)
		this.cache.set(key, vector)
		return vector
	}

	stats(): { entries: number; hits: number; misses: number } {
		return { entries: this.cache.size, hits: this.hits, misses: this.misses }
	}
}
