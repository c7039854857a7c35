/**
 * Generative backend
 *
 * OllamaClient sends one completion request to POST /api/generate. Calls are
 * gated by the shared token-bucket limiter; the per-call timeout is applied
 * by the caller through the signal it passes in.
 */

import { z } from "zod"
import { PipelineError, isAbortError } from "./errors.js"
import { cancelledError, DeadlineExceededError } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"
import type { RateLimiter } from "./rate_limiter.js"

export interface GenerationRequest {
	prompt: string
	stop: string[]
	maxTokens: number
	temperature: number
	signal?: AbortSignal
}

export interface GenerativeBackend {
	generate(request: GenerationRequest): Promise<string>
}

export interface OllamaClientOptions {
	baseUrl: string
	model: string
}

const generateResponseSchema = z.object({
	response: z.string(),
	total_duration: z.number().optional(),
	eval_count: z.number().optional(),
})

const tagsResponseSchema = z.object({
	models: z.array(z.object({ name: z.string() })),
})

export class OllamaClient implements GenerativeBackend {
	constructor(
		private readonly options: OllamaClientOptions,
		private readonly limiter: RateLimiter | null = null,
		private readonly logger: Logger = silentLogger,
		private readonly fetchImpl: typeof fetch = fetch,
	) {}

	async generate(request: GenerationRequest): Promise<string> {
		const { signal } = request
		if (this.limiter) {
			await this.limiter.acquire(signal)
		}

		const url = `${this.options.baseUrl}/api/generate`
		const startTime = Date.now()

		try {
			const response = await this.fetchImpl(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					Accept: "application/json",
				},
				body: JSON.stringify({
					model: this.options.model,
					prompt: request.prompt,
					stream: false,
					options: {
						temperature: request.temperature,
						num_predict: request.maxTokens,
						stop: request.stop,
					},
				}),
				signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new PipelineError(
					"generation_failed",
					`Language model returned error: ${response.status}`,
					response.status >= 500 ? ["Try again in a moment"] : [],
					response.status >= 500,
					{ status_code: response.status, response_body: errorText.slice(0, 500) },
				)
			}

			const body: unknown = await response.json()
			const parsed = generateResponseSchema.safeParse(body)
			if (!parsed.success) {
				throw new PipelineError("generation_failed", "Language model returned an unexpected payload", [], false, {
					issues: parsed.error.issues.map((i) => i.message),
				})
			}

			this.logger.debug("Completion received", {
				model: this.options.model,
				chars: parsed.data.response.length,
				eval_count: parsed.data.eval_count,
				latency_ms: Date.now() - startTime,
			})
			return parsed.data.response
		} catch (error) {
			if (error instanceof PipelineError || error instanceof DeadlineExceededError) {
				throw error
			}
			if (isAbortError(error) || signal?.aborted) {
				throw cancelledError()
			}
			// fetch reports connection failures as TypeError
			if (error instanceof TypeError) {
				throw new PipelineError(
					"generation_failed",
					`Cannot reach the language model at ${this.options.baseUrl}. Is Ollama running?`,
					["Check that the model server is running and try again"],
					true,
					{ base_url: this.options.baseUrl, original_error: error.message },
				)
			}
			throw new PipelineError(
				"generation_failed",
				"Unexpected error communicating with the language model",
				[],
				false,
				{ original_error: String(error) },
			)
		}
	}

	/**
	 * Whether the server answers and has the configured model pulled
	 */
	async healthCheck(signal?: AbortSignal): Promise<boolean> {
		try {
			const response = await this.fetchImpl(`${this.options.baseUrl}/api/tags`, { signal })
			if (!response.ok) return false
			const parsed = tagsResponseSchema.safeParse(await response.json())
			return parsed.success && parsed.data.models.some((m) => m.name === this.options.model)
		} catch (error) {
			this.logger.warn("Language model health check failed", { error: String(error) })
			return false
		}
	}
}
