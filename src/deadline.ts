/**
 * Timeouts, cancellation and clocks
 *
 * Every external boundary takes an AbortSignal. withTimeout() links the
 * caller's signal to a per-call timer so whichever fires first aborts the
 * in-flight work.
 */

import { PipelineError } from "./errors.js"

/** Milliseconds since the epoch; injectable for tests */
export type Clock = () => number

export const systemClock: Clock = () => Date.now()

export class DeadlineExceededError extends Error {
	constructor(
		public readonly label: string,
		public readonly timeoutMs: number,
	) {
		super(`${label} timed out after ${timeoutMs}ms`)
		this.name = "DeadlineExceededError"
	}
}

export function cancelledError(): PipelineError {
	return new PipelineError("cancelled", "The request was cancelled", [], true)
}

export function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) throw cancelledError()
}

/**
 * Run `task` with its own abort signal, aborted when `timeoutMs` elapses or
 * the parent signal aborts. Rejects with DeadlineExceededError on timeout and
 * a `cancelled` PipelineError when the parent aborts, even if the task
 * ignores its signal or rejects on abort.
 */
export async function withTimeout<T>(
	task: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	options: { label?: string; signal?: AbortSignal } = {},
): Promise<T> {
	const { label = "operation", signal: parent } = options
	throwIfAborted(parent)

	const controller = new AbortController()
	let timeoutId: NodeJS.Timeout | undefined
	let onParentAbort: (() => void) | undefined

	const timedOut = new Promise<never>((_, reject) => {
		timeoutId = setTimeout(() => {
			reject(new DeadlineExceededError(label, timeoutMs))
			controller.abort()
		}, timeoutMs)
	})

	const cancelled = new Promise<never>((_, reject) => {
		onParentAbort = () => {
			reject(cancelledError())
			controller.abort()
		}
		parent?.addEventListener("abort", onParentAbort, { once: true })
	})

	try {
		return await Promise.race([task(controller.signal), timedOut, cancelled])
	} finally {
		clearTimeout(timeoutId)
		if (onParentAbort) parent?.removeEventListener("abort", onParentAbort)
	}
}

/** Resolve after `ms`, or reject as cancelled when the signal aborts first */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(cancelledError())
			return
		}
		const onAbort = () => {
			clearTimeout(timeoutId)
			reject(cancelledError())
		}
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort)
			resolve()
		}, ms)
		signal?.addEventListener("abort", onAbort, { once: true })
	})
}

/**
 * Request-scoped deadline: a signal that aborts after `timeoutMs` or when
 * the caller's signal aborts. `expired()` tells the two apart.
 */
export interface Deadline {
	signal: AbortSignal
	expired(): boolean
	dispose(): void
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
	const controller = new AbortController()
	let expired = false
	const timeoutId = setTimeout(() => {
		expired = true
		controller.abort()
	}, timeoutMs)
	const onParentAbort = () => controller.abort()
	if (parent?.aborted) {
		controller.abort()
	} else {
		parent?.addEventListener("abort", onParentAbort, { once: true })
	}

	return {
		signal: controller.signal,
		expired: () => expired,
		dispose: () => {
			clearTimeout(timeoutId)
			parent?.removeEventListener("abort", onParentAbort)
		},
	}
}
