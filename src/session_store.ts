/**
 * Conversation state
 *
 * Per-session bounded history of finished turns. Sessions expire after an
 * idle period and the least recently active ones are evicted past
 * `maxSessions`. The orchestrator appends a turn only once its response is
 * final, so a request in flight never observes a half-written turn.
 */

import { systemClock, type Clock } from "./deadline.js"
import { TtlCache } from "./response_cache.js"
import type { ConversationTurn } from "./types.js"

export interface Session {
	id: string
	history: ConversationTurn[]
	lastActivity: number
}

export interface SessionStoreOptions {
	maxHistory: number
	idleTtlMs: number
	maxSessions: number
}

export class SessionStore {
	private sessions: TtlCache<Session>

	constructor(
		private readonly options: SessionStoreOptions,
		private readonly clock: Clock = systemClock,
	) {
		this.sessions = new TtlCache(options.maxSessions, options.idleTtlMs, clock)
	}

	/** Snapshot of a session's turns, oldest first */
	history(sessionId: string): ConversationTurn[] {
		return [...(this.sessions.get(sessionId)?.history ?? [])]
	}

	/** The most recent `n` turns, for prompt construction */
	window(sessionId: string, n: number): ConversationTurn[] {
		if (n <= 0) return []
		return this.history(sessionId).slice(-n)
	}

	append(sessionId: string, turn: ConversationTurn): void {
		const session = this.sessions.get(sessionId) ?? { id: sessionId, history: [], lastActivity: 0 }
		session.history.push(turn)
		while (session.history.length > this.options.maxHistory) {
			session.history.shift()
		}
		session.lastActivity = this.clock()
		// Re-set to refresh the idle expiry
		this.sessions.set(sessionId, session)
	}

	/** Drop idle sessions; returns how many were removed */
	prune(): number {
		return this.sessions.prune()
	}

	get size(): number {
		return this.sessions.size
	}
}
