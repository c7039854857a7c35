/**
 * Error taxonomy
 *
 * PipelineError is the single error type that crosses component boundaries.
 * Its `kind` is stable and is what callers (MCP clients, the UI layer) switch
 * on; `suggestions` carry remediation hints shown to the user.
 *
 * Database errors are classified by SQLSTATE into the classes that drive
 * retry and circuit-breaker decisions in the execution guard.
 */

export type ErrorKind =
	| "invalid_input"
	| "security_violation"
	| "validation_failed"
	| "generation_failed"
	| "generation_timeout"
	| "unanswerable"
	| "execution_failed"
	| "execution_timeout"
	| "circuit_open"
	| "cancelled"
	| "internal"

export class PipelineError extends Error {
	constructor(
		public readonly kind: ErrorKind,
		message: string,
		public readonly suggestions: string[] = [],
		public readonly recoverable: boolean = false,
		public readonly context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "PipelineError"
	}
}

/**
 * Error raised by a StatementExecutor. `sqlstate` is the PostgreSQL code when
 * the server produced one, or a Node network code (ECONNRESET, …) otherwise.
 */
export class DatabaseError extends Error {
	constructor(
		message: string,
		public readonly sqlstate?: string,
	) {
		super(message)
		this.name = "DatabaseError"
	}
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

// ============================================================================
// SQLSTATE classification
// ============================================================================

export type DatabaseErrorClass =
	| "transient" // connection loss, deadlock, lock timeout: retry with backoff
	| "timeout" // statement_timeout fired
	| "infrastructure" // resources, internal errors: never retry
	| "permission" // privilege / feature not supported
	| "statement" // the SQL itself is wrong
	| "unknown"

export interface DatabaseErrorClassification {
	errorClass: DatabaseErrorClass
	code: string | null
	retryable: boolean
	/** Whether the failure says something about datastore health */
	countsAsFailure: boolean
	reason: string
}

const TRANSIENT_CODES = [
	"40001", // serialization_failure
	"40P01", // deadlock_detected
	"55P03", // lock_not_available (lock_timeout)
	"57P01", // admin_shutdown
	"57P02", // crash_shutdown
	"57P03", // cannot_connect_now
]

const TRANSIENT_PREFIXES = ["08"] // connection exception

const NETWORK_CODES = ["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EHOSTUNREACH", "ENOTFOUND"]

const INFRASTRUCTURE_PREFIXES = ["53", "54", "58", "F0", "XX"]

const PERMISSION_CODES = ["42501"]
const PERMISSION_PREFIXES = ["0A"]

const STATEMENT_PREFIXES = ["42", "22", "21", "2B", "34", "3F"]

const REASONS: Record<string, string> = {
	"40001": "Serialization failure",
	"40P01": "Deadlock detected",
	"55P03": "Lock timeout",
	"57014": "Query canceled (statement_timeout)",
	"57P01": "Server shutting down",
	"57P02": "Server crashed",
	"57P03": "Server not accepting connections",
	"42P01": "Undefined table",
	"42703": "Undefined column",
	"42601": "Syntax error",
	"42501": "Insufficient privilege",
	"53300": "Too many connections",
}

function matchesPrefix(code: string, prefixes: string[]): boolean {
	return prefixes.some((prefix) => code.startsWith(prefix))
}

function readCode(error: unknown): string | null {
	if (error instanceof DatabaseError) return error.sqlstate ?? null
	if (typeof error === "object" && error !== null && "code" in error) {
		const code = error.code
		return typeof code === "string" ? code : null
	}
	return null
}

/**
 * Classify a datastore error for retry gating and circuit-breaker accounting
 */
export function classifyDatabaseError(error: unknown): DatabaseErrorClassification {
	const code = readCode(error)
	const message = errorMessage(error)

	if (code === "57014") {
		return { errorClass: "timeout", code, retryable: false, countsAsFailure: true, reason: REASONS[code] }
	}

	if (code && (TRANSIENT_CODES.includes(code) || matchesPrefix(code, TRANSIENT_PREFIXES) || NETWORK_CODES.includes(code))) {
		return {
			errorClass: "transient",
			code,
			retryable: true,
			countsAsFailure: true,
			reason: REASONS[code] ?? "Connection failure",
		}
	}

	// pg reports pool checkout timeouts and dropped sockets without a code
	if (!code && /timeout exceeded when trying to connect|connection terminated|connection refused/i.test(message)) {
		return { errorClass: "transient", code, retryable: true, countsAsFailure: true, reason: "Connection failure" }
	}

	if (code && matchesPrefix(code, INFRASTRUCTURE_PREFIXES)) {
		return {
			errorClass: "infrastructure",
			code,
			retryable: false,
			countsAsFailure: true,
			reason: REASONS[code] ?? "Datastore infrastructure failure",
		}
	}

	if (code && (PERMISSION_CODES.includes(code) || matchesPrefix(code, PERMISSION_PREFIXES))) {
		return {
			errorClass: "permission",
			code,
			retryable: false,
			countsAsFailure: false,
			reason: REASONS[code] ?? "Permission denied or feature not supported",
		}
	}

	if (code && matchesPrefix(code, STATEMENT_PREFIXES)) {
		return {
			errorClass: "statement",
			code,
			retryable: false,
			countsAsFailure: false,
			reason: REASONS[code] ?? "Statement rejected by the datastore",
		}
	}

	return {
		errorClass: "unknown",
		code,
		retryable: false,
		countsAsFailure: true,
		reason: `Unclassified error${code ? ` ${code}` : ""}: ${message}`,
	}
}

/** Normalize whatever the driver threw into a DatabaseError that keeps its code */
export function toDatabaseError(error: unknown): DatabaseError {
	if (error instanceof DatabaseError) return error
	return new DatabaseError(errorMessage(error), readCode(error) ?? undefined)
}
