/**
 * Core pipeline types
 *
 * Shared by every stage: intent analysis, retrieval, generation, validation,
 * execution and the orchestrator's outcomes.
 */

import type { ErrorKind } from "./errors.js"

// ============================================================================
// Query & intent
// ============================================================================

export type IntentKind =
	| "count"
	| "aggregate"
	| "ranking"
	| "comparison"
	| "trend"
	| "list"
	| "lookup"
	| "unknown"

export interface DateEntity {
	text: string
	/** ISO date (inclusive) */
	from: string
	/** ISO date (exclusive) */
	to: string
}

export type ComparatorOp = ">" | ">=" | "<" | "<=" | "=" | "between"

export interface ComparatorEntity {
	text: string
	op: ComparatorOp
}

export interface QueryEntities {
	dates: DateEntity[]
	numbers: number[]
	comparators: ComparatorEntity[]
	tableHints: string[]
}

export interface Query {
	readonly id: string
	readonly sessionId: string
	readonly text: string
	readonly normalizedText: string
	readonly timestamp: string
	readonly intent: IntentKind
	readonly confidence: number
	readonly entities: Readonly<QueryEntities>
	readonly isFollowUp: boolean
}

// ============================================================================
// Retrieval context
// ============================================================================

interface ElementBase {
	id: string
	content: string
	score: number
}

export interface TableElement extends ElementBase {
	kind: "table"
	metadata: { table: string; schema: string; description?: string; rowCount?: number }
}

export interface ColumnElement extends ElementBase {
	kind: "column"
	metadata: { table: string; column: string; dataType: string }
}

export interface RelationshipElement extends ElementBase {
	kind: "relationship"
	metadata: { fromTable: string; fromColumn: string; toTable: string; toColumn: string }
}

export interface ExampleElement extends ElementBase {
	kind: "example"
	metadata: { question: string; sql: string; intent?: IntentKind }
}

export interface RuleElement extends ElementBase {
	kind: "rule"
	metadata: { intents?: IntentKind[] }
}

export type ContextElement = TableElement | ColumnElement | RelationshipElement | ExampleElement | RuleElement

export type ContextKind = ContextElement["kind"]

export const CONTEXT_KINDS: readonly ContextKind[] = ["table", "column", "relationship", "example", "rule"]

export interface RetrievalContext {
	queryText: string
	intent: IntentKind
	elements: ContextElement[]
	totalTokens: number
	tokenBudget: number
	/** True when retrieval failed and generation runs without schema facts */
	degraded: boolean
}

// ============================================================================
// Generation
// ============================================================================

export type ComplexityTier = "simple" | "moderate" | "complex"

export interface GeneratedStatement {
	sql: string
	dialect: string
	complexity: ComplexityTier
	referencedTables: string[]
	attempt: number
	confidence: number
}

// ============================================================================
// Validation
// ============================================================================

export type IssueSeverity = "info" | "warning" | "error" | "critical"

export type ValidationLayer = "injection" | "allow_list" | "schema" | "complexity" | "cost"

export interface ValidationIssue {
	severity: IssueSeverity
	ruleId: string
	layer: ValidationLayer
	message: string
	suggestion?: string
	/** Ranked alternatives (schema layer) */
	candidates?: string[]
}

export type RiskLevel = "low" | "medium" | "high" | "very-high"

export interface ValidationResult {
	passed: boolean
	issues: ValidationIssue[]
	statement: string
	risk: RiskLevel
}

// ============================================================================
// Execution
// ============================================================================

export type Row = Record<string, unknown>

/** Why an execution did not produce rows; mapped one-to-one onto an ErrorResult */
export interface ExecutionFailure {
	kind: Extract<ErrorKind, "execution_failed" | "execution_timeout" | "circuit_open">
	message: string
	suggestions: string[]
	retryAfterMs?: number
}

export interface ExecutionResult {
	success: boolean
	rows: Row[]
	columns: string[]
	rowCount: number
	executionTimeMs: number
	complete: boolean
	estimatedRowCount?: number
	warnings: string[]
	attempts: number
	failure?: ExecutionFailure
}

// ============================================================================
// Outcomes
// ============================================================================

export interface Response {
	queryId: string
	sessionId: string
	question: string
	statement: string
	execution: ExecutionResult
	answer: string
	latencyMs: number
	cacheHit: boolean
	intent: IntentKind
	confidence: number
	validationWarnings: string[]
}

export interface ClarificationRequest {
	queryId: string
	question: string
	intent: IntentKind
	confidence: number
	questions: string[]
}

export interface ErrorResult {
	queryId: string
	kind: ErrorKind
	message: string
	suggestions: string[]
	traceId: string
}

export type ProcessOutcome =
	| { kind: "answer"; response: Response }
	| { kind: "clarification"; clarification: ClarificationRequest }
	| { kind: "error"; error: ErrorResult }

// ============================================================================
// Conversation
// ============================================================================

export interface ConversationTurn {
	query: Query
	response: Response
}
