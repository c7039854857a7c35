/**
 * Intent Analyzer
 *
 * Pattern-based classification of a question into a closed set of intent
 * kinds, plus independent entity extractors (dates, numbers, comparators,
 * table hints). Pure: the result depends only on the text, the conversation
 * history, the known table names and the reference date.
 *
 * The confidence score gates generation: below the configured threshold the
 * orchestrator asks clarification questions instead of generating SQL.
 */

import type {
	ComparatorEntity,
	ComparatorOp,
	ConversationTurn,
	DateEntity,
	IntentKind,
	QueryEntities,
} from "./types.js"

export interface IntentAnalysis {
	intent: IntentKind
	confidence: number
	normalizedText: string
	entities: QueryEntities
	isFollowUp: boolean
}

export interface AnalyzeOptions {
	knownTables?: string[]
	/** Reference date for relative expressions (defaults to now) */
	now?: Date
}

// ============================================================================
// Intent rules
// ============================================================================

interface IntentRule {
	intent: IntentKind
	pattern: RegExp
	strength: number
}

/** Ordered: first match wins */
const INTENT_RULES: IntentRule[] = [
	{ intent: "count", pattern: /\b(how many|number of|count of|count)\b/, strength: 0.6 },
	{ intent: "ranking", pattern: /\b(top|bottom|highest|lowest|most|least|rank(?:ed|ing)?)\b/, strength: 0.55 },
	{ intent: "aggregate", pattern: /\b(average|avg|mean|total|sum|maximum|minimum|max|min)\b/, strength: 0.55 },
	{ intent: "trend", pattern: /\b(trend|over time|(?:per|by) (?:day|week|month|quarter|year)|daily|weekly|monthly|yearly)\b/, strength: 0.5 },
	{ intent: "comparison", pattern: /\b(compare|compared|versus|vs|difference between)\b/, strength: 0.5 },
	{ intent: "lookup", pattern: /\b(what is the|what's the|which|who is|who was|details of|find)\b/, strength: 0.45 },
	{ intent: "list", pattern: /\b(show|list|display|give me|get|all)\b/, strength: 0.4 },
]

const UNKNOWN_STRENGTH = 0.3

const BONUS = {
	date: 0.15,
	tableHint: 0.1,
	comparatorOrNumber: 0.05,
	specificity: 0.05,
	followUp: 0.1,
}

const SPECIFIC_WORD_COUNT = 5
const MAX_CONFIDENCE = 0.99

const FOLLOW_UP_LEAD = /^(what about|how about|and for|and in|and what about|same for|same but|now for|also for|and)\b/
const FOLLOW_UP_REFERENCE = /\b(those|them|these|that|it|same)\b/

export function normalizeQuestion(text: string): string {
	return text.toLowerCase().replace(/\s+/g, " ").trim().replace(/[?.!]+$/, "").trim()
}

function strengthOf(intent: IntentKind): number {
	return INTENT_RULES.find((r) => r.intent === intent)?.strength ?? UNKNOWN_STRENGTH
}

export function classifyIntent(normalized: string): { intent: IntentKind; strength: number } {
	for (const rule of INTENT_RULES) {
		if (rule.pattern.test(normalized)) {
			return { intent: rule.intent, strength: rule.strength }
		}
	}
	return { intent: "unknown", strength: UNKNOWN_STRENGTH }
}

// ============================================================================
// Date extraction
// ============================================================================

const MONTHS = [
	"january", "february", "march", "april", "may", "june",
	"july", "august", "september", "october", "november", "december",
]

function utcDate(year: number, month: number, day: number): Date {
	return new Date(Date.UTC(year, month, day))
}

function iso(d: Date): string {
	return d.toISOString().slice(0, 10)
}

function addDays(d: Date, days: number): Date {
	return utcDate(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() + days)
}

function startOfWeek(d: Date): Date {
	// Monday-based weeks
	const offset = (d.getUTCDay() + 6) % 7
	return addDays(d, -offset)
}

interface DateMatch {
	entity: DateEntity
	index: number
}

export function extractDates(normalized: string, now: Date = new Date()): DateEntity[] {
	const today = utcDate(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
	const year = today.getUTCFullYear()
	const month = today.getUTCMonth()
	const found: DateMatch[] = []
	const claimed: Array<[number, number]> = []

	const claim = (match: RegExpExecArray, from: Date, to: Date) => {
		const start = match.index
		const end = start + match[0].length
		if (claimed.some(([s, e]) => start < e && end > s)) return
		claimed.push([start, end])
		found.push({ entity: { text: match[0], from: iso(from), to: iso(to) }, index: start })
	}

	const scan = (pattern: RegExp, resolve: (m: RegExpExecArray) => [Date, Date] | null) => {
		const regex = new RegExp(pattern.source, "g")
		let m: RegExpExecArray | null
		while ((m = regex.exec(normalized)) !== null) {
			const range = resolve(m)
			if (range) claim(m, range[0], range[1])
		}
	}

	scan(/\b(?:last|past|previous) (\d+) (day|week|month|year)s?\b/, (m) => {
		const n = parseInt(m[1], 10)
		const unit = m[2]
		const end = addDays(today, 1)
		if (unit === "day") return [addDays(today, -n), end]
		if (unit === "week") return [addDays(today, -7 * n), end]
		if (unit === "month") return [utcDate(year, month - n, today.getUTCDate()), end]
		return [utcDate(year - n, month, today.getUTCDate()), end]
	})

	scan(/\b(\d{4})-(\d{2})-(\d{2})\b/, (m) => {
		const d = utcDate(parseInt(m[1], 10), parseInt(m[2], 10) - 1, parseInt(m[3], 10))
		return isNaN(d.getTime()) ? null : [d, addDays(d, 1)]
	})

	scan(new RegExp(`\\b(${MONTHS.join("|")})(?: (\\d{4}))?\\b`), (m) => {
		const monthIndex = MONTHS.indexOf(m[1])
		// "may" is too common as a verb to count without a year
		if (m[1] === "may" && !m[2]) return null
		const y = m[2] ? parseInt(m[2], 10) : year
		return [utcDate(y, monthIndex, 1), utcDate(y, monthIndex + 1, 1)]
	})

	scan(/\b(?:in|during|for|of) (\d{4})\b/, (m) => {
		const y = parseInt(m[1], 10)
		if (y < 1900 || y > 2100) return null
		return [utcDate(y, 0, 1), utcDate(y + 1, 0, 1)]
	})

	scan(/\btoday\b/, () => [today, addDays(today, 1)])
	scan(/\byesterday\b/, () => [addDays(today, -1), today])
	scan(/\bthis week\b/, () => [startOfWeek(today), addDays(startOfWeek(today), 7)])
	scan(/\b(?:last|previous) week\b/, () => [addDays(startOfWeek(today), -7), startOfWeek(today)])
	scan(/\bthis month\b/, () => [utcDate(year, month, 1), utcDate(year, month + 1, 1)])
	scan(/\b(?:last|previous) month\b/, () => [utcDate(year, month - 1, 1), utcDate(year, month, 1)])
	scan(/\bthis year\b/, () => [utcDate(year, 0, 1), utcDate(year + 1, 0, 1)])
	scan(/\b(?:last|previous) year\b/, () => [utcDate(year - 1, 0, 1), utcDate(year, 0, 1)])

	return found.sort((a, b) => a.index - b.index).map((f) => f.entity)
}

// ============================================================================
// Numbers & comparators
// ============================================================================

export function extractNumbers(normalized: string, dates: DateEntity[]): number[] {
	let text = normalized
	for (const d of dates) {
		text = text.split(d.text).join(" ")
	}
	const numbers: number[] = []
	const regex = /(?<![\w.])-?\d+(?:\.\d+)?(?![\w.])/g
	let m: RegExpExecArray | null
	while ((m = regex.exec(text)) !== null) {
		numbers.push(parseFloat(m[0]))
	}
	return numbers
}

const COMPARATOR_PHRASES: Array<[RegExp, ComparatorOp]> = [
	[/\bbetween\b/, "between"],
	[/\b(?:at least|no less than|minimum of)\b/, ">="],
	[/\b(?:at most|no more than|maximum of|up to)\b/, "<="],
	[/\b(?:more than|greater than|over|above|exceeding)\b/, ">"],
	[/\b(?:less than|fewer than|under|below)\b/, "<"],
	[/\b(?:equal to|exactly)\b/, "="],
	[/>=/, ">="],
	[/<=/, "<="],
	[/(?<![<>])>(?!=)/, ">"],
	[/<(?![=>])/, "<"],
	[/(?<![<>!])=/, "="],
]

export function extractComparators(normalized: string): ComparatorEntity[] {
	const found: Array<ComparatorEntity & { index: number }> = []
	for (const [pattern, op] of COMPARATOR_PHRASES) {
		const regex = new RegExp(pattern.source, "g")
		let m: RegExpExecArray | null
		while ((m = regex.exec(normalized)) !== null) {
			found.push({ text: m[0], op, index: m.index })
		}
	}
	return found.sort((a, b) => a.index - b.index).map(({ text, op }) => ({ text, op }))
}

// ============================================================================
// Table hints
// ============================================================================

function singular(word: string): string {
	if (word.endsWith("ies") && word.length > 4) return word.slice(0, -3) + "y"
	if (word.endsWith("sses")) return word.slice(0, -2)
	if (word.endsWith("s") && !word.endsWith("ss") && word.length > 3) return word.slice(0, -1)
	return word
}

export function extractTableHints(normalized: string, knownTables: string[]): string[] {
	if (knownTables.length === 0) return []
	const words = normalized.match(/[a-z_][a-z0-9_]*/g) ?? []
	const forms: string[] = []
	for (let i = 0; i < words.length; i++) {
		forms.push(words[i])
		if (i + 1 < words.length) forms.push(`${words[i]}_${words[i + 1]}`)
	}

	const bySingular = new Map<string, string>()
	for (const table of knownTables) {
		bySingular.set(singular(table.toLowerCase()), table)
	}

	const hints: string[] = []
	for (const form of forms) {
		const table = bySingular.get(singular(form))
		if (table && !hints.includes(table)) hints.push(table)
	}
	return hints
}

// ============================================================================
// Analysis
// ============================================================================

function isFollowUpQuestion(normalized: string, history: ConversationTurn[]): boolean {
	if (history.length === 0) return false
	if (FOLLOW_UP_LEAD.test(normalized)) return true
	const wordCount = normalized.split(" ").length
	return wordCount <= 6 && FOLLOW_UP_REFERENCE.test(normalized)
}

function round(value: number): number {
	return Math.round(value * 100) / 100
}

export function analyzeIntent(
	text: string,
	history: ConversationTurn[] = [],
	options: AnalyzeOptions = {},
): IntentAnalysis {
	const normalized = normalizeQuestion(text)
	const now = options.now ?? new Date()
	const knownTables = options.knownTables ?? []

	let { intent, strength } = classifyIntent(normalized)
	const dates = extractDates(normalized, now)
	const entities: QueryEntities = {
		dates,
		numbers: extractNumbers(normalized, dates),
		comparators: extractComparators(normalized),
		tableHints: extractTableHints(normalized, knownTables),
	}

	const isFollowUp = isFollowUpQuestion(normalized, history)
	if (isFollowUp) {
		// Reference resolution: carry scope forward from the previous turn
		const previous = history[history.length - 1].query
		if (intent === "unknown") {
			intent = previous.intent
			strength = strengthOf(intent)
		}
		for (const hint of previous.entities.tableHints) {
			if (!entities.tableHints.includes(hint)) entities.tableHints.push(hint)
		}
		if (entities.dates.length === 0) {
			entities.dates.push(...previous.entities.dates)
		}
	}

	let confidence = strength
	if (entities.dates.length > 0) confidence += BONUS.date
	if (entities.tableHints.length > 0) confidence += BONUS.tableHint
	if (entities.comparators.length > 0 || entities.numbers.length > 0) confidence += BONUS.comparatorOrNumber
	if (normalized.split(" ").length >= SPECIFIC_WORD_COUNT) confidence += BONUS.specificity
	if (isFollowUp) confidence += BONUS.followUp

	return {
		intent,
		confidence: round(Math.min(confidence, MAX_CONFIDENCE)),
		normalizedText: normalized,
		entities,
		isFollowUp,
	}
}

/**
 * Questions that would raise confidence for an ambiguous request.
 */
export function clarificationQuestions(analysis: IntentAnalysis): string[] {
	const questions: string[] = []
	const { entities, intent } = analysis

	if (entities.dates.length === 0) {
		questions.push("What time period should this cover (for example yesterday, last month, or 2024)?")
	}
	if (entities.tableHints.length === 0 && entities.comparators.length === 0) {
		questions.push("Which records should be included (for example a specific department, category, or status)?")
	}
	if (intent === "list" || intent === "lookup" || intent === "unknown") {
		questions.push("What should be measured: a count, a total, an average, or the individual records?")
	}
	if (questions.length === 0) {
		questions.push("Could you rephrase the question with the specific measure, scope, and time period you need?")
	}
	return questions
}
