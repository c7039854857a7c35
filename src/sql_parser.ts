/**
 * SQL parsing helpers
 *
 * - State-machine tokenizer that separates code from strings, quoted
 *   identifiers, dollar-quoted bodies and comments
 * - Statement extraction from raw LLM completions
 * - Structural analysis (tables, aliases, joins, subqueries, clauses) used by
 *   the validator, the cost estimator and the generation controller
 *
 * This is a best-effort analyzer, not a full SQL grammar.
 */

export enum TokenType {
	NORMAL = "NORMAL",
	SINGLE_QUOTE = "SINGLE_QUOTE",
	DOUBLE_QUOTE = "DOUBLE_QUOTE",
	DOLLAR_QUOTE = "DOLLAR_QUOTE",
	LINE_COMMENT = "LINE_COMMENT",
	BLOCK_COMMENT = "BLOCK_COMMENT",
}

export interface Token {
	type: TokenType
	value: string
	start: number
	end: number
}

function readQuoted(sql: string, start: number, quote: string): number {
	let i = start + 1
	while (i < sql.length) {
		if (sql[i] === quote) {
			// doubled quote is an escape
			if (sql[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return i
}

/**
 * Tokenize SQL with proper handling of strings, comments, and dollar quoting
 */
export function tokenizeSQL(sql: string): Token[] {
	const tokens: Token[] = []
	const len = sql.length
	let i = 0

	while (i < len) {
		const char = sql[i]
		const next = i + 1 < len ? sql[i + 1] : ""
		const start = i

		if (char === "-" && next === "-") {
			while (i < len && sql[i] !== "\n") i++
			tokens.push({ type: TokenType.LINE_COMMENT, value: sql.substring(start, i), start, end: i })
			continue
		}

		if (char === "/" && next === "*") {
			i += 2
			while (i < len && !(sql[i] === "*" && sql[i + 1] === "/")) i++
			i = Math.min(i + 2, len)
			tokens.push({ type: TokenType.BLOCK_COMMENT, value: sql.substring(start, i), start, end: i })
			continue
		}

		if (char === "'") {
			i = readQuoted(sql, i, "'")
			tokens.push({ type: TokenType.SINGLE_QUOTE, value: sql.substring(start, i), start, end: i })
			continue
		}

		if (char === '"') {
			i = readQuoted(sql, i, '"')
			tokens.push({ type: TokenType.DOUBLE_QUOTE, value: sql.substring(start, i), start, end: i })
			continue
		}

		// $tag$...$tag$ or $$...$$ (but not positional parameters like $1)
		if (char === "$" && !/[0-9]/.test(next)) {
			const tagEnd = sql.indexOf("$", i + 1)
			const tag = tagEnd === -1 ? "" : sql.substring(i, tagEnd + 1)
			if (tagEnd !== -1 && /^\$[A-Za-z_]*\$$/.test(tag)) {
				const close = sql.indexOf(tag, tagEnd + 1)
				i = close === -1 ? len : close + tag.length
				tokens.push({ type: TokenType.DOLLAR_QUOTE, value: sql.substring(start, i), start, end: i })
				continue
			}
		}

		// Normal run: accumulate until a char that may open a string/comment
		i++
		while (
			i < len &&
			sql[i] !== "'" &&
			sql[i] !== '"' &&
			sql[i] !== "$" &&
			!(sql[i] === "-" && sql[i + 1] === "-") &&
			!(sql[i] === "/" && sql[i + 1] === "*")
		) {
			i++
		}
		const previous = tokens[tokens.length - 1]
		if (previous && previous.type === TokenType.NORMAL) {
			previous.value += sql.substring(start, i)
			previous.end = i
		} else {
			tokens.push({ type: TokenType.NORMAL, value: sql.substring(start, i), start, end: i })
		}
	}

	return tokens
}

/**
 * Code-only view of a statement: string literals collapse to '' and comments
 * to a space, so keyword and structure checks never match inside them.
 */
export function codeText(sql: string): string {
	return tokenizeSQL(sql)
		.map((t) => {
			switch (t.type) {
				case TokenType.NORMAL:
				case TokenType.DOUBLE_QUOTE:
					return t.value
				case TokenType.SINGLE_QUOTE:
				case TokenType.DOLLAR_QUOTE:
					return "''"
				default:
					return " "
			}
		})
		.join("")
}

export function hasComments(sql: string): boolean {
	return tokenizeSQL(sql).some((t) => t.type === TokenType.LINE_COMMENT || t.type === TokenType.BLOCK_COMMENT)
}

/** Positions of semicolons outside strings and comments */
export function semicolonPositions(sql: string): number[] {
	const positions: number[] = []
	for (const token of tokenizeSQL(sql)) {
		if (token.type !== TokenType.NORMAL) continue
		for (let i = 0; i < token.value.length; i++) {
			if (token.value[i] === ";") positions.push(token.start + i)
		}
	}
	return positions
}

/** Strip trailing whitespace and statement terminators */
export function stripTerminator(sql: string): string {
	return sql.trim().replace(/[;\s]+$/, "")
}

// ============================================================================
// Statement extraction
// ============================================================================

export type ExtractionResult =
	| { kind: "statement"; sql: string }
	| { kind: "no_sql" }
	| { kind: "empty" }

const STATEMENT_START = /\b(select|with)\b/gi

const IDENT = String.raw`(?:"[^"]+"|[a-z_][\w$]*)`

// WITH [RECURSIVE] name [(columns)] AS [NOT] [MATERIALIZED] (
const CTE_HEAD = new RegExp(
	String.raw`^with\s+(?:recursive\s+)?${IDENT}\s*(?:\([^)]*\))?\s+as\s+(?:not\s+)?(?:materialized\s+)?\(`,
	"i",
)

// SELECT followed by a select-list item rather than an English word
const SELECT_HEAD = new RegExp(
	String.raw`^select\s+(?:[*\d'(-]|(?:distinct|all)\b|[a-z_][\w$]*\s*\(|${IDENT}(?:\.(?:${IDENT}|\*))?\s*(?:,|from\b|as\b|\n|$))`,
	"i",
)

/**
 * Offset of the first SELECT or WITH that opens a statement. "with" and
 * "select" are common in narrative, so a WITH must open a CTE, and a SELECT
 * must start its line or be followed by a select-list item.
 */
function findStatementStart(text: string): number | null {
	const pattern = new RegExp(STATEMENT_START.source, STATEMENT_START.flags)
	let match: RegExpExecArray | null
	while ((match = pattern.exec(text)) !== null) {
		const rest = text.slice(match.index)
		if (match[1].toLowerCase() === "with") {
			if (CTE_HEAD.test(rest)) return match.index
			continue
		}
		const lineBefore = text.slice(text.lastIndexOf("\n", match.index - 1) + 1, match.index)
		if (lineBefore.trim() === "" || SELECT_HEAD.test(rest)) return match.index
	}
	return null
}

const CHAINED_STATEMENT = /^\s*(select|with|insert|update|delete|drop|create|alter|truncate|grant|revoke|exec|execute|merge|call|copy|set|begin|commit|declare)\b/i

const CONTINUATION = /^\s*(from|where|join|left|right|inner|outer|full|cross|on|and|or|group|order|having|limit|offset|fetch|union|intersect|except|window|select|with|case|when|then|else|end|as|\(|\)|,)/i

/**
 * Pull the SQL statement out of a raw completion: drop code fences and
 * narrative, start at the first SELECT/WITH that opens a statement, stop
 * at the end of the statement. A chained statement after a semicolon is kept so the
 * validator sees it.
 */
export function extractStatement(completion: string): ExtractionResult {
	let text = completion.trim()
	if (text.length === 0) return { kind: "empty" }
	if (/^no_sql\b/i.test(text) || /^`*\s*no_sql\s*`*$/i.test(text)) return { kind: "no_sql" }

	const fenced = /```(?:sql|postgresql|postgres)?\s*\n?([\s\S]*?)(?:```|$)/i.exec(text)
	if (fenced && fenced[1].trim().length > 0) {
		text = fenced[1]
	}

	const start = findStatementStart(text)
	if (start === null) {
		return /\bno_sql\b/i.test(text) ? { kind: "no_sql" } : { kind: "empty" }
	}
	let sql = text.slice(start)

	const fence = sql.indexOf("```")
	if (fence !== -1) sql = sql.slice(0, fence)

	// Blank line followed by prose ends the statement
	const paragraphs = sql.split(/\n\s*\n/)
	let kept = paragraphs[0]
	for (let i = 1; i < paragraphs.length; i++) {
		if (!CONTINUATION.test(paragraphs[i])) break
		kept += "\n" + paragraphs[i]
	}
	sql = kept

	const semicolons = semicolonPositions(sql)
	if (semicolons.length > 0) {
		const first = semicolons[0]
		const after = sql.slice(first + 1)
		if (!CHAINED_STATEMENT.test(after)) {
			sql = sql.slice(0, first)
		}
	}

	sql = stripTerminator(sql)
	return sql.length > 0 ? { kind: "statement", sql } : { kind: "empty" }
}

// ============================================================================
// Structural analysis
// ============================================================================

export interface QualifiedColumn {
	qualifier: string
	column: string
	table: string
}

export interface StatementStructure {
	firstKeyword: string
	tables: string[]
	cteNames: string[]
	aliases: Map<string, string>
	qualifiedColumns: QualifiedColumn[]
	joinCount: number
	subqueryCount: number
	maxSubqueryDepth: number
	unionCount: number
	hasWindow: boolean
	hasWhere: boolean
	hasLimit: boolean
	hasAggregate: boolean
	hasGroupBy: boolean
}

const NOT_AN_ALIAS = new Set([
	"where", "join", "on", "left", "right", "inner", "outer", "full", "cross", "natural",
	"group", "order", "limit", "offset", "fetch", "having", "union", "intersect", "except",
	"window", "using", "lateral", "as", "select", "from", "and", "or", "tablesample",
])

const CLAUSE_END = "(?=\\bwhere\\b|\\bgroup\\b|\\border\\b|\\blimit\\b|\\boffset\\b|\\bhaving\\b|\\bjoin\\b|\\bleft\\b|\\bright\\b|\\binner\\b|\\bfull\\b|\\bcross\\b|\\bnatural\\b|\\bunion\\b|\\bintersect\\b|\\bexcept\\b|\\bwindow\\b|\\bfetch\\b|\\)|;|$)"

const TABLE_IDENT = '(?:"[^"]+"|[a-z_][a-z0-9_$]*)'

function cleanIdentifier(raw: string): string {
	const last = raw.split(".").pop() ?? raw
	return last.replace(/"/g, "").toLowerCase()
}

/** Blank out FROM keywords that belong to function syntax (EXTRACT(x FROM y), …) */
function maskFunctionFrom(code: string): string {
	let masked = code
	const pattern = /\b(extract|substring|trim|overlay|position)\s*\(([^()]*)\)/gi
	let previous = ""
	while (previous !== masked) {
		previous = masked
		masked = masked.replace(pattern, (_m, fn: string) => `${fn}__()`)
	}
	return masked
}

function parseTableRef(ref: string): { table: string; alias: string | null } | null {
	const m = new RegExp(`^\\s*(${TABLE_IDENT}(?:\\.${TABLE_IDENT})?)(?:\\s+(?:as\\s+)?([a-z_][a-z0-9_]*))?\\s*$`, "i").exec(ref)
	if (!m) return null
	const alias = m[2] && !NOT_AN_ALIAS.has(m[2].toLowerCase()) ? m[2].toLowerCase() : null
	return { table: cleanIdentifier(m[1]), alias }
}

function subqueryDepth(code: string): { count: number; maxDepth: number } {
	const stack: boolean[] = []
	let depth = 0
	let maxDepth = 0
	let count = 0
	for (let i = 0; i < code.length; i++) {
		const char = code[i]
		if (char === "(") {
			const isSubquery = /^\(\s*(select|with)\b/i.test(code.slice(i, i + 12))
			stack.push(isSubquery)
			if (isSubquery) {
				count++
				depth++
				maxDepth = Math.max(maxDepth, depth)
			}
		} else if (char === ")") {
			if (stack.pop()) depth--
		}
	}
	return { count, maxDepth }
}

export function analyzeStatement(sql: string): StatementStructure {
	const code = maskFunctionFrom(codeText(sql))
	const firstKeyword = (/[a-z]+/i.exec(code)?.[0] ?? "").toUpperCase()

	const cteNames: string[] = []
	const ctePattern = /(?:\bwith\s+(?:recursive\s+)?|\)\s*,\s*)([a-z_][a-z0-9_]*)\s*(?:\([^()]*\)\s*)?as\s*(?:not\s+)?(?:materialized\s+)?\(/gi
	let m: RegExpExecArray | null
	while ((m = ctePattern.exec(code)) !== null) {
		cteNames.push(m[1].toLowerCase())
	}

	const aliases = new Map<string, string>()
	const tables: string[] = []
	const rawRefs = new Set<string>()
	const addRef = (ref: string) => {
		const parsed = parseTableRef(ref)
		if (!parsed) return
		rawRefs.add(ref.trim().split(/\s+/)[0].toLowerCase())
		aliases.set(parsed.table, parsed.table)
		if (parsed.alias) aliases.set(parsed.alias, parsed.table)
		if (!cteNames.includes(parsed.table) && !tables.includes(parsed.table)) {
			tables.push(parsed.table)
		}
	}

	const fromPattern = new RegExp(`\\bfrom\\s+([^()]*?)${CLAUSE_END}`, "gi")
	while ((m = fromPattern.exec(code)) !== null) {
		for (const ref of m[1].split(",")) addRef(ref)
	}

	const joinPattern = new RegExp(`\\bjoin\\s+(${TABLE_IDENT}(?:\\.${TABLE_IDENT})?(?:\\s+(?:as\\s+)?[a-z_][a-z0-9_]*)?)`, "gi")
	while ((m = joinPattern.exec(code)) !== null) {
		addRef(m[1])
	}

	const qualifiedColumns: QualifiedColumn[] = []
	const columnPattern = /\b([a-z_][a-z0-9_]*)\.("?[a-z_][a-z0-9_]*"?)/gi
	while ((m = columnPattern.exec(code)) !== null) {
		const qualifier = m[1].toLowerCase()
		const column = m[2].replace(/"/g, "").toLowerCase()
		if (rawRefs.has(`${qualifier}.${column}`)) continue // schema.table
		const table = aliases.get(qualifier)
		if (!table || cteNames.includes(table)) continue
		qualifiedColumns.push({ qualifier, column, table })
	}

	const { count: subqueryCount, maxDepth } = subqueryDepth(code)

	return {
		firstKeyword,
		tables,
		cteNames,
		aliases,
		qualifiedColumns,
		joinCount: (code.match(/\bjoin\b/gi) ?? []).length,
		subqueryCount,
		maxSubqueryDepth: maxDepth,
		unionCount: (code.match(/\b(union|intersect|except)\b/gi) ?? []).length,
		hasWindow: /\bover\s*\(/i.test(code),
		hasWhere: /\bwhere\b/i.test(code),
		hasLimit: /\blimit\s+\d+|\bfetch\s+(first|next)\b/i.test(code),
		hasAggregate: /\b(count|sum|avg|min|max)\s*\(/i.test(code),
		hasGroupBy: /\bgroup\s+by\b/i.test(code),
	}
}
