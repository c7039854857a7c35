/**
 * Template-based answers over an execution result
 *
 *   no rows                   → "No matching records were found."
 *   one row, one column       → "The <column> is <value>."
 *   anything else             → row count plus a preview of the first row
 *
 * An incomplete result appends the truncation warning.
 */

import type { ExecutionResult } from "./types.js"

const NUMERIC = /^-?\d+(\.\d+)?$/

function humanize(column: string): string {
	return column.replace(/_/g, " ").trim()
}

export function formatValue(value: unknown): string {
	if (value === null || value === undefined) return "no value"
	if (typeof value === "number") {
		return value.toLocaleString("en-US", { maximumFractionDigits: 2 })
	}
	if (typeof value === "bigint") return value.toLocaleString("en-US")
	if (typeof value === "string" && NUMERIC.test(value)) {
		// pg returns bigint and numeric as strings
		return Number(value).toLocaleString("en-US", { maximumFractionDigits: 2 })
	}
	if (value instanceof Date) {
		return value.toISOString().slice(0, 10)
	}
	if (typeof value === "object") return JSON.stringify(value)
	return String(value)
}

function describeRow(row: Record<string, unknown>, columns: string[]): string {
	return columns.map((c) => `${humanize(c)}: ${formatValue(row[c])}`).join(", ")
}

export function synthesizeAnswer(execution: ExecutionResult): string {
	const { rows, columns } = execution
	let answer: string

	if (rows.length === 0) {
		answer = "No matching records were found."
	} else if (rows.length === 1 && columns.length === 1) {
		answer = `The ${humanize(columns[0])} is ${formatValue(rows[0][columns[0]])}.`
	} else if (rows.length === 1) {
		answer = `Found 1 record: ${describeRow(rows[0], columns)}.`
	} else {
		answer = `Found ${rows.length.toLocaleString("en-US")} records. First: ${describeRow(rows[0], columns)}.`
	}

	if (!execution.complete && execution.warnings.length > 0) {
		answer += ` Note: the result is incomplete. ${execution.warnings.join(" ")}`
	}
	return answer
}
