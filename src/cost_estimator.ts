/**
 * Heuristic cost estimate for a read-only statement.
 *
 * score = Σ log10(rows + 1) over scanned tables
 *       + 1.5 per join + 2 per subquery + 1 for window functions
 *       + 3 when nothing bounds the result (no WHERE, LIMIT or aggregate)
 */

import type { StatementStructure } from "./sql_parser.js"
import type { TableInfo } from "./schema_provider.js"
import type { RiskLevel } from "./types.js"

export interface CostEstimate {
	score: number
	risk: RiskLevel
	/** Scanned tables at or above the large-table threshold */
	largeTables: string[]
	/** No filter, limit or aggregate narrows the result */
	unbounded: boolean
}

const RISK_THRESHOLDS: Array<[number, RiskLevel]> = [
	[8, "low"],
	[12, "medium"],
	[16, "high"],
]

export function riskFor(score: number): RiskLevel {
	for (const [limit, risk] of RISK_THRESHOLDS) {
		if (score < limit) return risk
	}
	return "very-high"
}

export function estimateCost(
	structure: StatementStructure,
	tables: Map<string, TableInfo>,
	options: { largeTableRows: number },
): CostEstimate {
	let score = 0
	const largeTables: string[] = []

	for (const name of structure.tables) {
		const table = tables.get(name)
		if (!table) continue
		score += Math.log10(table.rowCount + 1)
		if (table.rowCount >= options.largeTableRows) largeTables.push(name)
	}

	const unbounded = !structure.hasWhere && !structure.hasLimit && !structure.hasAggregate

	score += 1.5 * structure.joinCount
	score += 2 * structure.subqueryCount
	if (structure.hasWindow) score += 1
	if (unbounded) score += 3

	score = Math.round(score * 10) / 10
	return { score, risk: riskFor(score), largeTables, unbounded }
}
