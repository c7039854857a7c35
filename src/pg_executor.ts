/**
 * PostgreSQL statement executor
 *
 * Each statement runs on its own pooled connection inside a READ ONLY
 * transaction with SET LOCAL statement_timeout / lock_timeout, so the limits
 * die with the transaction and never leak to the next borrower. The
 * connection is released on every path.
 */

import type { Pool, PoolClient } from "pg"
import { toDatabaseError } from "./errors.js"
import { throwIfAborted } from "./deadline.js"
import { silentLogger, type Logger } from "./logger.js"
import type { Row } from "./types.js"

export interface ExecuteOptions {
	timeoutMs: number
	lockTimeoutMs: number
	signal?: AbortSignal
}

export interface RawResult {
	rows: Row[]
	columns: string[]
}

export interface StatementExecutor {
	execute(sql: string, options: ExecuteOptions): Promise<RawResult>
	ping(signal?: AbortSignal): Promise<boolean>
}

export class PgExecutor implements StatementExecutor {
	constructor(
		private readonly pool: Pool,
		private readonly logger: Logger = silentLogger,
	) {}

	async execute(sql: string, options: ExecuteOptions): Promise<RawResult> {
		throwIfAborted(options.signal)
		let client: PoolClient | null = null
		try {
			client = await this.pool.connect()
			await client.query("BEGIN TRANSACTION READ ONLY")
			await client.query(`SET LOCAL statement_timeout = ${Math.floor(options.timeoutMs)}`)
			await client.query(`SET LOCAL lock_timeout = ${Math.floor(options.lockTimeoutMs)}`)

			const result = await client.query<Row>(sql)
			await client.query("COMMIT")

			return {
				rows: result.rows,
				columns: result.fields.map((f) => f.name),
			}
		} catch (error) {
			if (client) {
				await client.query("ROLLBACK").catch((rollbackError: unknown) => {
					this.logger.warn("Rollback failed", { error: String(rollbackError) })
				})
			}
			throw toDatabaseError(error)
		} finally {
			if (client) {
				client.release()
			}
		}
	}

	async ping(signal?: AbortSignal): Promise<boolean> {
		throwIfAborted(signal)
		try {
			await this.pool.query("SELECT 1")
			return true
		} catch (error) {
			this.logger.warn("Database ping failed", { error: String(error) })
			return false
		}
	}
}
