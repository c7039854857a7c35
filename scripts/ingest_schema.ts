#!/usr/bin/env npx tsx
/**
 * Ingest Schema Script
 *
 * Introspects the configured PostgreSQL database, embeds one document per
 * table, column and foreign key (plus curated examples and rules) and
 * upserts them into the retrieval table (sql/001_context_elements.sql).
 *
 * Usage:
 *   npx tsx scripts/ingest_schema.ts --corpus=config/corpus.yaml
 *
 * Connection and model settings come from config/config.yaml and the usual
 * environment overrides (DB_HOST, DB_PASSWORD, OLLAMA_BASE_URL, ...).
 *
 * Options:
 *   --corpus       YAML file with curated examples and rules
 *   --exclude      Comma-separated tables to leave out
 *   --batch-size   Documents embedded and written per batch (default: 25)
 *   --dry-run      Build documents but don't embed or write them
 */

import { Pool } from "pg"
import fs from "fs"
import { getConfig } from "../src/config/loadConfig.js"
import { corpusDocuments, parseCorpus, schemaDocuments, type ContextDocument } from "../src/context_documents.js"
import { OllamaEmbeddingClient } from "../src/embedding_client.js"
import { errorMessage } from "../src/errors.js"
import { createLogger } from "../src/logger.js"
import { PgSchemaSource } from "../src/schema_provider.js"
import { PgVectorStore, type VectorRecord } from "../src/vector_store.js"

// ============================================================================
// Configuration
// ============================================================================

interface Options {
	corpusFile: string | null
	excludeTables: string[]
	batchSize: number
	dryRun: boolean
}

function parseArgs(): Options {
	const options: Options = {
		corpusFile: null,
		excludeTables: [],
		batchSize: 25,
		dryRun: false,
	}

	for (const arg of process.argv.slice(2)) {
		const value = arg.slice(arg.indexOf("=") + 1)
		if (arg.startsWith("--corpus=")) {
			options.corpusFile = value
		} else if (arg.startsWith("--exclude=")) {
			options.excludeTables = value.split(",").filter((t) => t !== "")
		} else if (arg.startsWith("--batch-size=")) {
			options.batchSize = parseInt(value, 10)
		} else if (arg === "--dry-run") {
			options.dryRun = true
		}
	}

	if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
		console.error("Error: --batch-size must be a positive integer")
		process.exit(1)
	}
	return options
}

// ============================================================================
// Main
// ============================================================================

async function main() {
	const options = parseArgs()
	const config = getConfig()
	const logger = createLogger(config.logging.level)
	const { database, model, retrieval } = config

	logger.info("Starting schema ingestion", {
		database: database.name,
		schemas: database.schemas,
		exclude_tables: options.excludeTables,
		corpus: options.corpusFile,
		batch_size: options.batchSize,
		dry_run: options.dryRun,
	})

	const pool = new Pool({
		host: database.host,
		port: database.port,
		database: database.name,
		user: database.user,
		password: database.password,
		connectionTimeoutMillis: database.connection_timeout_ms,
	})

	try {
		const source = new PgSchemaSource(pool, database.schemas)
		const snapshot = { ...(await source.loadSnapshot()), loadedAt: Date.now() }
		logger.info("Schema introspected", {
			version: snapshot.version,
			tables: snapshot.tables.size,
			foreign_keys: snapshot.foreignKeys.length,
		})

		const documents: ContextDocument[] = schemaDocuments(snapshot, options.excludeTables)
		if (options.corpusFile) {
			documents.push(...corpusDocuments(parseCorpus(fs.readFileSync(options.corpusFile, "utf-8"))))
		}

		const counts: Record<string, number> = {}
		for (const d of documents) counts[d.kind] = (counts[d.kind] ?? 0) + 1
		logger.info("Documents built", { total: documents.length, ...counts })

		if (options.dryRun) {
			for (const d of documents.slice(0, 5)) {
				console.error(`\n--- ${d.id} ---`)
				console.error(d.content)
			}
			logger.info("Dry run complete - nothing embedded or written")
			return
		}

		const embedder = new OllamaEmbeddingClient(
			{ baseUrl: model.ollama_url, model: model.embedding, timeoutMs: model.embedding_timeout_ms },
			logger,
		)
		const store = new PgVectorStore(pool, retrieval.vector_table)

		let written = 0
		for (let i = 0; i < documents.length; i += options.batchSize) {
			const batch = documents.slice(i, i + options.batchSize)
			const records: VectorRecord[] = []
			for (const d of batch) {
				records.push({ ...d, embedding: await embedder.embed(d.content) })
			}
			written += await store.upsert(records)
			logger.info("Batch written", { written, total: documents.length })
		}

		logger.info("Schema ingestion complete", { written })
	} catch (error) {
		logger.error("Ingestion failed", { error: errorMessage(error) })
		process.exitCode = 1
	} finally {
		await pool.end()
	}
}

main().catch((error: unknown) => {
	console.error("Unhandled error:", errorMessage(error))
	process.exit(1)
})
