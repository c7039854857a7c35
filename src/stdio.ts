#!/usr/bin/env node
/**
 * Stdio entry point for the askdb MCP server
 *
 * Configuration comes from config/config.yaml, config/config.local.yaml and
 * environment variables (see src/config/loadConfig.ts).
 *
 * Usage:
 *   node dist/src/stdio.js
 *   DB_HOST=db.internal DB_PASSWORD=... node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import createServer, { createPipeline } from "./index.js"
import { getConfig } from "./config/loadConfig.js"
import { errorMessage } from "./errors.js"
import { createLogger } from "./logger.js"

async function main() {
	const config = getConfig()
	// stdout is reserved for the MCP protocol
	const logger = createLogger(config.logging.level)

	logger.info("Starting askdb MCP server with stdio transport")
	logger.info("Database", {
		host: config.database.host,
		port: config.database.port,
		name: config.database.name,
		user: config.database.user,
	})
	logger.info("Model", { url: config.model.ollama_url, llm: config.model.llm, embedding: config.model.embedding })

	const pipeline = createPipeline(config, logger)
	const server = createServer({ pipeline, logger })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("askdb MCP server running via stdio")

	const shutdown = async (signal: string) => {
		logger.info("Shutting down...", { signal })
		try {
			await server.close()
			await pipeline.close()
		} catch (error) {
			logger.error("Error during shutdown", { error: errorMessage(error) })
		}
		process.exit(0)
	}

	process.on("SIGINT", () => void shutdown("SIGINT"))
	process.on("SIGTERM", () => void shutdown("SIGTERM"))
}

main().catch((error: unknown) => {
	console.error("[ERROR] Fatal error:", errorMessage(error))
	process.exit(1)
})
