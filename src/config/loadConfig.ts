/**
 * Unified config loader.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > defaults
 *
 * The merged document is validated with zod, so every consumer receives a
 * fully-populated, typed AskDbConfig.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

const databaseSchema = z.object({
	host: z.string().default("localhost"),
	port: z.number().int().positive().default(5432),
	name: z.string().default("clinical"),
	user: z.string().default("askdb_reader"),
	password: z.string().default(""),
	schemas: z.array(z.string()).default(["public"]),
	pool_max: z.number().int().positive().default(10),
	connection_timeout_ms: z.number().int().positive().default(3000),
	idle_timeout_ms: z.number().int().positive().default(30000),
})

const modelSchema = z.object({
	ollama_url: z.string().default("http://localhost:11434"),
	llm: z.string().default("sqlcoder:7b"),
	embedding: z.string().default("nomic-embed-text"),
	timeout_ms: z.number().int().positive().default(45000),
	embedding_timeout_ms: z.number().int().positive().default(15000),
})

const generationSchema = z.object({
	dialect: z.literal("postgres").default("postgres"),
	temperature: z.number().min(0).max(2).default(0.1),
	max_tokens: z.number().int().positive().default(512),
	max_attempts: z.number().int().min(1).max(5).default(2),
	history_window: z.number().int().min(0).default(3),
	confidence_penalty: z.number().min(0).max(1).default(0.1),
	stop: z.array(z.string()).default(["```\n", "\n\n\n", "Question:"]),
})

const rateLimitSchema = z.object({
	max_calls: z.number().int().positive().default(60),
	period_ms: z.number().int().positive().default(60000),
	acquire_timeout_ms: z.number().int().min(0).default(5000),
})

const intentSchema = z.object({
	confidence_threshold: z.number().min(0).max(1).default(0.7),
	max_query_length: z.number().int().positive().default(1000),
})

const retrievalSchema = z.object({
	top_k_simple: z.number().int().positive().default(5),
	top_k_complex: z.number().int().positive().default(15),
	threshold: z.number().min(0).max(1).default(0.3),
	max_tables: z.number().int().positive().default(6),
	walk_depth: z.number().int().min(0).default(2),
	max_context_tokens: z.number().int().positive().default(3000),
	prompt_overhead_tokens: z.number().int().min(0).default(600),
	chars_per_token: z.number().positive().default(4),
	embedding_cache_size: z.number().int().positive().default(500),
	embedding_cache_ttl_ms: z.number().int().positive().default(3600000),
	vector_table: z.string().regex(/^[a-z_][a-z0-9_]*\.[a-z_][a-z0-9_]*$/).default("rag.context_elements"),
})

const validationSchema = z.object({
	max_joins: z.number().int().min(0).default(5),
	max_subquery_depth: z.number().int().min(0).default(3),
	max_unions: z.number().int().min(0).default(2),
	large_table_rows: z.number().int().positive().default(100000),
	schema_cache_ttl_ms: z.number().int().positive().default(3600000),
	schema_version_check_ms: z.number().int().positive().default(60000),
	cache_size: z.number().int().positive().default(1000),
})

const executionSchema = z.object({
	timeout_ms: z.number().int().positive().default(30000),
	lock_timeout_ms: z.number().int().positive().default(5000),
	max_retries: z.number().int().min(0).default(2),
	backoff_base_ms: z.number().int().min(0).default(200),
	backoff_max_ms: z.number().int().min(0).default(2000),
	batch_size: z.number().int().positive().default(100),
	hard_cap: z.number().int().positive().default(1000),
	large_result_ceiling: z.number().int().positive().default(10000),
})

const circuitBreakerSchema = z.object({
	failure_threshold: z.number().int().positive().default(5),
	cooldown_ms: z.number().int().positive().default(30000),
	success_threshold: z.number().int().positive().default(2),
})

const cacheSchema = z.object({
	ttl_ms: z.number().int().positive().default(300000),
	max_entries: z.number().int().positive().default(500),
})

const sessionSchema = z.object({
	max_history: z.number().int().positive().default(10),
	idle_ttl_ms: z.number().int().positive().default(1800000),
	max_sessions: z.number().int().positive().default(1000),
})

const requestSchema = z.object({
	timeout_ms: z.number().int().positive().default(90000),
})

const loggingSchema = z.object({
	level: z.enum(["debug", "info", "warn", "error"]).default("info"),
})

export const configSchema = z.object({
	database: databaseSchema.default({}),
	model: modelSchema.default({}),
	generation: generationSchema.default({}),
	rate_limit: rateLimitSchema.default({}),
	intent: intentSchema.default({}),
	retrieval: retrievalSchema.default({}),
	validation: validationSchema.default({}),
	execution: executionSchema.default({}),
	circuit_breaker: circuitBreakerSchema.default({}),
	cache: cacheSchema.default({}),
	session: sessionSchema.default({}),
	request: requestSchema.default({}),
	logging: loggingSchema.default({}),
})

export type AskDbConfig = z.infer<typeof configSchema>

export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "ConfigError"
	}
}

// ── YAML Loading ─────────────────────────────────────────────────────

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = yaml.load(raw)
	} catch (err) {
		throw new ConfigError(`Failed to parse ${filePath}: ${String(err)}`)
	}
	if (parsed === undefined || parsed === null) return {}
	if (!isRecord(parsed)) throw new ConfigError(`${filePath} must contain a mapping at the top level`)
	return parsed
}

/** Deep merge b into a (b wins on conflicts). */
export function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

function env(name: string): string | undefined {
	const v = process.env[name]
	return v === undefined || v === "" ? undefined : v
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}
function envList(name: string): string[] | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
}

function section(cfg: RawConfig, key: string): RawConfig {
	const existing = cfg[key]
	if (isRecord(existing)) return existing
	const created: RawConfig = {}
	cfg[key] = created
	return created
}

function set(target: RawConfig, key: string, value: unknown): void {
	if (value !== undefined) target[key] = value
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: RawConfig): void {
	const db = section(cfg, "database")
	set(db, "host", env("DB_HOST"))
	set(db, "port", envInt("DB_PORT"))
	set(db, "name", env("DB_NAME"))
	set(db, "user", env("DB_USER"))
	set(db, "password", env("DB_PASSWORD"))
	set(db, "schemas", envList("DB_SCHEMAS"))
	set(db, "pool_max", envInt("DB_POOL_MAX"))

	const m = section(cfg, "model")
	set(m, "ollama_url", env("OLLAMA_BASE_URL"))
	set(m, "llm", env("OLLAMA_MODEL"))
	set(m, "embedding", env("EMBEDDING_MODEL"))
	set(m, "timeout_ms", envInt("OLLAMA_TIMEOUT_MS"))

	const g = section(cfg, "generation")
	set(g, "temperature", envFloat("TEMPERATURE"))
	set(g, "max_attempts", envInt("MAX_GENERATION_ATTEMPTS"))

	const i = section(cfg, "intent")
	set(i, "confidence_threshold", envFloat("CONFIDENCE_THRESHOLD"))

	const r = section(cfg, "retrieval")
	set(r, "threshold", envFloat("RETRIEVAL_THRESHOLD"))
	set(r, "max_context_tokens", envInt("MAX_CONTEXT_TOKENS"))

	const e = section(cfg, "execution")
	set(e, "timeout_ms", envInt("EXECUTION_TIMEOUT_MS"))

	const cb = section(cfg, "circuit_breaker")
	set(cb, "failure_threshold", envInt("CIRCUIT_FAILURE_THRESHOLD"))
	set(cb, "cooldown_ms", envInt("CIRCUIT_COOLDOWN_MS"))

	const c = section(cfg, "cache")
	set(c, "ttl_ms", envInt("CACHE_TTL_MS"))

	const s = section(cfg, "session")
	set(s, "max_history", envInt("SESSION_MAX_HISTORY"))

	const req = section(cfg, "request")
	set(req, "timeout_ms", envInt("REQUEST_TIMEOUT_MS"))

	const l = section(cfg, "logging")
	set(l, "level", env("LOG_LEVEL"))
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: AskDbConfig | null = null

export function parseConfig(raw: RawConfig): AskDbConfig {
	const result = configSchema.safeParse(raw)
	if (!result.success) {
		const details = result.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ")
		throw new ConfigError(`Invalid configuration: ${details}`)
	}
	return result.data
}

export function loadConfig(): AskDbConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	applyEnvOverrides(merged)
	_config = parseConfig(merged)
	return _config
}

export function getConfig(): AskDbConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
