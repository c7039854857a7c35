/**
 * Stderr logger
 *
 * stdout is reserved for the MCP protocol, so every level writes to stderr
 * with a level tag followed by the message and its structured fields.
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFields = Record<string, unknown>

export interface Logger {
	debug(message: string, fields?: LogFields): void
	info(message: string, fields?: LogFields): void
	warn(message: string, fields?: LogFields): void
	error(message: string, fields?: LogFields): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

function format(fields?: LogFields): string {
	if (!fields || Object.keys(fields).length === 0) return ""
	try {
		return " " + JSON.stringify(fields)
	} catch {
		return " [unserializable fields]"
	}
}

export function createLogger(level: string = "info", sink: (line: string) => void = (line) => console.error(line)): Logger {
	const threshold = LEVEL_ORDER[isLogLevel(level) ? level : "info"]

	const write = (lvl: LogLevel, message: string, fields?: LogFields) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		sink(`[${lvl.toUpperCase()}] ${message}${format(fields)}`)
	}

	return {
		debug: (message, fields) => write("debug", message, fields),
		info: (message, fields) => write("info", message, fields),
		warn: (message, fields) => write("warn", message, fields),
		error: (message, fields) => write("error", message, fields),
	}
}

/** Logger that drops everything (tests, scripts with --quiet). */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
