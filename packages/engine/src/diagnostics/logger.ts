/**
 * Structured Logger for @hybrid-retrieval/engine
 *
 * Leveled logging with inherited context. Children share the parent's entry
 * buffer and level so a single setLevel call reaches the whole tree.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
	level: LogLevel;
	message: string;
	timestamp: number;
	context?: LogContext;
	error?: Error;
}

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, error?: unknown, context?: LogContext): void;

	/** Create a child logger with additional context */
	child(context: LogContext): Logger;

	setLevel(level: LogLevel): void;

	/** Stored entries, oldest first (empty unless storeEntries is set) */
	getEntries(): LogEntry[];

	clear(): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Context keys whose values never reach output */
const REDACTED_KEYS = new Set(["apikey", "api_key", "authorization", "token", "secret", "password"]);

export interface LoggerOptions {
	/** Minimum level to log (default: "info") */
	level?: LogLevel;
	/** Whether to store entries in memory (default: false) */
	storeEntries?: boolean;
	/** Maximum entries to store (default: 1000) */
	maxEntries?: number;
	/** Whether to output to console (default: true) */
	console?: boolean;
	/** Prefix for all log messages (default: "[retrieval]") */
	prefix?: string;
	/** Base context added to all entries */
	baseContext?: LogContext;
}

interface SharedState {
	level: LogLevel;
	entries: LogEntry[];
}

function toError(value: unknown): Error | undefined {
	if (value === undefined) return undefined;
	if (value instanceof Error) return value;
	return new Error(typeof value === "string" ? value : JSON.stringify(value));
}

function redact(context: LogContext): LogContext {
	const out: LogContext = {};
	for (const [key, value] of Object.entries(context)) {
		out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? "[redacted]" : value;
	}
	return out;
}

function buildLogger(options: Required<Omit<LoggerOptions, "level">>, shared: SharedState): Logger {
	const { storeEntries, maxEntries, console: useConsole, prefix, baseContext } = options;

	function formatMessage(level: LogLevel, message: string, context: LogContext): string {
		const timestamp = new Date().toISOString();
		const contextStr = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
		return `${timestamp} ${prefix} [${level.toUpperCase()}] ${message}${contextStr}`;
	}

	function log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[shared.level]) return;

		const merged = redact({ ...baseContext, ...context });
		const entry: LogEntry = {
			level,
			message,
			timestamp: Date.now(),
			context: Object.keys(merged).length > 0 ? merged : undefined,
			error,
		};

		if (storeEntries) {
			shared.entries.push(entry);
			if (shared.entries.length > maxEntries) {
				shared.entries.shift();
			}
		}

		if (!useConsole) return;

		const formatted = formatMessage(level, message, merged);
		switch (level) {
			case "debug":
				console.debug(formatted);
				break;
			case "info":
				console.info(formatted);
				break;
			case "warn":
				console.warn(formatted);
				break;
			case "error":
				console.error(formatted);
				if (error?.stack) {
					console.error(error.stack);
				}
				break;
		}
	}

	return {
		debug(message, context) {
			log("debug", message, context);
		},

		info(message, context) {
			log("info", message, context);
		},

		warn(message, context) {
			log("warn", message, context);
		},

		error(message, error, context) {
			log("error", message, context, toError(error));
		},

		child(context) {
			return buildLogger({ ...options, baseContext: { ...baseContext, ...context } }, shared);
		},

		setLevel(level) {
			shared.level = level;
		},

		getEntries() {
			return [...shared.entries];
		},

		clear() {
			shared.entries.length = 0;
		},
	};
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const {
		level = "info",
		storeEntries = false,
		maxEntries = 1000,
		console: useConsole = true,
		prefix = "[retrieval]",
		baseContext = {},
	} = options;

	return buildLogger(
		{ storeEntries, maxEntries, console: useConsole, prefix, baseContext },
		{ level, entries: [] },
	);
}

/** Silent logger for testing */
export const nullLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
	child: () => nullLogger,
	setLevel: () => {},
	getEntries: () => [],
	clear: () => {},
};
