/** Log severity levels. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Injectable logging callback.
 *
 * Library code calls this instead of writing to `console` directly,
 * allowing consumers to route log output however they wish.
 */
export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

/** Default logger that writes to `console`. */
export const defaultLogger: Logger = (level, message) => console[level](`[livewindow] ${message}`);

/** Logger that discards everything. */
export const silentLogger: Logger = () => {};

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Create a {@link Logger} that emits JSON lines.
 *
 * Entries below `minLevel` are dropped. Bound context is merged into every
 * entry, with per-call `meta` taking precedence.
 *
 * @example
 * ```ts
 * const logger = createJsonLogger("info", { engine: "btc-1m" });
 * logger("info", "engine started", { lookback: 500 });
 * // => {"level":"info","msg":"engine started","ts":"...","engine":"btc-1m","lookback":500}
 * ```
 */
export function createJsonLogger(
	minLevel: LogLevel = "info",
	bindings: Record<string, unknown> = {},
	write: (line: string) => void = (line) => process.stdout.write(`${line}\n`),
): Logger {
	const minLevelValue = LEVEL_VALUE[minLevel];
	return (level, message, meta) => {
		if (LEVEL_VALUE[level] < minLevelValue) return;
		const entry: LogEntry = {
			level,
			msg: message,
			ts: new Date().toISOString(),
			...bindings,
			...meta,
		};
		write(JSON.stringify(entry));
	};
}

/** Wrap a logger so every call carries the given context. */
export function childLogger(logger: Logger, bindings: Record<string, unknown>): Logger {
	return (level, message, meta) => logger(level, message, { ...bindings, ...meta });
}
