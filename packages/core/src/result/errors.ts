/** Base error class for all livewindow errors */
export class LiveWindowError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Data source fetch failed or returned malformed rows. Retried on the next poll. */
export class SourceError extends LiveWindowError {
	constructor(message: string, cause?: Error) {
		super(message, "SOURCE_ERROR", cause);
	}
}

/** Row carries a field the current column schema does not include */
export class SchemaError extends LiveWindowError {
	constructor(message: string, cause?: Error) {
		super(message, "SCHEMA_VIOLATION", cause);
	}
}

/** Invalid engine configuration */
export class ConfigError extends LiveWindowError {
	constructor(message: string, cause?: Error) {
		super(message, "INVALID_CONFIG", cause);
	}
}

/** A sink rejected or failed a delivery */
export class SinkError extends LiveWindowError {
	constructor(message: string, cause?: Error) {
		super(message, "SINK_ERROR", cause);
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
