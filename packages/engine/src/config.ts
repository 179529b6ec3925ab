import {
	childLogger,
	ConfigError,
	defaultLogger,
	Err,
	type Logger,
	Ok,
	type Result,
} from "@livewindow/core";
import { DEFAULT_ENGINE_NAME, DEFAULT_POLL_INTERVAL_MS } from "./constants";
import type { ConsumerLoop, DataSource, Sink } from "./types";

/** Configuration accepted by {@link createSyncEngine}. */
export interface EngineConfig {
	/** Where rows come from. */
	source: DataSource;
	/** Loop that runs flush callbacks. */
	loop: ConsumerLoop;
	/** Receivers of streamed and patched rows. */
	sinks?: ReadonlyArray<Sink>;
	/** Maximum number of most recent rows retained, mirrored by every sink. */
	lookback: number;
	/** Worker poll period in milliseconds. Defaults to 1000. */
	pollIntervalMs?: number;
	/** Column names known before any row is seen. */
	columns?: ReadonlyArray<string>;
	/** Skip delivering corrections identical to the stored row. Defaults to true. */
	skipUnchangedCorrections?: boolean;
	/** Name bound into every log entry. Defaults to "engine". */
	name?: string;
	/** Injectable logger. Defaults to {@link defaultLogger}. */
	logger?: Logger;
}

/** {@link EngineConfig} with defaults applied and values checked. */
export interface ResolvedEngineConfig {
	source: DataSource;
	loop: ConsumerLoop;
	sinks: ReadonlyArray<Sink>;
	lookback: number;
	pollIntervalMs: number;
	columns: ReadonlyArray<string>;
	skipUnchangedCorrections: boolean;
	name: string;
	logger: Logger;
}

/** Apply defaults and validate an {@link EngineConfig}. */
export function resolveEngineConfig(config: EngineConfig): Result<ResolvedEngineConfig, ConfigError> {
	const { lookback } = config;
	if (!Number.isInteger(lookback) || lookback < 1) {
		return Err(new ConfigError(`lookback must be a positive integer, got ${lookback}`));
	}

	const pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
	if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
		return Err(new ConfigError(`pollIntervalMs must be a positive number, got ${pollIntervalMs}`));
	}

	const name = config.name ?? DEFAULT_ENGINE_NAME;
	if (name.trim() === "") {
		return Err(new ConfigError("name must not be empty"));
	}

	const columns = config.columns ?? [];
	const blank = columns.find((column) => column.trim() === "");
	if (blank !== undefined) {
		return Err(new ConfigError("column names must not be empty"));
	}

	return Ok({
		source: config.source,
		loop: config.loop,
		sinks: config.sinks ?? [],
		lookback,
		pollIntervalMs,
		columns,
		skipUnchangedCorrections: config.skipUnchangedCorrections ?? true,
		name,
		logger: childLogger(config.logger ?? defaultLogger, { engine: name }),
	});
}
