// ---------------------------------------------------------------------------
// PollWorker: periodic pull of new rows from the data source
// ---------------------------------------------------------------------------

import {
	Err,
	fromPromise,
	type Logger,
	Ok,
	type Result,
	type Row,
	type RowIndex,
	SourceError,
	toError,
} from "@livewindow/core";
import { parseSourceRows } from "./source-rows";
import type { DataSource } from "./types";

/** Counters exposed by {@link PollWorker.stats}. */
export interface PollStats {
	/** Cycles that called the source. */
	polls: number;
	/** Cycles dropped because the source failed or returned malformed rows. */
	failedPolls: number;
	/** Rows handed to the router. */
	rowsRouted: number;
}

/**
 * Timer loop that pulls rows newer than the last known position whenever
 * an update has been signalled, and hands them to `route` in ascending
 * order. It never talks to a sink: routing only mutates shared state and
 * requests flushes, so pull cadence stays independent of delivery cadence.
 */
export class PollWorker {
	private readonly source: DataSource;
	private readonly intervalMs: number;
	private readonly position: () => RowIndex | null;
	private readonly route: (rows: ReadonlyArray<Row>) => void;
	private readonly logger: Logger;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private running = false;
	private stopped = false;
	private signalled = false;
	private generation = 0;
	private readonly counters: PollStats = { polls: 0, failedPolls: 0, rowsRouted: 0 };

	constructor(config: {
		source: DataSource;
		intervalMs: number;
		position: () => RowIndex | null;
		route: (rows: ReadonlyArray<Row>) => void;
		logger: Logger;
	}) {
		this.source = config.source;
		this.intervalMs = config.intervalMs;
		this.position = config.position;
		this.route = config.route;
		this.logger = config.logger;
	}

	/** Start the polling loop. No-op if already running or stopped. */
	start(): void {
		if (this.running || this.stopped) return;
		this.running = true;
		this.schedule();
	}

	/**
	 * Stop the polling loop. The pending timer is cleared and a cycle still
	 * waiting on the source discards its rows when it resolves.
	 */
	stop(): void {
		this.running = false;
		this.stopped = true;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	/** Whether the loop is currently running. */
	get isRunning(): boolean {
		return this.running;
	}

	/** Whether an update signal is waiting to be consumed. */
	get isSignalled(): boolean {
		return this.signalled;
	}

	/** Signal that the source has new data. Idempotent until the next cycle consumes it. */
	notify(): void {
		if (this.stopped) return;
		this.signalled = true;
	}

	/**
	 * Mark the content that in-flight cycles were fetched against as
	 * superseded. Such a cycle discards its rows and re-arms the signal.
	 */
	invalidate(): void {
		this.generation++;
	}

	stats(): PollStats {
		return { ...this.counters };
	}

	/**
	 * Execute a single poll cycle without the timer loop.
	 *
	 * Resolves with the number of rows routed: 0 when no update was
	 * signalled or the worker was stopped while the source was pending.
	 */
	async pollOnce(): Promise<Result<number, SourceError>> {
		if (!this.signalled || this.stopped) return Ok(0);
		this.signalled = false;
		this.counters.polls++;

		const generation = this.generation;
		const position = this.position();
		const operation = `fetchSince(${position})`;
		const fetched = await fromPromise(() => this.source.fetchSince(position));
		if (!fetched.ok) {
			return this.fail(new SourceError(`${operation} failed: ${fetched.error.message}`, fetched.error));
		}
		const parsed = parseSourceRows(fetched.value, operation);
		if (!parsed.ok) {
			return this.fail(parsed.error);
		}
		if (this.stopped) {
			this.logger("debug", `Discarding ${parsed.value.length} rows fetched after stop`);
			return Ok(0);
		}
		if (generation !== this.generation) {
			this.signalled = true;
			this.logger("debug", `Discarding ${parsed.value.length} rows fetched before the content was replaced`);
			return Ok(0);
		}

		const rows = parsed.value;
		if (rows.length > 0) {
			this.route(rows);
			this.counters.rowsRouted += rows.length;
		}
		return Ok(rows.length);
	}

	/** Drop the cycle and re-arm the signal so the next tick retries. */
	private fail(error: SourceError): Result<never, SourceError> {
		this.counters.failedPolls++;
		if (!this.stopped) {
			this.signalled = true;
		}
		this.logger("warn", `Poll cycle dropped: ${error.message}`, { code: error.code });
		return Err(error);
	}

	private schedule(): void {
		if (!this.running) return;
		this.timer = setTimeout(async () => {
			this.timer = null;
			try {
				await this.pollOnce();
			} catch (err) {
				this.logger("error", `Poll cycle threw: ${toError(err).message}`);
			}
			this.schedule();
		}, this.intervalMs);
		// Allow the process to exit without waiting for the next poll
		if (this.timer.unref) {
			this.timer.unref();
		}
	}
}
