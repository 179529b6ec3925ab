import {
	ColumnSchema,
	type ConfigError,
	Err,
	fromPromise,
	type Logger,
	Ok,
	type Result,
	type Row,
	type RowIndex,
	SinkError,
	SourceError,
	toError,
} from "@livewindow/core";
import { type EngineConfig, type ResolvedEngineConfig, resolveEngineConfig } from "./config";
import { deriveAppendBatch, retentionCap } from "./delivery";
import { CoalescingScheduler, type FlushCounters } from "./flush-scheduler";
import { PendingQueue } from "./pending-queue";
import { type PollStats, PollWorker } from "./poll-worker";
import { parseSourceRows } from "./source-rows";
import type { Sink } from "./types";
import { WindowedStore } from "./windowed-store";

/** Point-in-time engine counters. */
export interface EngineStats {
	/** Rows currently retained. */
	rows: number;
	/** Corrections waiting for a flush. */
	pendingCorrections: number;
	/** Whether appended data is waiting for a flush. */
	appendPending: boolean;
	lastKnownPosition: RowIndex | null;
	lastDeliveredPosition: RowIndex | null;
	/** Rows rejected by the column schema. */
	droppedRows: number;
	/** Corrections skipped because they matched the stored row. */
	unchangedCorrections: number;
	/** Individual sink calls that threw. */
	sinkFailures: number;
	worker: PollStats;
	flushes: { append: FlushCounters; correction: FlushCounters };
}

/**
 * Keeps a bounded window of rows synchronised with one or more sinks.
 *
 * The poll worker is the only writer besides {@link set}; it classifies
 * each incoming row as an append or a correction and asks the scheduler
 * for a flush. Flushes run on the consumer loop and always derive their
 * payload from the current store, so a burst of writes collapses into one
 * delivery per kind.
 */
export class SyncEngine {
	private readonly config: ResolvedEngineConfig;
	private readonly logger: Logger;
	private readonly store: WindowedStore;
	private readonly queue = new PendingQueue();
	private readonly scheduler: CoalescingScheduler;
	private readonly worker: PollWorker;
	private lastDelivered: RowIndex | null = null;
	private lastKnown: RowIndex | null = null;
	private stopped = false;
	private droppedRows = 0;
	private unchangedCorrections = 0;
	private sinkFailures = 0;

	constructor(config: ResolvedEngineConfig) {
		this.config = config;
		this.logger = config.logger;
		this.store = new WindowedStore(config.lookback, ColumnSchema.of(config.columns));
		this.scheduler = new CoalescingScheduler({
			loop: config.loop,
			flush: {
				append: () => this.flushAppends(),
				correction: () => this.flushCorrections(),
			},
			logger: config.logger,
		});
		this.worker = new PollWorker({
			source: config.source,
			intervalMs: config.pollIntervalMs,
			position: () => this.lastKnown,
			route: (rows) => this.ingest(rows),
			logger: config.logger,
		});
	}

	/** Start the poll worker. No-op once stopped. */
	start(): void {
		if (this.stopped) return;
		this.worker.start();
	}

	/**
	 * Replace the whole window and deliver it afresh.
	 *
	 * Queued corrections refer to the old content and are dropped, as are the
	 * rows of a poll still waiting on the source. Sinks
	 * receive the complete column set before the next append flush streams
	 * the new rows.
	 */
	set(rows: Iterable<Row>): void {
		if (this.stopped) {
			this.logger("warn", "set() called on a stopped engine");
			return;
		}
		this.worker.invalidate();
		const schema = this.store.replace(rows);
		const dropped = this.queue.clearCorrections();
		if (dropped > 0) {
			this.logger("debug", `Dropped ${dropped} corrections superseded by set()`);
		}
		this.lastDelivered = null;
		const tail = this.store.positionOfLastAppended();
		if (tail !== null) {
			this.lastKnown = tail;
		}
		for (const sink of this.config.sinks) {
			this.callSink(sink, "applySchema", () => sink.applySchema(schema.columns));
		}
		this.queue.markAppendPending();
		this.scheduler.requestFlush("append");
	}

	/** Tell the worker the source has new data. Non-blocking and idempotent. */
	notifyUpdate(): void {
		this.worker.notify();
	}

	/** Index of the newest retained row, or null when empty. */
	getLastPosition(): RowIndex | null {
		return this.store.positionOfLastAppended();
	}

	/** Highest index streamed to the sinks by an append flush. */
	get lastDeliveredPosition(): RowIndex | null {
		return this.lastDelivered;
	}

	/** Highest index the worker has observed from the source. */
	get lastKnownPosition(): RowIndex | null {
		return this.lastKnown;
	}

	/** Whether the poll worker is running. */
	get isRunning(): boolean {
		return this.worker.isRunning;
	}

	/** Retained rows, ascending. The returned array is never mutated. */
	rows(): ReadonlyArray<Row> {
		return this.store.snapshot().rows;
	}

	/** Known columns, in first-seen order. */
	columns(): ReadonlyArray<string> {
		return this.store.schema.columns;
	}

	get stats(): EngineStats {
		return {
			rows: this.store.size,
			pendingCorrections: this.queue.correctionCount,
			appendPending: this.queue.hasAppendPending,
			lastKnownPosition: this.lastKnown,
			lastDeliveredPosition: this.lastDelivered,
			droppedRows: this.droppedRows,
			unchangedCorrections: this.unchangedCorrections,
			sinkFailures: this.sinkFailures,
			worker: this.worker.stats(),
			flushes: {
				append: this.scheduler.stats("append"),
				correction: this.scheduler.stats("correction"),
			},
		};
	}

	/**
	 * Stop the engine. The worker timer is cleared, a poll still waiting on
	 * the source discards its rows, and flushes not yet started are
	 * cancelled. A flush already executing runs to completion. Idempotent.
	 */
	stop(): void {
		if (this.stopped) return;
		this.stopped = true;
		this.worker.stop();
		this.scheduler.cancelAll();
		this.logger("info", "Engine stopped", { lastPosition: this.getLastPosition() });
	}

	/** Execute one poll cycle now (signalled by {@link notifyUpdate}). */
	async pollOnce(): Promise<Result<number, SourceError>> {
		return this.worker.pollOnce();
	}

	/** Route rows from the worker into the store and the pending queues. */
	private ingest(rows: ReadonlyArray<Row>): void {
		for (const row of rows) {
			const applied = this.store.upsert(row);
			if (!applied.ok) {
				// A rejected row still counts as observed
				if (this.lastKnown === null || row.index > this.lastKnown) {
					this.lastKnown = row.index;
				}
				this.droppedRows++;
				this.logger("warn", `Dropped row ${row.index}: ${applied.error.message}`, {
					code: applied.error.code,
				});
				continue;
			}

			const outcome = applied.value;
			if (outcome.kind === "append") {
				if (this.lastKnown === null || outcome.row.index > this.lastKnown) {
					this.lastKnown = outcome.row.index;
				}
				this.queue.markAppendPending();
				this.scheduler.requestFlush("append");
				continue;
			}

			if (!outcome.changed && this.config.skipUnchangedCorrections) {
				this.unchangedCorrections++;
				continue;
			}
			this.queue.enqueueCorrection(outcome.row);
			this.scheduler.requestFlush("correction");
		}
	}

	private flushAppends(): void {
		if (!this.queue.consumeAppendFlag()) return;
		const batch = deriveAppendBatch(this.store, this.lastDelivered, this.config.lookback);
		if (batch === null) return;

		this.lastDelivered = batch.lastIndex;
		this.logger("debug", `Streaming ${batch.rows.length} rows`, {
			lastIndex: batch.lastIndex,
			retentionCap: batch.retentionCap,
		});
		for (const sink of this.config.sinks) {
			this.callSink(sink, "streamRows", () => sink.streamRows(batch.rows, batch.retentionCap));
		}
	}

	private flushCorrections(): void {
		const corrections = this.queue.drainCorrections();
		if (corrections.length === 0) return;

		const cap = retentionCap(this.store.size, this.config.lookback);
		for (const row of corrections) {
			// Retained rows past the delivered position go out with the pending append flush
			if (this.store.has(row.index) && (this.lastDelivered === null || row.index > this.lastDelivered)) {
				continue;
			}
			for (const sink of this.config.sinks) {
				this.callSink(sink, "correction", () => {
					if (sink.retains(row.index)) {
						sink.patchRow(row);
						return;
					}
					this.logger("debug", `Row ${row.index} outside sink window, streaming instead`);
					sink.streamRows([row], cap);
				});
			}
		}
	}

	/** Invoke a sink, containing any failure to that one call. */
	private callSink(sink: Sink, operation: string, call: () => void): void {
		try {
			call();
		} catch (err) {
			this.sinkFailures++;
			const error = new SinkError(`Sink ${operation} failed: ${toError(err).message}`, toError(err));
			this.logger("error", error.message, { code: error.code, sink: sink.constructor.name });
		}
	}
}

/**
 * Validate `config`, fill the window from the source and start polling.
 *
 * The initial content is delivered on the first consumer tick; the engine
 * accepts `set` and `notifyUpdate` immediately.
 */
export async function createSyncEngine(
	config: EngineConfig,
): Promise<Result<SyncEngine, ConfigError | SourceError>> {
	const resolved = resolveEngineConfig(config);
	if (!resolved.ok) return resolved;

	const { source, lookback, logger } = resolved.value;
	const operation = `fetchInitial(${lookback})`;
	const fetched = await fromPromise(() => source.fetchInitial(lookback));
	if (!fetched.ok) {
		return Err(new SourceError(`${operation} failed: ${fetched.error.message}`, fetched.error));
	}
	const parsed = parseSourceRows(fetched.value, operation);
	if (!parsed.ok) return parsed;

	const engine = new SyncEngine(resolved.value);
	engine.set(parsed.value);
	engine.start();
	logger("info", "Engine started", { lookback, rows: parsed.value.length });
	return Ok(engine);
}
