import type { Row, RowIndex } from "@livewindow/core";

/**
 * Supplier of rows. Both methods may be called repeatedly; a rejection only
 * loses the current poll cycle, which is retried on the next tick.
 */
export interface DataSource {
	/** Up to `back` most recent rows. */
	fetchInitial(back: number): Promise<ReadonlyArray<Row>>;

	/**
	 * Rows strictly newer than `position` (all rows when `null`), ascending.
	 * A source may also re-send revised rows at or below `position`; those
	 * are delivered as corrections.
	 */
	fetchSince(position: RowIndex | null): Promise<ReadonlyArray<Row>>;
}

/** Opaque handle returned by {@link ConsumerLoop.schedule}. */
export type TickHandle = unknown;

/**
 * The single-threaded loop that owns the sinks. Every scheduled callback runs
 * exactly once, on a later tick, unless cancelled first.
 */
export interface ConsumerLoop {
	/** Run `callback` on the next tick of the loop. */
	schedule(callback: () => void): TickHandle;

	/** Cancel a scheduled callback. Returns false when it already ran or was never scheduled. */
	cancel(handle: TickHandle): boolean;
}

/**
 * Presentation-facing receiver of row data. All methods are invoked from the
 * consumer loop (or from the caller of `set`).
 */
export interface Sink {
	/** Complete column set. Always sent before any incremental delivery; clears retained data. */
	applySchema(columns: ReadonlyArray<string>): void;

	/** Append rows, then trim the oldest entries so at most `retentionCap` remain. */
	streamRows(rows: ReadonlyArray<Row>, retentionCap: number): void;

	/** Overwrite a retained row in place. Only valid when `retains(row.index)`. */
	patchRow(row: Row): void;

	/** Whether a row with this index is currently inside the sink's window. */
	retains(index: RowIndex): boolean;
}

/** The two kinds of flush the engine coalesces independently. */
export type FlushKind = "append" | "correction";
