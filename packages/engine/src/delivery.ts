import type { Row, RowIndex } from "@livewindow/core";
import type { WindowedStore } from "./windowed-store";

/** Rows to stream in one append flush. */
export interface AppendBatch {
	/** Rows ascending by index. */
	rows: ReadonlyArray<Row>;
	/** Number of rows each sink keeps after appending. */
	retentionCap: number;
	/** Greatest index in `rows`, the new last delivered position. */
	lastIndex: RowIndex;
}

/** How many rows a sink should keep: the store size, bounded by lookback. */
export function retentionCap(storeSize: number, lookback: number): number {
	return Math.max(1, Math.min(lookback, storeSize));
}

/**
 * Derive the append payload from the store's current content.
 *
 * Every retained row past `lastDelivered` qualifies, capped to the sink
 * retention so a single batch never exceeds what a sink keeps. Returns null
 * when nothing qualifies, in which case no sink is touched.
 */
export function deriveAppendBatch(
	store: WindowedStore,
	lastDelivered: RowIndex | null,
	lookback: number,
): AppendBatch | null {
	const cap = retentionCap(store.size, lookback);
	const rows = store.rowsAfter(lastDelivered, cap);
	const last = rows[rows.length - 1];
	if (last === undefined) return null;
	return { rows, retentionCap: cap, lastIndex: last.index };
}
