import {
	ColumnSchema,
	compareRows,
	Ok,
	type Result,
	type Row,
	type RowIndex,
	type SchemaError,
} from "@livewindow/core";
import equal from "fast-deep-equal";

/** Where a correction landed relative to the retained window. */
export type CorrectionPlacement = "overwrite" | "insert" | "outside-window";

/** Result of {@link WindowedStore.upsert}. `row` is the normalised row as stored. */
export type UpsertOutcome =
	| { kind: "append"; row: Row; evicted: number }
	| { kind: "correction"; row: Row; placement: CorrectionPlacement; changed: boolean };

/** Immutable view of the store, swapped atomically on each mutation. */
export interface StoreSnapshot {
	/** Rows ascending by index. Never mutated once published. */
	readonly rows: ReadonlyArray<Row>;
	readonly schema: ColumnSchema;
}

/** First position whose index is >= `index`. */
function lowerBound(rows: ReadonlyArray<Row>, index: RowIndex): number {
	let lo = 0;
	let hi = rows.length;
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		const row = rows[mid];
		if (row !== undefined && row.index < index) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}
	return lo;
}

/** First position whose index is > `index`. */
function upperBound(rows: ReadonlyArray<Row>, index: RowIndex): number {
	let lo = 0;
	let hi = rows.length;
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		const row = rows[mid];
		if (row !== undefined && row.index <= index) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}
	return lo;
}

/**
 * Ordered, index-keyed row window with bounded retention.
 *
 * All state lives in a single {@link StoreSnapshot} that is replaced, never
 * edited, by each mutation. Every method runs to completion synchronously,
 * so a reader holding a snapshot never observes a half-applied change and
 * no live reference to the store's internals is ever handed out.
 */
export class WindowedStore {
	private state: StoreSnapshot;
	readonly lookback: number;

	constructor(lookback: number, schema: ColumnSchema = ColumnSchema.empty()) {
		this.lookback = lookback;
		this.state = { rows: [], schema };
	}

	/** Number of retained rows. */
	get size(): number {
		return this.state.rows.length;
	}

	/** Current column schema. */
	get schema(): ColumnSchema {
		return this.state.schema;
	}

	/** Current immutable snapshot. */
	snapshot(): StoreSnapshot {
		return this.state;
	}

	/**
	 * Swap the entire content.
	 *
	 * Rows are ordered by index, later duplicates win, and only the
	 * `lookback` highest indices are kept. The schema keeps every column it
	 * already had and gains the fields of the new content.
	 */
	replace(rows: Iterable<Row>): ColumnSchema {
		const input = [...rows];
		const schema = this.state.schema.extendWith(input);

		const byIndex = new Map<RowIndex, Row>();
		for (const row of input) {
			byIndex.set(row.index, row);
		}
		const ordered = [...byIndex.values()].sort(compareRows);
		const retained = ordered.slice(Math.max(0, ordered.length - this.lookback));

		this.state = { rows: retained.map((row) => schema.normalise(row)), schema };
		return schema;
	}

	/**
	 * Apply a single row.
	 *
	 * A known index is overwritten in place. An index past the tail is
	 * appended and the head trimmed to `lookback`. An unknown index below the
	 * tail is a correction too: it is inserted in order when it still falls
	 * inside the window, and left out when it is older than the head of a
	 * full window.
	 */
	upsert(row: Row): Result<UpsertOutcome, SchemaError> {
		const prev = this.state;
		const valid = prev.schema.validate(row);
		if (!valid.ok) return valid;

		const next = prev.schema.normalise(row);
		const rows = prev.rows;
		const pos = lowerBound(rows, next.index);
		const existing = rows[pos];

		if (existing !== undefined && existing.index === next.index) {
			const updated = rows.slice();
			updated[pos] = next;
			this.state = { rows: updated, schema: prev.schema };
			return Ok({
				kind: "correction",
				row: next,
				placement: "overwrite",
				changed: !equal(existing.fields, next.fields),
			});
		}

		if (pos === rows.length) {
			const appended = [...rows, next];
			const evicted = Math.max(0, appended.length - this.lookback);
			this.state = { rows: evicted > 0 ? appended.slice(evicted) : appended, schema: prev.schema };
			return Ok({ kind: "append", row: next, evicted });
		}

		if (pos === 0 && rows.length >= this.lookback) {
			return Ok({ kind: "correction", row: next, placement: "outside-window", changed: true });
		}

		const inserted = [...rows.slice(0, pos), next, ...rows.slice(pos)];
		const overflow = Math.max(0, inserted.length - this.lookback);
		this.state = { rows: overflow > 0 ? inserted.slice(overflow) : inserted, schema: prev.schema };
		return Ok({ kind: "correction", row: next, placement: "insert", changed: true });
	}

	/** Whether a row with this index is retained. */
	has(index: RowIndex): boolean {
		const rows = this.state.rows;
		return rows[lowerBound(rows, index)]?.index === index;
	}

	/** Index of the tail row, or null when empty. */
	positionOfLastAppended(): RowIndex | null {
		const rows = this.state.rows;
		return rows[rows.length - 1]?.index ?? null;
	}

	/** Index of the head row, or null when empty. */
	positionOfFirstRetained(): RowIndex | null {
		return this.state.rows[0]?.index ?? null;
	}

	/**
	 * Rows with index greater than `position` (every row when null), keeping
	 * at most `limit` of the highest indices.
	 */
	rowsAfter(position: RowIndex | null, limit: number): ReadonlyArray<Row> {
		const rows = this.state.rows;
		const start = position === null ? 0 : upperBound(rows, position);
		return rows.slice(Math.max(start, rows.length - limit));
	}
}
