import { Err, Ok, type Result, type Row, type RowIndex, SinkError } from "@livewindow/core";

/** Change notifications emitted by {@link ColumnarSource}. */
export type ColumnarEvent =
	| { type: "reset"; columns: ReadonlyArray<string> }
	| { type: "stream"; rows: number; trimmed: number }
	| { type: "patch"; index: RowIndex; position: number };

/** Listener registered with {@link ColumnarSource.subscribe}. */
export type ColumnarListener = (event: ColumnarEvent) => void;

/**
 * Column-oriented row buffer: one array per column plus an `index` array,
 * all of equal length. Streaming appends to every array and trims the
 * oldest entries beyond the rollover; patching rewrites one position.
 */
export class ColumnarSource {
	private names: ReadonlyArray<string> = [];
	private indices: RowIndex[] = [];
	private data = new Map<string, unknown[]>();
	private listeners: ColumnarListener[] = [];

	/** Column names, excluding `index`. */
	get columns(): ReadonlyArray<string> {
		return this.names;
	}

	/** Number of retained entries. */
	get length(): number {
		return this.indices.length;
	}

	/** Drop all data and start over with `columns`. */
	reset(columns: ReadonlyArray<string>): void {
		this.names = [...columns];
		this.indices = [];
		this.data = new Map(columns.map((column) => [column, []]));
		this.emit({ type: "reset", columns: this.names });
	}

	/**
	 * Append `rows` in the given order, then drop the oldest entries so at
	 * most `rollover` remain. Fields outside the known columns are ignored;
	 * missing ones are stored as null.
	 */
	stream(rows: ReadonlyArray<Row>, rollover?: number): void {
		if (rows.length === 0) return;
		for (const row of rows) {
			this.indices.push(row.index);
			for (const [column, values] of this.data) {
				const value = row.fields[column];
				values.push(value === undefined ? null : value);
			}
		}
		let trimmed = 0;
		if (rollover !== undefined && this.indices.length > rollover) {
			trimmed = this.indices.length - rollover;
			this.indices.splice(0, trimmed);
			for (const values of this.data.values()) {
				values.splice(0, trimmed);
			}
		}
		this.emit({ type: "stream", rows: rows.length, trimmed });
	}

	/** Overwrite the retained entry with `row.index`. */
	patch(row: Row): Result<void, SinkError> {
		const position = this.indices.lastIndexOf(row.index);
		if (position === -1) {
			return Err(new SinkError(`Cannot patch row ${row.index}: not retained`));
		}
		for (const [column, values] of this.data) {
			if (!(column in row.fields)) continue;
			const value = row.fields[column];
			values[position] = value === undefined ? null : value;
		}
		this.emit({ type: "patch", index: row.index, position });
		return Ok(undefined);
	}

	/** Whether an entry with this index is retained. */
	retains(index: RowIndex): boolean {
		return this.indices.includes(index);
	}

	/** Retained indices in stored order. */
	indexColumn(): ReadonlyArray<RowIndex> {
		return [...this.indices];
	}

	/** Values of one column in stored order, or undefined for an unknown column. */
	column(name: string): ReadonlyArray<unknown> | undefined {
		const values = this.data.get(name);
		return values === undefined ? undefined : [...values];
	}

	/** Retained entries re-assembled as rows, in stored order. */
	rows(): Row[] {
		return this.indices.map((index, position) => {
			const fields: Record<string, unknown> = {};
			for (const [column, values] of this.data) {
				fields[column] = values[position];
			}
			return { index, fields };
		});
	}

	/** Register a change listener. Returns a function that removes it. */
	subscribe(listener: ColumnarListener): () => void {
		this.listeners.push(listener);
		return () => {
			this.listeners = this.listeners.filter((l) => l !== listener);
		};
	}

	private emit(event: ColumnarEvent): void {
		for (const listener of this.listeners) {
			listener(event);
		}
	}
}
