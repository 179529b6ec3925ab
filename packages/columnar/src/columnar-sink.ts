import { type Row, type RowIndex, unwrapOrThrow } from "@livewindow/core";
import type { Sink } from "@livewindow/engine";
import { ColumnarSource } from "./columnar-source";

/** Options for {@link ColumnarSink}. */
export interface ColumnarSinkOptions {
	/** Buffer to write into. A new one is created when omitted. */
	source?: ColumnarSource;
	/** Only keep these columns (e.g. a chart showing a subset of fields). */
	project?: ReadonlyArray<string>;
}

/**
 * {@link Sink} that writes into a {@link ColumnarSource}.
 *
 * With `project`, only the listed columns that exist in the engine's
 * schema are kept, in schema order.
 */
export class ColumnarSink implements Sink {
	readonly source: ColumnarSource;
	private readonly project: ReadonlySet<string> | null;

	constructor(options: ColumnarSinkOptions = {}) {
		this.source = options.source ?? new ColumnarSource();
		this.project = options.project ? new Set(options.project) : null;
	}

	applySchema(columns: ReadonlyArray<string>): void {
		const project = this.project;
		this.source.reset(project === null ? columns : columns.filter((column) => project.has(column)));
	}

	streamRows(rows: ReadonlyArray<Row>, retentionCap: number): void {
		this.source.stream(rows, retentionCap);
	}

	patchRow(row: Row): void {
		unwrapOrThrow(this.source.patch(row));
	}

	retains(index: RowIndex): boolean {
		return this.source.retains(index);
	}
}
