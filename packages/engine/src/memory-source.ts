import { compareRows, type Row, type RowIndex } from "@livewindow/core";
import type { DataSource } from "./types";

/**
 * In-process {@link DataSource} holding rows in memory.
 *
 * `append` adds rows that later `fetchSince` calls return as new data;
 * `revise` rewrites a row and queues it so the next `fetchSince` re-sends
 * it regardless of position. Useful for tests, demos and hosts that
 * already hold their rows in memory.
 */
export class MemoryDataSource implements DataSource {
	private readonly rows = new Map<RowIndex, Row>();
	private revisions: Row[] = [];
	private failures: Error[] = [];
	private calls = 0;

	constructor(rows: Iterable<Row> = []) {
		this.append(...rows);
	}

	/** Number of fetch calls served (including failed ones). */
	get fetchCount(): number {
		return this.calls;
	}

	/** Number of rows held. */
	get size(): number {
		return this.rows.size;
	}

	/** Add or overwrite rows without queuing them as revisions. */
	append(...rows: Row[]): void {
		for (const row of rows) {
			this.rows.set(row.index, row);
		}
	}

	/** Overwrite a row and have the next `fetchSince` re-send it. */
	revise(row: Row): void {
		this.rows.set(row.index, row);
		this.revisions.push(row);
	}

	/** Make the next fetch reject with `error`. Calls stack in order. */
	failNext(error: Error): void {
		this.failures.push(error);
	}

	async fetchInitial(back: number): Promise<ReadonlyArray<Row>> {
		this.takeCall();
		const ordered = this.ordered();
		return ordered.slice(Math.max(0, ordered.length - back));
	}

	async fetchSince(position: RowIndex | null): Promise<ReadonlyArray<Row>> {
		this.takeCall();
		const newer = this.ordered().filter((row) => position === null || row.index > position);
		const revised = this.revisions.filter((row) => position !== null && row.index <= position);
		this.revisions = [];

		const byIndex = new Map<RowIndex, Row>();
		for (const row of [...revised, ...newer]) {
			byIndex.set(row.index, this.rows.get(row.index) ?? row);
		}
		return [...byIndex.values()].sort(compareRows);
	}

	private takeCall(): void {
		this.calls++;
		const failure = this.failures.shift();
		if (failure !== undefined) throw failure;
	}

	private ordered(): Row[] {
		return [...this.rows.values()].sort(compareRows);
	}
}
