import type { LogLevel, Logger, Row, RowIndex } from "@livewindow/core";
import type { ConsumerLoop, Sink, TickHandle } from "../types";

/** Build a row with the given index and fields. */
export function row(index: RowIndex, fields: Record<string, unknown> = {}): Row {
	return { index, fields };
}

/** Rows `from..to` inclusive, each with `close = index * 10`. */
export function range(from: RowIndex, to: RowIndex): Row[] {
	const rows: Row[] = [];
	for (let index = from; index <= to; index++) {
		rows.push(row(index, { close: index * 10 }));
	}
	return rows;
}

/** ConsumerLoop whose callbacks only run when the test calls {@link tick}. */
export class ManualConsumerLoop implements ConsumerLoop {
	private queue: Array<{ id: number; callback: () => void }> = [];
	private nextId = 1;
	scheduled = 0;

	get pending(): number {
		return this.queue.length;
	}

	schedule(callback: () => void): TickHandle {
		const id = this.nextId++;
		this.scheduled++;
		this.queue.push({ id, callback });
		return id;
	}

	cancel(handle: TickHandle): boolean {
		const before = this.queue.length;
		this.queue = this.queue.filter((entry) => entry.id !== handle);
		return this.queue.length < before;
	}

	/** Run every callback queued before this call. Returns how many ran. */
	tick(): number {
		const due = this.queue;
		this.queue = [];
		for (const entry of due) {
			entry.callback();
		}
		return due.length;
	}
}

/** A call recorded by {@link RecordingSink}. */
export type SinkCall =
	| { op: "applySchema"; columns: string[] }
	| { op: "streamRows"; indices: RowIndex[]; retentionCap: number }
	| { op: "patchRow"; index: RowIndex; fields: Record<string, unknown> };

/**
 * Sink that records every call and mirrors the window a real sink would
 * keep, so `retains` answers like one.
 */
export class RecordingSink implements Sink {
	calls: SinkCall[] = [];
	window: RowIndex[] = [];
	failOn: SinkCall["op"] | null = null;

	applySchema(columns: ReadonlyArray<string>): void {
		this.guard("applySchema");
		this.calls.push({ op: "applySchema", columns: [...columns] });
		this.window = [];
	}

	streamRows(rows: ReadonlyArray<Row>, retentionCap: number): void {
		this.guard("streamRows");
		this.calls.push({ op: "streamRows", indices: rows.map((r) => r.index), retentionCap });
		this.window.push(...rows.map((r) => r.index));
		if (this.window.length > retentionCap) {
			this.window = this.window.slice(this.window.length - retentionCap);
		}
	}

	patchRow(row: Row): void {
		this.guard("patchRow");
		this.calls.push({ op: "patchRow", index: row.index, fields: { ...row.fields } });
	}

	retains(index: RowIndex): boolean {
		return this.window.includes(index);
	}

	private guard(op: SinkCall["op"]): void {
		if (this.failOn === op) throw new Error(`${op} exploded`);
	}
}

/** Logger that keeps entries for assertions. */
export function createRecordingLogger(): Logger & {
	entries: Array<{ level: LogLevel; message: string; meta?: Record<string, unknown> }>;
} {
	const entries: Array<{ level: LogLevel; message: string; meta?: Record<string, unknown> }> = [];
	const logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
		entries.push({ level, message, meta });
	};
	return Object.assign(logger, { entries });
}
