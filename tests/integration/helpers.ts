import type { Row, RowIndex } from "@livewindow/core";
import {
	type ConsumerLoop,
	type DataSource,
	ImmediateConsumerLoop,
	type MemoryDataSource,
	type TickHandle,
} from "@livewindow/engine";

/** Rows `from..to` inclusive, each with `close = index * 10`. */
export function range(from: RowIndex, to: RowIndex): Row[] {
	const rows: Row[] = [];
	for (let index = from; index <= to; index++) {
		rows.push({ index, fields: { close: index * 10 } });
	}
	return rows;
}

/** Resolve after everything already queued on the event loop has run. */
export function nextTurn(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Wraps a {@link MemoryDataSource} so every fetch resolves a turn after the
 * rows were read, leaving room for other work to interleave with a poll.
 */
export class SlowSource implements DataSource {
	private inFlight = 0;

	constructor(private readonly inner: MemoryDataSource) {}

	/** Fetches started but not yet resolved. */
	get pending(): number {
		return this.inFlight;
	}

	async fetchInitial(back: number): Promise<ReadonlyArray<Row>> {
		return this.delay(this.inner.fetchInitial(back));
	}

	async fetchSince(position: RowIndex | null): Promise<ReadonlyArray<Row>> {
		return this.delay(this.inner.fetchSince(position));
	}

	private async delay(fetch: Promise<ReadonlyArray<Row>>): Promise<ReadonlyArray<Row>> {
		this.inFlight++;
		try {
			const rows = await fetch;
			await nextTurn();
			return rows;
		} finally {
			this.inFlight--;
		}
	}
}

/** Real event-loop consumer that counts what was scheduled. */
export class CountingLoop implements ConsumerLoop {
	private readonly inner = new ImmediateConsumerLoop();
	scheduled = 0;

	schedule(callback: () => void): TickHandle {
		this.scheduled++;
		return this.inner.schedule(callback);
	}

	cancel(handle: TickHandle): boolean {
		return this.inner.cancel(handle);
	}

	get pending(): number {
		return this.inner.size;
	}
}
