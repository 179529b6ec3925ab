import type { Row } from "@livewindow/core";

/**
 * Rows awaiting delivery.
 *
 * The append side is a single flag: the rows themselves are read from the
 * store at flush time. The correction side is a FIFO of rows that have
 * already been applied to the store and only need to be announced.
 */
export class PendingQueue {
	private appendPending = false;
	private corrections: Row[] = [];

	/** Whether new tail data is waiting for an append flush. */
	get hasAppendPending(): boolean {
		return this.appendPending;
	}

	/** Number of queued corrections. */
	get correctionCount(): number {
		return this.corrections.length;
	}

	/** Flag that data was appended since the last append flush. Idempotent. */
	markAppendPending(): void {
		this.appendPending = true;
	}

	/** Read and clear the append flag. */
	consumeAppendFlag(): boolean {
		const pending = this.appendPending;
		this.appendPending = false;
		return pending;
	}

	enqueueCorrection(row: Row): void {
		this.corrections.push(row);
	}

	/** Take every queued correction in arrival order, leaving the queue empty. */
	drainCorrections(): Row[] {
		if (this.corrections.length === 0) return [];
		const drained = this.corrections;
		this.corrections = [];
		return drained;
	}

	/** Drop queued corrections without delivering them. Returns how many were dropped. */
	clearCorrections(): number {
		const dropped = this.corrections.length;
		this.corrections = [];
		return dropped;
	}
}
