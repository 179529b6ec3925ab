// ---------------------------------------------------------------------------
// CoalescingScheduler: one pending flush per kind on the consumer loop
// ---------------------------------------------------------------------------

import { type Logger, toError } from "@livewindow/core";
import { FLUSH_KINDS } from "./constants";
import type { ConsumerLoop, FlushKind, TickHandle } from "./types";

/** Per-kind request accounting. */
export interface FlushCounters {
	/** Calls to {@link CoalescingScheduler.requestFlush}. */
	requested: number;
	/** Requests folded into an already scheduled flush. */
	coalesced: number;
	/** Flush callbacks run by the consumer loop. */
	executed: number;
}

/** A scheduled, not yet executed flush. */
interface Slot {
	handle: TickHandle;
}

/**
 * Bridges flush requests onto the consumer loop.
 *
 * Each kind owns a single slot. While a slot is scheduled, further requests
 * of that kind are folded into it: the flush reads the current shared state
 * when it runs, so the one pending execution always serves the latest
 * request. The slot is freed before the flush runs, so a request issued
 * during a flush schedules the next tick.
 */
export class CoalescingScheduler {
	private readonly loop: ConsumerLoop;
	private readonly flushFns: Readonly<Record<FlushKind, () => void>>;
	private readonly logger: Logger;
	private readonly slots: Record<FlushKind, Slot | null> = { append: null, correction: null };
	private readonly counters: Record<FlushKind, FlushCounters> = {
		append: { requested: 0, coalesced: 0, executed: 0 },
		correction: { requested: 0, coalesced: 0, executed: 0 },
	};

	constructor(config: {
		loop: ConsumerLoop;
		flush: Readonly<Record<FlushKind, () => void>>;
		logger: Logger;
	}) {
		this.loop = config.loop;
		this.flushFns = config.flush;
		this.logger = config.logger;
	}

	/** Ensure a flush of `kind` runs on the next consumer tick. */
	requestFlush(kind: FlushKind): void {
		const counters = this.counters[kind];
		counters.requested++;
		if (this.slots[kind] !== null) {
			counters.coalesced++;
			return;
		}
		this.slots[kind] = { handle: this.loop.schedule(() => this.run(kind)) };
	}

	/** Whether a flush of `kind` is waiting for the consumer loop. */
	isScheduled(kind: FlushKind): boolean {
		return this.slots[kind] !== null;
	}

	/** Snapshot of the request counters for `kind`. */
	stats(kind: FlushKind): FlushCounters {
		return { ...this.counters[kind] };
	}

	/**
	 * Cancel every scheduled flush. A callback that already fired cannot be
	 * cancelled; the loop reports that and it is ignored.
	 */
	cancelAll(): void {
		for (const kind of FLUSH_KINDS) {
			const slot = this.slots[kind];
			if (slot === null) continue;
			this.slots[kind] = null;
			let cancelled = false;
			try {
				cancelled = this.loop.cancel(slot.handle);
			} catch (err) {
				this.logger("debug", `Cancel of ${kind} flush raised: ${toError(err).message}`, { kind });
			}
			if (!cancelled) {
				this.logger("debug", `${kind} flush had already fired`, { kind });
			}
		}
	}

	private run(kind: FlushKind): void {
		this.slots[kind] = null;
		this.counters[kind].executed++;
		try {
			this.flushFns[kind]();
		} catch (err) {
			// A failed flush must never break the consumer loop
			this.logger("error", `${kind} flush failed: ${toError(err).message}`, { kind });
		}
	}
}
