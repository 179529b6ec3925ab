import type { ConsumerLoop, TickHandle } from "./types";

/**
 * {@link ConsumerLoop} backed by the Node event loop. Callbacks run in
 * `setImmediate` order, after pending I/O of the current iteration.
 */
export class ImmediateConsumerLoop implements ConsumerLoop {
	private readonly pending = new Map<number, ReturnType<typeof setImmediate>>();
	private nextId = 1;

	/** Number of callbacks waiting to run. */
	get size(): number {
		return this.pending.size;
	}

	schedule(callback: () => void): TickHandle {
		const id = this.nextId++;
		const immediate = setImmediate(() => {
			this.pending.delete(id);
			callback();
		});
		this.pending.set(id, immediate);
		return id;
	}

	cancel(handle: TickHandle): boolean {
		if (typeof handle !== "number") return false;
		const immediate = this.pending.get(handle);
		if (immediate === undefined) return false;
		clearImmediate(immediate);
		this.pending.delete(handle);
		return true;
	}
}
