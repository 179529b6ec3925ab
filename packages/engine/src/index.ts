export { type EngineConfig, type ResolvedEngineConfig, resolveEngineConfig } from "./config";
export { DEFAULT_ENGINE_NAME, DEFAULT_POLL_INTERVAL_MS } from "./constants";
export { ImmediateConsumerLoop } from "./consumer-loop";
export { type AppendBatch, deriveAppendBatch, retentionCap } from "./delivery";
export { CoalescingScheduler, type FlushCounters } from "./flush-scheduler";
export { MemoryDataSource } from "./memory-source";
export { PendingQueue } from "./pending-queue";
export { type PollStats, PollWorker } from "./poll-worker";
export { parseSourceRows } from "./source-rows";
export { createSyncEngine, type EngineStats, SyncEngine } from "./sync-engine";
export type { ConsumerLoop, DataSource, FlushKind, Sink, TickHandle } from "./types";
export {
	type CorrectionPlacement,
	type StoreSnapshot,
	type UpsertOutcome,
	WindowedStore,
} from "./windowed-store";
