export {
	childLogger,
	createJsonLogger,
	defaultLogger,
	type LogEntry,
	type Logger,
	type LogLevel,
	silentLogger,
} from "./logger";
export * from "./result";
export * from "./row";
