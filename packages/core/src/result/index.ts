export {
	ConfigError,
	LiveWindowError,
	SchemaError,
	SinkError,
	SourceError,
	toError,
} from "./errors";
export { Err, fromPromise, mapResult, Ok, type Result, unwrapOrThrow } from "./result";
