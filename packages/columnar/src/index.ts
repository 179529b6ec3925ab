export {
	type ColumnarEvent,
	type ColumnarListener,
	ColumnarSource,
} from "./columnar-source";
export { ColumnarSink, type ColumnarSinkOptions } from "./columnar-sink";
