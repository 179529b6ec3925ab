import { compareRows, Err, isRow, Ok, type Result, type Row, SourceError } from "@livewindow/core";

/**
 * Check a data source result and return its rows ascending by index.
 *
 * Sources may be plain JavaScript, so the value is treated as untrusted.
 * The whole batch is rejected when any element is malformed, so a cycle is
 * either applied in full or not at all.
 */
export function parseSourceRows(value: unknown, operation: string): Result<Row[], SourceError> {
	if (!Array.isArray(value)) {
		return Err(new SourceError(`${operation} returned ${typeof value}, expected an array of rows`));
	}
	const rows: Row[] = [];
	for (const [position, candidate] of value.entries()) {
		if (!isRow(candidate)) {
			return Err(new SourceError(`${operation} returned a malformed row at position ${position}`));
		}
		rows.push(candidate);
	}
	return Ok(rows.sort(compareRows));
}
