/** Position of a row in the dataset. Unique and strictly ordered. */
export type RowIndex = number;

/** Named field values of a row. Serialisable values; use null, never undefined. */
export type RowFields = Readonly<Record<string, unknown>>;

/** A single logical record keyed by its index. */
export interface Row {
	readonly index: RowIndex;
	readonly fields: RowFields;
}

/** Type guard for values coming from untyped sources. */
export function isRow(value: unknown): value is Row {
	if (typeof value !== "object" || value === null) return false;
	if (!("index" in value) || !("fields" in value)) return false;
	const { index, fields } = value;
	return (
		typeof index === "number" &&
		Number.isFinite(index) &&
		typeof fields === "object" &&
		fields !== null &&
		!Array.isArray(fields)
	);
}

/** Ascending comparator by index. */
export function compareRows(a: Row, b: Row): number {
	return a.index - b.index;
}
