import { SchemaError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { Row } from "./types";

/**
 * Immutable, ordered set of known column names.
 *
 * A schema is established (or extended) only on a full replace. Incremental
 * rows are checked against it and rejected when they carry a field the sinks
 * have not been told about, since sinks cannot accept new columns mid-stream.
 */
export class ColumnSchema {
	private readonly names: ReadonlyArray<string>;
	private readonly lookup: ReadonlySet<string>;

	private constructor(names: ReadonlyArray<string>) {
		this.names = names;
		this.lookup = new Set(names);
	}

	/** Schema with no columns. */
	static empty(): ColumnSchema {
		return new ColumnSchema([]);
	}

	/** Schema from explicit column names. Duplicates are ignored. */
	static of(names: Iterable<string>): ColumnSchema {
		return new ColumnSchema([...new Set(names)]);
	}

	/** Column names in first-seen order. */
	get columns(): ReadonlyArray<string> {
		return this.names;
	}

	get size(): number {
		return this.names.length;
	}

	has(name: string): boolean {
		return this.lookup.has(name);
	}

	/**
	 * Return a schema holding the current columns followed by any field seen
	 * in `rows` that is not known yet. Returns `this` when nothing is new.
	 */
	extendWith(rows: Iterable<Row>): ColumnSchema {
		const added: string[] = [];
		const seen = new Set(this.lookup);
		for (const row of rows) {
			for (const name of Object.keys(row.fields)) {
				if (seen.has(name)) continue;
				seen.add(name);
				added.push(name);
			}
		}
		if (added.length === 0) return this;
		return new ColumnSchema([...this.names, ...added]);
	}

	/** Check that every field of `row` is a known column. */
	validate(row: Row): Result<void, SchemaError> {
		for (const name of Object.keys(row.fields)) {
			if (!this.lookup.has(name)) {
				return Err(
					new SchemaError(
						`Unknown column "${name}" in row ${row.index}. Known columns: ${this.names.join(", ") || "(none)"}`,
					),
				);
			}
		}
		return Ok(undefined);
	}

	/** Copy of `row` whose fields cover every column, missing ones set to null. */
	normalise(row: Row): Row {
		const fields: Record<string, unknown> = {};
		for (const name of this.names) {
			const value = row.fields[name];
			fields[name] = value === undefined ? null : value;
		}
		return { index: row.index, fields };
	}
}
