import { describe, expect, it } from "vitest";
import { ColumnSchema } from "../schema";
import { compareRows, isRow } from "../types";

describe("ColumnSchema", () => {
	it("keeps first-seen order and ignores duplicates", () => {
		const schema = ColumnSchema.of(["close", "open", "close"]);

		expect(schema.columns).toEqual(["close", "open"]);
		expect(schema.size).toBe(2);
		expect(schema.has("open")).toBe(true);
		expect(schema.has("volume")).toBe(false);
	});

	it("extends with fields found in rows", () => {
		const schema = ColumnSchema.of(["close"]).extendWith([
			{ index: 1, fields: { close: 1, open: 2 } },
			{ index: 2, fields: { volume: 3, open: 4 } },
		]);

		expect(schema.columns).toEqual(["close", "open", "volume"]);
	});

	it("returns the same instance when rows bring nothing new", () => {
		const schema = ColumnSchema.of(["close"]);

		expect(schema.extendWith([{ index: 1, fields: { close: 5 } }])).toBe(schema);
	});

	it("rejects a row with an unknown field", () => {
		const result = ColumnSchema.of(["close", "open"]).validate({ index: 7, fields: { close: 1, bid: 2 } });

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("SCHEMA_VIOLATION");
		expect(result.error.message).toBe('Unknown column "bid" in row 7. Known columns: close, open');
	});

	it("names an empty schema in the rejection", () => {
		const result = ColumnSchema.empty().validate({ index: 1, fields: { close: 1 } });

		expect(!result.ok && result.error.message).toBe('Unknown column "close" in row 1. Known columns: (none)');
	});

	it("accepts a row using a subset of the columns", () => {
		expect(ColumnSchema.of(["close", "open"]).validate({ index: 1, fields: { open: 1 } }).ok).toBe(true);
	});

	it("normalises missing fields to null in column order", () => {
		const row = ColumnSchema.of(["open", "close"]).normalise({ index: 3, fields: { close: 9 } });

		expect(row).toEqual({ index: 3, fields: { open: null, close: 9 } });
		expect(Object.keys(row.fields)).toEqual(["open", "close"]);
	});
});

describe("isRow", () => {
	it.each([
		[{ index: 1, fields: {} }, true],
		[{ index: 1.5, fields: { a: null } }, true],
		[{ index: "1", fields: {} }, false],
		[{ index: Number.POSITIVE_INFINITY, fields: {} }, false],
		[{ index: 1, fields: [] }, false],
		[{ index: 1 }, false],
		[null, false],
		[3, false],
	])("%j -> %s", (value, expected) => {
		expect(isRow(value)).toBe(expected);
	});
});

describe("compareRows", () => {
	it("orders ascending by index", () => {
		const rows = [{ index: 3, fields: {} }, { index: 1, fields: {} }, { index: 2, fields: {} }];

		expect(rows.sort(compareRows).map((r) => r.index)).toEqual([1, 2, 3]);
	});
});
