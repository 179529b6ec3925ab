import { afterEach, describe, expect, it, vi } from "vitest";
import { childLogger, createJsonLogger, defaultLogger, type Logger } from "../logger";

describe("createJsonLogger", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("writes one JSON line per entry with bindings and meta", () => {
		vi.useFakeTimers({ now: new Date("2026-01-02T03:04:05.000Z") });
		const lines: string[] = [];
		const logger = createJsonLogger("info", { engine: "quotes" }, (line) => lines.push(line));

		logger("info", "engine started", { lookback: 500 });

		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0] ?? "")).toEqual({
			level: "info",
			msg: "engine started",
			ts: "2026-01-02T03:04:05.000Z",
			engine: "quotes",
			lookback: 500,
		});
	});

	it("drops entries below the minimum level", () => {
		const lines: string[] = [];
		const logger = createJsonLogger("warn", {}, (line) => lines.push(line));

		logger("debug", "noise");
		logger("info", "still noise");
		logger("warn", "kept");
		logger("error", "kept too");

		expect(lines.map((line) => JSON.parse(line).msg)).toEqual(["kept", "kept too"]);
	});

	it("lets call meta override bindings", () => {
		const lines: string[] = [];
		const logger = createJsonLogger("debug", { engine: "a" }, (line) => lines.push(line));

		logger("debug", "x", { engine: "b" });

		expect(JSON.parse(lines[0] ?? "").engine).toBe("b");
	});
});

describe("childLogger", () => {
	it("merges bindings under the call meta", () => {
		const inner = vi.fn<Logger>();
		const child = childLogger(inner, { engine: "quotes", part: "worker" });

		child("warn", "slow", { part: "flush" });

		expect(inner).toHaveBeenCalledWith("warn", "slow", { engine: "quotes", part: "flush" });
	});
});

describe("defaultLogger", () => {
	it("prefixes console output", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => {});

		defaultLogger("error", "it broke");

		expect(spy).toHaveBeenCalledWith("[livewindow] it broke");
		spy.mockRestore();
	});
});
