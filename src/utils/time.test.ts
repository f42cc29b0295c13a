import { describe, expect, it } from "vitest";
import { InvalidTimeframeError } from "./errors";
import {
	parseTimeframe,
	quantizedMinutesSince,
	round2,
	timeframeToMinutes,
	timeframeToMs,
} from "./time";

describe("parseTimeframe", () => {
	it("should normalize supported timeframes", () => {
		expect(parseTimeframe(" 5M ")).toBe("5m");
		expect(parseTimeframe("1h")).toBe("1h");
	});

	it("should reject unsupported timeframes", () => {
		expect(() => parseTimeframe("7m")).toThrow(InvalidTimeframeError);
		expect(() => parseTimeframe("")).toThrow('Invalid timeframe ""');
	});
});

describe("timeframe conversions", () => {
	it("should convert to minutes and milliseconds", () => {
		expect(timeframeToMinutes("4h")).toBe(240);
		expect(timeframeToMs("5m")).toBe(300_000);
	});
});

describe("quantizedMinutesSince", () => {
	it("should floor elapsed time to whole timeframe units", () => {
		expect(quantizedMinutesSince(0, 12 * 60_000, "5m")).toBe(10);
		expect(quantizedMinutesSince(0, 15 * 60_000, "5m")).toBe(15);
		expect(quantizedMinutesSince(0, 59 * 60_000, "1h")).toBe(0);
	});

	it("should return zero before the start time", () => {
		expect(quantizedMinutesSince(60_000, 0, "1m")).toBe(0);
	});
});

describe("round2", () => {
	it("should round to two decimals", () => {
		expect(round2(5.769230769)).toBe(5.77);
		expect(round2(6)).toBe(6);
	});
});
