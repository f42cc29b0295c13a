import { describe, expect, it } from "vitest";
import type { Candle } from "../types";
import { closedCandles } from "./candleFeed";

const createCandle = (openTime: number, close = 100): Candle => ({
	openTime,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: 1,
});

describe("closedCandles", () => {
	it("should keep candles whose close time has passed", () => {
		const candles = [createCandle(0), createCandle(60_000), createCandle(120_000)];

		expect(closedCandles(candles, "1m", 180_000)).toHaveLength(3);
		expect(
			closedCandles(candles, "1m", 179_999).map((c) => c.openTime),
		).toEqual([0, 60_000]);
	});

	it("should sort by open time and keep the later copy of a duplicate", () => {
		const candles = [
			createCandle(300_000, 101),
			createCandle(0, 100),
			createCandle(300_000, 102),
		];

		const result = closedCandles(candles, "5m", 600_000);

		expect(result.map((c) => [c.openTime, c.close])).toEqual([
			[0, 100],
			[300_000, 102],
		]);
	});
});
