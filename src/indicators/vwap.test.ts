import { describe, expect, it } from "vitest";
import type { Candle } from "../types";
import { addVwap } from "./vwap";

const createCandle = (
	openTime: number,
	high: number,
	low: number,
	close: number,
	volume: number,
): Candle => ({ openTime, open: close, high, low, close, volume });

describe("addVwap", () => {
	it("should accumulate typical price weighted by volume from the first candle", () => {
		const candles = [
			createCandle(0, 10, 8, 9, 0),
			createCandle(60_000, 12, 10, 11, 2),
			createCandle(120_000, 14, 12, 13, 2),
		];

		const result = addVwap(candles);

		expect(result.map((c) => c.vwap)).toEqual([9, 11, 12]);
	});

	it("should not mutate the input candles", () => {
		const candles = [createCandle(0, 10, 8, 9, 1)];

		addVwap(candles);

		expect(candles[0].vwap).toBeUndefined();
	});

	it("should return an empty series unchanged", () => {
		expect(addVwap([])).toEqual([]);
	});
});
