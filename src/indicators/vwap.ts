import type { Candle } from "../types";

function typicalPrice(candle: Candle): number {
	return (candle.high + candle.low + candle.close) / 3;
}

/**
 * Annotates each candle with the VWAP accumulated from the first candle of
 * the series. Until any volume has traded the typical price stands in.
 */
export function addVwap(candles: Candle[]): Candle[] {
	let pvSum = 0;
	let volumeSum = 0;

	return candles.map((candle) => {
		const typical = typicalPrice(candle);
		if (candle.volume > 0) {
			pvSum += typical * candle.volume;
			volumeSum += candle.volume;
		}
		const vwap = volumeSum > 0 ? pvSum / volumeSum : typical;
		return { ...candle, vwap };
	});
}
