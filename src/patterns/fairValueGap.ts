import type { Candle, Direction, GapCandidate, Timeframe } from "../types";
import { round2, timeframeToMs } from "../utils/time";

export type GapDetectionOptions = {
	/** Smallest accepted gap, in percent of the reference price. */
	minGapPct: number;
};

type GapBounds = {
	direction: Direction;
	gapStart: number;
	gapEnd: number;
	referencePrice: number;
};

function gapBounds(prev2: Candle, curr: Candle): GapBounds | null {
	if (prev2.high < curr.low) {
		return {
			direction: "Bullish",
			gapStart: prev2.high,
			gapEnd: curr.low,
			referencePrice: prev2.high,
		};
	}
	if (prev2.low > curr.high) {
		return {
			direction: "Bearish",
			gapStart: curr.high,
			gapEnd: prev2.low,
			referencePrice: curr.high,
		};
	}
	return null;
}

function distanceFromVwapPct(bounds: GapBounds, vwap?: number): number | null {
	if (vwap === undefined || !Number.isFinite(vwap) || vwap === 0) return null;
	const near = bounds.direction === "Bullish" ? bounds.gapEnd : bounds.gapStart;
	return round2(((near - vwap) / vwap) * 100);
}

/**
 * Checks one candle triple. The middle candle never takes part in the rule,
 * it only has to sit between the other two in time.
 */
export function detectFairValueGap(
	symbol: string,
	timeframe: Timeframe,
	prev2: Candle,
	_prev1: Candle,
	curr: Candle,
	options: GapDetectionOptions,
): GapCandidate | null {
	const bounds = gapBounds(prev2, curr);
	if (!bounds || bounds.referencePrice <= 0) return null;

	const sizePct =
		((bounds.gapEnd - bounds.gapStart) / bounds.referencePrice) * 100;
	if (sizePct < options.minGapPct) return null;

	return {
		symbol,
		timeframe,
		direction: bounds.direction,
		gapStart: bounds.gapStart,
		gapEnd: bounds.gapEnd,
		activeTime: curr.openTime + timeframeToMs(timeframe),
		gapSizePct: round2(sizePct),
		distanceFromVwapPct: distanceFromVwapPct(bounds, curr.vwap),
	};
}

export function detectFairValueGaps(
	symbol: string,
	timeframe: Timeframe,
	candles: Candle[],
	options: GapDetectionOptions,
): GapCandidate[] {
	const gaps: GapCandidate[] = [];
	for (let i = 2; i < candles.length; i++) {
		const gap = detectFairValueGap(
			symbol,
			timeframe,
			candles[i - 2],
			candles[i - 1],
			candles[i],
			options,
		);
		if (gap) gaps.push(gap);
	}
	return gaps;
}
