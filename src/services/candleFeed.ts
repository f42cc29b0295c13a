import {
	createBinanceClient,
	createBinanceKlineFetcher,
	fetchBinanceCandles,
} from "../clients/binance";
import { createDeltaBatchFetcher, fetchDeltaCandles } from "../clients/delta";
import type { FeedProvider } from "../config";
import type { Candle, Timeframe } from "../types";
import { MINUTE_MS, timeframeToMs } from "../utils/time";

export interface CandleFeed {
	readonly provider: FeedProvider;
	fetchCandles(
		symbol: string,
		timeframe: Timeframe,
		lookbackMinutes: number,
		now: number,
	): Promise<Candle[]>;
}

export type CandleFeedOptions = {
	provider: FeedProvider;
	deltaBaseUrl: string;
	binanceTestnet: boolean;
	rateLimitMs: number;
};

/**
 * Keeps candles that have fully closed by `now`, oldest first, one per
 * open time (the later copy wins).
 */
export function closedCandles(
	candles: Candle[],
	timeframe: Timeframe,
	now: number,
): Candle[] {
	const span = timeframeToMs(timeframe);
	const byOpenTime = new Map<number, Candle>();
	for (const candle of candles) {
		if (candle.openTime + span <= now) byOpenTime.set(candle.openTime, candle);
	}
	return [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
}

export function createCandleFeed(options: CandleFeedOptions): CandleFeed {
	if (options.provider === "binance") {
		const fetchPage = createBinanceKlineFetcher(
			createBinanceClient(options.binanceTestnet),
		);
		return {
			provider: "binance",
			async fetchCandles(symbol, timeframe, lookbackMinutes, now) {
				const candles = await fetchBinanceCandles(fetchPage, {
					symbol,
					timeframe,
					startMs: now - lookbackMinutes * MINUTE_MS,
					endMs: now,
					rateLimitMs: options.rateLimitMs,
				});
				return closedCandles(candles, timeframe, now);
			},
		};
	}

	const fetchBatch = createDeltaBatchFetcher(options.deltaBaseUrl);
	return {
		provider: "delta",
		async fetchCandles(symbol, timeframe, lookbackMinutes, now) {
			const candles = await fetchDeltaCandles(fetchBatch, {
				symbol,
				timeframe,
				startMs: now - lookbackMinutes * MINUTE_MS,
				endMs: now,
				rateLimitMs: options.rateLimitMs,
			});
			return closedCandles(candles, timeframe, now);
		},
	};
}
