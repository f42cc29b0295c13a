import { USDMClient } from "binance";
import type { Candle, Timeframe } from "../types";
import { CandleFeedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sleep } from "../utils/time";

/** Largest page the USD-M klines endpoint returns. */
export const BINANCE_KLINE_LIMIT = 1500;

export type BinanceKlineRequest = {
	symbol: string;
	interval: Timeframe;
	startTime: number;
	endTime: number;
	limit: number;
};

export type BinanceKlineFetcher = (
	request: BinanceKlineRequest,
) => Promise<Candle[]>;

export function createBinanceClient(testnet: boolean): USDMClient {
	logger.info({ testnet }, "Using Binance USD-M candle feed");
	return new USDMClient({ beautifyResponses: true, useTestnet: testnet });
}

export function createBinanceKlineFetcher(
	client: USDMClient,
): BinanceKlineFetcher {
	return async (request) => {
		try {
			const data = await client.getKlines(request);
			return data.map((kline) => ({
				openTime: Number(kline[0]),
				open: Number(kline[1]),
				high: Number(kline[2]),
				low: Number(kline[3]),
				close: Number(kline[4]),
				volume: Number(kline[5]),
			}));
		} catch (error) {
			throw new CandleFeedError(
				`Binance klines request failed for ${request.symbol}: ${String(error)}`,
			);
		}
	};
}

export type BinanceHistoryOptions = {
	symbol: string;
	timeframe: Timeframe;
	startMs: number;
	endMs: number;
	rateLimitMs: number;
	pageSize?: number;
};

/**
 * Walks the klines endpoint forwards from `startMs` until a short page
 * comes back, so the newest candles up to `endMs` are always included.
 */
export async function fetchBinanceCandles(
	fetchPage: BinanceKlineFetcher,
	options: BinanceHistoryOptions,
): Promise<Candle[]> {
	const limit = options.pageSize ?? BINANCE_KLINE_LIMIT;
	const byOpenTime = new Map<number, Candle>();
	let startTime = options.startMs;

	while (startTime <= options.endMs) {
		const page = await fetchPage({
			symbol: options.symbol,
			interval: options.timeframe,
			startTime,
			endTime: options.endMs,
			limit,
		});
		if (page.length === 0) break;

		for (const candle of page) byOpenTime.set(candle.openTime, candle);

		const newest = Math.max(...page.map((c) => c.openTime));
		startTime = newest + 1;

		logger.debug(
			{ symbol: options.symbol, size: page.length, newest },
			"Fetched Binance kline page",
		);

		if (page.length < limit) break;
		await sleep(options.rateLimitMs);
	}

	return [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
}
