import axios from "axios";
import type { Candle, Timeframe } from "../types";
import { CandleFeedError } from "../utils/errors";
import { logger } from "../utils/logger";
import { sleep } from "../utils/time";

/** Largest page the history endpoint returns. */
export const DELTA_PAGE_SIZE = 2000;

export type DeltaCandle = {
	time: number;
	open: number | string;
	high: number | string;
	low: number | string;
	close: number | string;
	volume: number | string;
};

type DeltaHistoryResponse = {
	success?: boolean;
	result?: DeltaCandle[];
	error?: unknown;
};

export type DeltaBatchRequest = {
	symbol: string;
	resolution: Timeframe;
	/** Epoch seconds. */
	start: number;
	/** Epoch seconds. */
	end: number;
};

export type DeltaBatchFetcher = (
	request: DeltaBatchRequest,
) => Promise<DeltaCandle[]>;

export function createDeltaBatchFetcher(
	baseUrl: string,
	timeoutMs = 10_000,
): DeltaBatchFetcher {
	const http = axios.create({
		baseURL: baseUrl,
		timeout: timeoutMs,
		headers: { Accept: "application/json" },
	});

	return async (request) => {
		try {
			const { data } = await http.get<DeltaHistoryResponse>(
				"/v2/history/candles",
				{ params: request },
			);
			if (data.success === false) {
				throw new CandleFeedError(
					`Delta history request failed: ${JSON.stringify(data.error)}`,
				);
			}
			return data.result ?? [];
		} catch (error) {
			if (axios.isAxiosError(error)) {
				throw new CandleFeedError(
					`Delta history request failed: ${error.message}`,
					error.response?.status,
				);
			}
			throw error;
		}
	};
}

function toCandle(raw: DeltaCandle): Candle {
	return {
		openTime: raw.time * 1000,
		open: Number(raw.open),
		high: Number(raw.high),
		low: Number(raw.low),
		close: Number(raw.close),
		volume: Number(raw.volume),
	};
}

export type DeltaHistoryOptions = {
	symbol: string;
	timeframe: Timeframe;
	startMs: number;
	endMs: number;
	rateLimitMs: number;
};

/**
 * Walks the history endpoint backwards from `endMs` one page at a time
 * until a short page comes back, then returns the candles oldest first.
 */
export async function fetchDeltaCandles(
	fetchBatch: DeltaBatchFetcher,
	options: DeltaHistoryOptions,
): Promise<Candle[]> {
	const start = Math.floor(options.startMs / 1000);
	let end = Math.floor(options.endMs / 1000);
	const byOpenTime = new Map<number, Candle>();

	while (end >= start) {
		const batch = await fetchBatch({
			symbol: options.symbol,
			resolution: options.timeframe,
			start,
			end,
		});
		if (batch.length === 0) break;

		for (const raw of batch) {
			const candle = toCandle(raw);
			byOpenTime.set(candle.openTime, candle);
		}

		const oldest = Math.min(...batch.map((c) => c.time));
		end = oldest - 1;

		logger.debug(
			{ symbol: options.symbol, size: batch.length, oldest },
			"Fetched Delta candle page",
		);

		if (batch.length < DELTA_PAGE_SIZE) break;
		await sleep(options.rateLimitMs);
	}

	return [...byOpenTime.values()].sort((a, b) => a.openTime - b.openTime);
}
