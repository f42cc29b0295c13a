import { from, lastValueFrom } from "rxjs";
import { filter, mergeMap, toArray } from "rxjs/operators";
import { sendTelegramMessage, type TelegramOptions } from "../clients/telegram";
import type { Store } from "../storage/database";
import { logger } from "../utils/logger";
import { timeframeToMs } from "../utils/time";
import type { CandleFeed } from "./candleFeed";
import { cycleMessages } from "./notifications";
import {
	type CycleReport,
	type PipelineSettings,
	runPipeline,
	runTradeStages,
} from "./pipeline";
import { logClosedTrade } from "./tradeLogger";

export type CycleContext = {
	store: Store;
	feed: CandleFeed;
	settings: PipelineSettings;
	symbols: string[];
	lookbackMinutes: number;
	concurrency: number;
	telegram: TelegramOptions;
	tradeLogPath: string;
};

type SymbolCycle = (symbol: string) => Promise<CycleReport>;

async function publish(
	context: CycleContext,
	report: CycleReport,
	now: number,
): Promise<void> {
	for (const transition of report.transitions) {
		if (!transition.isOpen) {
			await logClosedTrade(context.tradeLogPath, transition, now);
		}
	}
	for (const message of cycleMessages(report)) {
		await sendTelegramMessage(context.telegram, message);
	}
}

/**
 * Runs `cycle` for every symbol with bounded concurrency. A symbol whose
 * cycle throws (typically a feed failure) is logged and left out; the
 * others still complete.
 */
async function forEachSymbol(
	context: CycleContext,
	job: string,
	now: number,
	cycle: SymbolCycle,
): Promise<CycleReport[]> {
	return lastValueFrom(
		from(context.symbols).pipe(
			mergeMap(async (symbol) => {
				try {
					const report = await cycle(symbol);
					try {
						await publish(context, report, now);
					} catch (error) {
						logger.error({ symbol, job, error }, "Failed to publish cycle events");
					}
					return report;
				} catch (error) {
					logger.error({ symbol, job, error }, "Symbol cycle failed");
					return null;
				}
			}, Math.max(1, context.concurrency)),
			filter((report): report is CycleReport => Boolean(report)),
			toArray(),
		),
	);
}

export function runTradeJob(
	context: CycleContext,
	now = Date.now(),
): Promise<CycleReport[]> {
	const { feed, settings, store } = context;
	return forEachSymbol(context, "trade", now, async (symbol) => {
		const candles = await feed.fetchCandles(
			symbol,
			settings.tradeTimeframe,
			context.lookbackMinutes,
			now,
		);
		return runTradeStages(store, symbol, candles, settings, now);
	});
}

/** Gap stage then trade stages, with both series fetched up front. */
export function runFullCycle(
	context: CycleContext,
	now = Date.now(),
): Promise<CycleReport[]> {
	const { feed, settings, store } = context;
	return forEachSymbol(context, "full", now, async (symbol) => {
		const [gapCandles, tradeCandles] = await Promise.all([
			feed.fetchCandles(symbol, settings.gapTimeframe, context.lookbackMinutes, now),
			feed.fetchCandles(symbol, settings.tradeTimeframe, context.lookbackMinutes, now),
		]);
		return runPipeline(store, symbol, gapCandles, tradeCandles, settings, now);
	});
}

export type CycleScheduler = {
	tick(now?: number): Promise<CycleReport[]>;
};

/**
 * Serializes scheduled cycles. The first tick after a gap-timeframe candle
 * closes runs the full cycle (gap stage before trade stages); every other
 * tick runs the trade stages only. A tick that arrives while another is
 * running waits for it.
 */
export function createCycleScheduler(context: CycleContext): CycleScheduler {
	const gapSpan = timeframeToMs(context.settings.gapTimeframe);
	let lastGapBoundary: number | null = null;
	let tail: Promise<unknown> = Promise.resolve();

	async function run(now: number): Promise<CycleReport[]> {
		const boundary = Math.floor(now / gapSpan) * gapSpan;
		if (boundary === lastGapBoundary) return runTradeJob(context, now);

		const reports = await runFullCycle(context, now);
		lastGapBoundary = boundary;
		return reports;
	}

	return {
		tick(now = Date.now()) {
			const result = tail.then(() => run(now));
			tail = result.then(
				() => undefined,
				() => undefined,
			);
			return result;
		},
	};
}
