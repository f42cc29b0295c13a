import { addVwap } from "../indicators/vwap";
import { detectFairValueGaps } from "../patterns/fairValueGap";
import type { Store } from "../storage/database";
import type { GapAgingResult } from "../storage/gapStore";
import type {
	Candle,
	FairValueGap,
	OpenPosition,
	RetestEvent,
	Timeframe,
} from "../types";
import { logger } from "../utils/logger";
import { managePositions, type PositionTransition } from "./positionManager";
import { detectRetest } from "./retestDetector";
import { triggerTrade } from "./tradeTrigger";

export type PipelineSettings = {
	gapTimeframe: Timeframe;
	tradeTimeframe: Timeframe;
	minGapPct: number;
	retestTolerancePct: number;
	stopBuffer: number;
	lotSize: number;
};

export type CycleReport = {
	symbol: string;
	insertedGaps: number;
	deactivatedGaps: FairValueGap[];
	retest: RetestEvent | null;
	trade: OpenPosition | null;
	transitions: PositionTransition[];
	failedStages: string[];
};

export function emptyReport(symbol: string): CycleReport {
	return {
		symbol,
		insertedGaps: 0,
		deactivatedGaps: [],
		retest: null,
		trade: null,
		transitions: [],
		failedStages: [],
	};
}

type StageResult<T> = { ok: true; value: T } | { ok: false };

function runStage<T>(
	report: CycleReport,
	stage: string,
	fn: () => T,
): StageResult<T> {
	try {
		return { ok: true, value: fn() };
	} catch (error) {
		report.failedStages.push(stage);
		logger.error({ symbol: report.symbol, stage, error }, "Pipeline stage failed");
		return { ok: false };
	}
}

function refreshGaps(
	store: Store,
	report: CycleReport,
	timeframe: Timeframe,
	close: number,
	now: number,
): boolean {
	const aging = runStage<GapAgingResult>(report, "ageAndDeactivate", () =>
		store.gaps.ageAndDeactivate(report.symbol, timeframe, close, now),
	);
	if (!aging.ok) return false;

	report.deactivatedGaps.push(...aging.value.deactivated);
	for (const gap of aging.value.deactivated) {
		logger.info(
			{
				symbol: report.symbol,
				gapId: gap.id,
				direction: gap.direction,
				gapStart: gap.gapStart,
				gapEnd: gap.gapEnd,
				close,
			},
			"Gap deactivated",
		);
	}
	return true;
}

/**
 * Detects gaps on the gap timeframe, stores the new ones and ages the
 * active ones against the latest close of that series.
 */
export function runGapStage(
	store: Store,
	symbol: string,
	candles: Candle[],
	settings: PipelineSettings,
	now: number,
	report: CycleReport = emptyReport(symbol),
): CycleReport {
	const latest = candles.at(-1);
	if (!latest) {
		logger.warn(
			{ symbol, timeframe: settings.gapTimeframe },
			"No candles; skipping gap stage",
		);
		return report;
	}

	if (candles.length < 3) {
		logger.info(
			{ symbol, count: candles.length },
			"Not enough candles for gap detection",
		);
	} else {
		runStage(report, "detectGaps", () => {
			const gaps = detectFairValueGaps(
				symbol,
				settings.gapTimeframe,
				addVwap(candles),
				{ minGapPct: settings.minGapPct },
			);
			const inserted = store.transaction(
				() => gaps.filter((gap) => store.gaps.insert(gap, now)).length,
			);
			report.insertedGaps += inserted;
			if (inserted > 0) {
				logger.info(
					{ symbol, detected: gaps.length, inserted },
					"Stored new fair value gaps",
				);
			}
		});
	}

	refreshGaps(store, report, settings.gapTimeframe, latest.close, now);
	return report;
}

/**
 * Runs the fine-timeframe stages in order: gap aging, retest detection,
 * trade trigger, then position management. A later stage that reads the
 * output of a failed one is skipped.
 */
export function runTradeStages(
	store: Store,
	symbol: string,
	candles: Candle[],
	settings: PipelineSettings,
	now: number,
	report: CycleReport = emptyReport(symbol),
): CycleReport {
	const latest = candles.at(-1);
	if (!latest) {
		logger.warn(
			{ symbol, timeframe: settings.tradeTimeframe },
			"No candles; skipping trade stages",
		);
		return report;
	}

	const gapsFresh = refreshGaps(
		store,
		report,
		settings.gapTimeframe,
		latest.close,
		now,
	);

	if (gapsFresh) {
		const retest = runStage(report, "detectRetest", () =>
			detectRetest(
				store,
				symbol,
				latest,
				{
					gapTimeframe: settings.gapTimeframe,
					timeframe: settings.tradeTimeframe,
					tolerancePct: settings.retestTolerancePct,
				},
				now,
			),
		);
		if (retest.ok) {
			report.retest = retest.value;
			const trade = runStage(report, "triggerTrade", () =>
				triggerTrade(
					store,
					symbol,
					latest,
					{ stopBuffer: settings.stopBuffer, lotSize: settings.lotSize },
					now,
				),
			);
			if (trade.ok) report.trade = trade.value;
		}
	}

	const transitions = runStage(report, "managePositions", () =>
		managePositions(store, symbol, latest, now),
	);
	if (transitions.ok) report.transitions.push(...transitions.value);

	return report;
}

export function runPipeline(
	store: Store,
	symbol: string,
	gapCandles: Candle[],
	tradeCandles: Candle[],
	settings: PipelineSettings,
	now: number,
): CycleReport {
	const report = runGapStage(store, symbol, gapCandles, settings, now);
	return runTradeStages(store, symbol, tradeCandles, settings, now, report);
}
