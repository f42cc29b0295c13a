import type { Store } from "../storage/database";
import type { Candle, FairValueGap, RetestEvent, Timeframe } from "../types";
import { logger } from "../utils/logger";

export type RetestSettings = {
	gapTimeframe: Timeframe;
	timeframe: Timeframe;
	/** Slack added to the gap boundary, in percent. */
	tolerancePct: number;
};

export function retestTriggered(
	gap: FairValueGap,
	candle: Candle,
	tolerancePct: number,
): boolean {
	const tolerance = tolerancePct / 100;
	if (gap.direction === "Bullish") {
		return candle.low <= gap.gapEnd * (1 + tolerance);
	}
	return candle.high >= gap.gapStart * (1 - tolerance);
}

/**
 * Looks only at the newest active gap that has not been retested yet and
 * records a retest when `candle` trades back into it.
 */
export function detectRetest(
	store: Store,
	symbol: string,
	candle: Candle,
	settings: RetestSettings,
	now: number,
): RetestEvent | null {
	const gap = store.gaps.findRetestCandidate(symbol, settings.gapTimeframe);
	if (!gap) {
		logger.debug({ symbol }, "No gap awaiting retest");
		return null;
	}

	if (candle.openTime <= gap.activeTime) return null;
	if (!retestTriggered(gap, candle, settings.tolerancePct)) return null;

	const event = store.transaction(() => {
		if (!store.gaps.markRetested(gap.id, now)) return null;
		return store.retests.insert(gap, settings.timeframe, candle, now);
	});

	if (event) {
		logger.info(
			{
				symbol,
				gapId: gap.id,
				direction: gap.direction,
				gapStart: gap.gapStart,
				gapEnd: gap.gapEnd,
				openTime: candle.openTime,
				low: candle.low,
				high: candle.high,
			},
			"Gap retested",
		);
	}
	return event;
}
