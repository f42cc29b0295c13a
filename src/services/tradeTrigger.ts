import type { Store } from "../storage/database";
import type {
	Candle,
	Direction,
	FairValueGap,
	OpenPosition,
	RetestEvent,
} from "../types";
import { logger } from "../utils/logger";

export type TradeSettings = {
	/** Fractional buffer placed beyond the gap edge for the stop. */
	stopBuffer: number;
	lotSize: number;
};

export type TradeLevels = {
	initialStopLoss: number;
	initialTarget: number;
	modifiedTarget: number;
};

export function breakoutConfirmed(retest: RetestEvent, candle: Candle): boolean {
	return retest.direction === "Bullish"
		? candle.close > retest.high
		: candle.close < retest.low;
}

/** Stop beyond the far gap edge; targets at 2R and 3R from the entry. */
export function tradeLevels(
	direction: Direction,
	entry: number,
	gap: Pick<FairValueGap, "gapStart" | "gapEnd">,
	stopBuffer: number,
): TradeLevels {
	if (direction === "Bullish") {
		const initialStopLoss = gap.gapStart * (1 - stopBuffer);
		const risk = entry - initialStopLoss;
		return {
			initialStopLoss,
			initialTarget: entry + 2 * risk,
			modifiedTarget: entry + 3 * risk,
		};
	}

	const initialStopLoss = gap.gapEnd * (1 + stopBuffer);
	const risk = initialStopLoss - entry;
	return {
		initialStopLoss,
		initialTarget: entry - 2 * risk,
		modifiedTarget: entry - 3 * risk,
	};
}

export function triggerTrade(
	store: Store,
	symbol: string,
	candle: Candle,
	settings: TradeSettings,
	now: number,
): OpenPosition | null {
	const retest = store.retests.findPending(symbol);
	if (!retest) return null;

	if (candle.openTime <= retest.openTime) return null;
	if (!breakoutConfirmed(retest, candle)) {
		logger.debug(
			{ symbol, retestId: retest.id, close: candle.close },
			"Retest waiting for breakout",
		);
		return null;
	}

	const gap = store.gaps.findById(retest.fairValueGapId);
	if (!gap) {
		logger.warn(
			{ symbol, retestId: retest.id, gapId: retest.fairValueGapId },
			"Retest references a missing gap; skipping trade",
		);
		return null;
	}

	const levels = tradeLevels(
		retest.direction,
		candle.close,
		gap,
		settings.stopBuffer,
	);

	const position = store.transaction(() => {
		const opened = store.trades.open(
			{
				symbol,
				entryTime: candle.openTime,
				retestEventId: retest.id,
				open: candle.open,
				high: candle.high,
				low: candle.low,
				close: candle.close,
				volume: candle.volume,
				direction: retest.direction,
				lot: settings.lotSize,
				remainingLot: settings.lotSize,
				initialStopLoss: levels.initialStopLoss,
				initialTarget: levels.initialTarget,
				modifiedStopLoss: levels.initialStopLoss,
				modifiedTarget: levels.modifiedTarget,
			},
			now,
		);
		store.retests.markTraded(retest.id, now);
		return opened;
	});

	if (position) {
		logger.info(
			{
				symbol,
				tradeId: position.trade.id,
				direction: position.trade.direction,
				entry: candle.close,
				...levels,
			},
			"Trade opened",
		);
	}
	return position;
}
