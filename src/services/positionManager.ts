import type { Store } from "../storage/database";
import type { PositionUpdate } from "../storage/tradeStore";
import type {
	Candle,
	Direction,
	OpenPosition,
	PositionState,
	TradeRecord,
} from "../types";
import { logger } from "../utils/logger";
import { MINUTE_MS } from "../utils/time";

export type PositionTransition = {
	tradeId: number;
	symbol: string;
	direction: Direction;
	from: PositionState;
	to: PositionState;
	entryPrice: number;
	exitPrice: number;
	pnl: number;
	remainingLot: number;
	isOpen: boolean;
};

export type PositionEvaluation = {
	update: PositionUpdate;
	transition: PositionTransition | null;
};

export function positionPnl(
	direction: Direction,
	entry: number,
	mark: number,
	qty: number,
): number {
	const diff = direction === "Bullish" ? mark - entry : entry - mark;
	return diff * qty;
}

function isAdverse(direction: Direction, close: number, stop: number): boolean {
	return direction === "Bullish" ? close < stop : close > stop;
}

function isFavourable(
	direction: Direction,
	close: number,
	target: number,
): boolean {
	return direction === "Bullish" ? close >= target : close <= target;
}

/** Exit price over the whole lot once both halves are out. */
function blendedExit(trade: TradeRecord, secondExit: number): number {
	const booked = trade.lot - trade.remainingLot;
	return (
		(booked * trade.initialTarget + trade.remainingLot * secondExit) / trade.lot
	);
}

function minutesOpen(entryTime: number, now: number): number {
	return Math.max(0, Math.floor((now - entryTime) / MINUTE_MS));
}

/**
 * Decides what the latest close does to one open position. Stops are
 * checked before targets; a candle never moves a position two steps.
 */
export function evaluatePosition(
	position: OpenPosition,
	close: number,
	now: number,
): PositionEvaluation {
	const { trade, status } = position;
	const { direction } = trade;
	const entry = status.entryPrice;
	const duration = minutesOpen(trade.entryTime, now);

	const base: PositionUpdate = {
		tradeId: trade.id,
		remainingLot: trade.remainingLot,
		modifiedStopLoss: trade.modifiedStopLoss,
		modifiedTarget: trade.modifiedTarget,
		status: status.status,
		exitPrice: status.exitPrice,
		pnl: status.pnl,
		duration,
		isOpen: true,
	};

	const transition = (
		update: PositionUpdate,
		exitPrice: number,
	): PositionEvaluation => ({
		update,
		transition: {
			tradeId: trade.id,
			symbol: trade.symbol,
			direction,
			from: status.status,
			to: update.status,
			entryPrice: entry,
			exitPrice,
			pnl: update.pnl,
			remainingLot: update.remainingLot,
			isOpen: update.isOpen,
		},
	});

	if (status.status === "Running") {
		if (isAdverse(direction, close, trade.initialStopLoss)) {
			const exitPrice = trade.initialStopLoss;
			return transition(
				{
					...base,
					status: "SL",
					remainingLot: 0,
					exitPrice,
					pnl: positionPnl(direction, entry, exitPrice, trade.lot),
					isOpen: false,
				},
				exitPrice,
			);
		}

		if (isFavourable(direction, close, trade.initialTarget)) {
			const remainingLot = trade.lot / 2;
			const exitPrice = trade.initialTarget;
			return transition(
				{
					...base,
					status: "PartialBooked",
					remainingLot,
					modifiedStopLoss: entry,
					exitPrice,
					pnl: positionPnl(direction, entry, exitPrice, trade.lot - remainingLot),
				},
				exitPrice,
			);
		}

		return {
			update: {
				...base,
				pnl: positionPnl(direction, entry, close, trade.remainingLot),
			},
			transition: null,
		};
	}

	if (status.status === "PartialBooked") {
		if (isAdverse(direction, close, trade.modifiedStopLoss)) {
			const exitPrice = blendedExit(trade, trade.modifiedStopLoss);
			return transition(
				{
					...base,
					status: "CostToCost",
					remainingLot: 0,
					exitPrice,
					pnl: positionPnl(direction, entry, exitPrice, trade.lot),
					isOpen: false,
				},
				exitPrice,
			);
		}

		if (isFavourable(direction, close, trade.modifiedTarget)) {
			const exitPrice = blendedExit(trade, trade.modifiedTarget);
			return transition(
				{
					...base,
					status: "FullBooked",
					remainingLot: 0,
					exitPrice,
					pnl: positionPnl(direction, entry, exitPrice, trade.lot),
					isOpen: false,
				},
				exitPrice,
			);
		}

		const booked = trade.lot - trade.remainingLot;
		return {
			update: {
				...base,
				pnl:
					positionPnl(direction, entry, trade.initialTarget, booked) +
					positionPnl(direction, entry, close, trade.remainingLot),
			},
			transition: null,
		};
	}

	// Terminal rows are never listed as open; nothing to do.
	return { update: { ...base, isOpen: false }, transition: null };
}

function unchanged(position: OpenPosition, update: PositionUpdate): boolean {
	const { status } = position;
	return (
		update.status === status.status &&
		update.pnl === status.pnl &&
		update.duration === status.duration &&
		update.exitPrice === status.exitPrice
	);
}

export function managePositions(
	store: Store,
	symbol: string,
	candle: Candle,
	now: number,
): PositionTransition[] {
	const transitions: PositionTransition[] = [];

	for (const position of store.trades.listOpenPositions(symbol)) {
		if (candle.openTime <= position.trade.entryTime) continue;

		const { update, transition } = evaluatePosition(position, candle.close, now);
		if (!transition && unchanged(position, update)) continue;

		store.trades.apply(update, now);

		if (transition) {
			transitions.push(transition);
			logger.info(
				{
					symbol,
					tradeId: transition.tradeId,
					from: transition.from,
					to: transition.to,
					close: candle.close,
					exitPrice: transition.exitPrice,
					pnl: transition.pnl,
					remainingLot: transition.remainingLot,
				},
				"Position advanced",
			);
		}
	}

	return transitions;
}
