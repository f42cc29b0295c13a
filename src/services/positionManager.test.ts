import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openStore, type Store } from "../storage/database";
import type { Candle, OpenPosition, PositionStatus, TradeRecord } from "../types";
import { evaluatePosition, managePositions, positionPnl } from "./positionManager";
import { detectRetest } from "./retestDetector";
import { triggerTrade } from "./tradeTrigger";

const T0 = Date.UTC(2024, 0, 1, 0, 15);
const MINUTE = 60_000;

const createPosition = (
	trade: Partial<TradeRecord> = {},
	status: Partial<PositionStatus> = {},
): OpenPosition => ({
	trade: {
		id: 1,
		symbol: "BTCUSD",
		entryTime: T0,
		retestEventId: 1,
		open: 110,
		high: 111,
		low: 107,
		close: 110,
		volume: 4,
		direction: "Bullish",
		lot: 2,
		remainingLot: 2,
		initialStopLoss: 100,
		initialTarget: 130,
		modifiedStopLoss: 100,
		modifiedTarget: 140,
		isActive: true,
		lastModified: T0,
		...trade,
	},
	status: {
		id: 1,
		tradeId: 1,
		symbol: "BTCUSD",
		entryTime: T0,
		entryPrice: 110,
		exitPrice: null,
		pnl: 0,
		status: "Running",
		quantity: 2,
		duration: 0,
		isOpen: true,
		lastModified: T0,
		...status,
	},
});

const partiallyBooked = (direction: "Bullish" | "Bearish" = "Bullish") =>
	direction === "Bullish"
		? createPosition(
				{ remainingLot: 1, modifiedStopLoss: 110 },
				{ status: "PartialBooked", exitPrice: 130, pnl: 20, quantity: 1 },
			)
		: createPosition(
				{
					direction: "Bearish",
					entryTime: T0,
					close: 100,
					remainingLot: 1,
					initialStopLoss: 110,
					initialTarget: 80,
					modifiedStopLoss: 100,
					modifiedTarget: 70,
				},
				{
					status: "PartialBooked",
					entryPrice: 100,
					exitPrice: 80,
					pnl: 20,
					quantity: 1,
				},
			);

describe("evaluatePosition", () => {
	const now = T0 + 10 * MINUTE;

	it("should book half the position at the first target", () => {
		const { update, transition } = evaluatePosition(createPosition(), 131, now);

		expect(update).toEqual({
			tradeId: 1,
			remainingLot: 1,
			modifiedStopLoss: 110,
			modifiedTarget: 140,
			status: "PartialBooked",
			exitPrice: 130,
			pnl: 20,
			duration: 10,
			isOpen: true,
		});
		expect(transition?.from).toBe("Running");
		expect(transition?.to).toBe("PartialBooked");
	});

	it("should stop out the whole lot at the initial stop", () => {
		const { update, transition } = evaluatePosition(createPosition(), 99, now);

		expect(update.status).toBe("SL");
		expect(update.exitPrice).toBe(100);
		expect(update.pnl).toBe(-20);
		expect(update.remainingLot).toBe(0);
		expect(update.isOpen).toBe(false);
		expect(transition?.isOpen).toBe(false);
	});

	it("should mark a running position to market without a transition", () => {
		const { update, transition } = evaluatePosition(createPosition(), 120, now);

		expect(transition).toBeNull();
		expect(update.status).toBe("Running");
		expect(update.pnl).toBe(20);
		expect(update.isOpen).toBe(true);
	});

	it("should close at cost once a partially booked position returns to entry", () => {
		const { update } = evaluatePosition(partiallyBooked(), 109, now);

		expect(update.status).toBe("CostToCost");
		expect(update.exitPrice).toBe(120);
		expect(update.pnl).toBe(20);
		expect(update.remainingLot).toBe(0);
		expect(update.isOpen).toBe(false);
	});

	it("should book the rest at the extended target", () => {
		const { update } = evaluatePosition(partiallyBooked(), 141, now);

		expect(update.status).toBe("FullBooked");
		expect(update.exitPrice).toBe(135);
		expect(update.pnl).toBe(50);
		expect(update.isOpen).toBe(false);
	});

	it("should combine booked and open profit while partially booked", () => {
		const { update, transition } = evaluatePosition(partiallyBooked(), 125, now);

		expect(transition).toBeNull();
		expect(update.pnl).toBe(35);
	});

	it("should mirror the rules for bearish positions", () => {
		const running = createPosition(
			{
				direction: "Bearish",
				close: 100,
				initialStopLoss: 110,
				initialTarget: 80,
				modifiedStopLoss: 110,
				modifiedTarget: 70,
			},
			{ entryPrice: 100 },
		);

		expect(evaluatePosition(running, 79, now).update).toMatchObject({
			status: "PartialBooked",
			exitPrice: 80,
			pnl: 20,
			modifiedStopLoss: 100,
			remainingLot: 1,
		});
		expect(evaluatePosition(running, 111, now).update).toMatchObject({
			status: "SL",
			exitPrice: 110,
			pnl: -20,
		});
		expect(evaluatePosition(partiallyBooked("Bearish"), 101, now).update).toMatchObject({
			status: "CostToCost",
			exitPrice: 90,
			pnl: 20,
		});
		expect(evaluatePosition(partiallyBooked("Bearish"), 69, now).update).toMatchObject({
			status: "FullBooked",
			exitPrice: 75,
			pnl: 50,
		});
	});
});

describe("positionPnl", () => {
	it("should measure profit in the trade direction", () => {
		expect(positionPnl("Bullish", 100, 105, 2)).toBe(10);
		expect(positionPnl("Bearish", 100, 105, 2)).toBe(-10);
	});
});

describe("managePositions", () => {
	let store: Store;

	const candle = (minute: number, close: number): Candle => ({
		openTime: T0 + minute * MINUTE,
		open: close,
		high: close + 1,
		low: close - 1,
		close,
		volume: 2,
	});

	beforeEach(() => {
		store = openStore(":memory:");
		store.gaps.insert(
			{
				symbol: "BTCUSD",
				timeframe: "5m",
				direction: "Bullish",
				gapStart: 100,
				gapEnd: 106,
				activeTime: T0,
				gapSizePct: 6,
				distanceFromVwapPct: null,
			},
			T0,
		);
		detectRetest(
			store,
			"BTCUSD",
			{ ...candle(1, 107), high: 108, low: 105 },
			{ gapTimeframe: "5m", timeframe: "1m", tolerancePct: 0.003 },
			T0,
		);
		triggerTrade(store, "BTCUSD", candle(2, 110), { stopBuffer: 0.00005, lotSize: 1 }, T0);
	});

	afterEach(() => {
		store.close();
	});

	it("should carry a trade from partial booking to a cost-to-cost exit", () => {
		const [opened] = store.trades.listOpenPositions("BTCUSD");
		const tradeId = opened.trade.id;
		const lots: number[] = [opened.trade.remainingLot];

		const partial = managePositions(store, "BTCUSD", candle(3, 131), T0 + 4 * MINUTE);
		const afterPartial = store.trades.findPosition(tradeId);
		lots.push(afterPartial?.trade.remainingLot ?? -1);

		expect(partial.map((t) => t.to)).toEqual(["PartialBooked"]);
		expect(afterPartial?.trade.modifiedStopLoss).toBe(110);
		expect(afterPartial?.status.status).toBe("PartialBooked");
		expect(afterPartial?.status.quantity).toBe(0.5);
		expect(afterPartial?.status.isOpen).toBe(true);

		const exit = managePositions(store, "BTCUSD", candle(4, 109), T0 + 5 * MINUTE);
		const closed = store.trades.findPosition(tradeId);
		lots.push(closed?.trade.remainingLot ?? -1);

		expect(exit.map((t) => t.to)).toEqual(["CostToCost"]);
		expect(closed?.status.exitPrice).toBeCloseTo(120.005, 9);
		expect(closed?.status.pnl).toBeCloseTo(10.005, 9);
		expect(closed?.status.isOpen).toBe(false);
		expect(closed?.status.duration).toBe(3);
		expect(closed?.trade.isActive).toBe(false);
		expect(lots).toEqual([1, 0.5, 0]);
		expect(store.trades.listOpenPositions("BTCUSD")).toEqual([]);
		expect(managePositions(store, "BTCUSD", candle(5, 50), T0 + 6 * MINUTE)).toEqual([]);
	});

	it("should ignore candles that are not after the entry candle", () => {
		const transitions = managePositions(store, "BTCUSD", candle(2, 50), T0 + 3 * MINUTE);

		expect(transitions).toEqual([]);
		expect(store.trades.listOpenPositions("BTCUSD")[0].status.status).toBe("Running");
	});

	it("should refresh open profit while running", () => {
		managePositions(store, "BTCUSD", candle(3, 115), T0 + 4 * MINUTE);

		const [position] = store.trades.listOpenPositions("BTCUSD");
		expect(position.status.pnl).toBe(5);
		expect(position.status.lastModified).toBe(T0 + 4 * MINUTE);
	});
});
