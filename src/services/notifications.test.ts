import { describe, expect, it } from "vitest";
import type { OpenPosition } from "../types";
import { cycleMessages } from "./notifications";
import { emptyReport } from "./pipeline";

const T0 = Date.UTC(2024, 0, 1);

const opened: OpenPosition = {
	trade: {
		id: 7,
		symbol: "BTCUSD",
		entryTime: T0,
		retestEventId: 3,
		open: 108,
		high: 111,
		low: 107,
		close: 110,
		volume: 4,
		direction: "Bullish",
		lot: 1,
		remainingLot: 1,
		initialStopLoss: 99.995,
		initialTarget: 130.01,
		modifiedStopLoss: 99.995,
		modifiedTarget: 140.015,
		isActive: true,
		lastModified: T0,
	},
	status: {
		id: 7,
		tradeId: 7,
		symbol: "BTCUSD",
		entryTime: T0,
		entryPrice: 110,
		exitPrice: null,
		pnl: 0,
		status: "Running",
		quantity: 1,
		duration: 0,
		isOpen: true,
		lastModified: T0,
	},
};

describe("cycleMessages", () => {
	it("should return nothing for a quiet cycle", () => {
		expect(cycleMessages(emptyReport("BTCUSD"))).toEqual([]);
	});

	it("should describe an opened trade", () => {
		const messages = cycleMessages({ ...emptyReport("BTCUSD"), trade: opened });

		expect(messages).toEqual([
			"Trade opened BTCUSD (Bullish)\nEntry: 110\nStop: 99.995\nTarget: 130.01\nExtended target: 140.015",
		]);
	});

	it("should describe position transitions", () => {
		const messages = cycleMessages({
			...emptyReport("BTCUSD"),
			transitions: [
				{
					tradeId: 7,
					symbol: "BTCUSD",
					direction: "Bullish",
					from: "Running",
					to: "PartialBooked",
					entryPrice: 110,
					exitPrice: 130.01,
					pnl: 10.005,
					remainingLot: 0.5,
					isOpen: true,
				},
				{
					tradeId: 7,
					symbol: "BTCUSD",
					direction: "Bullish",
					from: "PartialBooked",
					to: "CostToCost",
					entryPrice: 110,
					exitPrice: 120.005,
					pnl: 10.005,
					remainingLot: 0,
					isOpen: false,
				},
			],
		});

		expect(messages).toEqual([
			"BTCUSD trade #7: Running -> PartialBooked\nExit: 130.01\nPnL: 10.005\nRemaining lot: 0.5",
			"BTCUSD trade #7: PartialBooked -> CostToCost\nExit: 120.005\nPnL: 10.005",
		]);
	});
});
