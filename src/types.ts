export type Timeframe =
	| "1m"
	| "3m"
	| "5m"
	| "15m"
	| "30m"
	| "1h"
	| "2h"
	| "4h"
	| "1d";

export type Candle = {
	openTime: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	vwap?: number;
};

export type Direction = "Bullish" | "Bearish";

export type GapCandidate = {
	symbol: string;
	timeframe: Timeframe;
	direction: Direction;
	gapStart: number;
	gapEnd: number;
	activeTime: number;
	gapSizePct: number;
	distanceFromVwapPct: number | null;
};

export type FairValueGap = GapCandidate & {
	id: number;
	duration: number;
	isActive: boolean;
	isRetested: boolean;
	lastModified: number;
};

export type RetestEvent = {
	id: number;
	symbol: string;
	openTime: number;
	fairValueGapId: number;
	timeframe: Timeframe;
	direction: Direction;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	isActive: boolean;
	isTraded: boolean;
	lastModified: number;
};

export type TradeRecord = {
	id: number;
	symbol: string;
	entryTime: number;
	retestEventId: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	direction: Direction;
	lot: number;
	remainingLot: number;
	initialStopLoss: number;
	initialTarget: number;
	modifiedStopLoss: number;
	modifiedTarget: number;
	isActive: boolean;
	lastModified: number;
};

export type PositionState =
	| "Running"
	| "PartialBooked"
	| "CostToCost"
	| "FullBooked"
	| "SL";

export type PositionStatus = {
	id: number;
	tradeId: number;
	symbol: string;
	entryTime: number;
	entryPrice: number;
	exitPrice: number | null;
	pnl: number;
	status: PositionState;
	quantity: number;
	duration: number;
	isOpen: boolean;
	lastModified: number;
};

export type OpenPosition = {
	trade: TradeRecord;
	status: PositionStatus;
};
