import type { Timeframe } from "../types";
import { InvalidTimeframeError } from "./errors";

export const MINUTE_MS = 60_000;

const TIMEFRAME_MINUTES: Record<Timeframe, number> = {
	"1m": 1,
	"3m": 3,
	"5m": 5,
	"15m": 15,
	"30m": 30,
	"1h": 60,
	"2h": 120,
	"4h": 240,
	"1d": 1440,
};

function isTimeframe(value: string): value is Timeframe {
	return Object.prototype.hasOwnProperty.call(TIMEFRAME_MINUTES, value);
}

export function parseTimeframe(value: string): Timeframe {
	const trimmed = value.trim().toLowerCase();
	if (!isTimeframe(trimmed)) {
		throw new InvalidTimeframeError(value);
	}
	return trimmed;
}

export function timeframeToMinutes(timeframe: Timeframe): number {
	return TIMEFRAME_MINUTES[timeframe];
}

export function timeframeToMs(timeframe: Timeframe): number {
	return TIMEFRAME_MINUTES[timeframe] * MINUTE_MS;
}

/** Whole minutes elapsed since `from`, floored to multiples of the timeframe. */
export function quantizedMinutesSince(
	from: number,
	now: number,
	timeframe: Timeframe,
): number {
	const step = timeframeToMinutes(timeframe);
	const elapsed = (now - from) / MINUTE_MS;
	if (elapsed <= 0) return 0;
	return Math.floor(elapsed / step) * step;
}

export function round2(value: number): number {
	return Math.round(value * 100) / 100;
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
