import type { Direction, PositionState } from "../types";

const POSITION_STATES: readonly PositionState[] = [
	"Running",
	"PartialBooked",
	"CostToCost",
	"FullBooked",
	"SL",
];

export function parseDirection(value: string): Direction {
	if (value === "Bullish" || value === "Bearish") return value;
	throw new Error(`Unexpected direction "${value}" in store`);
}

export function parsePositionState(value: string): PositionState {
	const state = POSITION_STATES.find((s) => s === value);
	if (!state) throw new Error(`Unexpected position status "${value}" in store`);
	return state;
}

export function flag(value: number): boolean {
	return value === 1;
}
