export class InvalidTimeframeError extends Error {
	constructor(readonly timeframe: string) {
		super(`Invalid timeframe "${timeframe}"`);
		this.name = "InvalidTimeframeError";
	}
}

export class CandleFeedError extends Error {
	constructor(
		message: string,
		readonly status?: number,
	) {
		super(message);
		this.name = "CandleFeedError";
	}
}
