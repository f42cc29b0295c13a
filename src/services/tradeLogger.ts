import { appendLine } from "../utils/files";
import { logger } from "../utils/logger";
import type { PositionTransition } from "./positionManager";

export type ClosedTradeEntry = PositionTransition & { closedAt: string };

export async function logClosedTrade(
	filePath: string,
	transition: PositionTransition,
	closedAt: number,
): Promise<void> {
	const entry: ClosedTradeEntry = {
		...transition,
		closedAt: new Date(closedAt).toISOString(),
	};
	await appendLine(filePath, JSON.stringify(entry));
	logger.info(
		{ tradeId: transition.tradeId, symbol: transition.symbol },
		"Trade recorded",
	);
}
