import type { CycleReport } from "./pipeline";
import type { PositionTransition } from "./positionManager";

function formatPrice(value: number): string {
	return Number(value.toFixed(4)).toString();
}

function formatTransition(transition: PositionTransition): string {
	const lines = [
		`${transition.symbol} trade #${transition.tradeId}: ${transition.from} -> ${transition.to}`,
		`Exit: ${formatPrice(transition.exitPrice)}`,
		`PnL: ${formatPrice(transition.pnl)}`,
	];
	if (transition.isOpen) {
		lines.push(`Remaining lot: ${transition.remainingLot}`);
	}
	return lines.join("\n");
}

/** One message per trade opened or moved during the cycle. */
export function cycleMessages(report: CycleReport): string[] {
	const messages: string[] = [];

	if (report.trade) {
		const { trade } = report.trade;
		messages.push(
			[
				`Trade opened ${trade.symbol} (${trade.direction})`,
				`Entry: ${formatPrice(trade.close)}`,
				`Stop: ${formatPrice(trade.initialStopLoss)}`,
				`Target: ${formatPrice(trade.initialTarget)}`,
				`Extended target: ${formatPrice(trade.modifiedTarget)}`,
			].join("\n"),
		);
	}

	for (const transition of report.transitions) {
		messages.push(formatTransition(transition));
	}

	return messages;
}
