import type Database from "better-sqlite3";
import type {
	OpenPosition,
	PositionState,
	PositionStatus,
	TradeRecord,
} from "../types";
import { flag, parseDirection, parsePositionState } from "./rows";

type TradeRow = {
	id: number;
	symbol: string;
	entry_time: number;
	retest_gap_id: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	direction: string;
	lot: number;
	remaining_lot: number;
	initial_stop_loss: number;
	initial_target: number;
	modified_stop_loss: number;
	modified_target: number;
	is_active: number;
	last_modified: number;
};

type StatusRow = {
	id: number;
	trade_id: number;
	symbol: string;
	entry_time: number;
	entry_price: number;
	exit_price: number | null;
	pnl: number;
	status: string;
	quantity: number;
	duration: number;
	is_open: number;
	last_modified: number;
};

export type NewTrade = Omit<TradeRecord, "id" | "isActive" | "lastModified">;

type TradeInsertParams = Omit<NewTrade, "direction"> & {
	direction: string;
	now: number;
};

type StatusInsertParams = {
	tradeId: number;
	symbol: string;
	entryTime: number;
	entryPrice: number;
	quantity: number;
	now: number;
};

export type PositionUpdate = {
	tradeId: number;
	remainingLot: number;
	modifiedStopLoss: number;
	modifiedTarget: number;
	status: PositionState;
	exitPrice: number | null;
	pnl: number;
	duration: number;
	isOpen: boolean;
};

type TradeUpdateParams = {
	tradeId: number;
	remainingLot: number;
	modifiedStopLoss: number;
	modifiedTarget: number;
	isActive: number;
	now: number;
};

type StatusUpdateParams = {
	tradeId: number;
	status: string;
	exitPrice: number | null;
	pnl: number;
	quantity: number;
	duration: number;
	isOpen: number;
	now: number;
};

function toTrade(row: TradeRow): TradeRecord {
	return {
		id: row.id,
		symbol: row.symbol,
		entryTime: row.entry_time,
		retestEventId: row.retest_gap_id,
		open: row.open,
		high: row.high,
		low: row.low,
		close: row.close,
		volume: row.volume,
		direction: parseDirection(row.direction),
		lot: row.lot,
		remainingLot: row.remaining_lot,
		initialStopLoss: row.initial_stop_loss,
		initialTarget: row.initial_target,
		modifiedStopLoss: row.modified_stop_loss,
		modifiedTarget: row.modified_target,
		isActive: flag(row.is_active),
		lastModified: row.last_modified,
	};
}

function toStatus(row: StatusRow): PositionStatus {
	return {
		id: row.id,
		tradeId: row.trade_id,
		symbol: row.symbol,
		entryTime: row.entry_time,
		entryPrice: row.entry_price,
		exitPrice: row.exit_price,
		pnl: row.pnl,
		status: parsePositionState(row.status),
		quantity: row.quantity,
		duration: row.duration,
		isOpen: flag(row.is_open),
		lastModified: row.last_modified,
	};
}

export class TradeStore {
	private readonly insertTradeStmt: Database.Statement<TradeInsertParams>;
	private readonly insertStatusStmt: Database.Statement<StatusInsertParams>;
	private readonly tradeByIdStmt: Database.Statement<[number], TradeRow>;
	private readonly statusByTradeStmt: Database.Statement<[number], StatusRow>;
	private readonly openStatusesStmt: Database.Statement<[string], StatusRow>;
	private readonly updateTradeStmt: Database.Statement<TradeUpdateParams>;
	private readonly updateStatusStmt: Database.Statement<StatusUpdateParams>;

	constructor(private readonly db: Database.Database) {
		this.insertTradeStmt = db.prepare<TradeInsertParams>(`
			INSERT INTO Trades (
				symbol, entry_time, retest_gap_id, open, high, low, close, volume,
				direction, lot, remaining_lot, initial_stop_loss, initial_target,
				modified_stop_loss, modified_target, is_active, last_modified
			) VALUES (
				@symbol, @entryTime, @retestEventId, @open, @high, @low, @close, @volume,
				@direction, @lot, @remainingLot, @initialStopLoss, @initialTarget,
				@modifiedStopLoss, @modifiedTarget, 1, @now
			)
			ON CONFLICT (retest_gap_id) DO NOTHING
		`);
		this.insertStatusStmt = db.prepare<StatusInsertParams>(`
			INSERT INTO TradeStatus (
				trade_id, symbol, entry_time, entry_price, exit_price, pnl,
				status, quantity, duration, is_open, last_modified
			) VALUES (
				@tradeId, @symbol, @entryTime, @entryPrice, NULL, 0,
				'Running', @quantity, 0, 1, @now
			)
		`);
		this.tradeByIdStmt = db.prepare<[number], TradeRow>(
			"SELECT * FROM Trades WHERE id = ?",
		);
		this.statusByTradeStmt = db.prepare<[number], StatusRow>(
			"SELECT * FROM TradeStatus WHERE trade_id = ?",
		);
		this.openStatusesStmt = db.prepare<[string], StatusRow>(`
			SELECT * FROM TradeStatus
			WHERE symbol = ? AND is_open = 1
			ORDER BY entry_time, id
		`);
		this.updateTradeStmt = db.prepare<TradeUpdateParams>(`
			UPDATE Trades SET
				remaining_lot = @remainingLot,
				modified_stop_loss = @modifiedStopLoss,
				modified_target = @modifiedTarget,
				is_active = @isActive,
				last_modified = @now
			WHERE id = @tradeId
		`);
		this.updateStatusStmt = db.prepare<StatusUpdateParams>(`
			UPDATE TradeStatus SET
				status = @status,
				exit_price = @exitPrice,
				pnl = @pnl,
				quantity = @quantity,
				duration = @duration,
				is_open = @isOpen,
				last_modified = @now
			WHERE trade_id = @tradeId AND is_open = 1
		`);
	}

	/**
	 * Inserts the trade together with its Running status row. Returns null
	 * when the retest already produced a trade.
	 */
	open(trade: NewTrade, now: number): OpenPosition | null {
		const run = this.db.transaction((): OpenPosition | null => {
			const result = this.insertTradeStmt.run({ ...trade, now });
			if (result.changes === 0) return null;

			const tradeId = Number(result.lastInsertRowid);
			this.insertStatusStmt.run({
				tradeId,
				symbol: trade.symbol,
				entryTime: trade.entryTime,
				entryPrice: trade.close,
				quantity: trade.lot,
				now,
			});
			return this.findPosition(tradeId);
		});
		return run();
	}

	findTrade(id: number): TradeRecord | null {
		const row = this.tradeByIdStmt.get(id);
		return row ? toTrade(row) : null;
	}

	findPosition(tradeId: number): OpenPosition | null {
		const trade = this.findTrade(tradeId);
		const status = this.statusByTradeStmt.get(tradeId);
		if (!trade || !status) return null;
		return { trade, status: toStatus(status) };
	}

	listOpenPositions(symbol: string): OpenPosition[] {
		const positions: OpenPosition[] = [];
		for (const row of this.openStatusesStmt.all(symbol)) {
			const trade = this.findTrade(row.trade_id);
			if (trade) positions.push({ trade, status: toStatus(row) });
		}
		return positions;
	}

	/** Writes the trade and its status row in one transaction. */
	apply(update: PositionUpdate, now: number): void {
		const run = this.db.transaction(() => {
			this.updateTradeStmt.run({
				tradeId: update.tradeId,
				remainingLot: update.remainingLot,
				modifiedStopLoss: update.modifiedStopLoss,
				modifiedTarget: update.modifiedTarget,
				isActive: update.isOpen ? 1 : 0,
				now,
			});
			this.updateStatusStmt.run({
				tradeId: update.tradeId,
				status: update.status,
				exitPrice: update.exitPrice,
				pnl: update.pnl,
				quantity: update.remainingLot,
				duration: update.duration,
				isOpen: update.isOpen ? 1 : 0,
				now,
			});
		});
		run();
	}
}
