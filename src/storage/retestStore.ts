import type Database from "better-sqlite3";
import type { Candle, FairValueGap, RetestEvent, Timeframe } from "../types";
import { parseTimeframe } from "../utils/time";
import { flag, parseDirection } from "./rows";

type RetestRow = {
	id: number;
	symbol: string;
	open_time: number;
	fair_value_gap_id: number;
	timeframe: string;
	direction: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	is_active: number;
	is_traded: number;
	last_modified: number;
};

type RetestInsertParams = {
	symbol: string;
	openTime: number;
	fairValueGapId: number;
	timeframe: string;
	direction: string;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	now: number;
};

function toRetest(row: RetestRow): RetestEvent {
	return {
		id: row.id,
		symbol: row.symbol,
		openTime: row.open_time,
		fairValueGapId: row.fair_value_gap_id,
		timeframe: parseTimeframe(row.timeframe),
		direction: parseDirection(row.direction),
		open: row.open,
		high: row.high,
		low: row.low,
		close: row.close,
		volume: row.volume,
		isActive: flag(row.is_active),
		isTraded: flag(row.is_traded),
		lastModified: row.last_modified,
	};
}

export class RetestStore {
	private readonly insertStmt: Database.Statement<RetestInsertParams>;
	private readonly byIdStmt: Database.Statement<[number], RetestRow>;
	private readonly byGapStmt: Database.Statement<[number], RetestRow>;
	private readonly pendingStmt: Database.Statement<[string], RetestRow>;
	private readonly markTradedStmt: Database.Statement<[number, number]>;

	constructor(db: Database.Database) {
		this.insertStmt = db.prepare<RetestInsertParams>(`
			INSERT INTO RetestGap (
				symbol, open_time, fair_value_gap_id, timeframe, direction,
				open, high, low, close, volume, is_active, is_traded, last_modified
			) VALUES (
				@symbol, @openTime, @fairValueGapId, @timeframe, @direction,
				@open, @high, @low, @close, @volume, 1, 0, @now
			)
			ON CONFLICT (fair_value_gap_id) DO NOTHING
		`);
		this.byIdStmt = db.prepare<[number], RetestRow>(
			"SELECT * FROM RetestGap WHERE id = ?",
		);
		this.byGapStmt = db.prepare<[number], RetestRow>(
			"SELECT * FROM RetestGap WHERE fair_value_gap_id = ?",
		);
		this.pendingStmt = db.prepare<[string], RetestRow>(`
			SELECT * FROM RetestGap
			WHERE symbol = ? AND is_active = 1 AND is_traded = 0
			ORDER BY open_time DESC, id DESC
			LIMIT 1
		`);
		this.markTradedStmt = db.prepare<[number, number]>(`
			UPDATE RetestGap SET is_traded = 1, last_modified = ?
			WHERE id = ? AND is_traded = 0
		`);
	}

	/** Records the candle that retested `gap`; null if the gap already has one. */
	insert(
		gap: FairValueGap,
		timeframe: Timeframe,
		candle: Candle,
		now: number,
	): RetestEvent | null {
		const result = this.insertStmt.run({
			symbol: gap.symbol,
			openTime: candle.openTime,
			fairValueGapId: gap.id,
			timeframe,
			direction: gap.direction,
			open: candle.open,
			high: candle.high,
			low: candle.low,
			close: candle.close,
			volume: candle.volume,
			now,
		});
		if (result.changes === 0) return null;
		return this.findById(Number(result.lastInsertRowid));
	}

	findById(id: number): RetestEvent | null {
		const row = this.byIdStmt.get(id);
		return row ? toRetest(row) : null;
	}

	findByGap(fairValueGapId: number): RetestEvent | null {
		const row = this.byGapStmt.get(fairValueGapId);
		return row ? toRetest(row) : null;
	}

	/** Most recent retest that is still live and has not produced a trade. */
	findPending(symbol: string): RetestEvent | null {
		const row = this.pendingStmt.get(symbol);
		return row ? toRetest(row) : null;
	}

	markTraded(id: number, now: number): boolean {
		return this.markTradedStmt.run(now, id).changes > 0;
	}
}
