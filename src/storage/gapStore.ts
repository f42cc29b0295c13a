import type Database from "better-sqlite3";
import type { FairValueGap, GapCandidate, Timeframe } from "../types";
import { parseTimeframe, quantizedMinutesSince } from "../utils/time";
import { flag, parseDirection } from "./rows";

type GapRow = {
	id: number;
	symbol: string;
	timeframe: string;
	direction: string;
	gap_start: number;
	gap_end: number;
	active_time: number;
	duration: number;
	gap_size_pct: number;
	distance_from_vwap_pct: number | null;
	is_active: number;
	is_retested: number;
	last_modified: number;
};

type GapInsertParams = {
	symbol: string;
	timeframe: string;
	direction: string;
	gapStart: number;
	gapEnd: number;
	activeTime: number;
	gapSizePct: number;
	distanceFromVwapPct: number | null;
	now: number;
};

export type GapAgingResult = {
	aged: number;
	deactivated: FairValueGap[];
};

function toGap(row: GapRow): FairValueGap {
	return {
		id: row.id,
		symbol: row.symbol,
		timeframe: parseTimeframe(row.timeframe),
		direction: parseDirection(row.direction),
		gapStart: row.gap_start,
		gapEnd: row.gap_end,
		activeTime: row.active_time,
		duration: row.duration,
		gapSizePct: row.gap_size_pct,
		distanceFromVwapPct: row.distance_from_vwap_pct,
		isActive: flag(row.is_active),
		isRetested: flag(row.is_retested),
		lastModified: row.last_modified,
	};
}

/** A close beyond the far edge of the gap fills it for good. */
export function isClosedThrough(gap: FairValueGap, close: number): boolean {
	return gap.direction === "Bearish" ? close > gap.gapEnd : close < gap.gapStart;
}

export class GapStore {
	private readonly insertStmt: Database.Statement<GapInsertParams>;
	private readonly byIdStmt: Database.Statement<[number], GapRow>;
	private readonly activeStmt: Database.Statement<[string, string], GapRow>;
	private readonly candidateStmt: Database.Statement<[string, string], GapRow>;
	private readonly markRetestedStmt: Database.Statement<[number, number]>;
	private readonly durationStmt: Database.Statement<[number, number, number]>;
	private readonly deactivateStmt: Database.Statement<[number, number]>;
	private readonly cascadeStmt: Database.Statement<[number, number]>;

	constructor(private readonly db: Database.Database) {
		this.insertStmt = db.prepare<GapInsertParams>(`
			INSERT INTO FairValueGaps (
				symbol, timeframe, direction, gap_start, gap_end, active_time,
				duration, gap_size_pct, distance_from_vwap_pct,
				is_active, is_retested, last_modified
			) VALUES (
				@symbol, @timeframe, @direction, @gapStart, @gapEnd, @activeTime,
				0, @gapSizePct, @distanceFromVwapPct,
				1, 0, @now
			)
			ON CONFLICT (symbol, timeframe, direction, gap_start, gap_end) DO NOTHING
		`);
		this.byIdStmt = db.prepare<[number], GapRow>(
			"SELECT * FROM FairValueGaps WHERE id = ?",
		);
		this.activeStmt = db.prepare<[string, string], GapRow>(`
			SELECT * FROM FairValueGaps
			WHERE symbol = ? AND timeframe = ? AND is_active = 1
			ORDER BY active_time, id
		`);
		this.candidateStmt = db.prepare<[string, string], GapRow>(`
			SELECT * FROM FairValueGaps
			WHERE symbol = ? AND timeframe = ? AND is_active = 1 AND is_retested = 0
			ORDER BY active_time DESC, id DESC
			LIMIT 1
		`);
		this.markRetestedStmt = db.prepare<[number, number]>(`
			UPDATE FairValueGaps SET is_retested = 1, last_modified = ?
			WHERE id = ? AND is_active = 1 AND is_retested = 0
		`);
		this.durationStmt = db.prepare<[number, number, number]>(
			"UPDATE FairValueGaps SET duration = ?, last_modified = ? WHERE id = ?",
		);
		this.deactivateStmt = db.prepare<[number, number]>(`
			UPDATE FairValueGaps SET is_active = 0, last_modified = ?
			WHERE id = ? AND is_active = 1
		`);
		this.cascadeStmt = db.prepare<[number, number]>(`
			UPDATE RetestGap SET is_active = 0, last_modified = ?
			WHERE fair_value_gap_id = ? AND is_active = 1
		`);
	}

	/** Returns false when the same gap is already on record, active or not. */
	insert(gap: GapCandidate, now: number): boolean {
		const result = this.insertStmt.run({
			symbol: gap.symbol,
			timeframe: gap.timeframe,
			direction: gap.direction,
			gapStart: gap.gapStart,
			gapEnd: gap.gapEnd,
			activeTime: gap.activeTime,
			gapSizePct: gap.gapSizePct,
			distanceFromVwapPct: gap.distanceFromVwapPct,
			now,
		});
		return result.changes > 0;
	}

	findById(id: number): FairValueGap | null {
		const row = this.byIdStmt.get(id);
		return row ? toGap(row) : null;
	}

	listActive(symbol: string, timeframe: Timeframe): FairValueGap[] {
		return this.activeStmt.all(symbol, timeframe).map(toGap);
	}

	findRetestCandidate(symbol: string, timeframe: Timeframe): FairValueGap | null {
		const row = this.candidateStmt.get(symbol, timeframe);
		return row ? toGap(row) : null;
	}

	markRetested(id: number, now: number): boolean {
		return this.markRetestedStmt.run(now, id).changes > 0;
	}

	ageAndDeactivate(
		symbol: string,
		timeframe: Timeframe,
		latestClose: number,
		now: number,
	): GapAgingResult {
		const run = this.db.transaction((): GapAgingResult => {
			let aged = 0;
			const deactivated: FairValueGap[] = [];

			for (const gap of this.listActive(symbol, timeframe)) {
				const duration = Math.max(
					gap.duration,
					quantizedMinutesSince(gap.activeTime, now, timeframe),
				);
				if (duration !== gap.duration) {
					this.durationStmt.run(duration, now, gap.id);
					aged++;
				}

				if (isClosedThrough(gap, latestClose)) {
					this.deactivateStmt.run(now, gap.id);
					this.cascadeStmt.run(now, gap.id);
					deactivated.push({
						...gap,
						duration,
						isActive: false,
						lastModified: now,
					});
				}
			}

			return { aged, deactivated };
		});
		return run();
	}
}
