import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { logger } from "../utils/logger";
import { GapStore } from "./gapStore";
import { RetestStore } from "./retestStore";
import { TABLE_SCHEMAS } from "./schema";
import { TradeStore } from "./tradeStore";

/**
 * Explicit handle over the four strategy tables. Every component receives
 * one of these; nothing in the project holds a module-level connection.
 */
export type Store = {
	db: Database.Database;
	gaps: GapStore;
	retests: RetestStore;
	trades: TradeStore;
	transaction<T>(fn: () => T): T;
	close(): void;
};

export function openStore(filePath = ":memory:"): Store {
	if (filePath !== ":memory:") {
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
	}

	const db = new Database(filePath);
	db.pragma("journal_mode = WAL");
	db.pragma("foreign_keys = ON");

	for (const [table, sql] of Object.entries(TABLE_SCHEMAS)) {
		db.exec(sql);
		logger.debug({ table }, "Ensured table");
	}

	return {
		db,
		gaps: new GapStore(db),
		retests: new RetestStore(db),
		trades: new TradeStore(db),
		transaction<T>(fn: () => T): T {
			return db.transaction(fn)();
		},
		close() {
			db.close();
		},
	};
}
