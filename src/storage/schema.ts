export const TABLE_SCHEMAS = {
	FairValueGaps: `
		CREATE TABLE IF NOT EXISTS FairValueGaps (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			symbol TEXT NOT NULL,
			timeframe TEXT NOT NULL,
			direction TEXT NOT NULL CHECK (direction IN ('Bullish', 'Bearish')),
			gap_start REAL NOT NULL,
			gap_end REAL NOT NULL,
			active_time INTEGER NOT NULL,
			duration INTEGER NOT NULL DEFAULT 0,
			gap_size_pct REAL NOT NULL,
			distance_from_vwap_pct REAL,
			is_active INTEGER NOT NULL DEFAULT 1,
			is_retested INTEGER NOT NULL DEFAULT 0,
			last_modified INTEGER NOT NULL
		);
		CREATE UNIQUE INDEX IF NOT EXISTS FairValueGaps_identity
			ON FairValueGaps (symbol, timeframe, direction, gap_start, gap_end);
		CREATE INDEX IF NOT EXISTS FairValueGaps_active
			ON FairValueGaps (symbol, timeframe, is_active, active_time);
	`,
	RetestGap: `
		CREATE TABLE IF NOT EXISTS RetestGap (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			symbol TEXT NOT NULL,
			open_time INTEGER NOT NULL,
			fair_value_gap_id INTEGER NOT NULL REFERENCES FairValueGaps (id),
			timeframe TEXT NOT NULL,
			direction TEXT NOT NULL CHECK (direction IN ('Bullish', 'Bearish')),
			open REAL NOT NULL,
			high REAL NOT NULL,
			low REAL NOT NULL,
			close REAL NOT NULL,
			volume REAL NOT NULL,
			is_active INTEGER NOT NULL DEFAULT 1,
			is_traded INTEGER NOT NULL DEFAULT 0,
			last_modified INTEGER NOT NULL
		);
		CREATE UNIQUE INDEX IF NOT EXISTS RetestGap_gap
			ON RetestGap (fair_value_gap_id);
	`,
	Trades: `
		CREATE TABLE IF NOT EXISTS Trades (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			symbol TEXT NOT NULL,
			entry_time INTEGER NOT NULL,
			retest_gap_id INTEGER NOT NULL REFERENCES RetestGap (id),
			open REAL NOT NULL,
			high REAL NOT NULL,
			low REAL NOT NULL,
			close REAL NOT NULL,
			volume REAL NOT NULL,
			direction TEXT NOT NULL CHECK (direction IN ('Bullish', 'Bearish')),
			lot REAL NOT NULL,
			remaining_lot REAL NOT NULL,
			initial_stop_loss REAL NOT NULL,
			initial_target REAL NOT NULL,
			modified_stop_loss REAL NOT NULL,
			modified_target REAL NOT NULL,
			is_active INTEGER NOT NULL DEFAULT 1,
			last_modified INTEGER NOT NULL
		);
		CREATE UNIQUE INDEX IF NOT EXISTS Trades_retest
			ON Trades (retest_gap_id);
	`,
	TradeStatus: `
		CREATE TABLE IF NOT EXISTS TradeStatus (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			trade_id INTEGER NOT NULL REFERENCES Trades (id),
			symbol TEXT NOT NULL,
			entry_time INTEGER NOT NULL,
			entry_price REAL NOT NULL,
			exit_price REAL,
			pnl REAL NOT NULL DEFAULT 0,
			status TEXT NOT NULL CHECK (
				status IN ('Running', 'PartialBooked', 'CostToCost', 'FullBooked', 'SL')
			),
			quantity REAL NOT NULL,
			duration INTEGER NOT NULL DEFAULT 0,
			is_open INTEGER NOT NULL DEFAULT 1,
			last_modified INTEGER NOT NULL
		);
		CREATE UNIQUE INDEX IF NOT EXISTS TradeStatus_trade
			ON TradeStatus (trade_id);
	`,
} as const;
