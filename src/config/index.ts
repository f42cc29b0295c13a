import path from "node:path";
import dotenv from "dotenv";
import type { Timeframe } from "../types";
import { parseTimeframe } from "../utils/time";

dotenv.config();

export type FeedProvider = "delta" | "binance";

function parseFeedProvider(value: string): FeedProvider {
	const normalized = value.toLowerCase();
	if (normalized === "delta" || normalized === "binance") return normalized;
	throw new Error(`Unknown FEED_PROVIDER "${value}" (expected delta or binance)`);
}

const gapTimeframe: Timeframe = parseTimeframe(
	process.env.GAP_TIMEFRAME || "5m",
);
const tradeTimeframe: Timeframe = parseTimeframe(
	process.env.TRADE_TIMEFRAME || "1m",
);

export const config = {
	feed: {
		provider: parseFeedProvider(process.env.FEED_PROVIDER || "delta"),
		deltaBaseUrl:
			process.env.DELTA_BASE_URL || "https://api.india.delta.exchange",
		binanceTestnet:
			(process.env.BINANCE_USE_TESTNET || "false").toLowerCase() === "true",
		lookbackMinutes: Number(process.env.LOOKBACK_MINUTES || "1440"),
		rateLimitMs: Number(process.env.FEED_RATE_LIMIT_MS || "300"),
	},
	telegram: {
		botToken: process.env.TELEGRAM_BOT_TOKEN || "",
		chatId: process.env.TELEGRAM_CHAT_ID || "",
	},
	strategy: {
		symbols: (process.env.SYMBOLS || "BTCUSD")
			.split(",")
			.map((s) => s.trim())
			.filter((s) => s.length > 0),
		gapTimeframe,
		tradeTimeframe,
		minGapPct: Number(process.env.MIN_GAP_PCT || "0.02"),
		retestTolerancePct: Number(process.env.RETEST_TOLERANCE_PCT || "0.003"),
		stopBuffer: Number(process.env.STOP_BUFFER || "0.00005"),
		lotSize: Number(process.env.LOT_SIZE || "1"),
		symbolConcurrency: Number(process.env.SYMBOL_CONCURRENCY || "4"),
	},
	scheduling: {
		cron: process.env.CYCLE_CRON || "* * * * *",
		timezone: "UTC",
	},
	paths: {
		database: path.resolve(
			process.cwd(),
			process.env.DB_PATH || "data/trades.db",
		),
		tradeLog: path.join(process.cwd(), "data/trades.log"),
	},
};
