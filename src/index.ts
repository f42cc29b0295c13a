import cron from "node-cron";
import { sendTelegramMessage } from "./clients/telegram";
import { config } from "./config";
import { createCandleFeed } from "./services/candleFeed";
import {
	type CycleContext,
	createCycleScheduler,
	runFullCycle,
} from "./services/cycleRunner";
import { openStore } from "./storage/database";
import { logger } from "./utils/logger";

function buildContext(): CycleContext {
	const { strategy } = config;
	return {
		store: openStore(config.paths.database),
		feed: createCandleFeed(config.feed),
		settings: {
			gapTimeframe: strategy.gapTimeframe,
			tradeTimeframe: strategy.tradeTimeframe,
			minGapPct: strategy.minGapPct,
			retestTolerancePct: strategy.retestTolerancePct,
			stopBuffer: strategy.stopBuffer,
			lotSize: strategy.lotSize,
		},
		symbols: strategy.symbols,
		lookbackMinutes: config.feed.lookbackMinutes,
		concurrency: strategy.symbolConcurrency,
		telegram: config.telegram,
		tradeLogPath: config.paths.tradeLog,
	};
}

function guarded(
	name: string,
	job: () => Promise<unknown>,
	context: CycleContext,
): () => Promise<void> {
	let running = false;
	return async () => {
		if (running) {
			logger.warn({ job: name }, "Previous run still in progress; skipping tick");
			return;
		}
		running = true;
		try {
			await job();
		} catch (error) {
			logger.error({ job: name, error }, "Job failed");
			await sendTelegramMessage(
				context.telegram,
				`${name} job failed: ${String(error)}`,
			).catch((notifyError: unknown) =>
				logger.error({ error: notifyError }, "Failed to send failure notice"),
			);
		} finally {
			running = false;
		}
	};
}

async function bootstrap() {
	const context = buildContext();
	logger.info(
		{
			provider: context.feed.provider,
			symbols: context.symbols,
			gapTimeframe: context.settings.gapTimeframe,
			tradeTimeframe: context.settings.tradeTimeframe,
		},
		"Starting fair value gap strategy",
	);

	if (process.argv.includes("--once")) {
		const reports = await runFullCycle(context);
		logger.info({ reports: reports.length }, "Single cycle finished");
		context.store.close();
		return;
	}

	const scheduler = createCycleScheduler(context);
	const tick = guarded("cycle", () => scheduler.tick(), context);
	await tick();
	cron.schedule(config.scheduling.cron, tick, {
		timezone: config.scheduling.timezone,
	});
}

bootstrap().catch((err) => {
	logger.error({ err }, "Fatal error");
	process.exitCode = 1;
});
