import pino from "pino";

export const logger = pino({
	name: "fvg-retest-bot",
	level: process.env.LOG_LEVEL || "info",
	timestamp: pino.stdTimeFunctions.isoTime,
});
