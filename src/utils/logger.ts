import { existsSync, mkdirSync, readdirSync, statSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { createStream } from "rotating-file-stream";

const LOG_PREFIX = "batch-race-";
const RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

const logDir =
	process.env.BATCH_RACE_LOG_DIR ||
	join(homedir(), ".config", "batch-race", "logs");

if (!existsSync(logDir)) {
	mkdirSync(logDir, { recursive: true, mode: 0o700 });
}

const pruneOldLogs = async (dir: string) => {
	const now = Date.now();
	for (const file of readdirSync(dir)) {
		if (!file.startsWith(LOG_PREFIX) || !file.endsWith(".log")) continue;
		const filePath = join(dir, file);
		try {
			if (now - statSync(filePath).mtimeMs > RETENTION_MS) {
				await unlink(filePath);
			}
		} catch (e) {
			// file may already be gone
			console.debug(`Failed to prune log file ${filePath}:`, e);
		}
	}
};

pruneOldLogs(logDir).catch((e) => {
	console.debug("Log pruning failed:", e);
});

const rotatingStream = createStream(
	(time) => {
		const date = time ? new Date(time) : new Date();
		const dateStr = date.toISOString().split("T")[0];
		return `${LOG_PREFIX}${dateStr}.log`;
	},
	{
		interval: "1d",
		path: logDir,
	},
);

const level = process.env.LOG_LEVEL || "info";

// The console belongs to the progress lines and the report. Errors the
// commands already print go to the file only; stderr gets fatal records.
export const logStreams: pino.StreamEntry[] = [
	{ level: "trace", stream: rotatingStream },
	{ level: "fatal", stream: pino.destination(2) },
];

export const logger = pino(
	{
		level,
		base: {
			pid: process.pid,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		serializers: {
			err: pino.stdSerializers.err,
			error: pino.stdSerializers.err,
		},
	},
	pino.multistream(logStreams),
);

export const logError = (
	msg: string,
	error?: unknown,
	context?: Record<string, unknown>,
) => {
	const errorObj =
		error instanceof Error
			? error
			: new Error(String(error || "Unknown error"));
	logger.error({ err: errorObj, ...context }, msg);
};
