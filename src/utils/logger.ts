import { existsSync, mkdirSync, readdirSync, statSync } from "node:fs";
import { unlink } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { createStream } from "rotating-file-stream";
import { loadConfig } from "../config/loader";

const LOG_RETENTION_MS = 30 * 24 * 60 * 60 * 1000;

let logDir: string;
try {
	logDir = loadConfig().paths.logs;
} catch {
	logDir = join(homedir(), ".config", "hotmic", "logs");
}

const rotateLogs = async (dir: string) => {
	const now = Date.now();
	for (const file of readdirSync(dir)) {
		if (!file.startsWith("hotmic-") || !file.endsWith(".log")) continue;
		const filePath = join(dir, file);
		try {
			if (now - statSync(filePath).mtimeMs > LOG_RETENTION_MS) {
				await unlink(filePath);
			}
		} catch (e) {
			// may already be gone
			console.debug(`Failed to process log file ${filePath}:`, e);
		}
	}
};

const streams: pino.StreamEntry[] = [{ stream: pino.destination(1) }];

try {
	if (!existsSync(logDir)) {
		mkdirSync(logDir, { recursive: true, mode: 0o700 });
	}

	rotateLogs(logDir).catch((e) => {
		console.debug("Log rotation failed:", e);
	});

	streams.push({
		stream: createStream(
			(time) => {
				const date = time ? new Date(time) : new Date();
				return `hotmic-${date.toISOString().split("T")[0]}.log`;
			},
			{ interval: "1d", path: logDir },
		),
	});
} catch (e) {
	console.warn(`Log directory ${logDir} unavailable, logging to stdout only:`, e);
}

export const logger = pino(
	{
		level: process.env.LOG_LEVEL || "info",
		base: {
			pid: process.pid,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		serializers: {
			err: pino.stdSerializers.err,
			error: pino.stdSerializers.err,
		},
	},
	pino.multistream(streams),
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
