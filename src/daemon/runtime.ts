import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_CONFIG_DIR } from "../config/loader";

export const PID_FILE_NAME = "daemon.pid";
export const STATE_FILE_NAME = "daemon.state";
export const SOCKET_FILE_NAME = "daemon.sock";

export const DaemonStateSchema = z.object({
	status: z.enum(["idle", "recording", "processing", "inserting"]),
	pid: z.number().int(),
	uptime: z.number(),
	cycleCount: z.number().int(),
	errorCount: z.number().int(),
	lastError: z.string().optional(),
});

/** Snapshot written to `daemon.state` for `hotmic status`. */
export type DaemonState = z.infer<typeof DaemonStateSchema>;

export interface RuntimePaths {
	dir: string;
	pidFile: string;
	stateFile: string;
	socketFile: string;
}

export const runtimePaths = (dir: string = DEFAULT_CONFIG_DIR): RuntimePaths => ({
	dir,
	pidFile: join(dir, PID_FILE_NAME),
	stateFile: join(dir, STATE_FILE_NAME),
	socketFile: join(dir, SOCKET_FILE_NAME),
});

export const readPid = (pidFile: string): number | null => {
	if (!existsSync(pidFile)) return null;
	const pid = Number.parseInt(readFileSync(pidFile, "utf-8").trim(), 10);
	return Number.isInteger(pid) && pid > 0 ? pid : null;
};

export const isProcessAlive = (pid: number): boolean => {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: alive, but owned by someone else
		return (
			typeof error === "object" &&
			error !== null &&
			"code" in error &&
			error.code === "EPERM"
		);
	}
};

/** The state snapshot, or null when missing or unreadable. */
export const readDaemonState = (stateFile: string): DaemonState | null => {
	if (!existsSync(stateFile)) return null;
	try {
		const result = DaemonStateSchema.safeParse(
			JSON.parse(readFileSync(stateFile, "utf-8")),
		);
		return result.success ? result.data : null;
	} catch {
		return null;
	}
};
