import { rmSync } from "node:fs";
import { Command } from "commander";
import * as colors from "yoctocolors";
import { AudioDeviceService } from "../audio/device-service";
import {
	isProcessAlive,
	readDaemonState,
	readPid,
	runtimePaths,
} from "../daemon/runtime";
import { DaemonService } from "../daemon/service";
import { errorMessage } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { formatElapsed } from "../utils/text";
import { configCommand } from "./config";

const paths = runtimePaths();

const program = new Command();

program
	.name("hotmic")
	.description("Hotkey-driven voice dictation daemon")
	.version("0.1.0");

program
	.command("start")
	.description("Start the daemon in the foreground")
	.action(async () => {
		const running = readPid(paths.pidFile);
		if (running !== null && running !== process.pid && isProcessAlive(running)) {
			console.error(colors.red(`Daemon is already running (PID: ${running})`));
			process.exit(1);
		}

		let service: DaemonService;
		try {
			service = new DaemonService();
		} catch (error) {
			console.error(colors.red("Failed to start daemon:"), errorMessage(error));
			process.exit(1);
		}

		try {
			await service.start();
		} catch (error) {
			console.error(colors.red("Failed to start daemon:"), errorMessage(error));
			await service.shutdown();
			process.exit(1);
		}

		const stop = (signal: NodeJS.Signals) => {
			logger.info({ signal }, "Received signal, shutting down");
			service.shutdown().then(
				() => process.exit(0),
				(error: unknown) => {
					logError("Shutdown failed", error);
					process.exit(1);
				},
			);
		};
		process.once("SIGINT", stop);
		process.once("SIGTERM", stop);
	});

program
	.command("stop")
	.description("Stop the daemon")
	.action(() => {
		const pid = readPid(paths.pidFile);
		if (pid === null) {
			console.error("Daemon is not running (no PID file found)");
			return;
		}

		if (!isProcessAlive(pid)) {
			rmSync(paths.pidFile, { force: true });
			rmSync(paths.stateFile, { force: true });
			console.log(colors.yellow(`Removed stale PID file (PID: ${pid})`));
			return;
		}

		try {
			process.kill(pid, "SIGTERM");
			console.log(`Stopped daemon (PID: ${pid})`);
		} catch (error) {
			console.error(colors.red("Failed to stop daemon:"), errorMessage(error));
		}
	});

program
	.command("status")
	.description("Show daemon status")
	.action(() => {
		const pid = readPid(paths.pidFile);
		if (pid === null) {
			console.log(`Status: ${colors.dim("Stopped")}`);
			return;
		}

		if (!isProcessAlive(pid)) {
			console.log(
				`Status: ${colors.red("Dead")} (PID file exists but process is not running)`,
			);
			return;
		}

		console.log(`Status: ${colors.green("Running")} (PID: ${pid})`);
		const state = readDaemonState(paths.stateFile);
		if (!state) return;

		console.log(`State:  ${state.status.toUpperCase()}`);
		console.log(`Uptime: ${formatElapsed(state.uptime)}`);
		console.log(`Cycles: ${state.cycleCount}`);
		console.log(`Errors: ${state.errorCount}`);
		if (state.lastError) {
			console.log(`Error:  ${colors.red(state.lastError)}`);
		}
	});

program
	.command("list-mics")
	.description("List available microphone devices")
	.action(async () => {
		const deviceService = new AudioDeviceService();
		try {
			console.log("Scanning for audio devices...");
			const devices = await deviceService.listDevices();

			if (devices.length === 0) {
				console.log(colors.yellow("No audio devices found."));
				return;
			}

			console.log(colors.bold("\nAvailable Audio Devices:"));
			console.log(colors.dim("------------------------"));
			for (const device of devices) {
				console.log(`ID:   ${colors.cyan(device.id)}`);
				console.log(`Desc: ${device.description}`);
				console.log(colors.dim("------------------------"));
			}

			console.log(
				"\nTo use a device, add its ID to your config file (hotmic config path):",
			);
			console.log('"audio": { "device": "YOUR_DEVICE_ID" }');
		} catch (error) {
			console.error(
				colors.red("Failed to list microphones:"),
				errorMessage(error),
			);
		}
	});

program.addCommand(configCommand);

export { program };
