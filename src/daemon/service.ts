import { randomUUID } from "node:crypto";
import { mkdir, readFile, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type AudioCapture, AudioRecorder } from "../audio/recorder";
import { loadConfig } from "../config/loader";
import type { Config } from "../config/schema";
import { type ClipboardWriter, ClipboardManager } from "../output/clipboard";
import { type TextInjector, YdotoolInjector } from "../output/injector";
import { StatusDisplay } from "../overlay/status-display";
import type { DaemonStatus, DisplaySnapshot } from "../shared/ipc-types";
import { GroqClient } from "../transcribe/groq";
import type { Transcriber, TranscriptionFailure } from "../transcribe/types";
import {
	type ErrorTemplate,
	ErrorTemplates,
	formatUserError,
} from "../utils/error-templates";
import {
	type AppError,
	type ErrorCode,
	errorMessage,
	hasErrorCode,
	isDeviceError,
} from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { type HotkeySource, HotkeyListener } from "./hotkey";
import { IPCServer } from "./ipc";
import { type DaemonState, type RuntimePaths, runtimePaths } from "./runtime";

const STATE_WRITE_DEBOUNCE_MS = 50;

/** Legal moves of the state machine; anything else is refused with a warning. */
const TRANSITIONS: Record<DaemonStatus, readonly DaemonStatus[]> = {
	idle: ["recording"],
	recording: ["processing", "idle"],
	processing: ["inserting", "idle"],
	inserting: ["idle"],
};

const DEVICE_TEMPLATES: Partial<Record<ErrorCode, ErrorTemplate>> = {
	NO_MICROPHONE: ErrorTemplates.AUDIO.NO_MICROPHONE,
	PERMISSION_DENIED: ErrorTemplates.AUDIO.PERMISSION_DENIED,
	DEVICE_BUSY: ErrorTemplates.AUDIO.DEVICE_BUSY,
	AUDIO_BACKEND_MISSING: ErrorTemplates.AUDIO.AUDIO_BACKEND_MISSING,
};

/** The open capture of one cycle, backed by exactly one temp file. */
export interface RecordingSession {
	path: string;
	startedAt: number;
	/** Settles false when the capture never started; that failure is already reported. */
	started: Promise<boolean>;
	/** Set once a stop is under way; later triggers are ignored. */
	stopping: boolean;
	/** A device failure after the capture started. */
	failure?: AppError;
}

export interface DaemonDependencies {
	config?: Config;
	recorder?: AudioCapture;
	hotkey?: HotkeySource;
	transcriber?: Transcriber;
	injector?: TextInjector;
	clipboard?: ClipboardWriter;
	display?: StatusDisplay;
	/** Where PID, state and socket files live. */
	runtimeDir?: string;
	/** Where temporary recordings are written. */
	audioDir?: string;
}

export const describeTranscriptionFailure = (
	failure: TranscriptionFailure,
): string => {
	switch (failure.kind) {
		case "connection_failed":
			return ErrorTemplates.API.CONNECTION_FAILED.message;
		case "api_error":
			return ErrorTemplates.API.API_ERROR(failure.status, failure.message)
				.message;
		case "other":
			return ErrorTemplates.API.TRANSCRIPTION_FAILED(failure.message).message;
		default: {
			const unreachable: never = failure;
			return String(unreachable);
		}
	}
};

const deviceTemplate = (error: unknown): ErrorTemplate | undefined =>
	isDeviceError(error) ? DEVICE_TEMPLATES[error.code] : undefined;

const isMissingFile = (error: unknown): boolean =>
	typeof error === "object" &&
	error !== null &&
	"code" in error &&
	error.code === "ENOENT";

/**
 * The dictation state machine. Hotkey triggers toggle between starting a
 * capture and running stop → transcribe → insert; triggers that arrive while
 * a cycle is processing or inserting are dropped. Every cycle ends in idle
 * with its temp file removed.
 */
export class DaemonService {
	private status: DaemonStatus = "idle";
	private session: RecordingSession | null = null;
	private readonly config: Config;
	private readonly recorder: AudioCapture;
	private readonly hotkey: HotkeySource;
	private readonly transcriber: Transcriber;
	private readonly injector: TextInjector;
	private readonly clipboard: ClipboardWriter;
	private readonly display: StatusDisplay;
	private readonly ipcServer: IPCServer;
	private readonly paths: RuntimePaths;
	private readonly audioDir: string;
	private readonly inFlight = new Set<Promise<void>>();
	private stateWriteTimer: ReturnType<typeof setTimeout> | null = null;
	private hotkeyLoop: Promise<void> | null = null;
	private shutdownPromise: Promise<void> | null = null;
	private readonly startTime = Date.now();
	private cycleCount = 0;
	private errorCount = 0;
	private lastError?: string;

	private readonly signalHandler = () => {
		logger.info("Received SIGUSR1 signal, toggling recording");
		this.onHotkeyTrigger();
	};

	private readonly onDisplayChange = (snapshot: DisplaySnapshot) => {
		this.ipcServer.broadcast(this.status, snapshot);
	};

	private readonly onRecorderError = (error: AppError) => {
		const session = this.session;
		if (!session) return;
		session.failure = error;
		if (!session.stopping) this.track(this.stopAndTranscribe());
	};

	private readonly onRecorderLimit = (seconds: number) => {
		logger.info(
			{ seconds },
			"Maximum duration reached; press the hotkey to transcribe",
		);
		// Nothing is captured any more; hold the timer at the limit
		if (this.session && this.status === "recording") {
			this.display.showRecording(seconds, () => seconds);
		}
	};

	constructor(deps: DaemonDependencies = {}) {
		this.config = deps.config ?? loadConfig();
		this.recorder = deps.recorder ?? new AudioRecorder(this.config.audio);
		this.hotkey = deps.hotkey ?? new HotkeyListener(this.config.behavior.hotkey);
		this.transcriber = deps.transcriber ?? new GroqClient(this.config.api);
		this.injector = deps.injector ?? new YdotoolInjector(this.config.behavior);
		this.clipboard =
			deps.clipboard ??
			new ClipboardManager(this.config.behavior.clipboardTimeoutMs);
		this.display =
			deps.display ??
			new StatusDisplay({
				notifications: this.config.behavior.showNotification,
			});
		this.paths = runtimePaths(deps.runtimeDir);
		this.audioDir = deps.audioDir ?? tmpdir();
		this.ipcServer = new IPCServer(this.config.ui, this.paths.socketFile);

		this.display.on("change", this.onDisplayChange);
		this.recorder.on("error", this.onRecorderError);
		this.recorder.on("limit", this.onRecorderLimit);
	}

	public getStatus(): DaemonStatus {
		return this.status;
	}

	/** Writes the PID file, opens the IPC socket and starts consuming hotkeys. */
	public async start(): Promise<void> {
		try {
			await mkdir(this.paths.dir, { recursive: true, mode: 0o700 });
			await writeFile(this.paths.pidFile, process.pid.toString());
			await this.ipcServer.start();
			process.on("SIGUSR1", this.signalHandler);

			if (!this.config.api.key) {
				logger.warn(formatUserError(ErrorTemplates.API.MISSING_KEY));
			}

			const isWayland =
				!!process.env.WAYLAND_DISPLAY ||
				process.env.XDG_SESSION_TYPE === "wayland";
			if (isWayland && this.config.behavior.hotkey.toLowerCase() !== "disabled") {
				logger.warn(
					"Running on Wayland: built-in hotkeys only see XWayland windows. For system-wide hotkeys bind 'kill -USR1 <pid>' in your compositor and set the hotkey to 'disabled'.",
				);
			}

			this.hotkeyLoop = this.consumeHotkeys().catch((error) => {
				logError("Hotkey source ended unexpectedly", error);
			});
			this.scheduleStateWrite();
			logger.info("Daemon started. Waiting for hotkey...");
		} catch (error) {
			logError("Failed to start daemon", error);
			throw error;
		}
	}

	private async consumeHotkeys(): Promise<void> {
		for await (const _ of this.hotkey.listen()) {
			this.onHotkeyTrigger();
		}
	}

	/**
	 * Entry point for every trigger source. Never waits on the cycle it
	 * starts; the work runs on its own and is awaited by `drain()`.
	 */
	public onHotkeyTrigger(): void {
		if (this.shutdownPromise) return;

		switch (this.status) {
			case "idle":
				this.track(this.startRecording());
				return;
			case "recording":
				if (this.session?.stopping) {
					logger.debug("Stop already in progress, trigger ignored");
					return;
				}
				this.track(this.stopAndTranscribe());
				return;
			case "processing":
			case "inserting":
				logger.debug({ status: this.status }, "Hotkey ignored while busy");
				return;
		}
	}

	/** Resolves once every cycle started so far has finished. */
	public async drain(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	private track(task: Promise<void>): void {
		const tracked = task.catch((error) => {
			logError("Daemon cycle failed", error);
		});
		this.inFlight.add(tracked);
		void tracked.finally(() => this.inFlight.delete(tracked));
	}

	public async startRecording(): Promise<void> {
		if (this.session || this.status !== "idle") {
			logger.warn({ status: this.status }, "Already recording, start ignored");
			return;
		}

		const path = join(this.audioDir, `hotmic-${randomUUID()}.wav`);
		this.setStatus("recording");
		this.display.showRecording(0, () => this.recorder.elapsed());

		const session: RecordingSession = {
			path,
			startedAt: Date.now(),
			stopping: false,
			started: this.recorder.start(path).then(
				() => true,
				async (error: unknown) => {
					await this.abandonSession(session, error);
					return false;
				},
			),
		};
		this.session = session;

		if (await session.started) {
			logger.info({ path }, "Recording session opened");
		}
	}

	private async abandonSession(
		session: RecordingSession,
		error: unknown,
	): Promise<void> {
		const cancelled = hasErrorCode(error, "CAPTURE_CANCELLED");
		const template = deviceTemplate(error);
		if (cancelled) {
			logger.info("Recording cancelled before the microphone opened");
		} else {
			logError("Failed to start recording", error, {
				hint: template ? formatUserError(template) : undefined,
			});
		}

		if (this.session === session) this.session = null;
		await this.removeTempFile(session.path);
		if (cancelled) {
			this.display.hide();
		} else {
			this.reportError(template ? template.message : errorMessage(error));
		}
		this.setStatus("idle");
	}

	public async stopAndTranscribe(): Promise<void> {
		const session = this.session;
		if (this.status !== "recording" || !session || session.stopping) {
			logger.warn({ status: this.status }, "Not recording, stop ignored");
			return;
		}
		session.stopping = true;

		if (!(await session.started)) return;

		try {
			const duration = await this.recorder.stop();
			logger.info(
				{ duration, wallClockMs: Date.now() - session.startedAt },
				"Capture stopped",
			);

			if (session.failure) throw session.failure;

			if (duration < this.config.audio.minDuration) {
				logger.info(
					{ duration, minDuration: this.config.audio.minDuration },
					"Recording too short, skipping transcription",
				);
				this.reportError(ErrorTemplates.AUDIO.RECORDING_TOO_SHORT.message);
				return;
			}

			this.setStatus("processing");
			this.display.showProcessing();

			const audio = await readFile(session.path);
			const result = await this.transcriber.transcribe(
				audio,
				this.languageHint(),
			);

			if (!result.ok) {
				this.reportError(describeTranscriptionFailure(result.error));
				return;
			}

			const text = result.text.trim();
			if (!text) {
				logger.info({ duration }, "Transcription was blank");
				this.reportError(ErrorTemplates.API.EMPTY_RESULT.message);
				return;
			}

			this.setStatus("inserting");
			if (await this.insert(text)) {
				this.cycleCount++;
				this.display.showSuccess(text);
				logger.info({ duration, textLength: text.length }, "Dictation complete");
			} else {
				this.reportError(ErrorTemplates.OUTPUT.INJECTION_FAILED.message);
			}
		} catch (error) {
			logError("Processing failed", error, { path: session.path });
			this.reportError(deviceTemplate(error)?.message ?? errorMessage(error));
		} finally {
			if (this.session === session) this.session = null;
			await this.removeTempFile(session.path);
			this.setStatus("idle");
		}
	}

	private languageHint(): string | undefined {
		const { autoDetect, primary } = this.config.language;
		return autoDetect ? undefined : primary;
	}

	/** Injects, then copies. True when the text reached its destination. */
	private async insert(text: string): Promise<boolean> {
		const { autoPaste, copyToClipboard } = this.config.behavior;

		const injected = autoPaste ? await this.injector.inject(text) : false;
		const copied = copyToClipboard ? await this.clipboard.copy(text) : false;

		if (autoPaste) return injected;
		return copied || !copyToClipboard;
	}

	private reportError(message: string): void {
		this.errorCount++;
		this.lastError = message;
		this.display.showError(message);
	}

	private setStatus(next: DaemonStatus): void {
		const previous = this.status;
		if (previous === next) return;

		if (!TRANSITIONS[previous].includes(next)) {
			logger.warn({ from: previous, to: next }, "Invalid state transition ignored");
			return;
		}

		this.status = next;
		logger.info({ from: previous, to: next }, `Daemon status changed: ${next}`);
		this.ipcServer.broadcast(next, this.display.getState());
		this.scheduleStateWrite();
	}

	private async removeTempFile(path: string): Promise<void> {
		try {
			await unlink(path);
			logger.debug({ path }, "Removed temporary audio file");
		} catch (error) {
			if (isMissingFile(error)) return;
			logger.warn({ err: error, path }, "Failed to remove temporary audio file");
		}
	}

	private scheduleStateWrite(): void {
		if (this.stateWriteTimer || this.shutdownPromise) return;
		this.stateWriteTimer = setTimeout(() => {
			this.stateWriteTimer = null;
			this.writeStateFile().catch((error) => {
				logError("Failed to update daemon state file", error);
			});
		}, STATE_WRITE_DEBOUNCE_MS);
	}

	private async writeStateFile(): Promise<void> {
		const state: DaemonState = {
			status: this.status,
			pid: process.pid,
			uptime: Math.floor((Date.now() - this.startTime) / 1000),
			cycleCount: this.cycleCount,
			errorCount: this.errorCount,
			lastError: this.lastError,
		};
		await writeFile(this.paths.stateFile, JSON.stringify(state, null, 2));
		logger.debug({ status: this.status }, "Daemon state updated");
	}

	/** Stops every source and releases every resource. Safe to call twice. */
	public shutdown(): Promise<void> {
		if (!this.shutdownPromise) {
			this.shutdownPromise = this.performShutdown();
		}
		return this.shutdownPromise;
	}

	private async performShutdown(): Promise<void> {
		logger.info("Shutting down daemon");
		this.hotkey.stop();
		process.off("SIGUSR1", this.signalHandler);
		if (this.stateWriteTimer) clearTimeout(this.stateWriteTimer);
		this.stateWriteTimer = null;

		const session = this.session;
		if (session && !session.stopping) {
			session.stopping = true;
			this.session = null;
			// Releasing first also cancels a start still waiting on the device
			await this.recorder.release();
			await session.started;
			await this.removeTempFile(session.path);
			this.setStatus("idle");
		} else {
			await this.recorder.release();
		}

		// Cycles past capture run to completion and clean up after themselves
		await this.drain();
		await this.hotkeyLoop;

		this.recorder.off("error", this.onRecorderError);
		this.recorder.off("limit", this.onRecorderLimit);
		this.display.off("change", this.onDisplayChange);
		this.display.dispose();

		await this.ipcServer.stop();
		await rm(this.paths.pidFile, { force: true });
		await rm(this.paths.stateFile, { force: true });
		logger.info("Daemon stopped");
	}
}
