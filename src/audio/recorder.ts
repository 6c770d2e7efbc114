import { EventEmitter } from "node:events";
import { createWriteStream, type WriteStream } from "node:fs";
import { execa } from "execa";
import { type Recording, record } from "node-record-lpcm16";
import { loadConfig } from "../config/loader";
import type { AudioConfig } from "../config/schema";
import { AppError, type ErrorCode, hasErrorCode } from "../utils/errors";
import { logError, logger } from "../utils/logger";
import { withRetry } from "../utils/retry";

const BYTES_PER_SAMPLE = 2;
const START_FALLBACK_MS = 500;

/**
 * What the daemon needs from a microphone: capture into a file at a
 * destination, and report how long the capture ran.
 */
export interface AudioCapture {
	start(destination: string): Promise<void>;
	/** Resolves once the sink is flushed and closed. 0 when nothing was captured. */
	stop(): Promise<number>;
	elapsed(): number;
	isActive(): boolean;
	release(): Promise<void>;
	on(event: "error", listener: (error: AppError) => void): this;
	on(event: "limit", listener: (seconds: number) => void): this;
	off(event: "error", listener: (error: AppError) => void): this;
	off(event: "limit", listener: (seconds: number) => void): this;
}

export const classifyDeviceError = (
	error: unknown,
	stderrOutput: string,
): AppError => {
	let message = error instanceof Error ? error.message : String(error);
	let code: ErrorCode = "UNKNOWN_ERROR";

	if (
		stderrOutput.includes("No such file or directory") ||
		stderrOutput.includes("No such device")
	) {
		message =
			"No microphone detected. Please check if your microphone is connected and configured correctly.";
		code = "NO_MICROPHONE";
	} else if (stderrOutput.includes("Device or resource busy")) {
		message = "Microphone is busy. Another application might be using it.";
		code = "DEVICE_BUSY";
	} else if (
		stderrOutput.includes("Permission denied") ||
		stderrOutput.includes("audio open error")
	) {
		message =
			"Microphone permission denied. Please ensure your user is in the 'audio' group.";
		code = "PERMISSION_DENIED";
	} else if (stderrOutput) {
		message = `${message}. Details: ${stderrOutput.trim()}`;
	}

	return new AppError(code, message, { stderr: stderrOutput });
};

/**
 * Records 16-bit PCM WAV from `arecord` into a file, framed in
 * `chunkSize`-frame writes, and stops itself at `maxDuration`.
 */
export class AudioRecorder extends EventEmitter implements AudioCapture {
	private recording: Recording | null = null;
	private sink: WriteStream | null = null;
	private capture: Promise<void> | null = null;
	private pending: Buffer = Buffer.alloc(0);
	private startTime = 0;
	private stoppedAt: number | null = null;
	private limitTimer: ReturnType<typeof setTimeout> | null = null;
	private isStopping = false;
	private backendChecked = false;
	/** Rejects the open still waiting for its first chunk. */
	private cancelOpen: ((error: AppError) => void) | null = null;

	constructor(private readonly settings: AudioConfig = loadConfig().audio) {
		super();
	}

	public isActive(): boolean {
		return this.recording !== null;
	}

	public elapsed(): number {
		if (!this.isActive()) return 0;
		return (Date.now() - this.startTime) / 1000;
	}

	public async start(destination: string): Promise<void> {
		if (this.capture) {
			throw new AppError("ALREADY_RECORDING", "Already recording");
		}

		await this.ensureBackend();

		this.stoppedAt = null;
		this.pending = Buffer.alloc(0);
		this.startTime = Date.now();

		await withRetry(() => this.open(destination), {
			operationName: "Start recording",
			maxRetries: 2,
			backoffs: [100, 200],
			shouldRetry: (err) => hasErrorCode(err, "DEVICE_BUSY"),
		});

		this.limitTimer = setTimeout(() => {
			const seconds = this.elapsed();
			logger.warn(
				{ maxDuration: this.settings.maxDuration },
				"Recording limit reached. Auto-stopping.",
			);
			this.stoppedAt = Date.now();
			this.halt();
			this.emit("limit", seconds);
		}, this.settings.maxDuration * 1000);

		logger.info(
			{ destination, device: this.settings.device ?? "default" },
			"Recording started",
		);
	}

	private async ensureBackend(): Promise<void> {
		if (this.backendChecked) return;
		try {
			await execa("arecord", ["--version"], { stdio: "ignore" });
		} catch (_e) {
			throw new AppError(
				"AUDIO_BACKEND_MISSING",
				"Audio recording backend 'arecord' is not installed or not in PATH.",
			);
		}
		this.backendChecked = true;
	}

	private open(destination: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const recording = record({
				sampleRate: this.settings.sampleRate,
				channels: this.settings.channels,
				audioType: "wav",
				recorder: "arecord",
				device: this.settings.device,
			});
			const sink = createWriteStream(destination);
			sink.on("error", (err) => {
				logError("Audio sink error", err, { destination });
			});

			let stderrOutput = "";
			recording.process?.stderr?.on("data", (chunk: Buffer) => {
				stderrOutput += chunk.toString();
			});

			const stream = recording.stream();
			let streamStarted = false;
			const markStarted = () => {
				if (streamStarted) return;
				streamStarted = true;
				this.cancelOpen = null;
				resolve();
			};
			this.cancelOpen = (error) => {
				if (streamStarted) return;
				streamStarted = true;
				reject(error);
			};

			this.recording = recording;
			this.sink = sink;
			this.isStopping = false;

			this.capture = new Promise<void>((resolveCapture) => {
				const finish = () => {
					if (sink.destroyed) {
						resolveCapture();
						return;
					}
					if (this.pending.length > 0) {
						sink.write(this.pending);
						this.pending = Buffer.alloc(0);
					}
					sink.end(() => resolveCapture());
				};
				if (recording.process) {
					recording.process.once("close", finish);
				} else {
					stream.once("end", finish);
				}
			});

			stream.on("data", (chunk: Buffer | string) => {
				markStarted();
				this.append(
					sink,
					Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, "binary"),
				);
			});

			stream.once("error", (err: unknown) => {
				if (this.isStopping) return;

				const enhancedError = classifyDeviceError(err, stderrOutput);
				if (!streamStarted) {
					streamStarted = true;
					this.cancelOpen = null;
					this.discard();
					reject(enhancedError);
					return;
				}

				logError("Audio stream error", enhancedError);
				this.stoppedAt = Date.now();
				this.halt();
				if (this.listenerCount("error") > 0) {
					this.emit("error", enhancedError);
				}
			});

			// Fallback resolve if no data for 500ms but no error yet
			setTimeout(() => {
				if (this.recording === recording) markStarted();
			}, START_FALLBACK_MS);
		});
	}

	private append(sink: WriteStream, chunk: Buffer): void {
		const frameBytes =
			this.settings.chunkSize * this.settings.channels * BYTES_PER_SAMPLE;
		this.pending =
			this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;

		while (this.pending.length >= frameBytes) {
			sink.write(this.pending.subarray(0, frameBytes));
			this.pending = this.pending.subarray(frameBytes);
		}
	}

	/** Tells arecord to stop; the capture promise settles once it exits. */
	private halt(): void {
		this.clearLimitTimer();
		this.rejectPendingOpen();
		if (!this.recording) return;

		this.isStopping = true;
		try {
			this.recording.stop();
		} catch (e) {
			logError("Error stopping recording", e);
		}
		this.recording = null;
	}

	/** Drops a capture that never started. */
	private discard(): void {
		this.clearLimitTimer();
		this.rejectPendingOpen();
		try {
			this.recording?.stop();
		} catch (e) {
			logError("Error stopping failed recording", e);
		}
		this.sink?.destroy();
		this.recording = null;
		this.sink = null;
		this.capture = null;
		this.pending = Buffer.alloc(0);
	}

	public async stop(): Promise<number> {
		if (!this.capture) {
			return 0;
		}

		const endedAt = this.stoppedAt ?? Date.now();
		this.halt();
		await this.capture;

		this.capture = null;
		this.sink = null;
		this.stoppedAt = null;
		this.isStopping = false;

		const duration = Math.max(0, (endedAt - this.startTime) / 1000);
		logger.info({ duration }, "Recording stopped");
		return duration;
	}

	public async release(): Promise<void> {
		await this.stop();
		this.removeAllListeners();
	}

	private rejectPendingOpen(): void {
		const cancel = this.cancelOpen;
		this.cancelOpen = null;
		cancel?.(
			new AppError(
				"CAPTURE_CANCELLED",
				"Recording stopped before the microphone opened",
			),
		);
	}

	private clearLimitTimer(): void {
		if (this.limitTimer) clearTimeout(this.limitTimer);
		this.limitTimer = null;
	}
}
