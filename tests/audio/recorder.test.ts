import { EventEmitter } from "node:events";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

type Behaviour = "ok" | "busy" | "missing" | "silent";

const mocks = vi.hoisted(() => {
	const behaviours: Behaviour[] = [];
	return {
		record: vi.fn(),
		execa: vi.fn(async () => ({ exitCode: 0 })),
		behaviours,
	};
});

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

vi.mock("node-record-lpcm16", () => ({
	record: mocks.record,
}));

vi.mock("execa", () => ({
	execa: mocks.execa,
}));

import { AudioRecorder } from "../../src/audio/recorder";
import type { AudioConfig } from "../../src/config/schema";
import type { AppError } from "../../src/utils/errors";

interface FakeRecording {
	process: EventEmitter & { stderr: EventEmitter };
	stream: () => EventEmitter;
	stop: ReturnType<typeof vi.fn>;
	emitter: EventEmitter;
}

const recordings: FakeRecording[] = [];

const STDERR: Record<"busy" | "missing", string> = {
	busy: "arecord: main:831: audio open error: Device or resource busy",
	missing: "arecord: main:831: audio open error: No such file or directory",
};

const createRecording = (): FakeRecording => {
	const behaviour = mocks.behaviours.shift() ?? "ok";
	const emitter = new EventEmitter();
	const proc = Object.assign(new EventEmitter(), { stderr: new EventEmitter() });
	const recording: FakeRecording = {
		process: proc,
		emitter,
		stream: () => {
			queueMicrotask(() => {
				if (behaviour === "silent") return;
				if (behaviour === "ok") {
					emitter.emit("data", Buffer.alloc(0));
					return;
				}
				proc.stderr.emit("data", Buffer.from(STDERR[behaviour]));
				emitter.emit("error", new Error("arecord exited with code 1"));
			});
			return emitter;
		},
		stop: vi.fn(() => {
			proc.emit("close", 0);
		}),
	};
	recordings.push(recording);
	return recording;
};

const settings: AudioConfig = {
	sampleRate: 16000,
	channels: 1,
	chunkSize: 4,
	maxDuration: 30,
	minDuration: 0.5,
};

describe("AudioRecorder", () => {
	let dir: string;
	let destination: string;
	let recorder: AudioRecorder;

	beforeEach(() => {
		vi.clearAllMocks();
		vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
		vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
		recordings.length = 0;
		mocks.behaviours.length = 0;
		mocks.record.mockImplementation(createRecording);
		dir = mkdtempSync(join(tmpdir(), "hotmic-recorder-"));
		destination = join(dir, "capture.wav");
		recorder = new AudioRecorder(settings);
	});

	afterEach(async () => {
		await recorder.release();
		vi.useRealTimers();
		rmSync(dir, { recursive: true, force: true });
	});

	it("starts arecord with the configured format", async () => {
		await recorder.start(destination);

		expect(mocks.record).toHaveBeenCalledWith({
			sampleRate: 16000,
			channels: 1,
			audioType: "wav",
			recorder: "arecord",
			device: undefined,
		});
		expect(recorder.isActive()).toBe(true);
	});

	it("writes every captured byte and flushes the remainder on stop", async () => {
		await recorder.start(destination);
		const stream = recordings[0]?.emitter;
		stream?.emit("data", Buffer.from("0123456789"));
		stream?.emit("data", Buffer.from("ab"));

		await recorder.stop();

		expect(readFileSync(destination, "utf-8")).toBe("0123456789ab");
	});

	it("reports elapsed time and returns it from stop", async () => {
		await recorder.start(destination);
		vi.advanceTimersByTime(2000);

		expect(recorder.elapsed()).toBe(2);
		expect(await recorder.stop()).toBe(2);
		expect(recorder.isActive()).toBe(false);
		expect(recorder.elapsed()).toBe(0);
	});

	it("stop while idle returns 0", async () => {
		expect(await recorder.stop()).toBe(0);
	});

	it("refuses a second start", async () => {
		await recorder.start(destination);

		await expect(recorder.start(join(dir, "other.wav"))).rejects.toMatchObject({
			code: "ALREADY_RECORDING",
		});
		expect(mocks.record).toHaveBeenCalledTimes(1);
	});

	it("fails fast when arecord is not installed", async () => {
		mocks.execa.mockRejectedValueOnce(new Error("spawn arecord ENOENT"));

		await expect(recorder.start(destination)).rejects.toMatchObject({
			code: "AUDIO_BACKEND_MISSING",
		});
		expect(mocks.record).not.toHaveBeenCalled();
	});

	it("checks for arecord only once", async () => {
		await recorder.start(destination);
		await recorder.stop();
		await recorder.start(join(dir, "second.wav"));

		expect(mocks.execa).toHaveBeenCalledTimes(1);
		expect(mocks.execa).toHaveBeenCalledWith("arecord", ["--version"], {
			stdio: "ignore",
		});
	});

	it("a stop before the device opens cancels the pending start", async () => {
		mocks.behaviours.push("silent");
		const outcome = recorder.start(destination).then(
			() => "started",
			(error: unknown) => error,
		);
		await vi.advanceTimersByTimeAsync(100);
		expect(mocks.record).toHaveBeenCalledTimes(1);

		expect(await recorder.stop()).toBe(0.1);

		expect(await outcome).toMatchObject({ code: "CAPTURE_CANCELLED" });
		expect(recorder.isActive()).toBe(false);
		expect(await recorder.stop()).toBe(0);
	});

	it("release during start settles the start", async () => {
		mocks.behaviours.push("silent");
		const outcome = recorder.start(destination).then(
			() => "started",
			(error: unknown) => error,
		);
		await vi.advanceTimersByTimeAsync(100);

		await recorder.release();
		await vi.advanceTimersByTimeAsync(5000);

		expect(await outcome).toMatchObject({ code: "CAPTURE_CANCELLED" });
	});

	it("classifies a missing device from stderr", async () => {
		mocks.behaviours.push("missing");

		await expect(recorder.start(destination)).rejects.toMatchObject({
			code: "NO_MICROPHONE",
		});
		expect(recorder.isActive()).toBe(false);
		expect(await recorder.stop()).toBe(0);
	});

	it("retries a busy device", async () => {
		mocks.behaviours.push("busy", "ok");

		const started = recorder.start(destination);
		await vi.advanceTimersByTimeAsync(250);
		await started;

		expect(mocks.record).toHaveBeenCalledTimes(2);
		expect(recorder.isActive()).toBe(true);
	});

	it("stops itself at the maximum duration and keeps that duration", async () => {
		const onLimit = vi.fn();
		recorder.on("limit", onLimit);
		await recorder.start(destination);

		vi.advanceTimersByTime(30_000);

		expect(onLimit).toHaveBeenCalledWith(30);
		expect(recordings[0]?.stop).toHaveBeenCalledTimes(1);
		expect(recorder.isActive()).toBe(false);

		vi.advanceTimersByTime(5000);
		expect(await recorder.stop()).toBe(30);
		expect(existsSync(destination)).toBe(true);
	});

	it("emits a device error that happens after start", async () => {
		const onError = vi.fn((_error: AppError) => {});
		recorder.on("error", onError);
		await recorder.start(destination);
		const recording = recordings[0];

		recording?.process.stderr.emit("data", Buffer.from(STDERR.busy));
		recording?.emitter.emit("error", new Error("read error"));

		expect(onError).toHaveBeenCalledTimes(1);
		expect(onError.mock.calls[0]?.[0].code).toBe("DEVICE_BUSY");
		expect(recorder.isActive()).toBe(false);
		expect(await recorder.stop()).toBe(0);
	});

	it("release stops the capture and drops listeners", async () => {
		recorder.on("limit", vi.fn());
		await recorder.start(destination);

		await recorder.release();

		expect(recorder.isActive()).toBe(false);
		expect(recorder.listenerCount("limit")).toBe(0);
	});
});
