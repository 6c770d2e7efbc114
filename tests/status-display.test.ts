import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../src/output/notification", () => ({
	notify: vi.fn(),
}));

vi.mock("../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

import { notify } from "../src/output/notification";
import { StatusDisplay } from "../src/overlay/status-display";
import type { DisplaySnapshot } from "../src/shared/ipc-types";

describe("StatusDisplay", () => {
	let display: StatusDisplay;

	beforeEach(() => {
		vi.clearAllMocks();
		vi.useFakeTimers();
		vi.setSystemTime(new Date("2026-01-01T00:00:00Z"));
		display = new StatusDisplay();
	});

	afterEach(() => {
		display.dispose();
		vi.useRealTimers();
	});

	test("starts hidden", () => {
		expect(display.getState()).toEqual({ state: "hidden", label: "" });
	});

	test("recording ticks once a second", () => {
		display.showRecording(0);
		vi.advanceTimersByTime(3000);

		expect(display.getState()).toEqual({
			state: "recording",
			elapsedSeconds: 3,
			label: "Recording... [0:03]",
		});
	});

	test("repeated showRecording keeps a single ticker", () => {
		display.showRecording(0);
		display.showRecording(60);
		display.showRecording(61);
		vi.advanceTimersByTime(1000);

		expect(display.getState().elapsedSeconds).toBe(62);
		expect(display.getState().label).toBe("Recording... [1:02]");
	});

	test("with a clock source each tick re-reads the capture time", () => {
		const readings = [1.2, 2.9, 1.0, 4.5];
		display.showRecording(0, () => readings.shift() ?? 0);
		const seen: Array<number | undefined> = [];
		display.on("change", (snapshot: DisplaySnapshot) => {
			seen.push(snapshot.elapsedSeconds);
		});

		vi.advanceTimersByTime(4000);

		expect(seen).toEqual([1, 2, 4]);
		expect(display.getState().label).toBe("Recording... [0:04]");
	});

	test("a fixed clock source holds the timer", () => {
		display.showRecording(30, () => 30);
		const onChange = vi.fn();
		display.on("change", onChange);

		vi.advanceTimersByTime(10_000);

		expect(onChange).not.toHaveBeenCalled();
		expect(display.getState().label).toBe("Recording... [0:30]");
	});

	test("leaving recording stops the ticker", () => {
		display.showRecording(5);
		display.showProcessing();
		vi.advanceTimersByTime(5000);

		expect(display.getState()).toEqual({
			state: "processing",
			label: "Processing...",
		});
	});

	test("success previews the text and hides after 1.5s", () => {
		const text = "The quick brown fox jumps over the lazy dog again";
		display.showSuccess(text);

		expect(display.getState()).toEqual({
			state: "success",
			text: "The quick brown fox jumps over the lazy ...",
			label: "✓ The quick brown fox jumps over the lazy ...",
			autoHideAt: Date.parse("2026-01-01T00:00:01.500Z"),
		});

		vi.advanceTimersByTime(1499);
		expect(display.getState().state).toBe("success");
		vi.advanceTimersByTime(1);
		expect(display.getState().state).toBe("hidden");
	});

	test("error cuts the message at 50 characters and hides after 3s", () => {
		display.showError("e".repeat(60));

		expect(display.getState().message).toBe(`${"e".repeat(50)}...`);
		vi.advanceTimersByTime(2999);
		expect(display.getState().state).toBe("error");
		vi.advanceTimersByTime(1);
		expect(display.getState().state).toBe("hidden");
	});

	test("a new state cancels a pending auto-hide", () => {
		display.showError("Recording too short");
		vi.advanceTimersByTime(2000);
		display.showRecording(0);
		vi.advanceTimersByTime(2000);

		expect(display.getState().state).toBe("recording");
	});

	test("showing an error twice restarts its timer", () => {
		display.showError("first");
		vi.advanceTimersByTime(2000);
		display.showError("second");
		vi.advanceTimersByTime(2000);

		expect(display.getState()).toMatchObject({
			state: "error",
			message: "second",
		});
	});

	test("emits a snapshot on every change", () => {
		const seen: DisplaySnapshot[] = [];
		display.on("change", (snapshot: DisplaySnapshot) => seen.push(snapshot));

		display.showProcessing();
		display.hide();

		expect(seen.map((s) => s.state)).toEqual(["processing", "hidden"]);
	});

	test("notifies only when enabled", () => {
		display.showSuccess("hello");
		expect(notify).not.toHaveBeenCalled();

		const noisy = new StatusDisplay({ notifications: true });
		noisy.showSuccess("hello");
		noisy.showError("API connection failed. Check internet/proxy.");
		noisy.dispose();

		expect(notify).toHaveBeenCalledWith("Transcribed", "hello", "success");
		expect(notify).toHaveBeenCalledWith(
			"Error",
			"API connection failed. Check internet/proxy.",
			"error",
		);
	});

	test("dispose clears pending timers", () => {
		display.showRecording(0);
		display.dispose();
		vi.advanceTimersByTime(5000);

		expect(display.getState().elapsedSeconds).toBe(0);
		expect(vi.getTimerCount()).toBe(0);
	});
});
