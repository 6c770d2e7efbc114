import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => ({
	execa: vi.fn(async () => ({ stdout: "" })),
}));

vi.mock("execa", () => ({
	execa: mocks.execa,
}));

vi.mock("../../src/utils/logger", () => ({
	logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
	logError: vi.fn(),
}));

import {
	AudioDeviceService,
	parseArecordOutput,
} from "../../src/audio/device-service";

const ARECORD_OUTPUT = [
	"null",
	"    Discard all samples (playback) or generate zero samples (capture)",
	"default",
	"    Default Audio Device",
	"hw:CARD=PCH,DEV=0",
	"    HDA Intel PCH, ALC257 Analog",
	"    Direct hardware device without any conversions",
	"",
	"sysdefault:CARD=Mic",
	"    USB Microphone",
	"orphan",
].join("\n");

describe("parseArecordOutput", () => {
	it("pairs ids with their indented descriptions", () => {
		expect(parseArecordOutput(ARECORD_OUTPUT)).toEqual([
			{ id: "default", description: "Default Audio Device" },
			{
				id: "hw:CARD=PCH,DEV=0",
				description:
					"HDA Intel PCH, ALC257 Analog - Direct hardware device without any conversions",
			},
			{ id: "sysdefault:CARD=Mic", description: "USB Microphone" },
		]);
	});

	it("returns nothing for empty output", () => {
		expect(parseArecordOutput("")).toEqual([]);
	});
});

describe("AudioDeviceService", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	it("lists devices from arecord -L", async () => {
		mocks.execa.mockResolvedValueOnce({ stdout: "default\n    Default Audio Device\n" });

		const devices = await new AudioDeviceService().listDevices();

		expect(devices).toEqual([{ id: "default", description: "Default Audio Device" }]);
		expect(mocks.execa).toHaveBeenCalledWith("arecord", ["-L"], {
			cancelSignal: expect.any(AbortSignal),
		});
	});

	it("retries once before giving up", async () => {
		mocks.execa.mockRejectedValue(new Error("spawn arecord ENOENT"));

		await expect(new AudioDeviceService().listDevices()).rejects.toThrow(
			"spawn arecord ENOENT",
		);
		expect(mocks.execa).toHaveBeenCalledTimes(2);
	});
});
