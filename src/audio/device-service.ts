import { execa } from "execa";
import { logError } from "../utils/logger";
import { withRetry } from "../utils/retry";

export interface AudioDevice {
	id: string;
	description: string;
}

/**
 * Parses the output of `arecord -L`: an unindented id line followed by
 * indented description lines. The `null` sink is skipped.
 */
export const parseArecordOutput = (output: string): AudioDevice[] => {
	const devices: AudioDevice[] = [];

	let currentId: string | null = null;
	let descriptionLines: string[] = [];

	const flushDevice = () => {
		if (currentId && currentId !== "null" && descriptionLines.length > 0) {
			devices.push({
				id: currentId,
				description: descriptionLines.join(" - "),
			});
		}
	};

	for (const line of output.split("\n")) {
		if (!line.trim()) continue;

		if (/^\s/.test(line)) {
			descriptionLines.push(line.trim());
		} else {
			flushDevice();
			currentId = line.trim();
			descriptionLines = [];
		}
	}

	flushDevice();

	return devices;
};

export class AudioDeviceService {
	/**
	 * Lists ALSA capture devices for the `audio.device` setting.
	 */
	public async listDevices(): Promise<AudioDevice[]> {
		return withRetry(
			async (signal) => {
				try {
					const { stdout } = await execa("arecord", ["-L"], {
						cancelSignal: signal,
					});
					return parseArecordOutput(stdout);
				} catch (error) {
					logError("Failed to list audio devices", error);
					throw error;
				}
			},
			{
				operationName: "List audio devices",
				maxRetries: 1,
				timeout: 5000,
			},
		);
	}
}
