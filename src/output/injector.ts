import { execa } from "execa";
import { loadConfig } from "../config/loader";
import { logError, logger } from "../utils/logger";

export interface TextInjector {
	/** Types `text` into the focused window. Failure is `false`, never a rejection. */
	inject(text: string): Promise<boolean>;
}

export interface InjectorSettings {
	typingDelayMs: number;
	injectTimeoutMs: number;
}

const describeFailure = (error: unknown): string => {
	if (typeof error !== "object" || error === null) return String(error);
	if ("code" in error && error.code === "ENOENT") {
		return "ydotool not found in PATH (install ydotool)";
	}
	if ("timedOut" in error && error.timedOut === true) {
		return "ydotool timed out";
	}
	if ("stderr" in error && typeof error.stderr === "string" && error.stderr) {
		return `ydotool failed: ${error.stderr.trim()}`;
	}
	return error instanceof Error ? error.message : "ydotool failed";
};

/**
 * Injects text through `ydotool type`, which writes to /dev/uinput and so
 * works on Wayland and X11 alike.
 */
export class YdotoolInjector implements TextInjector {
	constructor(
		private readonly settings: InjectorSettings = loadConfig().behavior,
	) {}

	public async inject(text: string): Promise<boolean> {
		if (!text) {
			logger.warn("Empty text, nothing to insert");
			return false;
		}

		const args = ["type"];
		if (this.settings.typingDelayMs > 0) {
			args.push("--key-delay", String(this.settings.typingDelayMs));
		}
		args.push("--", text);

		try {
			await execa("ydotool", args, { timeout: this.settings.injectTimeoutMs });
			logger.info({ length: text.length }, "Inserted text");
			return true;
		} catch (error) {
			logError("Text insertion failed", error, {
				reason: describeFailure(error),
			});
			return false;
		}
	}
}
