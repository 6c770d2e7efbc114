import clipboardy from "clipboardy";
import { execa } from "execa";
import { loadConfig } from "../config/loader";
import { logError, logger } from "../utils/logger";
import { withRetry } from "../utils/retry";

export interface ClipboardWriter {
	/** Best-effort; failure is `false`, never a rejection. */
	copy(text: string): Promise<boolean>;
}

export class ClipboardManager implements ClipboardWriter {
	private readonly isWayland: boolean;

	constructor(
		private readonly timeoutMs: number = loadConfig().behavior
			.clipboardTimeoutMs,
	) {
		this.isWayland = !!process.env.WAYLAND_DISPLAY;
	}

	public async copy(text: string): Promise<boolean> {
		if (!text) return false;
		// One budget covers wl-copy and the fallback together
		const deadline = Date.now() + this.timeoutMs;

		if (this.isWayland) {
			try {
				await execa("wl-copy", ["--type", "text/plain"], {
					input: text,
					stdout: "ignore",
					stderr: "ignore",
					timeout: this.timeoutMs,
				});
				logger.info({ length: text.length }, "Copied to clipboard (wl-copy)");
				return true;
			} catch (error) {
				logger.warn({ err: error }, "wl-copy failed, falling back to clipboardy");
			}
		}

		const remainingMs = deadline - Date.now();
		if (remainingMs <= 0) {
			logger.warn(
				{ timeoutMs: this.timeoutMs },
				"Clipboard timeout spent before the fallback could run",
			);
			return false;
		}

		try {
			await withRetry(() => clipboardy.write(text), {
				operationName: "Clipboard write",
				maxRetries: 0,
				timeout: remainingMs,
			});
			logger.info({ length: text.length }, "Copied to clipboard");
			return true;
		} catch (error) {
			logError("Clipboard copy failed", error);
			return false;
		}
	}
}
