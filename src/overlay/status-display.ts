import { EventEmitter } from "node:events";
import { notify } from "../output/notification";
import type { DisplaySnapshot } from "../shared/ipc-types";
import { formatElapsed, truncate } from "../utils/text";

export const RECORDING_TICK_MS = 1000;
export const SUCCESS_AUTO_HIDE_MS = 1500;
export const ERROR_AUTO_HIDE_MS = 3000;
export const PREVIEW_MAX_CHARS = 40;
export const MESSAGE_MAX_CHARS = 50;

export interface StatusDisplayOptions {
	/** Also raise a desktop notification for Success and Error. */
	notifications?: boolean;
}

/** Reads how long the capture has been running, in seconds. */
export type ElapsedSource = () => number;

const recordingLabel = (seconds: number) =>
	`Recording... [${formatElapsed(seconds)}]`;

/**
 * Presentation state for the overlay: five exclusive states, a 1 s
 * self-updating timer while recording, and auto-hide after Success/Error.
 * Every change is emitted as a "change" event carrying a snapshot.
 */
export class StatusDisplay extends EventEmitter {
	private snapshot: DisplaySnapshot = { state: "hidden", label: "" };
	private tickTimer: ReturnType<typeof setInterval> | null = null;
	private autoHideTimer: ReturnType<typeof setTimeout> | null = null;
	private elapsedSource: ElapsedSource | null = null;

	constructor(private readonly options: StatusDisplayOptions = {}) {
		super();
	}

	public getState(): DisplaySnapshot {
		return { ...this.snapshot };
	}

	/**
	 * With `elapsed`, each tick re-reads the capture's own clock and the
	 * shown value never goes backwards. Without it the display counts by itself.
	 */
	public showRecording(seconds: number, elapsed?: ElapsedSource): void {
		this.cancelAutoHide();
		this.elapsedSource = elapsed ?? null;
		this.showElapsed(Math.max(0, Math.floor(seconds)));

		if (!this.tickTimer) {
			this.tickTimer = setInterval(() => this.tick(), RECORDING_TICK_MS);
		}
	}

	private tick(): void {
		if (this.snapshot.state !== "recording") {
			this.stopTick();
			return;
		}
		const current = this.snapshot.elapsedSeconds ?? 0;
		const next = this.elapsedSource
			? Math.max(current, Math.floor(this.elapsedSource()))
			: current + 1;
		if (next !== current) this.showElapsed(next);
	}

	private showElapsed(elapsedSeconds: number): void {
		this.apply({
			state: "recording",
			elapsedSeconds,
			label: recordingLabel(elapsedSeconds),
		});
	}

	public showProcessing(): void {
		this.stopTick();
		this.cancelAutoHide();
		this.apply({ state: "processing", label: "Processing..." });
	}

	public showSuccess(text: string): void {
		this.stopTick();
		const preview = truncate(text.trim(), PREVIEW_MAX_CHARS);
		this.apply({
			state: "success",
			text: preview,
			label: `✓ ${preview}`,
			autoHideAt: Date.now() + SUCCESS_AUTO_HIDE_MS,
		});
		this.scheduleAutoHide(SUCCESS_AUTO_HIDE_MS);

		if (this.options.notifications) {
			notify("Transcribed", text, "success");
		}
	}

	public showError(message: string): void {
		this.stopTick();
		const short = truncate(message, MESSAGE_MAX_CHARS);
		this.apply({
			state: "error",
			message: short,
			label: `✗ ${short}`,
			autoHideAt: Date.now() + ERROR_AUTO_HIDE_MS,
		});
		this.scheduleAutoHide(ERROR_AUTO_HIDE_MS);

		if (this.options.notifications) {
			notify("Error", message, "error");
		}
	}

	public hide(): void {
		this.stopTick();
		this.cancelAutoHide();
		this.apply({ state: "hidden", label: "" });
	}

	public dispose(): void {
		this.stopTick();
		this.cancelAutoHide();
		this.removeAllListeners();
	}

	private apply(next: DisplaySnapshot): void {
		this.snapshot = next;
		this.emit("change", this.getState());
	}

	private scheduleAutoHide(delayMs: number): void {
		this.cancelAutoHide();
		this.autoHideTimer = setTimeout(() => {
			this.autoHideTimer = null;
			this.hide();
		}, delayMs);
	}

	private cancelAutoHide(): void {
		if (this.autoHideTimer) clearTimeout(this.autoHideTimer);
		this.autoHideTimer = null;
	}

	private stopTick(): void {
		if (this.tickTimer) clearInterval(this.tickTimer);
		this.tickTimer = null;
		this.elapsedSource = null;
	}
}
