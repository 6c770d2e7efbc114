import { EventEmitter, on } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import {
	GlobalKeyboardListener,
	type IGlobalKeyEvent,
} from "node-global-key-listener";
import { loadConfig } from "../config/loader";
import { logError, logger } from "../utils/logger";

export const RETRY_BACKOFF_MS = 1000;

type KeyDownMap = Partial<Record<string, boolean>>;

/** An unending sequence of trigger presses. */
export interface HotkeySource {
	listen(): AsyncGenerator<void, void, undefined>;
	stop(): void;
}

export interface ParsedHotkey {
	trigger: string;
	modifiers: string[];
}

const normalizeKey = (key: string) =>
	key.trim().toUpperCase().replace("CONTROL", "CTRL");

export const parseHotkey = (hotkey: string): ParsedHotkey | null => {
	const parts = hotkey.split("+").map(normalizeKey);
	const trigger = parts[parts.length - 1];
	if (!trigger) return null;
	return { trigger, modifiers: parts.slice(0, -1) };
};

const modifierHeld = (modifier: string, down: KeyDownMap): boolean => {
	switch (modifier) {
		case "CTRL":
			return !!(down["LEFT CTRL"] || down["RIGHT CTRL"]);
		case "ALT":
			return !!(down["LEFT ALT"] || down["RIGHT ALT"]);
		case "SHIFT":
			return !!(down["LEFT SHIFT"] || down["RIGHT SHIFT"]);
		case "META":
		case "SUPER":
		case "WIN":
			return !!(down["LEFT META"] || down["RIGHT META"]);
		default:
			return !!down[modifier];
	}
};

/**
 * Global hotkey source. Each physical press of the trigger key (with its
 * modifiers held) yields once; auto-repeat is swallowed until key-up.
 * Failing to bind the keyboard, or the key server exiting later, is logged
 * and retried after RETRY_BACKOFF_MS.
 */
export class HotkeyListener extends EventEmitter implements HotkeySource {
	private listener: GlobalKeyboardListener | null = null;
	private isPressed = false;
	private stopped = false;
	/** A key-server exit seen while nobody was iterating. */
	private serverFailure: Error | null = null;
	private readonly abort = new AbortController();

	constructor(
		private readonly hotkey: string = loadConfig().behavior.hotkey,
	) {
		super();
	}

	public async *listen(): AsyncGenerator<void, void, undefined> {
		if (this.hotkey.trim().toLowerCase() === "disabled") {
			logger.info("Hotkey listener disabled (use compositor bindings or SIGUSR1)");
			return;
		}

		const parsed = parseHotkey(this.hotkey);
		if (!parsed) {
			logger.warn({ hotkey: this.hotkey }, "Invalid hotkey: empty trigger key");
			return;
		}

		while (!this.stopped) {
			try {
				await this.bind(parsed);
				const failure = this.serverFailure;
				if (failure) {
					this.serverFailure = null;
					throw failure;
				}
				// A key-server exit arrives as "error" and rejects this loop
				for await (const _ of on(this, "trigger", {
					signal: this.abort.signal,
				})) {
					yield;
				}
			} catch (error) {
				if (this.stopped) return;
				logError("Hotkey listener failed, retrying", error, {
					backoffMs: RETRY_BACKOFF_MS,
				});
				this.unbind();
				try {
					await sleep(RETRY_BACKOFF_MS, undefined, {
						signal: this.abort.signal,
					});
				} catch {
					return;
				}
			}
		}
	}

	private async bind({ trigger, modifiers }: ParsedHotkey): Promise<void> {
		if (this.listener) return;

		this.serverFailure = null;
		const onError = (errorCode: number | null) => {
			if (this.listener !== listener || this.stopped) return;
			this.failServer(
				new Error(`Key server exited (code ${errorCode ?? "unknown"})`),
			);
		};
		const listener: GlobalKeyboardListener = new GlobalKeyboardListener({
			x11: { onError },
			mac: { onError },
			windows: { onError },
		});
		this.listener = listener;
		this.isPressed = false;

		await listener.addListener((e: IGlobalKeyEvent, down: KeyDownMap) => {
			if (!e.name || normalizeKey(e.name) !== trigger) return;

			if (e.state === "UP") {
				this.isPressed = false;
				return;
			}

			if (this.isPressed) return;
			if (!modifiers.every((mod) => modifierHeld(mod, down))) return;

			this.isPressed = true;
			logger.debug({ hotkey: this.hotkey }, "Hotkey triggered");
			this.emit("trigger");
		});

		logger.info({ hotkey: this.hotkey }, "Global hotkey listener started");
	}

	private failServer(error: Error): void {
		if (this.listenerCount("error") > 0) {
			this.emit("error", error);
		} else {
			this.serverFailure = error;
		}
	}

	private unbind(): void {
		const listener = this.listener;
		if (!listener) return;
		this.listener = null;
		try {
			listener.kill();
		} catch (error) {
			logError("Failed to release keyboard listener", error);
		}
	}

	public stop(): void {
		if (this.stopped) return;
		this.stopped = true;
		this.abort.abort();
		this.unbind();
		logger.info("Global hotkey listener stopped");
	}
}
