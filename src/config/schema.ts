import { z } from "zod";
import hotkeyKeys from "./hotkey-keys.json";

const VALID_HOTKEY_PARTS = new Set<string>([
	...hotkeyKeys.modifiers,
	...hotkeyKeys.named,
	..."ABCDEFGHIJKLMNOPQRSTUVWXYZ".split(""),
	..."0123456789".split(""),
	...Array.from({ length: 24 }, (_, i) => `F${i + 1}`),
]);

/**
 * Validates a hotkey string.
 * Supports "Modifier+Key" format (e.g., "Ctrl+Space", "F24").
 * Also accepts "disabled" to turn the built-in listener off.
 * Case-insensitive.
 */
export const hotkeyValidator = (hotkey: string) => {
	if (!hotkey || hotkey.trim().length === 0) return false;

	if (hotkey.trim().toLowerCase() === "disabled") return true;

	const parts = hotkey.split("+").map((p) => p.trim().toUpperCase());
	return parts.every((part) => VALID_HOTKEY_PARTS.has(part));
};

export const ApiSchema = z.object({
	key: z.string().default(""),
	model: z.string().min(1).default("whisper-large-v3"),
	endpoint: z.string().url().optional(),
	/** HTTP(S) proxy for API requests. */
	proxy: z.string().url().optional(),
	timeoutMs: z.number().int().positive().max(60000).default(60000),
});

export const LanguageSchema = z.object({
	autoDetect: z.boolean().default(true),
	primary: z
		.string()
		.regex(/^[a-z]{2,3}$/, { message: "Use an ISO-639 code such as 'en'" })
		.default("en"),
});

export const AudioSchema = z
	.object({
		sampleRate: z.number().int().positive().default(16000),
		channels: z.number().int().min(1).max(2).default(1),
		chunkSize: z.number().int().positive().default(2048),
		maxDuration: z.number().positive().default(30),
		minDuration: z.number().min(0).default(0.5),
		device: z.string().optional(),
	})
	.refine((audio) => audio.minDuration < audio.maxDuration, {
		message: "minDuration must be shorter than maxDuration",
		path: ["minDuration"],
	});

export const BehaviorSchema = z.object({
	hotkey: z.string().default("F24").refine(hotkeyValidator, {
		message:
			"Invalid hotkey format. Use 'Modifier+Key' (e.g. 'Ctrl+Space', 'F24') or 'disabled'.",
	}),
	autoPaste: z.boolean().default(true),
	copyToClipboard: z.boolean().default(true),
	showNotification: z.boolean().default(false),
	typingDelayMs: z.number().int().min(0).default(0),
	injectTimeoutMs: z.number().int().positive().max(10000).default(10000),
	clipboardTimeoutMs: z.number().int().positive().max(5000).default(5000),
});

export const UiSchema = z.object({
	theme: z.enum(["dark", "light"]).default("dark"),
	position: z
		.enum(["top-center", "top-left", "top-right"])
		.default("top-center"),
	animationDurationMs: z.number().int().min(0).default(200),
});

export const PathsSchema = z.object({
	logs: z.string().default("~/.config/hotmic/logs/"),
});

export const ConfigSchema = z.object({
	api: ApiSchema.default({}),
	language: LanguageSchema.default({}),
	audio: AudioSchema.default({}),
	behavior: BehaviorSchema.default({}),
	ui: UiSchema.default({}),
	paths: PathsSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AudioConfig = z.infer<typeof AudioSchema>;

/**
 * The raw config file structure before defaults are applied.
 */
export type ConfigFile = z.input<typeof ConfigSchema>;
