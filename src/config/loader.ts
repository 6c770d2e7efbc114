import { existsSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ErrorTemplates, formatUserError } from "../utils/error-templates";
import { AppError } from "../utils/errors";
import { type Config, ConfigSchema } from "./schema";

export const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "hotmic");
export const DEFAULT_CONFIG_FILE = join(DEFAULT_CONFIG_DIR, "config.json");

/**
 * Resolves the path with ~ expansion.
 */
export const resolvePath = (path: string): string => {
	if (path.startsWith("~")) {
		return join(homedir(), path.slice(1));
	}
	return resolve(path);
};

let cachedConfig: Config | null = null;
let reloadInProgress = false;

/**
 * Result of a config load attempt.
 * Used by reloadConfig() to return success/failure without throwing.
 */
export interface ConfigLoadResult {
	success: boolean;
	config?: Config;
	error?: string;
}

export const tryLoadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
): ConfigLoadResult => {
	try {
		const config = loadConfig(configPath, true);
		return { success: true, config };
	} catch (error) {
		const message = error instanceof AppError ? error.message : String(error);
		return { success: false, error: message };
	}
};

/**
 * Reloads config from file with validation.
 * On failure the previously cached config stays in place.
 */
export const reloadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
): ConfigLoadResult => {
	if (reloadInProgress) {
		return { success: false, error: "Reload already in progress" };
	}

	reloadInProgress = true;
	try {
		return tryLoadConfig(configPath);
	} finally {
		reloadInProgress = false;
	}
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Loads and validates the configuration.
 * A missing file means defaults everywhere; the API key falls back to GROQ_API_KEY.
 * @throws {AppError} if config is corrupted or validation fails
 */
export const loadConfig = (
	configPath: string = DEFAULT_CONFIG_FILE,
	forceReload: boolean = false,
): Config => {
	if (cachedConfig && !forceReload && configPath === DEFAULT_CONFIG_FILE) {
		return cachedConfig;
	}

	let fileConfig: Record<string, unknown> = {};

	if (existsSync(configPath)) {
		const mode = statSync(configPath).mode & 0o777;
		if (mode !== 0o600) {
			console.warn(
				`WARNING: Config file permissions are ${mode.toString(8)}. ` +
					`It is recommended to set them to 600 (chmod 600 ${configPath}).`,
			);
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(configPath, "utf-8"));
		} catch (_error) {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED),
			);
		}
		if (!isRecord(parsed)) {
			throw new AppError(
				"CORRUPTED",
				formatUserError(ErrorTemplates.CONFIG.CORRUPTED),
			);
		}
		fileConfig = parsed;
	}

	// File config wins over the environment
	const fileApi = isRecord(fileConfig.api) ? fileConfig.api : {};
	const fileKey = typeof fileApi.key === "string" ? fileApi.key : "";
	const mergedConfig = {
		...fileConfig,
		api: {
			...fileApi,
			key: fileKey || process.env.GROQ_API_KEY || "",
		},
	};

	const result = ConfigSchema.safeParse(mergedConfig);

	if (!result.success) {
		const errorMessages = result.error.issues
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("\n");
		throw new AppError(
			"VALIDATION_FAILED",
			`Config validation failed:\n${errorMessages}`,
		);
	}

	const config = result.data;
	config.paths.logs = resolvePath(config.paths.logs);

	if (configPath === DEFAULT_CONFIG_FILE) {
		cachedConfig = config;
	}

	return config;
};
