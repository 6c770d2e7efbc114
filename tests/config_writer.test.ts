import {
	existsSync,
	mkdtempSync,
	readFileSync,
	rmSync,
	statSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadConfig } from "../src/config/loader";
import type { ConfigFile } from "../src/config/schema";
import { saveConfig } from "../src/config/writer";

describe("Config Writer", () => {
	let dir: string;
	let configFile: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "hotmic-writer-"));
		configFile = join(dir, "nested", "config.json");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("should write the config with defaults filled in", () => {
		const config: ConfigFile = { behavior: { hotkey: "Ctrl+Space" } };

		saveConfig(config, configFile);

		const content = JSON.parse(readFileSync(configFile, "utf-8"));
		expect(content.behavior.hotkey).toBe("Ctrl+Space");
		expect(content.behavior.autoPaste).toBe(true);
		expect(content.audio.sampleRate).toBe(16000);
	});

	test("should create the directory with owner-only permissions", () => {
		saveConfig({}, configFile);

		expect(existsSync(configFile)).toBe(true);
		expect(statSync(join(dir, "nested")).mode & 0o777).toBe(0o700);
		expect(statSync(configFile).mode & 0o777).toBe(0o600);
	});

	test("should refuse an invalid config and write nothing", () => {
		expect(() =>
			saveConfig({ language: { primary: "english" } }, configFile),
		).toThrow(expect.objectContaining({ code: "VALIDATION_FAILED" }));
		expect(existsSync(configFile)).toBe(false);
	});

	test("what is saved loads back unchanged", () => {
		saveConfig(
			{ api: { key: "test-secret" }, language: { autoDetect: false, primary: "uk" } },
			configFile,
		);

		const config = loadConfig(configFile);
		expect(config.api.key).toBe("test-secret");
		expect(config.language).toEqual({ autoDetect: false, primary: "uk" });
	});
});
