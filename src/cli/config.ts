import { existsSync } from "node:fs";
import { Command } from "commander";
import * as colors from "yoctocolors";
import { DEFAULT_CONFIG_FILE, loadConfig } from "../config/loader";
import { type Config, ConfigSchema } from "../config/schema";
import { saveConfig } from "../config/writer";
import { errorMessage } from "../utils/errors";

export const maskKey = (key: string): string =>
	key ? `****${key.slice(-4)}` : "(not set)";

/** The loaded config with the API key masked, for printing. */
export const maskedConfig = (config: Config): Config => ({
	...config,
	api: { ...config.api, key: maskKey(config.api.key) },
});

export const configCommand = new Command("config").description(
	"Manage the configuration file",
);

configCommand
	.command("init")
	.description("Write a configuration file with every default filled in")
	.option("-f, --force", "Overwrite an existing file")
	.action((options: { force?: boolean }) => {
		if (existsSync(DEFAULT_CONFIG_FILE) && !options.force) {
			console.log(
				colors.yellow(
					`Configuration already exists at ${DEFAULT_CONFIG_FILE}. Use --force to overwrite it.`,
				),
			);
			return;
		}

		try {
			saveConfig(ConfigSchema.parse({}), DEFAULT_CONFIG_FILE);
			console.log(
				`${colors.green("✅")} Configuration initialized at ${DEFAULT_CONFIG_FILE}`,
			);

			console.log(colors.bold("\nNext Steps:"));
			console.log("  1. Set your Groq API key in 'api.key' (or export GROQ_API_KEY).");
			console.log("  2. Select your microphone device:");
			console.log(`     ${colors.cyan("hotmic list-mics")}`);
			console.log("  3. Start the daemon:");
			console.log(`     ${colors.cyan("hotmic start")}`);
		} catch (error) {
			console.error(
				colors.red("Failed to initialize config:"),
				errorMessage(error),
			);
		}
	});

configCommand
	.command("show")
	.description("Print the effective configuration")
	.action(() => {
		try {
			const config = loadConfig(DEFAULT_CONFIG_FILE, true);
			console.log(colors.bold("\nCurrent Configuration:"));
			console.log(colors.dim("------------------------"));
			console.log(JSON.stringify(maskedConfig(config), null, 2));
			console.log(colors.dim("------------------------"));
		} catch (error) {
			console.error(colors.red("Failed to load config:"), errorMessage(error));
		}
	});

configCommand
	.command("path")
	.description("Print the configuration file location")
	.action(() => {
		console.log(DEFAULT_CONFIG_FILE);
	});
