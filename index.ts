#!/usr/bin/env tsx
import { program } from "./src/cli/index";

program.parseAsync(process.argv).catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
