#!/usr/bin/env tsx
/**
 * seqmetrics CLI entry point.
 */

import { ConfigError, MetricError } from "../core/errors.ts";
import { RegistryNotFoundError } from "../core/registry/index.ts";
import { parseArgs } from "./args.ts";
import { HELP_TEXT, curveCommand, evalCommand, listCommand } from "./commands.ts";

async function main(): Promise<void> {
	const parsed = parseArgs(process.argv);

	switch (parsed.command) {
		case "help":
		case "--help":
		case "-h":
			console.log(HELP_TEXT);
			break;

		case "list":
			console.log(listCommand());
			break;

		case "eval":
			console.log(await evalCommand(parsed.options));
			break;

		case "curve":
			console.log(await curveCommand(parsed.options));
			break;

		default:
			console.error(`\n❌ Unknown command: ${parsed.command}\n`);
			console.log(HELP_TEXT);
			process.exit(1);
	}
}

main().catch((error: unknown) => {
	if (error instanceof MetricError || error instanceof ConfigError || error instanceof RegistryNotFoundError) {
		console.error(`\n❌ ${error.name}: ${error.message}\n`);
	} else {
		console.error("❌ Error:", error);
	}
	process.exit(1);
});
