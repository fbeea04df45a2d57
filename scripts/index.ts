#!/usr/bin/env node
import * as p from "@clack/prompts";
import { askSource } from "./shared/cli.js";

const VERSION = "0.1.0";

const USAGE = "Usage: reflinks [format|check] <file-or-directory> [--config <file>]";

const parseArgs = (
	argv: string[],
): {
	command?: string;
	source?: string;
	configPath?: string;
	help: boolean;
} => {
	let configPath: string | undefined;
	let help = false;
	const positional: string[] = [];
	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i]!;
		if (arg === "--config" || arg === "-c") {
			configPath = argv[++i];
		} else if (arg === "--help" || arg === "-h") {
			help = true;
		} else if (!arg.startsWith("-")) {
			positional.push(arg);
		}
	}
	// `reflinks <path>` is shorthand for `reflinks format <path>`
	const [first, second] = positional;
	if (first === "format" || first === "check") {
		return { command: first, source: second, configPath, help };
	}
	return { command: "format", source: first, configPath, help };
};

const main = async (): Promise<void> => {
	const { command, source, configPath, help } = parseArgs(process.argv);

	p.intro(`reflinks v${VERSION}`);

	if (help) {
		p.log.info(USAGE);
		p.outro("Done!");
		return;
	}

	const target = source ?? (await askSource());
	const { runFormat } = await import("./format/index.js");
	const ok = await runFormat(target, { check: command === "check", configPath });

	if (!ok) process.exitCode = 1;
	p.outro("Done!");
};

main().catch((err) => {
	p.log.error(err instanceof Error ? err.message : String(err));
	process.exit(1);
});
