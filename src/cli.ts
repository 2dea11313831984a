#!/usr/bin/env node

import { Command } from "commander";
import { collectCandidates, formatSelection } from "./candidates.js";
import { resolveConfig, type CliOptions } from "./config.js";
import { runSession } from "./session.js";

const program = new Command();

program
	.name("winnow")
	.description("Pick a file or code symbol by fuzzy search, narrowing in successive passes")
	.version("0.1.0");

program
	.argument("[directory]", "Directory to pick from", ".")
	.option("-m, --mode <mode>", "Candidates to pick: files or symbols", "files")
	.option("--patterns <patterns>", "Comma-separated glob patterns to include")
	.option("--ignore <patterns>", "Comma-separated glob patterns to exclude")
	.option("--no-preview", "Hide the preview pane")
	.option("--cache-size <number>", "Number of files kept in the preview cache")
	.option("--print-action", "Prefix the selection with the chosen action")
	.action(async (directory: string, options: CliOptions) => {
		try {
			const config = resolveConfig(directory, options);

			// Progress goes to stderr so stdout only carries the selection
			console.error(`🔍 Collecting ${config.mode} in ${config.directory}...`);
			const candidates = await collectCandidates(config.directory, config.mode, {
				patterns: config.patterns,
				ignore: config.ignore,
			});
			console.error(`📚 Found ${candidates.length} candidates`);

			if (candidates.length === 0) {
				console.error("🤷 Nothing to pick");
				return;
			}

			const selection = await runSession(candidates, config);
			if (selection) {
				console.log(formatSelection(selection.candidate, selection.action, config.printAction));
			}
			process.exit(0);
		} catch (error) {
			console.error("❌ Error:", error);
			process.exit(1);
		}
	});

await program.parseAsync();
