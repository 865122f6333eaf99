/**
 * Main entry point for the threadlog CLI.
 *
 * Handles argument parsing, settings, project lookup and command dispatch.
 */

import chalk from "chalk";
import { type Command, parseArgs, printHelp } from "./cli/args.js";
import { type CommandContext, consoleOutput, type Output } from "./commands/context.js";
import { runCopy } from "./commands/copy.js";
import { runExport } from "./commands/export.js";
import { runList } from "./commands/list.js";
import { runProjects } from "./commands/projects.js";
import { runSearch } from "./commands/search.js";
import { runTree } from "./commands/tree.js";
import { runView } from "./commands/view.js";
import { getConfigDir, getProjectsDir, SettingsManager } from "./config.js";
import { CliError, formatError } from "./errors.js";
import { type ClipboardWriter, copyToClipboard } from "./utils/clipboard.js";

export const VERSION = "0.1.0";

const handlers: Record<Command, (ctx: CommandContext) => void> = {
	list: runList,
	view: runView,
	copy: runCopy,
	search: runSearch,
	tree: runTree,
	export: runExport,
	projects: runProjects,
};

export interface MainOptions {
	env?: NodeJS.ProcessEnv;
	cwd?: string;
	output?: Output;
	clipboard?: ClipboardWriter;
	/** Overrides the settings file under the config directory. */
	settings?: SettingsManager;
}

/** Run one command; returns the process exit code. */
export function main(argv: string[], options: MainOptions = {}): number {
	const env = options.env ?? process.env;
	const output = options.output ?? consoleOutput;
	const args = parseArgs(argv);

	if (args.version) {
		output.log(VERSION);
		return 0;
	}
	if (args.help || !args.command) {
		printHelp();
		return 0;
	}

	const settings = options.settings ?? SettingsManager.create(getConfigDir(env));
	for (const problem of settings.getProblems()) {
		output.warn(chalk.yellow(`Warning: ${problem}`));
	}
	if (args.extra.length > 0) {
		output.warn(chalk.yellow(`Warning: Ignoring extra arguments: ${args.extra.join(" ")}`));
	}

	const ctx: CommandContext = {
		args,
		settings,
		projectsDir: getProjectsDir(env),
		cwd: options.cwd ?? process.cwd(),
		output,
		clipboard: options.clipboard ?? copyToClipboard,
	};

	try {
		handlers[args.command](ctx);
		return 0;
	} catch (error) {
		output.warn(formatError(error));
		if (args.verbose && !(error instanceof CliError) && error instanceof Error && error.stack) {
			output.warn(chalk.dim(error.stack));
		}
		return 1;
	}
}
