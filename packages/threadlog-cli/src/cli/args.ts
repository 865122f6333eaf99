/**
 * CLI argument parsing for threadlog.
 */

import chalk from "chalk";
import { isRangeSpec } from "../range.js";

export type Command = "list" | "view" | "copy" | "search" | "tree" | "export" | "projects";

const COMMANDS: Record<string, Command> = {
	list: "list",
	ls: "list",
	view: "view",
	v: "view",
	copy: "copy",
	cp: "copy",
	search: "search",
	s: "search",
	tree: "tree",
	export: "export",
	projects: "projects",
};

export interface Args {
	command?: Command;
	/** Session reference: index, id or id prefix. */
	session?: string;
	pattern?: string;
	project?: string;
	n?: number;
	range?: string;
	all?: boolean;
	tools?: boolean;
	raw?: boolean;
	json?: boolean;
	timestamps?: boolean;
	noStitch?: boolean;
	continuous?: boolean;
	compactSummaries?: boolean;
	truncate?: number;
	branch?: number;
	count?: number;
	limit?: number;
	verbose?: boolean;
	help?: boolean;
	version?: boolean;
	/** Positionals the command does not take. */
	extra: string[];
}

function parseInteger(flag: string, value: string): number | undefined {
	if (/^-?\d+$/.test(value)) return Number.parseInt(value, 10);
	console.error(chalk.yellow(`Warning: ${flag} expects a number, got "${value}"`));
	return undefined;
}

function takesSession(command: Command | undefined): boolean {
	return command === "view" || command === "copy" || command === "tree" || command === "export";
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		extra: [],
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-V") {
			result.version = true;
		} else if (arg === "--verbose") {
			result.verbose = true;
		} else if ((arg === "--project" || arg === "-p") && i + 1 < args.length) {
			result.project = args[++i];
		} else if (arg === "-n" && i + 1 < args.length) {
			result.n = parseInteger(arg, args[++i]);
		} else if ((arg === "-r" || arg === "--range") && i + 1 < args.length && isRangeSpec(args[i + 1])) {
			result.range = args[++i];
		} else if (arg.startsWith("-r=") || arg.startsWith("--range=")) {
			result.range = arg.slice(arg.indexOf("=") + 1);
		} else if (arg === "-r" || arg === "--range") {
			console.error(chalk.yellow(`Warning: ${arg} expects a range such as 3, -1, 2-5 or -3--1`));
		} else if (arg === "--all" || arg === "-a") {
			result.all = true;
		} else if (arg === "--tools" || arg === "--include-tools") {
			result.tools = true;
		} else if (arg === "--raw") {
			result.raw = true;
		} else if (arg === "--json") {
			result.json = true;
		} else if (arg === "--timestamps" || arg === "-t") {
			result.timestamps = true;
		} else if (arg === "--no-stitch") {
			result.noStitch = true;
		} else if (arg === "--continuous") {
			result.continuous = true;
		} else if (arg === "--compact-summaries") {
			result.compactSummaries = true;
		} else if (arg === "--truncate" && i + 1 < args.length) {
			result.truncate = parseInteger(arg, args[++i]);
		} else if ((arg === "--branch" || arg === "-b") && i + 1 < args.length) {
			result.branch = parseInteger(arg, args[++i]);
		} else if (arg === "--count" && i + 1 < args.length) {
			result.count = parseInteger(arg, args[++i]);
		} else if (arg === "--limit" && i + 1 < args.length) {
			result.limit = parseInteger(arg, args[++i]);
		} else if (!arg.startsWith("-")) {
			if (result.command === undefined && Object.hasOwn(COMMANDS, arg)) {
				result.command = COMMANDS[arg];
			} else if (result.command === "search" && result.pattern === undefined) {
				result.pattern = arg;
			} else if (takesSession(result.command) && result.session === undefined) {
				result.session = arg;
			} else {
				result.extra.push(arg);
			}
		} else {
			console.error(chalk.yellow(`Warning: Unknown option "${arg}"`));
		}
	}

	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold("threadlog")} - read coding-assistant session logs as conversations

${chalk.bold("Usage:")}
  threadlog <command> [session] [options]

${chalk.bold("Commands:")}
  list, ls               List sessions of the current project
  view, v [session]      Show conversation turns (latest session by default)
  copy, cp [session]     Copy turns to the clipboard (last turn by default)
  search, s <pattern>    Search user and assistant messages in the project
  tree [session]         Show the active path with its branch points
  export [session]       Export a session as Markdown or JSON
  projects               List all projects with sessions

  A session is a 1-based index from "list", a session id or an id prefix.

${chalk.bold("Options:")}
  --project, -p <name>   Project directory name, fragment or path (default: cwd)
  -n <count>             Show the last <count> turns (list: number of sessions)
  -r <range>             Turns to show: 3, -1, 2-5, -3--1
  --all, -a              Show all turns
  --tools                Include tool calls
  --raw                  Show every message instead of turns
  --json                 JSON output
  --timestamps, -t       Show timestamps
  --no-stitch            Do not follow compaction into older log files
  --continuous           Do not break turns at compaction boundaries
  --compact-summaries    Show compaction summaries as turns
  --truncate <n>         Cut tool output in --raw mode (default 500, -1 for none)
  --branch, -b <n>       Follow alternative <n> at the latest branch point
  --count <n>            Sessions to list (default 10)
  --limit <n>            Search results to show (default 20)
  --verbose              Print warnings found while reading logs
  --help, -h             Show this help
  --version, -V          Show version number

${chalk.bold("Examples:")}
  threadlog ls
  threadlog v -r -3--1 --tools
  threadlog v 2 --all --json
  threadlog s "migration" --limit 5
  threadlog tree --branch 2
  threadlog export > session.md

${chalk.bold("Environment Variables:")}
  THREADLOG_PROJECTS_DIR  Session log root (default ~/.claude/projects)
  THREADLOG_CONFIG_DIR    Settings directory (default ~/.threadlog)
`);
}
