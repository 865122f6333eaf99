import { readFileSync } from "node:fs";
import chalk from "chalk";
import { readEntries } from "threadlog";
import { CliError } from "../errors.js";
import { entryText } from "../extract.js";
import { listSessionFiles } from "../session-index.js";
import { formatDateTime, plural, stripAnsi } from "../utils/text.js";
import { type CommandContext, projectDirOf } from "./context.js";

export const DEFAULT_SEARCH_LIMIT = 20;
const SNIPPET_CONTEXT = 40;

export interface SearchMatch {
	sessionId: string;
	entryId: string;
	role: "user" | "assistant";
	timestamp: string;
	snippet: string;
}

/** Text around the first match, with the match highlighted. */
export function snippetAround(text: string, index: number, length: number): string {
	const start = Math.max(0, index - SNIPPET_CONTEXT);
	const end = Math.min(text.length, index + length + SNIPPET_CONTEXT);
	const before = text.slice(start, index).replace(/\s+/g, " ");
	const match = text.slice(index, index + length);
	const after = text.slice(index + length, end).replace(/\s+/g, " ");
	return `${start > 0 ? "..." : ""}${before}${chalk.bold.yellow(match)}${after}${end < text.length ? "..." : ""}`;
}

/** Case-insensitive literal search over user and assistant text, newest session first. */
export function searchSessions(dir: string, pattern: string, limit: number): SearchMatch[] {
	// Matched on the original text so the index and length stay valid for slicing.
	const needle = new RegExp(pattern.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "i");
	const matches: SearchMatch[] = [];
	for (const file of listSessionFiles(dir)) {
		for (const parsed of readEntries(readFileSync(file.path, "utf-8"), { path: file.path, index: 0 })) {
			if (parsed.type !== "entry") continue;
			const { entry } = parsed;
			if (entry.kind !== "user" && entry.kind !== "assistant") continue;
			const text = entryText(entry);
			const found = needle.exec(text);
			if (!found) continue;
			matches.push({
				sessionId: file.id,
				entryId: entry.id,
				role: entry.kind,
				timestamp: entry.timestamp,
				snippet: snippetAround(text, found.index, found[0].length),
			});
			if (matches.length >= limit) return matches;
		}
	}
	return matches;
}

export function runSearch(ctx: CommandContext): void {
	const { args, output } = ctx;
	if (!args.pattern) {
		throw new CliError('search needs a pattern: threadlog search "text"');
	}
	const dir = projectDirOf(ctx);
	if (listSessionFiles(dir).length === 0) {
		output.log(`No sessions in ${dir}`);
		return;
	}

	const matches = searchSessions(dir, args.pattern, args.limit ?? DEFAULT_SEARCH_LIMIT);
	if (matches.length === 0) {
		output.log(`No matches for "${args.pattern}".`);
		return;
	}
	if (args.json) {
		const plain = matches.map((match) => ({ ...match, snippet: stripAnsi(match.snippet) }));
		output.log(JSON.stringify({ pattern: args.pattern, matches: plain }, null, 2));
		return;
	}

	output.log(chalk.bold(`Found ${plural(matches.length, "match", "matches")} for "${args.pattern}":`));
	for (const match of matches) {
		output.log("");
		output.log(
			`${chalk.cyan(match.sessionId.slice(0, 8))} ${chalk.dim(formatDateTime(match.timestamp))} ${chalk.gray(`[${match.role}]`)}`,
		);
		output.log(`  ${match.snippet}`);
	}
}
