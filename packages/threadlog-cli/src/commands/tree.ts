import chalk from "chalk";
import type { Branch, Entry, ResolvedSession, SessionFamily, Turn } from "threadlog";
import { entryText, toolCallsOf } from "../extract.js";
import { firstLine, plural, truncate } from "../utils/text.js";
import { type CommandContext, loadSession, projectDirOf } from "./context.js";

const PREVIEW_LENGTH = 60;

function previewOf(entry: Entry | undefined): string {
	if (!entry) return chalk.dim("(missing)");
	const text = firstLine(entryText(entry));
	if (text) return truncate(text, PREVIEW_LENGTH);
	return truncate(toolCallsOf(entry)[0]?.oneLine() ?? `[${entry.kind}]`, PREVIEW_LENGTH);
}

/** Label line plus one numbered preview per alternative; the star marks the active one. */
function branchLines(branch: Branch, family: SessionFamily): string[] {
	const lines = [`     ${chalk.magenta(`└ ${branch.label}`)} ${chalk.dim(`at ${branch.parentId}`)}`];
	branch.alternatives.forEach((alt, i) => {
		const marker = `[${i + 1}]${alt.onActivePath ? "*" : ""}`;
		lines.push(`         ${alt.onActivePath ? chalk.green(marker) : chalk.dim(marker)} ${previewOf(family.getEntry(alt.id))}`);
	});
	return lines;
}

function turnLines(turn: Turn, session: ResolvedSession, family: SessionFamily): string[] {
	const lines: string[] = [];
	const prefix = chalk.dim(`${String(turn.index).padStart(3)}.`);

	if (turn.boundaryCrossed) {
		lines.push(chalk.gray(`     --- compaction boundary${turn.stitchedPositionally ? " (stitched by position)" : ""} ---`));
	}

	if (turn.marker) {
		lines.push(`${prefix} ${chalk.gray("[compaction]")} ${truncate(firstLine(entryText(turn.marker)), PREVIEW_LENGTH)}`);
	} else if (turn.implicit) {
		lines.push(`${prefix} ${chalk.gray(`[${turn.opener.kind}]`)} ${truncate(firstLine(entryText(turn.opener)), PREVIEW_LENGTH)}`);
	} else {
		lines.push(`${prefix} ${chalk.cyan("USER")} ${truncate(firstLine(entryText(turn.opener)), PREVIEW_LENGTH)}`);
	}

	const assistant = turn.entries
		.filter((e) => e.kind === "assistant")
		.map((e) => firstLine(entryText(e)))
		.find((text) => text.length > 0);
	const tools = turn.entries.flatMap(toolCallsOf).length;
	if (assistant || tools > 0) {
		const toolNote = tools > 0 ? chalk.yellow(` (${plural(tools, "tool call")})`) : "";
		lines.push(`     ${chalk.green("ASSISTANT")} ${truncate(assistant ?? "", PREVIEW_LENGTH)}${toolNote}`);
	}

	for (const entry of turn.entries) {
		const branch = session.branches.get(entry.id);
		if (branch) lines.push(...branchLines(branch, family));
	}
	return lines;
}

export function runTree(ctx: CommandContext): void {
	const { output } = ctx;
	const { session, family, branch } = loadSession(ctx, projectDirOf(ctx));
	output.log(chalk.bold(`Session: ${session.id}`));
	if (session.path.entries.length === 0) {
		output.log("No messages");
		return;
	}

	const stats = [
		plural(session.turns.length, "turn"),
		plural(session.activePathLength, "entry", "entries"),
		plural(session.branches.size, "branch point"),
	];
	if (session.files.length > 1) stats.push(plural(session.files.length, "file"));
	output.log(chalk.dim(stats.join(", ")));
	if (branch) {
		output.log(chalk.yellow(`Branch ${branch.number} at ${branch.point.parentId} (${branch.point.label})`));
	}
	output.log("");

	for (const turn of session.turns) {
		for (const line of turnLines(turn, session, family)) {
			output.log(line);
		}
	}

	const onPath = new Set(session.path.entries.map((e) => e.id));
	const offPath = [...session.branches.values()].filter((b) => !onPath.has(b.parentId));
	if (offPath.length > 0) {
		output.log("");
		output.log(chalk.bold("Off the active path:"));
		for (const point of offPath) {
			for (const line of branchLines(point, family)) {
				output.log(line);
			}
		}
	}
}
