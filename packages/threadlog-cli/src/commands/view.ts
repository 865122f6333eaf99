import chalk from "chalk";
import { CliError } from "../errors.js";
import { buildTurnViews, extractMessages } from "../extract.js";
import { formatMessage, formatMessagesJson, formatTurns, formatTurnsJson } from "../format.js";
import { computeIndices } from "../range.js";
import { plural } from "../utils/text.js";
import { type CommandContext, loadSession, projectDirOf, selectionOf } from "./context.js";

export function runView(ctx: CommandContext): void {
	const { args, output, settings } = ctx;
	const { session, branch } = loadSession(ctx, projectDirOf(ctx));
	if (session.path.entries.length === 0) {
		output.log(`No messages in session ${session.id}.`);
		return;
	}

	if (args.raw) {
		const messages = extractMessages(session.path.entries, args.truncate ?? settings.getTruncate());
		if (messages.length === 0) {
			output.log(`No messages in session ${session.id}.`);
			return;
		}
		const positions = computeIndices(messages.length, selectionOf(args), settings.getDefaultTurns());
		if (positions.length === 0) {
			throw new CliError(`No messages in range (session has ${messages.length})`);
		}
		if (args.json) {
			output.log(formatMessagesJson(messages, session.id, positions));
			return;
		}
		output.log(chalk.bold(`Session ${session.id}: ${messages.length} raw messages`));
		output.log("");
		output.log(
			positions
				.map((p) => formatMessage(messages[p - 1], p, messages.length, { timestamps: args.timestamps }))
				.join("\n\n"),
		);
		return;
	}

	const turns = buildTurnViews(session.turns, { tools: args.tools, compactSummaries: args.compactSummaries });
	if (turns.length === 0) {
		output.log("No conversation turns.");
		return;
	}
	const positions = computeIndices(turns.length, selectionOf(args), settings.getDefaultTurns());
	if (positions.length === 0) {
		throw new CliError(`No turns in range (session has ${plural(turns.length, "turn")})`);
	}
	if (args.json) {
		output.log(formatTurnsJson(turns, session.id, positions));
		return;
	}

	let header = `Session ${session.id}: ${plural(turns.length, "turn")}`;
	if (session.files.length > 1) header += `, ${session.files.length} files`;
	if (positions.length < turns.length) header += `, showing ${positions.length}`;
	output.log(chalk.bold(header));
	if (branch) {
		output.log(chalk.yellow(`Branch ${branch.number} at ${branch.point.parentId} (${branch.point.label})`));
	}
	output.log("");
	output.log(formatTurns(turns, positions, { timestamps: args.timestamps, tools: args.tools }));
}
