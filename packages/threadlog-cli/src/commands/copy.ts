import chalk from "chalk";
import { CliError } from "../errors.js";
import { buildTurnViews, extractMessages } from "../extract.js";
import { formatTurns } from "../format.js";
import { computeIndices, type Selection } from "../range.js";
import { plural, stripAnsi } from "../utils/text.js";
import { type CommandContext, loadSession, projectDirOf, selectionOf } from "./context.js";

/** Copy defaults to the last turn (or message) rather than the last few. */
function copySelection(ctx: CommandContext): Selection {
	const selection = selectionOf(ctx.args);
	if (selection.n === undefined && selection.range === undefined && !selection.all) {
		return { range: "-1" };
	}
	return selection;
}

export function runCopy(ctx: CommandContext): void {
	const { args } = ctx;
	const { session } = loadSession(ctx, projectDirOf(ctx));
	if (session.path.entries.length === 0) {
		throw new CliError(`No messages in session ${session.id}`);
	}

	let text: string;
	let copied: string;
	if (args.raw) {
		const messages = extractMessages(session.path.entries, args.truncate ?? ctx.settings.getTruncate());
		const positions = computeIndices(messages.length, copySelection(ctx));
		if (positions.length === 0) {
			throw new CliError(`No messages in range (session has ${messages.length})`);
		}
		text = positions
			.map((p) => {
				const message = messages[p - 1];
				return `${message.role.toUpperCase()}:\n${message.content}`;
			})
			.join("\n\n");
		copied = plural(positions.length, "message");
	} else {
		let turns = buildTurnViews(session.turns, { tools: args.tools, compactSummaries: args.compactSummaries });
		if (turns.length === 0 && !args.compactSummaries) {
			turns = buildTurnViews(session.turns, { tools: args.tools, compactSummaries: true });
		}
		if (turns.length === 0) {
			throw new CliError(`No conversation turns in session ${session.id}`);
		}
		const positions = computeIndices(turns.length, copySelection(ctx));
		if (positions.length === 0) {
			throw new CliError(`No turns in range (session has ${plural(turns.length, "turn")})`);
		}
		text = stripAnsi(formatTurns(turns, positions, { tools: args.tools }));
		copied = plural(positions.length, "turn");
	}

	if (!ctx.clipboard(text)) {
		throw new CliError("Could not copy to the clipboard (tried pbcopy, wl-copy, xclip, xsel and clip)");
	}
	ctx.output.log(chalk.green(`Copied ${copied} (${text.length} chars) to the clipboard`));
}
