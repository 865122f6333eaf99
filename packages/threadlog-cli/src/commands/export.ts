import { CliError } from "../errors.js";
import { buildTurnViews, extractMessages } from "../extract.js";
import { formatMessagesJson, formatMessagesMarkdown, formatTurnsJson, formatTurnsMarkdown, type MarkdownHeader } from "../format.js";
import { computeIndices } from "../range.js";
import { type CommandContext, loadSession, projectDirOf, selectionOf } from "./context.js";

/** Export keeps tool output whole unless --truncate is given. */
const EXPORT_TRUNCATE = -1;

export function runExport(ctx: CommandContext): void {
	const { args, output } = ctx;
	const { session } = loadSession(ctx, projectDirOf(ctx));
	const header: MarkdownHeader = {
		sessionId: session.id,
		title: session.titles[0],
		files: session.files.length,
	};
	const selection = selectionOf(args);
	const everything = selection.n === undefined && selection.range === undefined ? { all: true } : selection;

	if (args.raw) {
		const messages = extractMessages(session.path.entries, args.truncate ?? EXPORT_TRUNCATE);
		const positions = computeIndices(messages.length, everything);
		if (messages.length > 0 && positions.length === 0) {
			throw new CliError(`No messages in range (session has ${messages.length})`);
		}
		output.log(
			args.json
				? formatMessagesJson(messages, session.id, positions)
				: formatMessagesMarkdown(
						positions.map((p) => messages[p - 1]),
						header,
					),
		);
		return;
	}

	const turns = buildTurnViews(session.turns, { tools: args.tools, compactSummaries: args.compactSummaries });
	const positions = computeIndices(turns.length, everything);
	if (turns.length > 0 && positions.length === 0) {
		throw new CliError(`No turns in range (session has ${turns.length})`);
	}
	output.log(
		args.json
			? formatTurnsJson(turns, session.id, positions)
			: formatTurnsMarkdown(
					positions.map((p) => turns[p - 1]),
					header,
				),
	);
}
