import chalk from "chalk";
import { resolveSessions } from "threadlog";
import { buildTurnViews } from "../extract.js";
import { SessionIndex } from "../session-index.js";
import { formatDateTime, plural, truncate } from "../utils/text.js";
import { type CommandContext, projectDirOf, sessionOptionsOf } from "./context.js";

export const DEFAULT_LIST_COUNT = 10;
const SUMMARY_LENGTH = 76;

export function runList(ctx: CommandContext): void {
	const dir = projectDirOf(ctx);
	const count = ctx.args.count ?? ctx.args.n ?? DEFAULT_LIST_COUNT;
	const sessions = new SessionIndex(dir).listSessions(count);
	if (sessions.length === 0) {
		ctx.output.log(`No sessions in ${dir}`);
		return;
	}

	// Each file on its own: list rows describe files, not compaction chains.
	const results = resolveSessions(
		sessions.map((s) => [s.path]),
		sessionOptionsOf(ctx),
	);

	ctx.output.log(chalk.bold(`Sessions in ${dir}:`));
	sessions.forEach((meta, i) => {
		const result = results[i];
		let info: string;
		if (result?.ok) {
			const turns = buildTurnViews(result.session.turns).length;
			const branchPoints = result.session.branches.size;
			info = plural(turns, "turn");
			if (branchPoints > 0) info += `, ${branchPoints} branch pt${branchPoints === 1 ? "" : "s"}`;
			if (result.session.path.junctions.length > 0) info += ", compacted";
		} else {
			info = `${meta.messageCount} msgs, unreadable`;
			if (ctx.args.verbose && result) {
				ctx.output.warn(chalk.dim(`${meta.sessionId}: ${result.error instanceof Error ? result.error.message : String(result.error)}`));
			}
		}
		const summary = truncate(meta.summary.replace(/\s+/g, " ").trim(), SUMMARY_LENGTH);
		ctx.output.log(
			`${String(i + 1).padStart(3)}. ${chalk.cyan(meta.sessionId.slice(0, 8))}  ${chalk.dim(formatDateTime(meta.modified))}  ${chalk.gray(`(${info})`)}  ${summary}`,
		);
	});
}
