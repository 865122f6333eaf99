/**
 * Shared command plumbing: where output goes, which project and session a
 * command reads, and how reconstruction warnings are reported.
 */

import chalk from "chalk";
import { type Branch, type ResolvedSession, SessionFamily, type SessionOptions, type SessionWarning } from "threadlog";
import type { Args } from "../cli/args.js";
import type { SettingsManager } from "../config.js";
import { CliError } from "../errors.js";
import { resolveProjectDir } from "../projects.js";
import type { Selection } from "../range.js";
import { discoverFamily, resolveSessionFile, type SessionFileInfo } from "../session-index.js";
import type { ClipboardWriter } from "../utils/clipboard.js";
import { plural } from "../utils/text.js";

export interface Output {
	/** Command results (stdout). */
	log(text: string): void;
	/** Warnings, diagnostics and errors (stderr). */
	warn(text: string): void;
}

export const consoleOutput: Output = {
	log: (text) => console.log(text),
	warn: (text) => console.error(text),
};

export interface CommandContext {
	args: Args;
	settings: SettingsManager;
	projectsDir: string;
	cwd: string;
	output: Output;
	clipboard: ClipboardWriter;
}

export interface LoadedSession {
	file: SessionFileInfo;
	session: ResolvedSession;
	family: SessionFamily;
	/** Set when --branch picked an alternative. */
	branch?: { number: number; point: Branch };
}

export function projectDirOf(ctx: CommandContext): string {
	return resolveProjectDir(ctx.projectsDir, ctx.args.project, ctx.cwd);
}

export function selectionOf(args: Args): Selection {
	return { n: args.n, range: args.range, all: args.all };
}

export function sessionOptionsOf(ctx: CommandContext): SessionOptions {
	return {
		stitch: !ctx.args.noStitch && ctx.settings.getStitch(),
		suppressBoundaryBreaks: ctx.args.continuous || ctx.settings.getSuppressBoundaryBreaks(),
		mechanicalKinds: ctx.settings.getMechanicalKinds(),
	};
}

/** Branch points the active path passes through, oldest first. */
export function branchPointsOnPath(session: ResolvedSession): Branch[] {
	return session.path.entries.flatMap((entry) => {
		const branch = session.branches.get(entry.id);
		return branch ? [branch] : [];
	});
}

export function reportWarnings(ctx: CommandContext, warnings: readonly SessionWarning[]): void {
	if (warnings.length === 0) return;
	if (!ctx.args.verbose) {
		ctx.output.warn(chalk.yellow(`${plural(warnings.length, "warning")} while reading the session (use --verbose to list)`));
		return;
	}
	for (const warning of warnings) {
		const where = warning.type === "parse" ? `${warning.file}:${warning.line}` : warning.file;
		ctx.output.warn(chalk.dim(`[${warning.type}] ${where}: ${warning.message}`));
	}
}

/** Resolve the session a command targets, following --session, --no-stitch and --branch. */
export function loadSession(ctx: CommandContext, dir: string): LoadedSession {
	const file = resolveSessionFile(dir, ctx.args.session);
	const options = sessionOptionsOf(ctx);
	const paths = options.stitch ? discoverFamily(dir, file.path) : [file.path];
	if (ctx.args.verbose) {
		ctx.output.warn(chalk.dim(`Reading ${plural(paths.length, "file")}: ${paths.join(", ")}`));
	}

	const family = SessionFamily.open(paths, options);
	let session = family.resolve(options);
	let branch: LoadedSession["branch"];

	const n = ctx.args.branch ?? 0;
	if (n > 0) {
		const point = branchPointsOnPath(session).at(-1);
		if (!point) {
			throw new CliError(`Session ${session.id} has no branch points on its active path`);
		}
		const tip = family.alternativeTip(point.parentId, n, { mechanicalKinds: options.mechanicalKinds });
		if (!tip) {
			throw new CliError(
				`Branch point ${point.parentId} has ${plural(point.alternatives.length, "alternative")}, not ${n}`,
			);
		}
		session = family.resolve({ ...options, tip });
		branch = { number: n, point };
	}

	reportWarnings(ctx, session.warnings);
	return { file, session, family, branch };
}
