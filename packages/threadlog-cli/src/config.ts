/**
 * Configuration for threadlog.
 *
 * Session logs live in ~/.claude/projects (override with THREADLOG_PROJECTS_DIR).
 * User preferences live in ~/.threadlog/settings.json (override the directory with
 * THREADLOG_CONFIG_DIR). Command flags override settings, settings override defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { ENTRY_KINDS, type MechanicalKind } from "threadlog";
import { z } from "zod";
import { DEFAULT_TURNS } from "./range.js";

export const PROJECTS_DIR_ENV = "THREADLOG_PROJECTS_DIR";
export const CONFIG_DIR_ENV = "THREADLOG_CONFIG_DIR";
export const DEFAULT_TRUNCATE = 500;

function expandHome(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return homedir() + path.slice(1);
	return path;
}

export function getProjectsDir(env: NodeJS.ProcessEnv = process.env): string {
	const envDir = env[PROJECTS_DIR_ENV];
	if (envDir) return expandHome(envDir);
	return join(homedir(), ".claude", "projects");
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	const envDir = env[CONFIG_DIR_ENV];
	if (envDir) return expandHome(envDir);
	return join(homedir(), ".threadlog");
}

const mechanicalKindSchema = z.enum([...ENTRY_KINDS, "tool_invocation"]);

const settingsSchema = z.object({
	defaultTurns: z.number().int().positive().optional(),
	truncate: z.number().int().optional(),
	stitch: z.boolean().optional(),
	suppressBoundaryBreaks: z.boolean().optional(),
	mechanicalKinds: z.array(mechanicalKindSchema).optional(),
});

export type SettingsData = z.infer<typeof settingsSchema>;

export class SettingsManager {
	private data: SettingsData = {};
	private problems: string[] = [];

	private constructor(private settingsPath: string) {
		this.reload();
	}

	static create(configDir: string): SettingsManager {
		return new SettingsManager(join(configDir, "settings.json"));
	}

	static inMemory(data: SettingsData = {}): SettingsManager {
		const manager = new SettingsManager("");
		manager.data = data;
		return manager;
	}

	private reload(): void {
		this.problems = [];
		if (!this.settingsPath || !existsSync(this.settingsPath)) {
			this.data = {};
			return;
		}
		let json: unknown;
		try {
			json = JSON.parse(readFileSync(this.settingsPath, "utf-8"));
		} catch (error) {
			this.data = {};
			this.problems.push(`Ignoring ${this.settingsPath}: ${error instanceof Error ? error.message : String(error)}`);
			return;
		}
		const parsed = settingsSchema.safeParse(json);
		if (parsed.success) {
			this.data = parsed.data;
		} else {
			this.data = {};
			const issue = parsed.error.issues[0];
			this.problems.push(`Ignoring ${this.settingsPath}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim());
		}
	}

	/** Problems found while loading, for the caller to report. */
	getProblems(): readonly string[] {
		return this.problems;
	}

	getDefaultTurns(): number {
		return this.data.defaultTurns ?? DEFAULT_TURNS;
	}

	getTruncate(): number {
		return this.data.truncate ?? DEFAULT_TRUNCATE;
	}

	getStitch(): boolean {
		return this.data.stitch ?? true;
	}

	getSuppressBoundaryBreaks(): boolean {
		return this.data.suppressBoundaryBreaks ?? false;
	}

	getMechanicalKinds(): ReadonlySet<MechanicalKind> | undefined {
		return this.data.mechanicalKinds ? new Set<MechanicalKind>(this.data.mechanicalKinds) : undefined;
	}
}
