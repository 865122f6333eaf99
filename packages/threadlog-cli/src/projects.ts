/**
 * Project resolution: map a working directory to its session log directory.
 *
 * Each project has a directory under the projects root named after its path with
 * separators replaced by "-" ("/home/user/app" -> "-home-user-app").
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { CliError } from "./errors.js";

export interface ProjectInfo {
	name: string;
	path: string;
	sessionCount: number;
	/** mtime of the newest session file, epoch ms. */
	modified: number;
}

/** Session logs are *.jsonl files; sub-agent logs (agent-*.jsonl) are not sessions. */
export function isSessionFileName(name: string): boolean {
	return name.endsWith(".jsonl") && !name.startsWith("agent-");
}

export function projectKey(path: string): string {
	return path.replace(/[\\/.]/g, "-");
}

function projectDirNames(projectsDir: string): string[] {
	if (!existsSync(projectsDir)) return [];
	return readdirSync(projectsDir, { withFileTypes: true })
		.filter((d) => d.isDirectory())
		.map((d) => d.name);
}

/** Exact key match first, then a case-insensitive one. */
export function findProjectDir(projectsDir: string, cwd: string): string | undefined {
	const names = projectDirNames(projectsDir);
	const key = projectKey(cwd);
	const exact = names.find((name) => name === key);
	if (exact) return join(projectsDir, exact);
	const lower = key.toLowerCase();
	const folded = names.find((name) => name.toLowerCase() === lower);
	return folded ? join(projectsDir, folded) : undefined;
}

/**
 * Resolve the project to read from. An override may be a directory name under the
 * projects root, a filesystem path, or a fragment of a directory name.
 */
export function resolveProjectDir(projectsDir: string, override: string | undefined, cwd: string): string {
	if (override === undefined) {
		const found = findProjectDir(projectsDir, cwd);
		if (!found) {
			throw new CliError(`No sessions found for ${cwd}. Use --project <name> or run "threadlog projects".`);
		}
		return found;
	}

	const names = projectDirNames(projectsDir);
	if (names.includes(override)) return join(projectsDir, override);

	if (existsSync(override)) {
		const byPath = findProjectDir(projectsDir, resolve(override));
		if (byPath) return byPath;
	}

	const fragment = override.toLowerCase();
	const partial = names.filter((name) => name.toLowerCase().includes(fragment));
	if (partial.length === 1) return join(projectsDir, partial[0]);
	if (partial.length > 1) {
		throw new CliError(`Project "${override}" is ambiguous: ${partial.join(", ")}`);
	}
	throw new CliError(`No project matching "${override}" in ${projectsDir}`);
}

/** Projects with at least one session, newest activity first. */
export function listProjects(projectsDir: string): ProjectInfo[] {
	const projects: ProjectInfo[] = [];
	for (const name of projectDirNames(projectsDir)) {
		const path = join(projectsDir, name);
		const sessions = readdirSync(path).filter(isSessionFileName);
		if (sessions.length === 0) continue;
		const modified = Math.max(...sessions.map((file) => statSync(join(path, file)).mtimeMs));
		projects.push({ name, path, sessionCount: sessions.length, modified });
	}
	return projects.sort((a, b) => b.modified - a.modified);
}
