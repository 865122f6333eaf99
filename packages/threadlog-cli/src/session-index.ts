/**
 * Session files of one project directory: listing, lookup by reference,
 * compaction family discovery and list metadata.
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { join } from "node:path";
import { type Entry, readEntries, sessionIdOf } from "threadlog";
import { z } from "zod";
import { CliError } from "./errors.js";
import { entryText } from "./extract.js";
import { isSessionFileName } from "./projects.js";

export const INDEX_FILE_NAME = "sessions-index.json";

export interface SessionFileInfo {
	id: string;
	path: string;
	/** epoch ms */
	mtime: number;
}

export interface SessionMeta {
	sessionId: string;
	path: string;
	summary: string;
	firstPrompt: string;
	messageCount: number;
	created: string;
	modified: string;
}

/** Session files in a project directory, newest first. */
export function listSessionFiles(dir: string): SessionFileInfo[] {
	if (!existsSync(dir)) return [];
	return readdirSync(dir)
		.filter(isSessionFileName)
		.map((name) => {
			const path = join(dir, name);
			return { id: sessionIdOf(name), path, mtime: statSync(path).mtimeMs };
		})
		.sort((a, b) => b.mtime - a.mtime || a.id.localeCompare(b.id));
}

/**
 * Pick a session: the newest when ref is absent, the n-th newest for a number,
 * otherwise the one whose id starts with ref.
 */
export function resolveSessionFile(dir: string, ref: string | undefined): SessionFileInfo {
	const sessions = listSessionFiles(dir);
	if (sessions.length === 0) {
		throw new CliError(`No sessions found in ${dir}`);
	}
	if (ref === undefined) return sessions[0];

	if (/^\d+$/.test(ref)) {
		const n = Number.parseInt(ref, 10);
		const picked = sessions[n - 1];
		if (!picked) {
			throw new CliError(`Session #${n} is out of range (1-${sessions.length})`);
		}
		return picked;
	}

	const exact = sessions.find((s) => s.id === ref);
	if (exact) return exact;
	const matches = sessions.filter((s) => s.id.startsWith(ref));
	if (matches.length === 1) return matches[0];
	if (matches.length > 1) {
		throw new CliError(`Session prefix "${ref}" is ambiguous: ${matches.map((s) => s.id).join(", ")}`);
	}
	throw new CliError(`No session matching "${ref}" in ${dir}`);
}

function firstEntry(path: string): Entry | undefined {
	for (const parsed of readEntries(readFileSync(path, "utf-8"), { path, index: 0 })) {
		if (parsed.type === "entry") return parsed.entry;
	}
	return undefined;
}

function containsEntry(path: string, id: string): boolean {
	const content = readFileSync(path, "utf-8");
	if (!content.includes(id)) return false;
	for (const parsed of readEntries(content, { path, index: 0 })) {
		if (parsed.type === "entry" && parsed.entry.id === id) return true;
	}
	return false;
}

function isCompactionMarker(entry: Entry): boolean {
	return entry.kind === "summary" || entry.record.subtype === "compact_boundary";
}

/**
 * Files of the compaction chain that ends in the given session file, oldest first.
 * Follows the first entry's link into older files of the same directory; when the
 * first entry marks a compaction without a resolvable link, the next older file is
 * taken as the predecessor.
 */
export function discoverFamily(dir: string, path: string): string[] {
	const older = listSessionFiles(dir);
	const family = [path];
	const visited = new Set([path]);

	let current = path;
	while (true) {
		const first = firstEntry(current);
		if (!first) break;
		const currentMtime = statSync(current).mtimeMs;
		const candidates = older.filter((s) => !visited.has(s.path) && s.mtime <= currentMtime);

		const link = first.logicalParentId ?? first.parentId ?? undefined;
		let predecessor = link ? candidates.find((s) => containsEntry(s.path, link))?.path : undefined;
		if (!predecessor && isCompactionMarker(first)) {
			predecessor = candidates[0]?.path;
		}
		if (!predecessor) break;

		family.unshift(predecessor);
		visited.add(predecessor);
		current = predecessor;
	}
	return family;
}

// ============================================================================
// Metadata
// ============================================================================

const indexEntrySchema = z
	.object({
		sessionId: z.string(),
		summary: z.string().optional(),
		firstPrompt: z.string().optional(),
		messageCount: z.number().optional(),
		created: z.string().optional(),
		modified: z.string().optional(),
	})
	.passthrough();

const indexFileSchema = z
	.object({
		version: z.number().optional(),
		entries: z.array(indexEntrySchema),
	})
	.passthrough();

type IndexEntry = z.infer<typeof indexEntrySchema>;

/**
 * List metadata for a project's sessions. Reads sessions-index.json when present
 * and scans the session file for anything the index lacks.
 */
export class SessionIndex {
	private cache: Map<string, IndexEntry> | undefined;

	constructor(private readonly dir: string) {}

	/** Parsed index, loaded once. A missing or unreadable index is empty. */
	getIndex(): Map<string, IndexEntry> {
		if (this.cache) return this.cache;
		const entries = new Map<string, IndexEntry>();
		const path = join(this.dir, INDEX_FILE_NAME);
		if (existsSync(path)) {
			try {
				const parsed = indexFileSchema.safeParse(JSON.parse(readFileSync(path, "utf-8")));
				if (parsed.success) {
					for (const entry of parsed.data.entries) {
						entries.set(entry.sessionId, entry);
					}
				}
			} catch {
				entries.clear();
			}
		}
		this.cache = entries;
		return entries;
	}

	getMetadata(sessionId: string, path: string): SessionMeta {
		const indexed = this.getIndex().get(sessionId);
		if (indexed?.summary !== undefined && indexed.firstPrompt !== undefined && indexed.messageCount !== undefined) {
			return {
				sessionId,
				path,
				summary: indexed.summary,
				firstPrompt: indexed.firstPrompt,
				messageCount: indexed.messageCount,
				created: indexed.created ?? "",
				modified: indexed.modified ?? new Date(statSync(path).mtimeMs).toISOString(),
			};
		}
		const scanned = scanSessionFile(sessionId, path);
		return {
			...scanned,
			summary: indexed?.summary ?? scanned.summary,
			firstPrompt: indexed?.firstPrompt ?? scanned.firstPrompt,
			messageCount: indexed?.messageCount ?? scanned.messageCount,
			created: indexed?.created ?? scanned.created,
			modified: indexed?.modified ?? scanned.modified,
		};
	}

	listSessions(limit: number): SessionMeta[] {
		return listSessionFiles(this.dir)
			.slice(0, limit)
			.map((s) => this.getMetadata(s.id, s.path));
	}
}

/** Metadata from the file itself: title line, first user prompt, message count. */
export function scanSessionFile(sessionId: string, path: string): SessionMeta {
	let title: string | undefined;
	let firstPrompt = "";
	let messageCount = 0;
	let created = "";

	for (const parsed of readEntries(readFileSync(path, "utf-8"), { path, index: 0 })) {
		if (parsed.type === "metadata") {
			if (title === undefined && parsed.record.type === "summary" && parsed.record.summary) {
				title = parsed.record.summary;
			}
			continue;
		}
		if (parsed.type !== "entry") continue;
		const { entry } = parsed;
		if (!created && entry.timestamp) created = entry.timestamp;
		if (entry.kind === "user" || entry.kind === "assistant") messageCount++;
		if (!firstPrompt && entry.kind === "user") firstPrompt = entryText(entry);
	}

	return {
		sessionId,
		path,
		summary: title ?? firstPrompt,
		firstPrompt,
		messageCount,
		created,
		modified: new Date(statSync(path).mtimeMs).toISOString(),
	};
}
