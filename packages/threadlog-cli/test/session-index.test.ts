import { rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	discoverFamily,
	INDEX_FILE_NAME,
	listSessionFiles,
	resolveSessionFile,
	SessionIndex,
	scanSessionFile,
} from "../src/session-index.js";
import {
	assistant,
	compactBoundary,
	NEWER_MTIME,
	OLDER_MTIME,
	resetClock,
	title,
	toolResult,
	user,
	writeCompactedProject,
	writeSession,
} from "./utilities.js";

const MIDDLE_MTIME = new Date("2025-01-15T09:30:00.000Z");

describe("session files", () => {
	let dir: string;

	beforeEach(() => {
		resetClock();
		dir = join(tmpdir(), `threadlog-index-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("lists sessions newest first", () => {
		writeSession(dir, "aaa.jsonl", "", OLDER_MTIME);
		writeSession(dir, "bbb.jsonl", "", NEWER_MTIME);
		writeSession(dir, "agent-ccc.jsonl", "", NEWER_MTIME);
		expect(listSessionFiles(dir).map((s) => [s.id, s.mtime])).toEqual([
			["bbb", NEWER_MTIME.getTime()],
			["aaa", OLDER_MTIME.getTime()],
		]);
		expect(listSessionFiles(join(dir, "missing"))).toEqual([]);
	});

	it("resolves a session reference", () => {
		writeSession(dir, "abc-111.jsonl", "", OLDER_MTIME);
		writeSession(dir, "abd-222.jsonl", "", NEWER_MTIME);
		expect(resolveSessionFile(dir, undefined).id).toBe("abd-222");
		expect(resolveSessionFile(dir, "2").id).toBe("abc-111");
		expect(resolveSessionFile(dir, "abc").id).toBe("abc-111");
		expect(resolveSessionFile(dir, "abd-222").id).toBe("abd-222");
		expect(() => resolveSessionFile(dir, "ab")).toThrow('Session prefix "ab" is ambiguous: abd-222, abc-111');
		expect(() => resolveSessionFile(dir, "3")).toThrow("Session #3 is out of range (1-2)");
		expect(() => resolveSessionFile(dir, "zzz")).toThrow(`No session matching "zzz" in ${dir}`);
	});

	it("fails when the project has no sessions", () => {
		expect(() => resolveSessionFile(dir, undefined)).toThrow(`No sessions found in ${dir}`);
	});

	it("follows a compaction link into an older file", () => {
		const { older, newer } = writeCompactedProject(dir);
		writeSession(dir, "unrelated.jsonl", [user("x1", null, "Other work")], MIDDLE_MTIME);
		expect(discoverFamily(dir, newer)).toEqual([older, newer]);
		expect(discoverFamily(dir, older)).toEqual([older]);
	});

	it("takes the next older file when a compaction link does not resolve", () => {
		const older = writeSession(dir, "older.jsonl", [user("u1", null, "Start")], OLDER_MTIME);
		const newer = writeSession(dir, "newer.jsonl", [compactBoundary("b1", "gone"), user("u2", "b1", "Go on")], NEWER_MTIME);
		expect(discoverFamily(dir, newer)).toEqual([older, newer]);
	});

	it("does not chain unrelated sessions", () => {
		writeSession(dir, "older.jsonl", [user("u1", null, "Start")], OLDER_MTIME);
		const newer = writeSession(dir, "newer.jsonl", [user("u9", null, "Fresh start")], NEWER_MTIME);
		expect(discoverFamily(dir, newer)).toEqual([newer]);
	});
});

describe("SessionIndex", () => {
	let dir: string;

	beforeEach(() => {
		resetClock();
		dir = join(tmpdir(), `threadlog-meta-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("scans a session file for its metadata", () => {
		const path = writeSession(
			dir,
			"s1.jsonl",
			[
				title("Fix the login form"),
				user("u1", null, "The login form breaks"),
				assistant("a1", "u1", "Looking"),
				toolResult("r1", "a1", "ok"),
				user("u2", "r1", "Thanks"),
			],
			NEWER_MTIME,
		);
		expect(scanSessionFile("s1", path)).toEqual({
			sessionId: "s1",
			path,
			summary: "Fix the login form",
			firstPrompt: "The login form breaks",
			messageCount: 3,
			created: "2025-01-15T10:00:00.000Z",
			modified: NEWER_MTIME.toISOString(),
		});
	});

	it("uses the first prompt when there is no title", () => {
		const path = writeSession(dir, "s2.jsonl", [user("u1", null, "Add a test")], NEWER_MTIME);
		expect(scanSessionFile("s2", path).summary).toBe("Add a test");
	});

	it("prefers complete index entries", () => {
		const path = writeSession(dir, "s1.jsonl", [user("u1", null, "From the file")], NEWER_MTIME);
		writeFileSync(
			join(dir, INDEX_FILE_NAME),
			JSON.stringify({
				version: 1,
				entries: [{ sessionId: "s1", summary: "Indexed summary", firstPrompt: "Indexed prompt", messageCount: 42 }],
			}),
		);
		expect(new SessionIndex(dir).getMetadata("s1", path)).toEqual({
			sessionId: "s1",
			path,
			summary: "Indexed summary",
			firstPrompt: "Indexed prompt",
			messageCount: 42,
			created: "",
			modified: NEWER_MTIME.toISOString(),
		});
	});

	it("fills gaps in the index from the file", () => {
		const path = writeSession(dir, "s1.jsonl", [user("u1", null, "From the file")], NEWER_MTIME);
		writeFileSync(join(dir, INDEX_FILE_NAME), JSON.stringify({ entries: [{ sessionId: "s1", summary: "Indexed" }] }));
		const meta = new SessionIndex(dir).getMetadata("s1", path);
		expect([meta.summary, meta.firstPrompt, meta.messageCount]).toEqual(["Indexed", "From the file", 1]);
	});

	it("ignores a corrupt index", () => {
		const path = writeSession(dir, "s1.jsonl", [user("u1", null, "From the file")], NEWER_MTIME);
		writeFileSync(join(dir, INDEX_FILE_NAME), "{broken");
		const index = new SessionIndex(dir);
		expect(index.getIndex().size).toBe(0);
		expect(index.listSessions(10).map((s) => s.summary)).toEqual(["From the file"]);
	});
});
