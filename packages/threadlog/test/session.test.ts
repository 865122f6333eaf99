import { rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IntegrityError } from "../src/errors.js";
import { resolveSession, resolveSessions, SessionFamily, sessionIdOf } from "../src/session/session.js";
import {
	assistant,
	compactBoundary,
	compactSummary,
	resetClock,
	title,
	toolResult,
	toolUse,
	user,
	writeSession,
} from "./utilities.js";

describe("sessionIdOf", () => {
	it("strips directory and extension", () => {
		expect(sessionIdOf("/tmp/project/abc-123.jsonl")).toBe("abc-123");
		expect(sessionIdOf("plain")).toBe("plain");
	});
});

describe("SessionFamily", () => {
	let tempDir: string;

	beforeEach(() => {
		resetClock();
		tempDir = join(tmpdir(), `threadlog-session-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	function writeCompactedFamily(): string[] {
		const older = writeSession(tempDir, "older.jsonl", [
			title("Refactor the parser"),
			user("u1", null, "Refactor the parser"),
			assistant("a1", "u1", "Plan ready"),
			assistant("a1b", "u1", "Another plan"),
		]);
		const newer = writeSession(tempDir, "newer.jsonl", [
			compactBoundary("b1", "a1b"),
			compactSummary("s1", "b1", "We refactored the parser"),
			user("u2", "s1", "Now add tests"),
			toolUse("t1", "u2", "Write", { file_path: "/tmp/parser.test.ts" }),
			toolResult("r1", "t1", "toolu-1", "written"),
			assistant("a2", "r1", "Tests added"),
		]);
		return [older, newer];
	}

	it("resolves a compacted session from disk", () => {
		const session = resolveSession(writeCompactedFamily());
		expect(session.id).toBe("newer");
		expect(session.files.map((f) => f.index)).toEqual([0, 1]);
		expect(session.path.entries.map((e) => e.id)).toEqual(["u1", "a1b", "b1", "s1", "u2", "t1", "r1", "a2"]);
		expect(session.activePathLength).toBe(8);
		expect(session.turns.map((t) => t.opener.id)).toEqual(["u1", "b1", "u2"]);
		expect(session.branches.get("u1")?.label).toBe("retried here");
		expect(session.branches.get("u1")?.alternatives.map((a) => a.onActivePath)).toEqual([false, true]);
		expect(session.titles).toEqual(["Refactor the parser"]);
		expect(session.hasPredecessors).toBe(true);
		expect(session.warnings).toEqual([]);
	});

	it("suppresses boundary turns on request", () => {
		const session = resolveSession(writeCompactedFamily(), { suppressBoundaryBreaks: true });
		expect(session.turns.map((t) => t.opener.id)).toEqual(["u1", "u2"]);
	});

	it("resolves a single linear file without predecessors", () => {
		const path = writeSession(tempDir, "solo.jsonl", [user("u1", null, "Hello"), assistant("a1", "u1", "Hi")]);
		const session = resolveSession([path]);
		expect(session.hasPredecessors).toBe(false);
		expect(session.turns).toHaveLength(1);
		expect(session.branches.size).toBe(0);
	});

	it("passes parse warnings through", () => {
		const path = writeSession(tempDir, "noisy.jsonl", `{oops\n${JSON.stringify(user("u1", null, "Hello"))}\n`);
		const session = resolveSession([path]);
		expect(session.path.entries.map((e) => e.id)).toEqual(["u1"]);
		expect(session.warnings.map((w) => [w.type, w.file])).toEqual([["parse", path]]);
	});

	it("returns identical results for repeated resolution", () => {
		const family = SessionFamily.open(writeCompactedFamily());
		expect(family.resolve()).toEqual(family.resolve());
	});

	it("views an abandoned alternative by tip", () => {
		const family = SessionFamily.open(writeCompactedFamily());
		const tip = family.alternativeTip("u1", 1);
		expect(tip).toBe("a1");
		const session = family.resolve({ tip });
		expect(session.path.entries.map((e) => e.id)).toEqual(["u1", "a1"]);
		expect(family.alternativeTip("u1", 5)).toBeUndefined();
		expect(family.alternativeTip("a2", 1)).toBeUndefined();
	});

	it("exposes entries and per-file trees", () => {
		const family = SessionFamily.open(writeCompactedFamily());
		expect(family.entryCount()).toBe(9);
		expect(family.getEntry("s1")?.kind).toBe("summary");
		expect(family.getEntry("zzz")).toBeUndefined();

		const tree = family.getTree();
		expect(tree.map((n) => n.entry.id)).toEqual(["u1", "b1"]);
		expect(tree[0].children.map((n) => n.entry.id)).toEqual(["a1", "a1b"]);
		expect(tree[1].children.map((n) => n.entry.id)).toEqual(["s1"]);
	});

	it("fails a corrupt family without half-loading it", () => {
		const path = writeSession(tempDir, "broken.jsonl", [user("u1", null, "Hello"), assistant("a1", "missing", "Hi")]);
		expect(() => SessionFamily.open([path])).toThrow(IntegrityError);
	});

	it("reports a failing family and keeps resolving the others", () => {
		const good = writeSession(tempDir, "good.jsonl", [user("u1", null, "Hello")]);
		const bad = writeSession(tempDir, "bad.jsonl", [user("x1", null, "Hello"), user("x1", null, "Again")]);
		const results = resolveSessions([[good], [bad]]);

		expect(results.map((r) => r.ok)).toEqual([true, false]);
		const failed = results[1];
		if (failed.ok) throw new Error("expected failure");
		expect(failed.id).toBe("bad");
		expect(failed.files).toEqual([bad]);
		expect(failed.error).toBeInstanceOf(IntegrityError);
	});
});
