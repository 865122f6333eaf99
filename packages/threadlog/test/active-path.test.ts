import { beforeEach, describe, expect, it } from "vitest";
import { ThreadlogError, UnresolvableRootError } from "../src/errors.js";
import { defaultTip, resolveActivePath, tipForAlternative } from "../src/session/active-path.js";
import { detectBranches } from "../src/session/branches.js";
import { assistant, buildIndices, progress, resetClock, toolResult, toolUse, user } from "./utilities.js";

beforeEach(() => {
	resetClock();
});

function ids(entries: { id: string }[]): string[] {
	return entries.map((e) => e.id);
}

describe("resolveActivePath", () => {
	it("returns a linear session in order", () => {
		const indices = buildIndices([
			user("u1", null, "Hello"),
			assistant("a1", "u1", "Hi there"),
			user("u2", "a1", "How are you?"),
			assistant("a2", "u2", "I am fine"),
		]);
		const path = resolveActivePath(indices);
		expect(ids(path.entries)).toEqual(["u1", "a1", "u2", "a2"]);
		expect(path.junctions).toEqual([]);
		expect(path.warnings).toEqual([]);
	});

	it("returns an empty path for an empty family", () => {
		expect(resolveActivePath(buildIndices([]))).toEqual({ entries: [], junctions: [], warnings: [] });
		expect(resolveActivePath([])).toEqual({ entries: [], junctions: [], warnings: [] });
	});

	it("follows the most recent branch", () => {
		const indices = buildIndices([
			user("u1", null, "Pick one"),
			assistant("a1", "u1", "Which option?"),
			user("u2", "a1", "option A"),
			assistant("a2", "u2", "A it is"),
			user("u3", "a1", "option B"),
			assistant("a3", "u3", "B it is"),
		]);
		expect(ids(resolveActivePath(indices).entries)).toEqual(["u1", "a1", "u3", "a3"]);
	});

	it("walks back from an explicit tip", () => {
		const indices = buildIndices([
			user("u1", null, "Pick one"),
			assistant("a1", "u1", "Which option?"),
			user("u2", "a1", "option A"),
			assistant("a2", "u2", "A it is"),
			user("u3", "a1", "option B"),
		]);
		expect(ids(resolveActivePath(indices, { tip: "a2" }).entries)).toEqual(["u1", "a1", "u2", "a2"]);
	});

	it("throws for an unknown tip", () => {
		const indices = buildIndices([user("u1", null, "Hello")]);
		expect(() => resolveActivePath(indices, { tip: "nope" })).toThrow(ThreadlogError);
	});

	it("follows the tool result chain past progress fan-out", () => {
		const indices = buildIndices([
			user("u1", null, "List files"),
			toolUse("t1", "u1", "Bash", { command: "ls" }),
			progress("p1", "t1"),
			toolResult("r1", "t1", "toolu-1", "file1.txt\nfile2.txt"),
			assistant("a1", "r1", "Two files."),
		]);
		expect(ids(resolveActivePath(indices).entries)).toEqual(["u1", "t1", "r1", "a1"]);
	});

	it("detects a cycle instead of looping", () => {
		const indices = buildIndices([user("x", "y", "first"), assistant("y", "x", "second")]);
		expect(defaultTip(indices)).toBeUndefined();
		expect(() => resolveActivePath(indices, { tip: "x" })).toThrow(UnresolvableRootError);
	});

	it("reports the cycle chain", () => {
		const indices = buildIndices([user("s", "s", "self")]);
		try {
			resolveActivePath(indices, { tip: "s" });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(UnresolvableRootError);
			if (error instanceof UnresolvableRootError) {
				expect(error.chain).toEqual(["s", "s"]);
				expect(error.code).toBe("E_CYCLE");
			}
		}
	});

	it("produces a simple path", () => {
		const indices = buildIndices(
			[user("u1", null, "Hello"), assistant("a1", "u1", "Hi"), assistant("a1b", "u1", "Hi, retried")],
			[
				{ type: "system", uuid: "b1", parentUuid: null, logicalParentUuid: "a1b", subtype: "compact_boundary" },
				user("u2", "b1", "Continue"),
				assistant("a2", "u2", "Done"),
			],
		);
		const path = resolveActivePath(indices).entries;
		expect(new Set(ids(path)).size).toBe(path.length);
		expect(ids(path)).toEqual(["u1", "a1b", "b1", "u2", "a2"]);
	});
});

describe("tipForAlternative", () => {
	it("resolves the latest leaf under the chosen alternative", () => {
		const indices = buildIndices([
			user("u1", null, "Hello"),
			assistant("a1", "u1", "first answer"),
			user("u2", "a1", "follow up"),
			assistant("a2", "u1", "second answer"),
		]);
		const branch = detectBranches(indices).get("u1");
		expect(branch).toBeDefined();
		if (!branch) return;
		expect(tipForAlternative(indices, branch, 1)?.id).toBe("u2");
		expect(tipForAlternative(indices, branch, 2)?.id).toBe("a2");
		expect(tipForAlternative(indices, branch, 3)).toBeUndefined();
	});
});
