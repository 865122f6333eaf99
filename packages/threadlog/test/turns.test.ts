import { beforeEach, describe, expect, it } from "vitest";
import { resolveActivePath } from "../src/session/active-path.js";
import { groupIntoTurns } from "../src/session/turns.js";
import type { Turn } from "../src/session/types.js";
import {
	assistant,
	buildIndices,
	compactBoundary,
	compactSummary,
	type RecordLine,
	resetClock,
	system,
	toolResult,
	toolUse,
	user,
} from "./utilities.js";

beforeEach(() => {
	resetClock();
});

function turnIds(turns: Turn[]): string[][] {
	return turns.map((t) => t.entries.map((e) => e.id));
}

function turnsOf(...files: RecordLine[][]): Turn[] {
	return groupIntoTurns(resolveActivePath(buildIndices(...files)));
}

function compactedFamily(): RecordLine[][] {
	return [
		[user("u1", null, "Start"), assistant("a1", "u1", "Working")],
		[
			compactBoundary("b1", "a1"),
			compactSummary("s1", "b1", "Summary of the earlier conversation"),
			user("u2", "s1", "Carry on"),
			assistant("a2", "u2", "Continuing"),
		],
	];
}

describe("groupIntoTurns", () => {
	it("opens a turn for each user message", () => {
		const turns = turnsOf([
			user("u1", null, "Hello"),
			assistant("a1", "u1", "Hi"),
			user("u2", "a1", "Question?"),
			assistant("a2", "u2", "Answer."),
			user("u3", "a2", "Thanks"),
		]);
		expect(turnIds(turns)).toEqual([["u1", "a1"], ["u2", "a2"], ["u3"]]);
		expect(turns.map((t) => t.index)).toEqual([1, 2, 3]);
		expect(turns.map((t) => t.opener.id)).toEqual(["u1", "u2", "u3"]);
		expect(turns.every((t) => !t.implicit && !t.boundaryCrossed)).toBe(true);
	});

	it("keeps tool calls and results inside the turn", () => {
		const turns = turnsOf([
			user("u1", null, "List files"),
			toolUse("t1", "u1", "Bash", { command: "ls" }),
			toolResult("r1", "t1", "toolu-1", "file1.txt"),
			assistant("a1", "r1", "One file."),
		]);
		expect(turnIds(turns)).toEqual([["u1", "t1", "r1", "a1"]]);
	});

	it("does not open a turn for input injected by a tool", () => {
		const turns = turnsOf([
			user("u1", null, "Run the skill"),
			assistant("a1", "u1", "Loading skill"),
			user("u2", "a1", "Skill instructions", { sourceToolAssistantUUID: "a1" }),
			assistant("a2", "u2", "Done"),
		]);
		expect(turnIds(turns)).toEqual([["u1", "a1", "u2", "a2"]]);
	});

	it("marks a turn without a user opener as implicit", () => {
		const turns = turnsOf([assistant("a0", null, "Resuming"), user("u1", "a0", "Ok")]);
		expect(turns.map((t) => t.implicit)).toEqual([true, false]);
	});

	it("puts a leading compaction summary in its own marked turn", () => {
		const turns = turnsOf([compactSummary("s0", null, "Earlier work"), user("u1", "s0", "Continue")]);
		expect(turnIds(turns)).toEqual([["s0"], ["u1"]]);
		expect(turns[0].marker?.id).toBe("s0");
		expect(turns[0].implicit).toBe(true);
		expect(turns[1].marker).toBeUndefined();
	});

	it("breaks at a compaction boundary and marks the summary", () => {
		const turns = turnsOf(...compactedFamily());
		expect(turnIds(turns)).toEqual([
			["u1", "a1"],
			["b1", "s1"],
			["u2", "a2"],
		]);
		expect(turns[1].boundaryCrossed).toBe(true);
		expect(turns[1].stitchedPositionally).toBe(false);
		expect(turns[1].implicit).toBe(true);
		expect(turns[1].marker?.id).toBe("s1");
		expect(turns[0].boundaryCrossed).toBe(false);
		expect(turns[2].boundaryCrossed).toBe(false);
	});

	it("merges across the boundary when breaks are suppressed", () => {
		const path = resolveActivePath(buildIndices(...compactedFamily()));
		const turns = groupIntoTurns(path, { suppressBoundaryBreaks: true });
		expect(turnIds(turns)).toEqual([
			["u1", "a1", "b1", "s1"],
			["u2", "a2"],
		]);
		expect(turns[0].boundaryCrossed).toBe(true);
		expect(turns.every((t) => t.marker === undefined)).toBe(true);
	});

	it("flags turns joined by a positional stitch", () => {
		const turns = turnsOf(
			[user("u1", null, "Start"), assistant("a1", "u1", "Working")],
			[system("x1", null, "informational"), user("u2", "x1", "Carry on")],
		);
		expect(turnIds(turns)).toEqual([["u1", "a1"], ["x1"], ["u2"]]);
		expect(turns[1].boundaryCrossed).toBe(true);
		expect(turns[1].stitchedPositionally).toBe(true);
	});

	it("opens a marked turn for a summary in the middle of a turn", () => {
		const turns = turnsOf([
			user("u1", null, "Hello"),
			assistant("a1", "u1", "Hi"),
			compactSummary("s1", "a1", "Recap"),
			user("u2", "s1", "More"),
		]);
		expect(turnIds(turns)).toEqual([["u1", "a1"], ["s1"], ["u2"]]);
		expect(turns[1].marker?.id).toBe("s1");
	});

	it("has as many turns as user messages on a contiguous path", () => {
		const records: RecordLine[] = [];
		let parent: string | null = null;
		for (let i = 1; i <= 4; i++) {
			records.push(user(`u${i}`, parent, `message ${i}`));
			records.push(toolUse(`t${i}`, `u${i}`, "Read", { file_path: "/tmp/a.txt" }));
			records.push(toolResult(`r${i}`, `t${i}`, "toolu-1", "contents"));
			records.push(assistant(`a${i}`, `r${i}`, `reply ${i}`));
			parent = `a${i}`;
		}
		const turns = turnsOf(records);
		expect(turns).toHaveLength(4);
	});

	it("keeps every path entry in exactly one turn, in order", () => {
		const path = resolveActivePath(buildIndices(...compactedFamily()));
		for (const suppressBoundaryBreaks of [false, true]) {
			const flattened = groupIntoTurns(path, { suppressBoundaryBreaks }).flatMap((t) => t.entries);
			expect(flattened).toEqual(path.entries);
		}
	});

	it("returns no turns for an empty path", () => {
		expect(groupIntoTurns({ entries: [], junctions: [] })).toEqual([]);
	});
});
