/**
 * Branch detection: decide which multi-child nodes are real conversational
 * alternatives and which are tool fan-out or bookkeeping.
 */

import type { TreeIndex } from "./tree-index.js";
import {
	type ActivePath,
	type Branch,
	type BranchLabel,
	type BranchMap,
	DEFAULT_MECHANICAL_KINDS,
	type Entry,
	type MechanicalKind,
} from "./types.js";

export interface BranchOptions {
	mechanicalKinds?: ReadonlySet<MechanicalKind>;
	/** When given, alternatives are marked on or off this path. */
	activePath?: ActivePath;
}

export function isMechanical(entry: Entry, mechanicalKinds: ReadonlySet<MechanicalKind> = DEFAULT_MECHANICAL_KINDS): boolean {
	if (mechanicalKinds.has(entry.kind)) return true;
	return entry.toolInvocation && mechanicalKinds.has("tool_invocation");
}

function labelFor(alternatives: Entry[]): BranchLabel {
	if (alternatives.every((e) => e.kind === "assistant")) return "retried here";
	if (alternatives.every((e) => e.kind === "user")) return "edited here";
	return "branched here";
}

/**
 * Classify one node's children; undefined when the fork is mechanical.
 * Bookkeeping children (a mechanical kind) never count. A fork whose remaining
 * children are all tool invocations is fan-out of one action; otherwise every
 * user or assistant child is an alternative, tool invocations included.
 */
export function classifyFork(index: TreeIndex, parentId: string, options: BranchOptions = {}): Branch | undefined {
	const mechanicalKinds = options.mechanicalKinds ?? DEFAULT_MECHANICAL_KINDS;
	const children = index.childrenOf(parentId);
	if (children.length < 2) return undefined;

	const candidates: Entry[] = [];
	for (const id of children) {
		const child = index.get(id);
		if (child && !mechanicalKinds.has(child.kind)) candidates.push(child);
	}
	if (candidates.every((child) => isMechanical(child, mechanicalKinds))) return undefined;

	const alternatives = candidates.filter((child) => child.kind === "user" || child.kind === "assistant");
	if (alternatives.length < 2) return undefined;

	const onPath = options.activePath ? new Set(options.activePath.entries.map((e) => e.id)) : undefined;
	return {
		parentId,
		alternatives: alternatives.map((e) => ({
			id: e.id,
			kind: e.kind,
			onActivePath: onPath ? onPath.has(e.id) : undefined,
		})),
		label: labelFor(alternatives),
	};
}

/** Branch map over every file of a family; needs no active path. */
export function detectBranches(indices: readonly TreeIndex[], options: BranchOptions = {}): BranchMap {
	const branches: BranchMap = new Map();
	for (const index of indices) {
		for (const parentId of index.forkIds()) {
			const branch = classifyFork(index, parentId, options);
			if (branch) branches.set(parentId, branch);
		}
	}
	return branches;
}
