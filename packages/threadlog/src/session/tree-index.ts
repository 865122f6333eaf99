/**
 * Per-file tree index: an arena of entries keyed by id plus a parent → children side index.
 * Files are never merged; cross-file links are resolved by the stitcher.
 */

import { IntegrityError } from "../errors.js";
import type { Entry, SessionFile } from "./types.js";

/** Later time wins; file position breaks ties. */
export function compareRecency(a: Entry, b: Entry): number {
	if (a.time !== b.time) return a.time < b.time ? -1 : 1;
	return a.sequence - b.sequence;
}

export class TreeIndex {
	readonly file: SessionFile;
	private readonly ordered: Entry[];
	private readonly byId: Map<string, Entry>;
	private readonly children: Map<string, string[]>;

	private constructor(file: SessionFile, ordered: Entry[], byId: Map<string, Entry>, children: Map<string, string[]>) {
		this.file = file;
		this.ordered = ordered;
		this.byId = byId;
		this.children = children;
	}

	/**
	 * Build the index for one file. A parent id missing from the file is only
	 * allowed on the file-initial entry, where it marks a compaction boundary.
	 */
	static build(file: SessionFile, entries: Entry[]): TreeIndex {
		const byId = new Map<string, Entry>();
		for (const entry of entries) {
			byId.set(entry.id, entry);
		}

		const children = new Map<string, string[]>();
		for (let i = 0; i < entries.length; i++) {
			const entry = entries[i];
			if (entry.parentId === null) continue;
			if (!byId.has(entry.parentId)) {
				if (i === 0) continue;
				throw new IntegrityError(
					`Entry ${entry.id} at line ${entry.line} of ${file.path} references missing parent ${entry.parentId}`,
					file.path,
					entry.id,
				);
			}
			const siblings = children.get(entry.parentId);
			if (siblings) {
				siblings.push(entry.id);
			} else {
				children.set(entry.parentId, [entry.id]);
			}
		}

		return new TreeIndex(file, [...entries], byId, children);
	}

	get size(): number {
		return this.ordered.length;
	}

	has(id: string): boolean {
		return this.byId.has(id);
	}

	get(id: string): Entry | undefined {
		return this.byId.get(id);
	}

	childrenOf(id: string): readonly string[] {
		return this.children.get(id) ?? [];
	}

	/** Ids with more than one child, in file order. */
	forkIds(): string[] {
		return this.ordered.filter((e) => this.childrenOf(e.id).length > 1).map((e) => e.id);
	}

	entries(): readonly Entry[] {
		return this.ordered;
	}

	first(): Entry | undefined {
		return this.ordered[0];
	}

	/** In-file parent of an entry, undefined for roots. */
	parentOf(entry: Entry): Entry | undefined {
		return entry.parentId === null ? undefined : this.byId.get(entry.parentId);
	}

	/** Entries without an in-file parent. */
	roots(): Entry[] {
		return this.ordered.filter((e) => this.parentOf(e) === undefined);
	}

	leaves(): Entry[] {
		return this.ordered.filter((e) => this.childrenOf(e.id).length === 0);
	}

	/**
	 * Link a root carries towards an older entry: its logical parent, or the
	 * dangling parent id of the file-initial entry.
	 */
	boundaryLinkOf(root: Entry): string | undefined {
		if (root.logicalParentId) return root.logicalParentId;
		if (root.parentId !== null && !this.byId.has(root.parentId)) return root.parentId;
		return undefined;
	}

	isFileInitial(entry: Entry): boolean {
		return this.ordered[0]?.id === entry.id;
	}

	/** Most recent entry, skipping side chains unless nothing else exists. */
	latest(candidates: readonly Entry[] = this.ordered): Entry | undefined {
		let best: Entry | undefined;
		let bestSidechain: Entry | undefined;
		for (const entry of candidates) {
			if (entry.sidechain) {
				if (!bestSidechain || compareRecency(entry, bestSidechain) > 0) bestSidechain = entry;
			} else if (!best || compareRecency(entry, best) > 0) {
				best = entry;
			}
		}
		return best ?? bestSidechain;
	}

	/** Latest leaf in the subtree rooted at id. */
	latestLeafUnder(id: string): Entry | undefined {
		const leaves: Entry[] = [];
		const stack = [id];
		const seen = new Set<string>();
		while (stack.length > 0) {
			const current = stack.pop();
			if (current === undefined || seen.has(current)) continue;
			seen.add(current);
			const kids = this.childrenOf(current);
			if (kids.length === 0) {
				const entry = this.byId.get(current);
				if (entry) leaves.push(entry);
			} else {
				stack.push(...kids);
			}
		}
		return this.latest(leaves);
	}
}
