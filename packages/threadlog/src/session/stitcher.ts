/**
 * Compaction stitching: continues a backward walk past a root that carries a
 * link into older history. Exact links win; a positional guess is flagged.
 */

import type { TreeIndex } from "./tree-index.js";
import type { Entry, SessionWarning, StitchMethod } from "./types.js";

export interface Continuation {
	entry: Entry;
	method: StitchMethod;
}

export interface StitchResult {
	continuation?: Continuation;
	warning?: SessionWarning;
}

export class CompactionStitcher {
	constructor(private readonly indices: readonly TreeIndex[]) {}

	/** Find the exact target of a link: same file first, then older files newest first. */
	resolveLink(linkId: string, fromFile: number, exclude?: string): Entry | undefined {
		const own = this.indices[fromFile];
		if (own && linkId !== exclude) {
			const local = own.get(linkId);
			if (local) return local;
		}
		for (let f = fromFile - 1; f >= 0; f--) {
			const found = this.indices[f]?.get(linkId);
			if (found) return found;
		}
		return undefined;
	}

	continuationOf(root: Entry): StitchResult {
		const own = this.indices[root.file];
		if (!own) return {};

		const linkId = own.boundaryLinkOf(root);
		if (linkId) {
			const target = this.resolveLink(linkId, root.file, root.id);
			if (target) {
				return { continuation: { entry: target, method: "logical" } };
			}
		}

		if (root.file === 0 || !own.isFileInitial(root)) return linkId ? this.unresolved(own, root, linkId) : {};

		// Nearest older file with entries; empty ones in between are skipped.
		const skipped: string[] = [];
		for (let f = root.file - 1; f >= 0; f--) {
			const previous = this.indices[f];
			if (!previous) continue;
			const fallback = previous.latest();
			if (!fallback) {
				skipped.push(previous.file.path);
				continue;
			}
			let reason = linkId ? `link ${linkId} did not resolve` : "no logical parent";
			if (skipped.length > 0) reason += `; ${skipped.join(", ")} ${skipped.length === 1 ? "has" : "have"} no entries`;
			return {
				continuation: { entry: fallback, method: "positional" },
				warning: {
					type: "stitch-ambiguity",
					file: own.file.path,
					fromId: root.id,
					toId: fallback.id,
					message: `Stitched ${root.id} to the last entry of ${previous.file.path} by position (${reason})`,
				},
			};
		}

		if (linkId) return this.unresolved(own, root, linkId);
		return {
			warning: {
				type: "empty-predecessor",
				file: own.file.path,
				entryId: root.id,
				message: `Entry ${root.id} starts ${own.file.path} but the older files of this family have no entries`,
			},
		};
	}

	private unresolved(own: TreeIndex, root: Entry, linkId: string): StitchResult {
		return {
			warning: {
				type: "unresolved-link",
				file: own.file.path,
				entryId: root.id,
				linkId,
				message: `Entry ${root.id} links to ${linkId}, which is not in this session family`,
			},
		};
	}
}
