/**
 * Active path resolution: walk from the tip back to a root, stitching across
 * compaction boundaries, and return the chain in chronological order.
 */

import { ThreadlogError, UnresolvableRootError } from "../errors.js";
import { CompactionStitcher } from "./stitcher.js";
import type { TreeIndex } from "./tree-index.js";
import type { ActivePath, Branch, Entry, Junction, SessionWarning } from "./types.js";

export interface ResolveOptions {
	/** Entry id to walk back from. Defaults to the latest leaf of the most recent file. */
	tip?: string;
	/** Follow compaction links into older history (default true). */
	stitch?: boolean;
}

export interface ResolvedPath extends ActivePath {
	warnings: SessionWarning[];
}

export function findEntry(indices: readonly TreeIndex[], id: string): Entry | undefined {
	for (let f = indices.length - 1; f >= 0; f--) {
		const entry = indices[f].get(id);
		if (entry) return entry;
	}
	return undefined;
}

/** Latest non-sidechain leaf of the most recent non-empty file. */
export function defaultTip(indices: readonly TreeIndex[]): Entry | undefined {
	for (let f = indices.length - 1; f >= 0; f--) {
		const index = indices[f];
		if (index.size === 0) continue;
		return index.latest(index.leaves());
	}
	return undefined;
}

/** Tip for viewing the n-th (1-based) alternative of a branch. */
export function tipForAlternative(indices: readonly TreeIndex[], branch: Branch, n: number): Entry | undefined {
	const alternative = branch.alternatives[n - 1];
	if (!alternative) return undefined;
	const entry = findEntry(indices, alternative.id);
	if (!entry) return undefined;
	return indices[entry.file].latestLeafUnder(entry.id);
}

export function resolveActivePath(indices: readonly TreeIndex[], options: ResolveOptions = {}): ResolvedPath {
	const stitch = options.stitch ?? true;
	const warnings: SessionWarning[] = [];

	let tip: Entry | undefined;
	if (options.tip !== undefined) {
		tip = findEntry(indices, options.tip);
		if (!tip) {
			throw new ThreadlogError("E_NOT_FOUND", `Entry ${options.tip} is not in this session`);
		}
	} else {
		tip = defaultTip(indices);
	}
	if (!tip) return { entries: [], junctions: [], warnings };

	const stitcher = new CompactionStitcher(indices);
	const reversed: Entry[] = [];
	const visited = new Set<string>();
	const crossings: Omit<Junction, "index">[] = [];

	let current: Entry | undefined = tip;
	while (current) {
		if (visited.has(current.id)) {
			const chain = reversed.map((e) => e.id);
			throw new UnresolvableRootError(
				`Cycle detected: ${current.id} is its own ancestor`,
				[...chain, current.id],
				indices[current.file]?.file.path,
			);
		}
		visited.add(current.id);
		reversed.push(current);

		const parent = indices[current.file].parentOf(current);
		if (parent) {
			current = parent;
			continue;
		}
		if (!stitch) break;

		const { continuation, warning } = stitcher.continuationOf(current);
		if (warning) warnings.push(warning);
		if (!continuation) break;

		crossings.push({
			fromId: current.id,
			toId: continuation.entry.id,
			method: continuation.method,
			crossesFile: continuation.entry.file !== current.file,
		});
		current = continuation.entry;
	}

	const entries = reversed.reverse();
	const position = new Map(entries.map((e, i) => [e.id, i]));
	const junctions: Junction[] = crossings
		.map((c) => ({ ...c, index: position.get(c.fromId) ?? 0 }))
		.sort((a, b) => a.index - b.index);

	return { entries, junctions, warnings };
}
