/**
 * Turn grouping over a resolved (possibly stitched) active path.
 */

import { defaultClassifier, type EntryClassifier } from "./classify.js";
import type { ActivePath, Entry, Junction, Turn } from "./types.js";

export interface GroupOptions {
	/** Treat the path as contiguous: no turn breaks or markers at compaction boundaries. */
	suppressBoundaryBreaks?: boolean;
	classifier?: EntryClassifier;
}

function isBookkeeping(entry: Entry): boolean {
	return entry.kind === "system" || entry.kind === "progress";
}

export function groupIntoTurns(path: ActivePath, options: GroupOptions = {}): Turn[] {
	const classifier = options.classifier ?? defaultClassifier;
	const suppress = options.suppressBoundaryBreaks ?? false;
	const junctionAt = new Map<number, Junction>(path.junctions.map((j) => [j.index, j]));

	const turns: Turn[] = [];
	let current: Turn | undefined;
	let bookkeepingOnly = false;

	for (let i = 0; i < path.entries.length; i++) {
		const entry = path.entries[i];
		const genuine = classifier.isGenuineUserMessage(entry, path.entries[i - 1]);
		const junction = junctionAt.get(i);
		const marksCompaction = !suppress && entry.kind === "summary";

		let open = !current || genuine || (!suppress && junction !== undefined);
		if (current && !open && marksCompaction) {
			if (bookkeepingOnly && !current.marker) {
				current.marker = entry;
			} else {
				open = true;
			}
		}

		if (open || !current) {
			current = {
				index: turns.length + 1,
				opener: entry,
				entries: [],
				boundaryCrossed: false,
				stitchedPositionally: false,
				implicit: !genuine,
			};
			if (marksCompaction) current.marker = entry;
			turns.push(current);
			bookkeepingOnly = true;
		}

		current.entries.push(entry);
		bookkeepingOnly = bookkeepingOnly && isBookkeeping(entry);
		if (junction) {
			current.boundaryCrossed = true;
			if (junction.method === "positional") current.stitchedPositionally = true;
		}
	}

	return turns;
}
