/**
 * Turn and message selection: `-n`, `-r` and `--all`.
 */

export const DEFAULT_TURNS = 5;

const RANGE_PATTERN = /^(-?\d+)(?:-(-?\d+))?$/;

/** True for values `-r` accepts: "3", "-1", "3-5", "-3--1". */
export function isRangeSpec(value: string): boolean {
	return RANGE_PATTERN.test(value);
}

/**
 * 1-based indices selected by a range over max items. Negative values count
 * from the end (-1 is the last). A range is clipped to 1..max; a single index out
 * of bounds or an invalid range selects nothing.
 */
export function parseRange(range: string, max: number): number[] {
	const match = RANGE_PATTERN.exec(range.trim());
	if (!match) return [];

	const resolve = (value: string): number => {
		const n = Number.parseInt(value, 10);
		return n < 0 ? max + n + 1 : n;
	};

	const start = resolve(match[1]);
	if (match[2] === undefined) {
		return start >= 1 && start <= max ? [start] : [];
	}

	const from = Math.max(start, 1);
	const to = Math.min(resolve(match[2]), max);
	const indices: number[] = [];
	for (let i = from; i <= to; i++) {
		indices.push(i);
	}
	return indices;
}

export interface Selection {
	n?: number;
	range?: string;
	all?: boolean;
}

export function computeIndices(total: number, selection: Selection, defaultCount = DEFAULT_TURNS): number[] {
	if (selection.all) return parseRange(`1-${total}`, total);
	if (selection.range !== undefined) return parseRange(selection.range, total);
	const count = selection.n ?? defaultCount;
	return parseRange(`${Math.max(total - count + 1, 1)}-${total}`, total);
}
