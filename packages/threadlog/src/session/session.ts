/**
 * Session family facade: load every file of a compaction chain once, then
 * answer path, turn and branch queries against the in-memory snapshot.
 */

import { basename } from "node:path";
import { findEntry, type ResolveOptions, resolveActivePath, tipForAlternative } from "./active-path.js";
import { type BranchOptions, detectBranches } from "./branches.js";
import { type LoadOptions, loadSessionFile } from "./loader.js";
import { TreeIndex } from "./tree-index.js";
import { type GroupOptions, groupIntoTurns } from "./turns.js";
import type { ActivePath, BranchMap, Entry, MechanicalKind, SessionFile, SessionWarning, Turn } from "./types.js";

export interface SessionOptions extends LoadOptions, ResolveOptions {
	suppressBoundaryBreaks?: boolean;
	mechanicalKinds?: ReadonlySet<MechanicalKind>;
}

export interface ResolvedSession {
	/** Id of the most recent file. */
	id: string;
	files: SessionFile[];
	path: ActivePath;
	turns: Turn[];
	branches: BranchMap;
	warnings: SessionWarning[];
	titles: string[];
	activePathLength: number;
	/** The session continues compacted history. */
	hasPredecessors: boolean;
}

export type SessionResult =
	| { ok: true; session: ResolvedSession }
	| { ok: false; id: string; files: string[]; error: unknown };

export interface SessionTreeNode {
	entry: Entry;
	children: SessionTreeNode[];
}

export function sessionIdOf(path: string): string {
	return basename(path).replace(/\.jsonl$/, "");
}

export class SessionFamily {
	readonly files: SessionFile[];
	readonly indices: readonly TreeIndex[];
	readonly titles: string[];
	private readonly loadWarnings: SessionWarning[];

	private constructor(files: SessionFile[], indices: TreeIndex[], titles: string[], warnings: SessionWarning[]) {
		this.files = files;
		this.indices = indices;
		this.titles = titles;
		this.loadWarnings = warnings;
	}

	/**
	 * Load a family from its files, oldest first. Throws IntegrityError for a
	 * corrupt file; nothing is returned half-built.
	 */
	static open(paths: readonly string[], options: LoadOptions = {}): SessionFamily {
		const files: SessionFile[] = [];
		const indices: TreeIndex[] = [];
		const titles: string[] = [];
		const warnings: SessionWarning[] = [];

		paths.forEach((path, index) => {
			const loaded = loadSessionFile(path, index, options);
			files.push(loaded.file);
			indices.push(TreeIndex.build(loaded.file, loaded.entries));
			titles.push(...loaded.titles);
			warnings.push(...loaded.warnings);
		});

		return new SessionFamily(files, indices, titles, warnings);
	}

	get id(): string {
		const latest = this.files[this.files.length - 1];
		return latest ? sessionIdOf(latest.path) : "";
	}

	get warnings(): readonly SessionWarning[] {
		return this.loadWarnings;
	}

	getEntry(id: string): Entry | undefined {
		return findEntry(this.indices, id);
	}

	entryCount(): number {
		return this.indices.reduce((sum, index) => sum + index.size, 0);
	}

	activePath(options: ResolveOptions = {}): ActivePath & { warnings: SessionWarning[] } {
		return resolveActivePath(this.indices, options);
	}

	branches(options: BranchOptions = {}): BranchMap {
		return detectBranches(this.indices, options);
	}

	/** Tip id of the n-th alternative at a branch, for viewing an abandoned path. */
	alternativeTip(parentId: string, n: number, options: BranchOptions = {}): string | undefined {
		const branch = this.branches(options).get(parentId);
		return branch ? tipForAlternative(this.indices, branch, n)?.id : undefined;
	}

	/** Per-file trees, children in file order. */
	getTree(): SessionTreeNode[] {
		const roots: SessionTreeNode[] = [];
		for (const index of this.indices) {
			const nodes = new Map<string, SessionTreeNode>();
			for (const entry of index.entries()) {
				nodes.set(entry.id, { entry, children: [] });
			}
			for (const entry of index.entries()) {
				const node = nodes.get(entry.id);
				if (!node) continue;
				const parent = index.parentOf(entry);
				const parentNode = parent ? nodes.get(parent.id) : undefined;
				if (parentNode) {
					parentNode.children.push(node);
				} else {
					roots.push(node);
				}
			}
		}
		return roots;
	}

	resolve(options: SessionOptions = {}): ResolvedSession {
		const path = this.activePath(options);
		const groupOptions: GroupOptions = {
			suppressBoundaryBreaks: options.suppressBoundaryBreaks,
			classifier: options.classifier,
		};
		const activePath: ActivePath = { entries: path.entries, junctions: path.junctions };
		return {
			id: this.id,
			files: this.files,
			path: activePath,
			turns: groupIntoTurns(activePath, groupOptions),
			branches: this.branches({ mechanicalKinds: options.mechanicalKinds, activePath }),
			warnings: [...this.loadWarnings, ...path.warnings],
			titles: this.titles,
			activePathLength: path.entries.length,
			hasPredecessors: this.files.length > 1 || path.junctions.length > 0,
		};
	}
}

export function resolveSession(paths: readonly string[], options: SessionOptions = {}): ResolvedSession {
	return SessionFamily.open(paths, options).resolve(options);
}

/** Resolve many families; a failing family is reported, never fatal to the batch. */
export function resolveSessions(families: readonly (readonly string[])[], options: SessionOptions = {}): SessionResult[] {
	return families.map((paths): SessionResult => {
		try {
			return { ok: true, session: resolveSession(paths, options) };
		} catch (error) {
			const last = paths[paths.length - 1];
			return { ok: false, id: last ? sessionIdOf(last) : "", files: [...paths], error };
		}
	});
}
