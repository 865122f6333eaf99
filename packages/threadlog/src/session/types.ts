/**
 * Entry and projection types for JSONL session trees.
 * Records keep the log producer's raw shape; the engine only reads structural fields.
 */

import { z } from "zod";

export const ENTRY_KINDS = ["user", "assistant", "system", "tool_result", "summary", "progress"] as const;

export type EntryKind = (typeof ENTRY_KINDS)[number];

/** Kinds that can be treated as mechanical, plus assistant tool invocations. */
export type MechanicalKind = EntryKind | "tool_invocation";

export const DEFAULT_MECHANICAL_KINDS: ReadonlySet<MechanicalKind> = new Set<MechanicalKind>([
	"tool_result",
	"progress",
	"system",
	"tool_invocation",
]);

const contentBlockSchema = z
	.object({
		type: z.string(),
	})
	.passthrough();

export const messageSchema = z
	.object({
		role: z.string().optional(),
		content: z.union([z.string(), z.array(contentBlockSchema)]).optional(),
	})
	.passthrough();

/** One JSONL line as written by the log producer. Unknown fields pass through. */
export const rawRecordSchema = z
	.object({
		type: z.string(),
		uuid: z.string().min(1).optional(),
		parentUuid: z.string().nullable().optional(),
		logicalParentUuid: z.string().nullable().optional(),
		timestamp: z.string().optional(),
		subtype: z.string().optional(),
		isSidechain: z.boolean().optional(),
		isMeta: z.boolean().optional(),
		isCompactSummary: z.boolean().optional(),
		sourceToolAssistantUUID: z.string().optional(),
		toolUseResult: z.unknown().optional(),
		summary: z.string().optional(),
		message: messageSchema.optional(),
	})
	.passthrough();

export type RawRecord = z.infer<typeof rawRecordSchema>;
export type RawMessage = z.infer<typeof messageSchema>;
export type ContentBlock = z.infer<typeof contentBlockSchema>;

/** A record that occupies a tree position. */
export interface Entry {
	id: string;
	parentId: string | null;
	logicalParentId?: string;
	kind: EntryKind;
	timestamp: string;
	/** Epoch milliseconds; -Infinity when the timestamp is absent or unparseable. */
	time: number;
	/** 0-based position among the file's tree entries. */
	sequence: number;
	/** 1-based source line. */
	line: number;
	/** Index of the source file within its family, 0 = oldest. */
	file: number;
	sidechain: boolean;
	toolInvocation: boolean;
	record: RawRecord;
}

/** One log file of a session family. */
export interface SessionFile {
	path: string;
	index: number;
}

// ============================================================================
// Warnings
// ============================================================================

export interface ParseWarning {
	type: "parse";
	file: string;
	line: number;
	message: string;
}

export interface StitchAmbiguity {
	type: "stitch-ambiguity";
	file: string;
	fromId: string;
	toId: string;
	message: string;
}

export interface UnresolvedLinkWarning {
	type: "unresolved-link";
	file: string;
	entryId: string;
	linkId: string;
	message: string;
}

/** A file-initial root with no link whose older files hold no entries at all. */
export interface EmptyPredecessorWarning {
	type: "empty-predecessor";
	file: string;
	entryId: string;
	message: string;
}

export type SessionWarning = ParseWarning | StitchAmbiguity | UnresolvedLinkWarning | EmptyPredecessorWarning;

// ============================================================================
// Projections
// ============================================================================

export type StitchMethod = "logical" | "positional";

/** A point where the active path crosses a compaction boundary. */
export interface Junction {
	/** Position in the path of the first entry after the boundary. */
	index: number;
	/** Entry on the newer side of the boundary (the root that was stitched). */
	fromId: string;
	/** Entry on the older side that the walk continued into. */
	toId: string;
	method: StitchMethod;
	crossesFile: boolean;
}

export interface ActivePath {
	entries: Entry[];
	junctions: Junction[];
}

export interface Turn {
	/** 1-based. */
	index: number;
	opener: Entry;
	/** Opener first, then attached entries in path order. */
	entries: Entry[];
	boundaryCrossed: boolean;
	stitchedPositionally: boolean;
	/** Summary entry that marks a compaction, when this turn carries one. */
	marker?: Entry;
	/** The opener is not a genuine user message. */
	implicit: boolean;
}

export type BranchLabel = "retried here" | "edited here" | "branched here";

export interface BranchAlternative {
	id: string;
	kind: EntryKind;
	/** Undefined when branches were detected without an active path. */
	onActivePath?: boolean;
}

export interface Branch {
	parentId: string;
	alternatives: BranchAlternative[];
	label: BranchLabel;
}

export type BranchMap = Map<string, Branch>;
