/**
 * threadlog - conversation reconstruction for JSONL session logs.
 */

// Errors
export {
	errorToPayload,
	IntegrityError,
	isThreadlogError,
	ThreadlogError,
	type ThreadlogErrorCode,
	UnresolvableRootError,
} from "./errors.js";
// Reconstruction stages
export { defaultTip, findEntry, type ResolvedPath, type ResolveOptions, resolveActivePath, tipForAlternative } from "./session/active-path.js";
export { type BranchOptions, classifyFork, detectBranches, isMechanical } from "./session/branches.js";
export { defaultClassifier, type EntryClassifier } from "./session/classify.js";
export {
	collectEntries,
	type LoadedFile,
	type LoadOptions,
	loadSessionFile,
	type ParsedLine,
	parseTimestamp,
	readEntries,
} from "./session/loader.js";
// Session
export {
	type ResolvedSession,
	resolveSession,
	resolveSessions,
	SessionFamily,
	type SessionOptions,
	type SessionResult,
	type SessionTreeNode,
	sessionIdOf,
} from "./session/session.js";
export { type Continuation, CompactionStitcher, type StitchResult } from "./session/stitcher.js";
export { compareRecency, TreeIndex } from "./session/tree-index.js";
export { type GroupOptions, groupIntoTurns } from "./session/turns.js";
export {
	type ActivePath,
	type Branch,
	type BranchAlternative,
	type BranchLabel,
	type BranchMap,
	type ContentBlock,
	DEFAULT_MECHANICAL_KINDS,
	type EmptyPredecessorWarning,
	ENTRY_KINDS,
	type Entry,
	type EntryKind,
	type Junction,
	type MechanicalKind,
	type ParseWarning,
	type RawMessage,
	type RawRecord,
	rawRecordSchema,
	type SessionFile,
	type SessionWarning,
	type StitchAmbiguity,
	type StitchMethod,
	type Turn,
	type UnresolvedLinkWarning,
} from "./session/types.js";
