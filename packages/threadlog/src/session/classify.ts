/**
 * Entry classification.
 *
 * The discriminating fields belong to the external log format, so the engine
 * only talks to an EntryClassifier. The default one understands Claude-style
 * records; callers can swap it when the format changes.
 */

import type { ContentBlock, Entry, EntryKind, RawRecord } from "./types.js";

export interface EntryClassifier {
	kindOf(record: RawRecord): EntryKind;
	/** Assistant record whose content is nothing but tool invocations. */
	isToolInvocation(record: RawRecord): boolean;
	/** Explicit human input that opens a turn. */
	isGenuineUserMessage(entry: Entry, previous: Entry | undefined): boolean;
}

function contentBlocks(record: RawRecord): ContentBlock[] {
	const content = record.message?.content;
	return Array.isArray(content) ? content : [];
}

function hasToolResultBlock(record: RawRecord): boolean {
	return contentBlocks(record).some((block) => block.type === "tool_result");
}

export const defaultClassifier: EntryClassifier = {
	kindOf(record) {
		switch (record.type) {
			case "assistant":
				return "assistant";
			case "system":
				return "system";
			case "progress":
				return "progress";
			case "summary":
				return "summary";
			case "user":
				if (record.isCompactSummary) return "summary";
				if (record.toolUseResult !== undefined || hasToolResultBlock(record)) return "tool_result";
				if (record.isMeta) return "system";
				return "user";
			default:
				return "system";
		}
	},

	isToolInvocation(record) {
		if (record.type !== "assistant") return false;
		const blocks = contentBlocks(record);
		return blocks.length > 0 && blocks.every((block) => block.type === "tool_use");
	},

	isGenuineUserMessage(entry, previous) {
		if (entry.kind !== "user") return false;
		if (previous?.kind === "assistant" && entry.record.sourceToolAssistantUUID === previous.id) {
			return false;
		}
		return true;
	},
};
