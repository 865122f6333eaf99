/**
 * Payload extraction: turn the opaque records of resolved entries into text.
 * The engine only orders entries; everything that reads message content is here.
 */

import type { ContentBlock, Entry, EntryKind, Turn } from "threadlog";
import { DEFAULT_TRUNCATE } from "./config.js";
import { shortPath, stripAnsi, truncate } from "./utils/text.js";

type MaybeRecord = Record<string, unknown>;

function isRecord(value: unknown): value is MaybeRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getString(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

function contentBlocks(entry: Entry): ContentBlock[] {
	const content = entry.record.message?.content;
	return Array.isArray(content) ? content : [];
}

/** Text of a string or text-block content value. */
function contentText(content: unknown): string {
	if (typeof content === "string") return content;
	if (!Array.isArray(content)) return "";
	return content
		.map((block) => (isRecord(block) && block.type === "text" ? (getString(block.text) ?? "") : ""))
		.filter((text) => text.length > 0)
		.join("\n");
}

/** Visible text of an entry's message, ANSI stripped. */
export function entryText(entry: Entry): string {
	return stripAnsi(contentText(entry.record.message?.content)).trim();
}

// ============================================================================
// Tool calls
// ============================================================================

const BASH_COMMAND_LENGTH = 60;
const GENERIC_INPUT_LENGTH = 80;

export class ToolSummary {
	constructor(
		readonly name: string,
		readonly input: MaybeRecord,
	) {}

	private field(key: string): string | undefined {
		const value = getString(this.input[key]);
		return value && value.length > 0 ? value : undefined;
	}

	private detail(): string | undefined {
		switch (this.name) {
			case "Read":
			case "Write":
			case "Edit":
			case "MultiEdit": {
				const path = this.field("file_path");
				return path ? shortPath(path) : undefined;
			}
			case "NotebookEdit": {
				const path = this.field("notebook_path");
				return path ? shortPath(path) : undefined;
			}
			case "Bash": {
				const command = this.field("command");
				return this.field("description") ?? (command ? truncate(command, BASH_COMMAND_LENGTH) : undefined);
			}
			case "Glob":
			case "Grep":
				return this.field("pattern");
			case "WebFetch":
				return this.field("url");
			case "WebSearch":
				return this.field("query");
			case "Task":
				return this.field("description");
			case "TodoWrite":
				return undefined;
			default:
				return Object.keys(this.input).length > 0
					? truncate(JSON.stringify(this.input), GENERIC_INPUT_LENGTH)
					: undefined;
		}
	}

	/** "[Bash] List files", "[Read] .../src/app.ts", "[TodoWrite]". */
	oneLine(): string {
		const detail = this.detail();
		return detail ? `[${this.name}] ${detail}` : `[${this.name}]`;
	}
}

export function toolCallsOf(entry: Entry): ToolSummary[] {
	if (entry.kind !== "assistant") return [];
	return contentBlocks(entry)
		.filter((block) => block.type === "tool_use")
		.map((block) => new ToolSummary(getString(block.name) ?? "unknown", isRecord(block.input) ? block.input : {}));
}

// ============================================================================
// Turn views
// ============================================================================

export interface TurnView {
	/** Index of the engine turn this view renders. */
	turn: number;
	id: string;
	timestamp: string;
	userText: string;
	assistantText: string;
	toolCalls: ToolSummary[];
	isCompactSummary: boolean;
	boundaryCrossed: boolean;
	stitchedPositionally: boolean;
}

export interface TurnViewOptions {
	tools?: boolean;
	/** Show compaction summaries as turns; otherwise turns marked by one are left out. */
	compactSummaries?: boolean;
}

/**
 * Displayable turns. Turns with nothing to show are dropped; a compaction
 * boundary they carried moves to the next shown turn.
 */
export function buildTurnViews(turns: readonly Turn[], options: TurnViewOptions = {}): TurnView[] {
	const views: TurnView[] = [];
	let carriedBoundary = false;
	let carriedPositional = false;

	for (const turn of turns) {
		const boundaryCrossed: boolean = carriedBoundary || turn.boundaryCrossed;
		const stitchedPositionally: boolean = carriedPositional || turn.stitchedPositionally;

		const isCompactSummary = turn.marker !== undefined;
		let userText = "";
		if (turn.marker) {
			userText = options.compactSummaries ? entryText(turn.marker) : "";
		} else if (turn.opener.kind === "user") {
			userText = entryText(turn.opener);
		}

		const assistantText = turn.entries
			.filter((e) => e.kind === "assistant")
			.map(entryText)
			.filter((text) => text.length > 0)
			.join("\n\n");
		const toolCalls = options.tools ? turn.entries.flatMap(toolCallsOf) : [];

		const hidden = isCompactSummary && !options.compactSummaries;
		if (hidden || (!userText && !assistantText && toolCalls.length === 0)) {
			carriedBoundary = boundaryCrossed;
			carriedPositional = stitchedPositionally;
			continue;
		}
		carriedBoundary = false;
		carriedPositional = false;

		views.push({
			turn: turn.index,
			id: turn.opener.id,
			timestamp: turn.opener.timestamp,
			userText,
			assistantText,
			toolCalls,
			isCompactSummary,
			boundaryCrossed,
			stitchedPositionally,
		});
	}
	return views;
}

// ============================================================================
// Raw messages
// ============================================================================

export interface TranscriptMessage {
	role: string;
	content: string;
	timestamp: string;
	id: string;
	kind: EntryKind;
}

function toolResultText(block: ContentBlock): string {
	const text = contentText(block.content);
	return block.is_error === true ? `ERROR: ${text}` : text;
}

/**
 * One message per visible piece of each entry. Tool output, thinking and system
 * content are cut to truncateLength (non-positive keeps everything).
 */
export function extractMessages(entries: readonly Entry[], truncateLength = DEFAULT_TRUNCATE): TranscriptMessage[] {
	const messages: TranscriptMessage[] = [];
	const push = (entry: Entry, role: string, content: string) => {
		messages.push({ role, content: stripAnsi(content), timestamp: entry.timestamp, id: entry.id, kind: entry.kind });
	};

	for (const entry of entries) {
		switch (entry.kind) {
			case "progress":
				break;
			case "user": {
				const text = entryText(entry);
				if (text) push(entry, "user", text);
				break;
			}
			case "summary": {
				const role = entry.record.isCompactSummary ? "compact_summary" : "summary";
				push(entry, role, truncate(entryText(entry) || (entry.record.summary ?? ""), truncateLength));
				break;
			}
			case "tool_result": {
				const results = contentBlocks(entry).filter((block) => block.type === "tool_result");
				if (results.length === 0) {
					const raw = entry.record.toolUseResult;
					const text = typeof raw === "string" ? raw : JSON.stringify(raw ?? "");
					push(entry, "user (tool_result)", truncate(text, truncateLength));
				}
				for (const block of results) {
					push(entry, "user (tool_result)", truncate(toolResultText(block), truncateLength));
				}
				break;
			}
			case "assistant": {
				const content = entry.record.message?.content;
				if (typeof content === "string") {
					push(entry, "assistant", content);
					break;
				}
				for (const block of contentBlocks(entry)) {
					if (block.type === "text") {
						const text = getString(block.text) ?? "";
						if (text.trim()) push(entry, "assistant", text);
					} else if (block.type === "tool_use") {
						const input = isRecord(block.input) ? block.input : {};
						push(entry, "assistant (tool)", new ToolSummary(getString(block.name) ?? "unknown", input).oneLine());
					} else if (block.type === "thinking") {
						push(entry, "assistant (thinking)", truncate(getString(block.thinking) ?? "", truncateLength));
					}
				}
				break;
			}
			case "system": {
				const subtype = entry.record.subtype ?? (entry.record.type === "user" ? "meta" : entry.record.type);
				const text =
					subtype === "compact_boundary"
						? "Compaction boundary"
						: (getString(entry.record.content) ?? entryText(entry));
				push(entry, `system (${subtype})`, truncate(text, truncateLength));
				break;
			}
		}
	}
	return messages;
}
