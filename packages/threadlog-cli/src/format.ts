/**
 * Rendering: terminal text (chalk), JSON and Markdown.
 */

import chalk from "chalk";
import type { TranscriptMessage, TurnView } from "./extract.js";
import { formatDateTime, formatTime, stripAnsi } from "./utils/text.js";

// ============================================================================
// Color helpers
// ============================================================================

export const colors = {
	user: chalk.bold.cyan,
	assistant: chalk.bold.green,
	tool: chalk.yellow,
	muted: chalk.gray,
	dim: chalk.dim,
	bold: chalk.bold,
	error: chalk.red,
	warning: chalk.yellow,
	success: chalk.green,
};

export interface TurnFormatOptions {
	timestamps?: boolean;
	tools?: boolean;
}

function boundaryLabels(turn: TurnView): string[] {
	const labels: string[] = [];
	if (turn.boundaryCrossed) labels.push(colors.muted("[continued after compaction]"));
	if (turn.stitchedPositionally) labels.push(colors.warning("[stitched by position]"));
	return labels;
}

export function formatTurn(turn: TurnView, position: number, total: number, options: TurnFormatOptions = {}): string {
	const lines: string[] = [];
	const counter = `[${position}/${total}]`;

	const userHeader = [colors.user(`${counter} USER`)];
	if (turn.isCompactSummary) userHeader.push(colors.muted("[Compaction Summary]"));
	if (options.timestamps) {
		const time = formatTime(turn.timestamp);
		if (time) userHeader.push(colors.dim(time));
	}
	userHeader.push(...boundaryLabels(turn));

	if (turn.userText) {
		lines.push(userHeader.join(" "), turn.userText);
	} else if (userHeader.length > 1) {
		lines.push(userHeader.join(" "));
	}

	const showTools = options.tools && turn.toolCalls.length > 0;
	if (turn.assistantText || showTools) {
		if (lines.length > 0) lines.push("");
		lines.push(colors.assistant(`${counter} ASSISTANT`));
		if (turn.assistantText) lines.push(turn.assistantText);
		if (showTools) {
			lines.push(colors.dim(`(${turn.toolCalls.length} tool calls)`));
			for (const call of turn.toolCalls) {
				lines.push(`  ${colors.tool(call.oneLine())}`);
			}
		}
	}
	return lines.join("\n");
}

export function formatTurns(turns: readonly TurnView[], positions: readonly number[], options: TurnFormatOptions = {}): string {
	return positions
		.map((position) => {
			const turn = turns[position - 1];
			return turn ? formatTurn(turn, position, turns.length, options) : "";
		})
		.filter(Boolean)
		.join("\n\n");
}

export function formatMessage(
	message: TranscriptMessage,
	position: number,
	total: number,
	options: { timestamps?: boolean } = {},
): string {
	const header = [colors.bold(`[${position}/${total}] ${message.role.toUpperCase()}`), colors.dim(message.id.slice(0, 12))];
	if (options.timestamps) {
		const time = formatTime(message.timestamp);
		if (time) header.push(colors.dim(time));
	}
	return `${header.join(" ")}\n${stripAnsi(message.content)}`;
}

// ============================================================================
// JSON
// ============================================================================

export function formatTurnsJson(
	turns: readonly TurnView[],
	sessionId: string,
	positions: readonly number[],
): string {
	const selected = positions.flatMap((position) => {
		const turn = turns[position - 1];
		if (!turn) return [];
		return [
			{
				index: position,
				id: turn.id,
				timestamp: turn.timestamp,
				compactSummary: turn.isCompactSummary,
				boundaryCrossed: turn.boundaryCrossed,
				stitchedPositionally: turn.stitchedPositionally,
				user: { text: turn.userText },
				assistant: {
					text: turn.assistantText,
					...(turn.toolCalls.length > 0
						? { toolCalls: turn.toolCalls.map((call) => ({ name: call.name, input: call.input })) }
						: {}),
				},
			},
		];
	});
	return JSON.stringify({ sessionId, totalTurns: turns.length, turns: selected }, null, 2);
}

export function formatMessagesJson(
	messages: readonly TranscriptMessage[],
	sessionId: string,
	positions: readonly number[] = messages.map((_, i) => i + 1),
): string {
	const selected = positions.flatMap((position) => {
		const message = messages[position - 1];
		return message
			? [{ index: position, role: message.role, content: message.content, timestamp: message.timestamp, id: message.id }]
			: [];
	});
	return JSON.stringify({ sessionId, totalMessages: messages.length, messages: selected }, null, 2);
}

// ============================================================================
// Markdown
// ============================================================================

export interface MarkdownHeader {
	sessionId: string;
	title?: string;
	files: number;
}

export function formatTurnsMarkdown(turns: readonly TurnView[], header: MarkdownHeader): string {
	const lines = [`# Session ${header.sessionId}`, ""];
	if (header.title) lines.push(`- Title: ${header.title}`);
	lines.push(`- Turns: ${turns.length}`);
	if (header.files > 1) lines.push(`- Files: ${header.files}`);
	lines.push("");

	if (turns.length === 0) {
		lines.push("No conversation turns.");
		return lines.join("\n");
	}

	turns.forEach((turn, i) => {
		const when = turn.timestamp ? ` (${formatDateTime(turn.timestamp)})` : "";
		lines.push(`## Turn ${i + 1}${when}`, "");
		if (turn.boundaryCrossed) lines.push("_Continued after compaction._", "");
		if (turn.userText) {
			lines.push(turn.isCompactSummary ? "**Compaction Summary**" : "**User**", "", turn.userText, "");
		}
		if (turn.assistantText || turn.toolCalls.length > 0) {
			lines.push("**Assistant**", "");
			if (turn.assistantText) lines.push(turn.assistantText, "");
			for (const call of turn.toolCalls) {
				lines.push(`- \`${call.oneLine()}\``);
			}
			if (turn.toolCalls.length > 0) lines.push("");
		}
	});
	return lines.join("\n").trimEnd();
}

export function formatMessagesMarkdown(messages: readonly TranscriptMessage[], header: MarkdownHeader): string {
	const lines = [`# Session ${header.sessionId}`, ""];
	if (header.title) lines.push(`- Title: ${header.title}`);
	lines.push(`- Messages: ${messages.length}`, "");
	for (const message of messages) {
		lines.push(`### ${message.role}`, "", message.content, "");
	}
	return lines.join("\n").trimEnd();
}
