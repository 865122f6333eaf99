/**
 * Small text helpers shared by extraction and rendering.
 */

const ANSI_PATTERN = /\x1b\[[0-9;]*[A-Za-z]/g;

export function stripAnsi(text: string): string {
	return text.replace(ANSI_PATTERN, "");
}

/** Cut text to maxLength characters plus "...". A non-positive limit disables truncation. */
export function truncate(text: string, maxLength: number): string {
	if (maxLength <= 0 || text.length <= maxLength) return text;
	return `${text.slice(0, maxLength)}...`;
}

/** Keep the last maxParts path components: "/home/user/a/b.ts" -> ".../user/a/b.ts". */
export function shortPath(path: string, maxParts = 3): string {
	const segments = path.split("/").filter(Boolean);
	const parts = path.startsWith("/") ? segments.length + 1 : segments.length;
	if (parts <= maxParts) return path;
	return `.../${segments.slice(-maxParts).join("/")}`;
}

/** First line of text, whitespace collapsed. */
export function firstLine(text: string): string {
	const line = text.split("\n").find((l) => l.trim().length > 0) ?? "";
	return line.replace(/\s+/g, " ").trim();
}

const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})/;

/** "2025-01-15 10:00:00" for an ISO timestamp, the first 16 characters of anything else. */
export function formatDateTime(timestamp: string): string {
	const match = ISO_DATE_TIME.exec(timestamp);
	if (!match) return timestamp.slice(0, 16);
	return `${match[1]} ${match[2]}`;
}

/** "10:00:00" for an ISO timestamp, empty otherwise. */
export function formatTime(timestamp: string): string {
	return ISO_DATE_TIME.exec(timestamp)?.[2] ?? "";
}

export function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
	return `${count} ${count === 1 ? singular : pluralForm}`;
}
