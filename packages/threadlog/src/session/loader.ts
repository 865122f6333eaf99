/**
 * Entry loader: one JSONL file in, entries and warnings out.
 */

import { readFileSync } from "node:fs";
import { IntegrityError } from "../errors.js";
import { defaultClassifier, type EntryClassifier } from "./classify.js";
import { type Entry, type ParseWarning, type RawRecord, rawRecordSchema, type SessionFile } from "./types.js";

export interface LoadOptions {
	classifier?: EntryClassifier;
}

export type ParsedLine =
	| { type: "entry"; entry: Entry }
	| { type: "metadata"; record: RawRecord; line: number }
	| { type: "warning"; warning: ParseWarning };

export interface LoadedFile {
	file: SessionFile;
	entries: Entry[];
	/** Session titles from id-less summary lines. */
	titles: string[];
	warnings: ParseWarning[];
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}T/;

/** Epoch milliseconds for an ISO timestamp, -Infinity for anything else. */
export function parseTimestamp(value: string | null | undefined): number {
	if (!value || !ISO_DATE.test(value)) return Number.NEGATIVE_INFINITY;
	const time = Date.parse(value);
	return Number.isNaN(time) ? Number.NEGATIVE_INFINITY : time;
}

/**
 * Parse JSONL content line by line.
 * Malformed lines yield warnings and take no sequence number.
 */
export function* readEntries(content: string, file: SessionFile, options: LoadOptions = {}): Generator<ParsedLine> {
	const classifier = options.classifier ?? defaultClassifier;
	const lines = content.split("\n");
	let sequence = 0;

	for (let i = 0; i < lines.length; i++) {
		const text = lines[i].trim();
		if (!text) continue;
		const line = i + 1;

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			yield { type: "warning", warning: { type: "parse", file: file.path, line, message: `Invalid JSON: ${message}` } };
			continue;
		}

		const parsed = rawRecordSchema.safeParse(json);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
			yield {
				type: "warning",
				warning: {
					type: "parse",
					file: file.path,
					line,
					message: `Unrecognized record${where}: ${issue?.message ?? "invalid shape"}`,
				},
			};
			continue;
		}

		const record = parsed.data;
		if (!record.uuid) {
			yield { type: "metadata", record, line };
			continue;
		}

		const timestamp = record.timestamp ?? "";
		yield {
			type: "entry",
			entry: {
				id: record.uuid,
				parentId: record.parentUuid ?? null,
				logicalParentId: record.logicalParentUuid ?? undefined,
				kind: classifier.kindOf(record),
				timestamp,
				time: parseTimestamp(timestamp),
				sequence: sequence++,
				line,
				file: file.index,
				sidechain: record.isSidechain === true,
				toolInvocation: classifier.isToolInvocation(record),
				record,
			},
		};
	}
}

/** Collect a file's parsed lines, rejecting duplicate ids. */
export function collectEntries(content: string, file: SessionFile, options: LoadOptions = {}): LoadedFile {
	const entries: Entry[] = [];
	const titles: string[] = [];
	const warnings: ParseWarning[] = [];
	const seen = new Set<string>();

	for (const parsed of readEntries(content, file, options)) {
		if (parsed.type === "warning") {
			warnings.push(parsed.warning);
		} else if (parsed.type === "metadata") {
			if (parsed.record.type === "summary" && parsed.record.summary) {
				titles.push(parsed.record.summary);
			}
		} else {
			const { entry } = parsed;
			if (seen.has(entry.id)) {
				throw new IntegrityError(
					`Duplicate entry id ${entry.id} at line ${entry.line} of ${file.path}`,
					file.path,
					entry.id,
				);
			}
			seen.add(entry.id);
			entries.push(entry);
		}
	}

	return { file, entries, titles, warnings };
}

/** Snapshot a session file with a single read. */
export function loadSessionFile(path: string, index: number, options: LoadOptions = {}): LoadedFile {
	const content = readFileSync(path, "utf8");
	return collectEntries(content, { path, index }, options);
}
