// src/features/snapshot/service.ts
import * as nodeFs from "node:fs";
import { dirname } from "node:path";
import { errorMessage, SerializationError } from "@lib/errors";
import { toCanonicalRecord } from "@lib/mapper";
import { isObject } from "@lib/utils";
import type {
	CanonicalRecord,
	ExportDeps,
	SnapshotDocument,
	SnapshotFs,
} from "./types";

/** Wrap records (fetch order kept) with export metadata. */
export function buildSnapshot(
	records: readonly CanonicalRecord[],
	now: Date = new Date(),
): SnapshotDocument {
	return Object.freeze({
		exported_at: now.toISOString(),
		total_count: records.length,
		repositories: Object.freeze([...records]),
	});
}

/** Two-space JSON; non-ASCII stays literal. */
export function serialiseSnapshot(doc: SnapshotDocument): string {
	return JSON.stringify(doc, null, 2);
}

/** Full overwrite of `filePath`; creates the parent directory if needed. */
export function writeSnapshot(
	filePath: string,
	doc: SnapshotDocument,
	_fs: SnapshotFs = nodeFs,
): void {
	try {
		const dir = dirname(filePath);
		if (!_fs.existsSync(dir)) _fs.mkdirSync(dir, { recursive: true });
		_fs.writeFileSync(filePath, serialiseSnapshot(doc), "utf8");
	} catch (e) {
		throw new SerializationError(
			`Failed to write snapshot ${filePath}: ${errorMessage(e)}`,
			"write",
			filePath,
			{ cause: e },
		);
	}
}

/** Build, persist and return the snapshot. */
export function exportSnapshot(
	records: readonly CanonicalRecord[],
	filePath: string,
	deps: ExportDeps = {},
): SnapshotDocument {
	const doc = buildSnapshot(records, deps.now?.() ?? new Date());
	writeSnapshot(filePath, doc, deps.fs);
	return doc;
}

/**
 * Parse snapshot JSON written by `writeSnapshot`. Records are re-defaulted and
 * `total_count` is recomputed from the array rather than trusted.
 */
export function parseSnapshot(
	text: string,
	source = "<snapshot>",
): SnapshotDocument {
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (e) {
		throw new SerializationError(
			`Snapshot ${source} is not valid JSON: ${errorMessage(e)}`,
			"read",
			source,
			{ cause: e },
		);
	}
	if (!isObject(data) || !Array.isArray(data.repositories)) {
		throw new SerializationError(
			`Snapshot ${source} has no "repositories" array`,
			"read",
			source,
		);
	}
	const repositories = data.repositories.map(toCanonicalRecord);
	return Object.freeze({
		exported_at:
			typeof data.exported_at === "string" ? data.exported_at : "",
		total_count: repositories.length,
		repositories: Object.freeze(repositories),
	});
}

export function readSnapshot(
	filePath: string,
	_fs: Pick<SnapshotFs, "readFileSync"> = nodeFs,
): SnapshotDocument {
	let text: string;
	try {
		text = _fs.readFileSync(filePath, "utf8");
	} catch (e) {
		throw new SerializationError(
			`Failed to read snapshot ${filePath}: ${errorMessage(e)}`,
			"read",
			filePath,
			{ cause: e },
		);
	}
	return parseSnapshot(text, filePath);
}
