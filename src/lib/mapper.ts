// src/lib/mapper.ts
import type { CanonicalRecord, StarEntry } from "@lib/types";
import {
	isObject,
	toCount,
	toStringArray,
	toStringOrNull,
} from "@lib/utils";

/** Key that marks the timestamped (`star+json`) wrapper shape. */
const WRAPPER_KEY = "repo";

const EMPTY_REPO: Record<string, unknown> = {};

/**
 * Decide the raw shape once, by structure: a `repo` key means the
 * `{ repo, starred_at }` wrapper, anything else is a bare repository.
 */
export function classifyStarEntry(raw: unknown): StarEntry {
	if (!isObject(raw)) return { kind: "plain", repo: EMPTY_REPO, starredAt: null };
	if (WRAPPER_KEY in raw) {
		const repo = raw[WRAPPER_KEY];
		return {
			kind: "starred",
			repo: isObject(repo) ? repo : EMPTY_REPO,
			starredAt: toStringOrNull(raw.starred_at),
		};
	}
	return { kind: "plain", repo: raw, starredAt: null };
}

/** Unwrap `{ [field]: string }` from a nested object such as owner or license. */
function nestedString(obj: unknown, field: string): string | null {
	return isObject(obj) ? toStringOrNull(obj[field]) : null;
}

/** Fill every field from a raw repository object; never throws. */
function buildRecord(
	r: Record<string, unknown>,
	starredAt: string | null,
): CanonicalRecord {
	return Object.freeze({
		name: toStringOrNull(r.full_name) ?? "",
		description: toStringOrNull(r.description),
		url: toStringOrNull(r.html_url) ?? "",
		language: toStringOrNull(r.language),
		stars: toCount(r.stargazers_count),
		forks: toCount(r.forks_count),
		open_issues: toCount(r.open_issues_count),
		topics: Object.freeze(toStringArray(r.topics)),
		created_at: toStringOrNull(r.created_at),
		updated_at: toStringOrNull(r.updated_at),
		starred_at: starredAt,
		archived: r.archived === true,
		owner: nestedString(r.owner, "login"),
		owner_type: nestedString(r.owner, "type"),
		license: nestedString(r.license, "name"),
		homepage: toStringOrNull(r.homepage),
	});
}

export function normaliseRepo(entry: StarEntry): CanonicalRecord {
	return buildRecord(entry.repo, entry.starredAt);
}

/** Raw API entry (either shape) -> CanonicalRecord. */
export function mapStarEntryToRecord(raw: unknown): CanonicalRecord {
	return normaliseRepo(classifyStarEntry(raw));
}

/**
 * Re-validate a record read back from a snapshot file. Same defaults as
 * ingestion, keyed by the canonical field names.
 */
export function toCanonicalRecord(stored: unknown): CanonicalRecord {
	const s = isObject(stored) ? stored : EMPTY_REPO;
	return Object.freeze({
		name: toStringOrNull(s.name) ?? "",
		description: toStringOrNull(s.description),
		url: toStringOrNull(s.url) ?? "",
		language: toStringOrNull(s.language),
		stars: toCount(s.stars),
		forks: toCount(s.forks),
		open_issues: toCount(s.open_issues),
		topics: Object.freeze(toStringArray(s.topics)),
		created_at: toStringOrNull(s.created_at),
		updated_at: toStringOrNull(s.updated_at),
		starred_at: toStringOrNull(s.starred_at),
		archived: s.archived === true,
		owner: toStringOrNull(s.owner),
		owner_type: toStringOrNull(s.owner_type),
		license: toStringOrNull(s.license),
		homepage: toStringOrNull(s.homepage),
	});
}
