// src/features/stats/service.ts
// Pure aggregation over the canonical record set.

import { compareCodeUnits } from "@lib/utils";
import type {
	CanonicalRecord,
	HistogramEntry,
	QuickStats,
	RecapStats,
} from "./types";

export const TOP_REPOS = 10;
const ORGANIZATION = "Organization";

/**
 * Count values, then order by count descending. Map keeps insertion order and
 * Array#sort is stable, so equal counts stay in first-seen order.
 */
export function histogram(values: Iterable<string>): HistogramEntry[] {
	const counts = new Map<string, number>();
	for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
	return Array.from(counts, ([name, count]) => ({ name, count })).sort(
		(a, b) => b.count - a.count,
	);
}

/** Languages of records that have one; null and "" are not counted. */
export function languageHistogram(
	records: readonly CanonicalRecord[],
): HistogramEntry[] {
	return histogram(
		records
			.map((r) => r.language)
			.filter((l): l is string => !!l),
	);
}

export function topicHistogram(
	records: readonly CanonicalRecord[],
): HistogramEntry[] {
	return histogram(records.flatMap((r) => r.topics));
}

/** Stable sort, most stars first. */
export function rankByStars(
	records: readonly CanonicalRecord[],
): CanonicalRecord[] {
	return [...records].sort((a, b) => b.stars - a.stars);
}

/** Stable sort, latest `updated_at` first; null sorts as "" (oldest). */
export function rankByUpdated(
	records: readonly CanonicalRecord[],
): CanonicalRecord[] {
	return [...records].sort((a, b) =>
		compareCodeUnits(b.updated_at ?? "", a.updated_at ?? ""),
	);
}

/** Case-insensitive name order for the full listing. */
export function sortByName(
	records: readonly CanonicalRecord[],
): CanonicalRecord[] {
	return [...records].sort((a, b) =>
		compareCodeUnits(a.name.toLowerCase(), b.name.toLowerCase()),
	);
}

export function quickStats(
	records: readonly CanonicalRecord[],
	languages: HistogramEntry[] = languageHistogram(records),
	topics: HistogramEntry[] = topicHistogram(records),
): QuickStats {
	const archived = records.filter((r) => r.archived).length;
	const organizations = records.filter(
		(r) => r.owner_type === ORGANIZATION,
	).length;
	return {
		total: records.length,
		archived,
		organizations,
		users: records.length - organizations,
		languages: languages.length,
		topics: topics.length,
	};
}

export function aggregate(records: readonly CanonicalRecord[]): RecapStats {
	const languages = languageHistogram(records);
	const topics = topicHistogram(records);
	return {
		languages,
		topics,
		popular: rankByStars(records).slice(0, TOP_REPOS),
		recent: rankByUpdated(records).slice(0, TOP_REPOS),
		quick: quickStats(records, languages, topics),
	};
}
