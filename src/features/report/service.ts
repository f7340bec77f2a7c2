// src/features/report/service.ts
// Pure renderer: snapshot + stats -> console lines. Printing is the caller's job.

import type { HistogramEntry, QuickStats, RecapStats } from "@features/stats";
import { sortByName } from "@features/stats";
import type { CanonicalRecord, SnapshotDocument } from "@lib/types";
import { formatCount } from "@lib/utils";
import { charLength, padEndChars, truncateChars } from "@lib/width";
import { PANEL_WIDTH, panel, titleBox } from "./panels";

const TOP_LANGUAGES = 10;
const TOP_TOPICS = 15;
const MAX_BAR = 20;
const POPULAR_NAME = 45;
const LISTED_NAME = 55;
const DESCRIPTION = 74;
const RULE = "-".repeat(PANEL_WIDTH.listing);

/* ───────────────── sections ───────────────── */

export function renderHeader(total: number, exportedAt: string): string[] {
	return panel(
		"  ⭐ GITHUB STARRED REPOS RECAP",
		PANEL_WIDTH.header,
		[`  Total: ${total} repositories`, `  Exported: ${exportedAt.slice(0, 19)}`],
		"=",
	);
}

export function renderLanguages(languages: HistogramEntry[]): string[] {
	const rows = languages
		.slice(0, TOP_LANGUAGES)
		.map(
			({ name, count }) =>
				`  ${name}: ${count} ${"█".repeat(Math.min(count, MAX_BAR))}`,
		);
	return panel("  📊 TOP LANGUAGES", PANEL_WIDTH.narrow, rows);
}

export function renderPopular(popular: readonly CanonicalRecord[]): string[] {
	const rows = popular.map((r) => {
		const name = padEndChars(truncateChars(r.name, POPULAR_NAME), POPULAR_NAME);
		return `  ${name} ⭐ ${formatCount(r.stars).padStart(10)}`;
	});
	return panel(
		"  🔥 MOST POPULAR REPOS YOU'VE STARRED",
		PANEL_WIDTH.wide,
		rows,
	);
}

export function renderRecent(recent: readonly CanonicalRecord[]): string[] {
	const rows = recent.map((r) => {
		const name = padEndChars(truncateChars(r.name, LISTED_NAME), LISTED_NAME);
		return `  ${name} ${(r.updated_at ?? "").slice(0, 10)}`;
	});
	return panel("  🕐 RECENTLY UPDATED", PANEL_WIDTH.wide, rows);
}

/** Empty when there are no topics at all: the panel is skipped, not drawn empty. */
export function renderTopics(topics: HistogramEntry[]): string[] {
	if (topics.length === 0) return [];
	const rows = topics
		.slice(0, TOP_TOPICS)
		.map(({ name, count }) => `  ${name}: ${count}`);
	return panel("  🔖 TOP TOPICS", PANEL_WIDTH.narrow, rows);
}

export function renderQuickStats(q: QuickStats): string[] {
	return panel("  📈 QUICK STATS", PANEL_WIDTH.stats, [
		`  👥 Organizations: ${q.organizations}`,
		`  👤 Users: ${q.users}`,
		`  📦 Archived: ${q.archived}`,
		`  💻 Languages: ${q.languages}`,
		`  🔖 Topics: ${q.topics}`,
	]);
}

/** Description cut to 74 characters; "..." only when something was cut. */
export function shortDescription(desc: string): string {
	const cut = truncateChars(desc, DESCRIPTION);
	return charLength(desc) > DESCRIPTION ? `${cut}...` : cut;
}

function renderEntry(r: CanonicalRecord): string[] {
	const lines = ["", `  📁 ${truncateChars(r.name, LISTED_NAME)}`];
	if (r.description) lines.push(`     ${shortDescription(r.description)}`);
	let stats = `     ⭐ ${formatCount(r.stars)}  🍴 ${formatCount(r.forks)}  💻 ${r.language || "N/A"}`;
	if (r.archived) stats += "  📦 ARCHIVED";
	lines.push(stats, `     🔗 ${r.url}`);
	return lines;
}

export function renderListing(records: readonly CanonicalRecord[]): string[] {
	return [
		...titleBox("  📋 ALL STARRED REPOS", PANEL_WIDTH.listing),
		...sortByName(records).flatMap(renderEntry),
	];
}

export function renderFooter(total: number): string[] {
	return ["", RULE, `⭐ Total: ${total} starred repositories`, RULE];
}

/* ───────────────── report ───────────────── */

/**
 * Full recap in fixed order: header, languages, popular, recent, topics
 * (when any), quick stats, listing, footer. Blank lines separate panels.
 */
export function renderReport(
	snapshot: SnapshotDocument,
	stats: RecapStats,
): string[] {
	const repos = snapshot.repositories;
	const topics = renderTopics(stats.topics);
	return [
		"",
		"",
		...renderHeader(repos.length, snapshot.exported_at),
		"",
		...renderLanguages(stats.languages),
		"",
		...renderPopular(stats.popular),
		"",
		...renderRecent(stats.recent),
		...(topics.length ? ["", ...topics] : []),
		"",
		...renderQuickStats(stats.quick),
		"",
		"",
		...renderListing(repos),
		...renderFooter(repos.length),
	];
}
