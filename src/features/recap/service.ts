// src/features/recap/service.ts
// fetch -> normalise -> export -> aggregate -> render, strictly in sequence.

import { renderReport } from "@features/report";
import { exportSnapshot } from "@features/snapshot";
import { aggregate } from "@features/stats";
import { mapStarEntryToRecord } from "@lib/mapper";
import { getAllStars } from "@lib/stars";
import { NoopReporter } from "@lib/types";
import type {
	RecapConfig,
	RecapDeps,
	RecapReporter,
	RecapResult,
	RenderedRecap,
	SnapshotDocument,
} from "./types";

/** Aggregate and render an already built (or loaded) snapshot. */
export function renderFromSnapshot(snapshot: SnapshotDocument): RenderedRecap {
	const stats = aggregate(snapshot.repositories);
	return { stats, lines: renderReport(snapshot, stats) };
}

/**
 * One full run. The snapshot is written only after every page has been
 * fetched; a failure on any page propagates and leaves the previous file
 * untouched.
 */
export async function runRecap(
	config: RecapConfig,
	deps: RecapDeps = {},
	reporter: RecapReporter = NoopReporter,
): Promise<RecapResult> {
	const fetchAll = deps.getAllStars ?? getAllStars;
	const raw = await fetchAll(
		config.username,
		config.token,
		deps.fetchImpl,
		reporter,
	);

	const records = raw.map(mapStarEntryToRecord);
	reporter.debug(`recap: normalised ${records.length} records`);

	const snapshot = exportSnapshot(records, config.outFile, {
		fs: deps.fs,
		now: deps.now,
	});
	reporter.exported?.(config.outFile, snapshot.total_count);

	return { snapshot, ...renderFromSnapshot(snapshot) };
}
