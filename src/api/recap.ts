// ./api/recap.ts
import { renderFromSnapshot, runRecap } from "@features/recap";
import { readSnapshot } from "@features/snapshot";
import { resolveRecapConfig, resolveSnapshotPath } from "@lib/config";
import type { LoggerLike, RecapCliOptions, ReportCliOptions } from "./types";
import { createRecapReporter, plural, printRecap } from "./utils";

/* ----------------------------- Types & DI seams ----------------------------- */

type RecapCoreDeps = {
	runRecap: typeof runRecap;
	readSnapshot: typeof readSnapshot;
	resolveRecapConfig: typeof resolveRecapConfig;
	resolveSnapshotPath: typeof resolveSnapshotPath;
};

const defaultDeps: RecapCoreDeps = {
	runRecap,
	readSnapshot,
	resolveRecapConfig,
	resolveSnapshotPath,
};

/* ------------------------------ recap command ------------------------------ */

/** Fetch all stars, write the snapshot, print the recap. */
export async function runRecapCore(
	opts: RecapCliOptions,
	logger: LoggerLike,
	deps: RecapCoreDeps = defaultDeps,
): Promise<void> {
	const config = deps.resolveRecapConfig({
		username: opts.user,
		outFile: opts.out,
	});
	logger.info(`Fetching starred repos for ${config.username}...`);

	const s = logger.spinner("Fetching stars...").start();
	let result: Awaited<ReturnType<typeof runRecap>>;
	try {
		result = await deps.runRecap(
			config,
			{},
			createRecapReporter(logger, s),
		);
		s.succeed(`Fetched ${plural(result.snapshot.total_count, "repository")}`);
	} catch (e) {
		s.fail?.("Failed while fetching stars");
		throw e;
	}

	logger.success(`💾 Exported to ${config.outFile}`);
	printRecap(logger, result, opts.json);
}

/* ------------------------------ report command ----------------------------- */

/** Re-render a snapshot already on disk; no network. */
export async function runReportCore(
	opts: ReportCliOptions,
	logger: LoggerLike,
	deps: RecapCoreDeps = defaultDeps,
): Promise<void> {
	const file = deps.resolveSnapshotPath(opts.in);
	const snapshot = deps.readSnapshot(file);
	logger.debug(`report: loaded ${snapshot.total_count} records from ${file}`);
	printRecap(logger, renderFromSnapshot(snapshot), opts.json);
}
