import type { RecapStats } from "@features/stats";
import type { SnapshotFs } from "@features/snapshot";
import type { RecapConfig } from "@lib/config";
import type { getAllStars, StarsReporter } from "@lib/stars";
import type { FetchLike, SnapshotDocument } from "@lib/types";

export type { RecapConfig, RecapStats, SnapshotDocument };

/** Injectable seams; all optional, defaulting to the real network and disk. */
export type RecapDeps = {
	fetchImpl?: FetchLike;
	getAllStars?: typeof getAllStars;
	fs?: SnapshotFs;
	now?: () => Date;
};

export type RecapReporter = StarsReporter & {
	/** Fired once the snapshot is on disk. */
	exported?: (filePath: string, count: number) => void;
};

export type RenderedRecap = {
	stats: RecapStats;
	lines: string[];
};

export type RecapResult = RenderedRecap & {
	snapshot: SnapshotDocument;
};
