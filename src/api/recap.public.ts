import {
	type RecapResult,
	type RenderedRecap,
	renderFromSnapshot,
	runRecap,
} from "@features/recap";
import { readSnapshot } from "@features/snapshot";
import { resolveRecapConfig } from "@lib/config";
import { mapStarEntryToRecord } from "@lib/mapper";
import { getAllStars } from "@lib/stars";
import type { CanonicalRecord, FetchLike } from "@lib/types";
import type { ProgressEmitter } from "./public.types";

/** Options shared by the programmatic entry points. */
export interface StarsFetchOptions {
	/** Falls back to GITHUB_USERNAME. */
	username?: string;
	// NOTE: override token useful for tests / programmatic use
	GITHUB_TOKEN?: string;
	fetchImpl?: FetchLike;
	onProgress?: ProgressEmitter<"fetching:stars" | "exporting:snapshot">;
}

export interface RecapOptions extends StarsFetchOptions {
	/** Falls back to STARS_OUT_FILE, then `starred_repos.json`. */
	outFile?: string;
}

export interface StarsFetchResult {
	items: CanonicalRecord[];
	stats: { count: number; pages: number; fetchedAt: string };
}

function pageEmitter(onProgress: StarsFetchOptions["onProgress"]) {
	return (page: number, total: number) =>
		onProgress?.({
			phase: "fetching:stars",
			index: page,
			total,
			detail: { status: "page", page },
		});
}

/** Fetch and normalise all stars as plain data (no disk writes, no logging). */
export async function fetchStarredRepos(
	opts: StarsFetchOptions = {},
): Promise<StarsFetchResult> {
	const config = resolveRecapConfig({
		username: opts.username,
		token: opts.GITHUB_TOKEN,
	});
	let pages = 0;
	const onPage = pageEmitter(opts.onProgress);
	const raw = await getAllStars(config.username, config.token, opts.fetchImpl, {
		debug: () => {},
		page(page, total) {
			pages = page;
			onPage(page, total);
		},
	});
	const items = raw.map(mapStarEntryToRecord);
	return {
		items,
		stats: { count: items.length, pages, fetchedAt: new Date().toISOString() },
	};
}

/** Full run: fetch, write the snapshot, aggregate and render (lines are returned, not printed). */
export async function recap(opts: RecapOptions = {}): Promise<RecapResult> {
	const config = resolveRecapConfig({
		username: opts.username,
		token: opts.GITHUB_TOKEN,
		outFile: opts.outFile,
	});
	const { onProgress } = opts;
	return runRecap(
		config,
		{ fetchImpl: opts.fetchImpl },
		{
			debug: () => {},
			page: pageEmitter(onProgress),
			exported(filePath, count) {
				onProgress?.({
					phase: "exporting:snapshot",
					item: filePath,
					total: count,
					detail: { status: "done", count },
				});
			},
		},
	);
}

/** Load a snapshot file and render it without touching the network. */
export function renderSnapshotFile(filePath: string): RenderedRecap {
	return renderFromSnapshot(readSnapshot(filePath));
}
