// src/lib/stars.ts

import { TransportError } from "./errors";
import { GITHUB_API, githubREST, STAR_MEDIA_TYPE } from "./github";
import type { FetchLike, Reporter } from "./types";
import { NoopReporter } from "./types";

/** Fixed by the endpoint's maximum; not configurable. */
export const STARS_PAGE_SIZE = 100;

/** Reporter with an optional per-page progress hook. */
export type StarsReporter = Reporter & {
	page?: (pageNo: number, total: number) => void;
};

const SilentStarsReporter: StarsReporter = NoopReporter;

export function starredPath(username: string, page: number): string {
	const user = encodeURIComponent(username);
	return `/users/${user}/starred?page=${page}&per_page=${STARS_PAGE_SIZE}`;
}

/* ─────────────────────── internals ───────────────────────── */

async function fetchStarsPage(
	username: string,
	token: string | null,
	page: number,
	fetchImpl: FetchLike | undefined,
	reporter: StarsReporter,
): Promise<unknown[]> {
	const path = starredPath(username, page);
	reporter.debug(`stars: GET page=${page} size=${STARS_PAGE_SIZE}`);

	const body = await githubREST<unknown>(
		token,
		path,
		{ accept: STAR_MEDIA_TYPE },
		fetchImpl,
	);
	if (!Array.isArray(body)) {
		throw new TransportError(
			`GET ${path} -> expected a JSON array, got ${typeof body}`,
			200,
			`${GITHUB_API}${path}`,
		);
	}
	return body;
}

/* ─────────────────────── public API ──────────────────────── */

/**
 * Stream raw starred entries page by page, starting at page 1.
 * Stops on the first empty page; a failed page throws out of the loop.
 */
export async function* getAllStarsStream(
	username: string,
	token: string | null,
	fetchImpl?: FetchLike,
	reporter: StarsReporter = SilentStarsReporter,
): AsyncGenerator<unknown[], void, void> {
	let pageNo = 0;
	let total = 0;

	for (;;) {
		pageNo++;
		const batch = await fetchStarsPage(
			username,
			token,
			pageNo,
			fetchImpl,
			reporter,
		);
		if (batch.length === 0) break;

		total += batch.length;
		reporter.debug(
			`stars: page #${pageNo} got=${batch.length} total=${total}`,
		);
		reporter.page?.(pageNo, total);
		yield batch;
	}
	reporter.debug(`stars: done pages=${pageNo - 1} total=${total}`);
}

/** Fetch **all** raw starred entries; fully materialised before returning. */
export async function getAllStars(
	username: string,
	token: string | null,
	fetchImpl?: FetchLike,
	reporter: StarsReporter = SilentStarsReporter,
): Promise<unknown[]> {
	const entries: unknown[] = [];
	for await (const batch of getAllStarsStream(
		username,
		token,
		fetchImpl,
		reporter,
	)) {
		entries.push(...batch);
	}
	return entries;
}
