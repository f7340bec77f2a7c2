// src/lib/github.ts
import { TransportError } from "./errors";
import type { FetchLike } from "./types";

export const GITHUB_API = "https://api.github.com";

/** Star media type: each entry becomes `{ starred_at, repo }`. */
export const STAR_MEDIA_TYPE = "application/vnd.github.v3.star+json";

export function ghHeaders(
	token: string | null,
	accept = "application/vnd.github+json",
): Record<string, string> {
	const ua = process.env.GH_USER_AGENT ?? "star-recap/0.1";
	const apiVersion = process.env.GITHUB_API_VERSION ?? "2022-11-28";
	const headers: Record<string, string> = {
		Accept: accept,
		"User-Agent": ua,
		"X-GitHub-Api-Version": apiVersion,
	};
	// Unauthenticated calls are legal, just rate-limited harder
	if (token) headers.Authorization = `Bearer ${token}`;
	return headers;
}

/**
 * Single GET against the REST API. Any non-2xx status throws TransportError;
 * there is deliberately no retry or backoff.
 */
export async function githubREST<T>(
	token: string | null,
	path: string,
	opts: { accept?: string } = {},
	fetchImpl?: FetchLike,
): Promise<T> {
	const doFetch = fetchImpl ?? fetch;
	const url = `${GITHUB_API}${path}`;
	const headers = ghHeaders(token, opts.accept);

	if (process.env.DEBUG) console.error(`[rest] GET ${path}`);
	const res = await doFetch(url, { method: "GET", headers });

	if (!res.ok) {
		const txt = await res.text().catch(() => "");
		throw new TransportError(
			`GET ${path} -> ${res.status} ${txt.slice(0, 200)}`.trim(),
			res.status,
			url,
		);
	}

	return res.json() as Promise<T>;
}
