// src/__test__/github-fakes.ts
import type {
	FetchLike,
	GitHubRepo,
	StarredRepoPayload,
} from "@lib/types";

export type FakeCall = { url: string; headers: Record<string, string> };

export interface FakeStarsOptions {
	/** Respond to this page number with an HTTP error instead of data. */
	failOnPage?: number;
	failStatus?: number;
}

/** Header names come back lower-cased, as `Headers` normalises them. */
function headersOf(init?: RequestInit): Record<string, string> {
	return Object.fromEntries(new Headers(init?.headers).entries());
}

/**
 * Fake `fetch` for GET /users/{u}/starred. `pages[i]` answers `page=i+1`;
 * any page past the end answers `[]`, like the real endpoint.
 */
export function makeFakeStarsFetch(
	pages: unknown[][],
	opts: FakeStarsOptions = {},
): { fetch: FetchLike; calls: FakeCall[] } {
	const calls: FakeCall[] = [];
	const fetch: FetchLike = async (input, init) => {
		const url = String(input);
		calls.push({ url, headers: headersOf(init) });
		const page = Number(new URL(url).searchParams.get("page") ?? "0");
		if (opts.failOnPage === page) {
			return new Response(JSON.stringify({ message: "boom" }), {
				status: opts.failStatus ?? 500,
				headers: { "Content-Type": "application/json" },
			});
		}
		const body = pages[page - 1] ?? [];
		return new Response(JSON.stringify(body), {
			status: 200,
			headers: { "Content-Type": "application/json" },
		});
	};
	return { fetch, calls };
}

const DEFAULT_REPO: Readonly<GitHubRepo> = {
	full_name: "o/r",
	html_url: "https://github.com/o/r",
	description: "d",
	language: "TypeScript",
	stargazers_count: 10,
	forks_count: 2,
	open_issues_count: 3,
	topics: ["x", "y"],
	created_at: "2023-01-01T00:00:00Z",
	updated_at: "2024-01-04T00:00:00Z",
	archived: false,
	owner: { login: "o", type: "User" },
	license: { key: "mit", name: "MIT License", spdx_id: "MIT" },
	homepage: null,
};

export function makeRepo(partial: Partial<GitHubRepo> = {}): GitHubRepo {
	return { ...DEFAULT_REPO, ...partial };
}

/** Timestamped (`star+json`) shape. */
export function makeStarred(
	partial: Partial<GitHubRepo> = {},
	starredAt = "2024-01-01T00:00:00Z",
): StarredRepoPayload {
	return { repo: makeRepo(partial), starred_at: starredAt };
}
