// src/lib/types/github.ts
// REST shapes for GET /users/{username}/starred

/** Owner object nested in a repository payload. */
export type GitHubOwner = {
	login?: string | null;
	type?: string | null;
};

/** License object nested in a repository payload. */
export type GitHubLicense = {
	key?: string | null;
	name?: string | null;
	spdx_id?: string | null;
};

/** Fields we read from a REST repository object; everything may be missing. */
export type GitHubRepo = {
	full_name?: string;
	html_url?: string;
	description?: string | null;
	language?: string | null;
	stargazers_count?: number | null;
	forks_count?: number | null;
	open_issues_count?: number | null;
	topics?: string[] | null;
	created_at?: string | null;
	updated_at?: string | null;
	archived?: boolean | null;
	owner?: GitHubOwner | null;
	license?: GitHubLicense | null;
	homepage?: string | null;
};

/** `application/vnd.github.v3.star+json` wraps each repo with its star time. */
export type StarredRepoPayload = {
	repo: GitHubRepo;
	starred_at: string;
};

/**
 * Raw entry after shape detection at the ingestion boundary.
 * Nothing downstream of the mapper looks at raw payloads again.
 */
export type StarEntry =
	| { kind: "starred"; repo: Record<string, unknown>; starredAt: string | null }
	| { kind: "plain"; repo: Record<string, unknown>; starredAt: null };
