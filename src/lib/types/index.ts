// src/lib/types/index.ts
// Main types export - consolidate all type exports here

export type { ISODateTime } from "./base";
export type {
	GitHubLicense,
	GitHubOwner,
	GitHubRepo,
	StarEntry,
	StarredRepoPayload,
} from "./github";
export type { CanonicalRecord, SnapshotDocument } from "./record";
export type { Reporter } from "./utilities";
export { NoopReporter } from "./utilities";

export type FetchLike = (
	input: string | URL,
	init?: RequestInit,
) => Promise<Response>;
