// src/lib/types/record.ts
// Canonical shapes shared by every stage after ingestion

import type { ISODateTime } from "./base";

/** One starred repository, normalised and total-defaulted. */
export type CanonicalRecord = {
	/** `owner/repo` */
	name: string;
	description: string | null;
	url: string;
	language: string | null;
	stars: number;
	forks: number;
	open_issues: number;
	topics: readonly string[];
	created_at: ISODateTime | null;
	updated_at: ISODateTime | null;
	/** Only set when the API returned the timestamped star shape. */
	starred_at: ISODateTime | null;
	archived: boolean;
	owner: string | null;
	owner_type: string | null;
	/** License display name (e.g. "MIT License"), not the SPDX id. */
	license: string | null;
	homepage: string | null;
};

/** Persisted export document; written whole on every run. */
export type SnapshotDocument = {
	exported_at: ISODateTime;
	total_count: number;
	/** Fetch order, never re-sorted. */
	repositories: readonly CanonicalRecord[];
};
