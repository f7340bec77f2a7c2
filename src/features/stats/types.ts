import type { CanonicalRecord } from "@lib/types";

export type { CanonicalRecord };

/** One histogram bucket. */
export type HistogramEntry = {
	name: string;
	count: number;
};

export type QuickStats = {
	total: number;
	archived: number;
	/** owner_type === "Organization" */
	organizations: number;
	/** total - organizations (includes records with no owner type) */
	users: number;
	languages: number;
	topics: number;
};

export type RecapStats = {
	/** Full histogram, most used first; ties keep first-seen order. */
	languages: HistogramEntry[];
	topics: HistogramEntry[];
	/** First 10 by stars. */
	popular: CanonicalRecord[];
	/** First 10 by updated_at. */
	recent: CanonicalRecord[];
	quick: QuickStats;
};
