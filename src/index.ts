// Public library-facing APIs
export * from "./api/public.types";
export {
	fetchStarredRepos,
	type RecapOptions,
	recap,
	renderSnapshotFile,
	type StarsFetchOptions,
	type StarsFetchResult,
} from "./api/recap.public";

// Pure building blocks
export type { RecapResult, RenderedRecap } from "./features/recap";
export { renderReport } from "./features/report";
export {
	buildSnapshot,
	parseSnapshot,
	serialiseSnapshot,
} from "./features/snapshot";
export {
	aggregate,
	type HistogramEntry,
	languageHistogram,
	type QuickStats,
	type RecapStats,
	rankByStars,
	rankByUpdated,
	topicHistogram,
} from "./features/stats";
export {
	classifyStarEntry,
	mapStarEntryToRecord,
	normaliseRepo,
} from "./lib/mapper";
export { displayWidth, padLine } from "./lib/width";
