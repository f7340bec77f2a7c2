/**
 * Shared public types & errors used by the programmatic API.
 */

export type { RecapConfig } from "@lib/config";
export {
	ConfigError,
	SerializationError,
	TransportError,
} from "@lib/errors";
export type { CanonicalRecord, FetchLike, SnapshotDocument } from "@lib/types";

/* -------------------------------------------------------------------------- */
/*  PROGRESS                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Lifecycle markers for progress events.
 * `page` covers paginated fetches; `done` marks the end of a phase.
 */
export type ProgressDetail =
	| { status: "page"; page: number }
	| { status: "done"; count: number };

/**
 * Progress notification emitted by the fetch and export steps.
 * Phases follow a `verbing:subject` convention (`fetching:stars`,
 * `exporting:snapshot`) so listeners can route by verb.
 */
export interface ProgressEvent {
	phase: string;
	/** Page number while fetching. */
	index?: number;
	/** Running total of entries. */
	total?: number;
	item?: string;
	detail?: ProgressDetail;
}

/** Synchronous listener; return values are ignored. */
export type ProgressEmitter<TPhase extends string = string> = (
	event: ProgressEvent & { phase: TPhase },
) => void;
