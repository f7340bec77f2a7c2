import type * as fs from "node:fs";
import type { CanonicalRecord, SnapshotDocument } from "@lib/types";

// Re-export types used by service
export type { CanonicalRecord, SnapshotDocument };

/** Narrow fs surface so tests can inject failures. */
export type SnapshotFs = Pick<
	typeof fs,
	"existsSync" | "mkdirSync" | "writeFileSync" | "readFileSync"
>;

export type ExportDeps = {
	fs?: SnapshotFs;
	now?: () => Date;
};
