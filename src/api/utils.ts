// ./api/utils.ts

import type { RecapReporter } from "@features/recap";
import type { LoggerLike, Spinner } from "./types";

/* -----------------------------------------------------------------------------
 * UX HELPERS
 * -------------------------------------------------------------------------- */

export function plural(n: number, word: string): string {
	return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** Route pipeline progress into a running spinner and debug logs. */
export function createRecapReporter(
	logger: LoggerLike,
	spinner: Spinner,
): RecapReporter {
	return {
		debug: (...a) => logger.debug(...a),
		page(pageNo, total) {
			spinner.text = `Fetched page ${pageNo} (${total} repos so far)`;
		},
		exported(filePath, count) {
			spinner.text = `Exported ${plural(count, "repository")} to ${filePath}`;
		},
	};
}

/* -----------------------------------------------------------------------------
 * HUMAN PRINTERS (structural logger)
 * -------------------------------------------------------------------------- */

/** Emit rendered report lines verbatim, or the stats as JSON. */
export function printRecap(
	logger: LoggerLike,
	out: { lines: string[]; stats: unknown },
	json: boolean,
): void {
	if (json) {
		if (logger.json) logger.json(out.stats);
		else logger.line(JSON.stringify(out.stats, null, 2));
		return;
	}
	for (const l of out.lines) logger.line(l);
}
