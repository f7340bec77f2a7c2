export function isObject(x: unknown): x is Record<string, unknown> {
	return typeof x === "object" && x !== null;
}

/** String value or null; anything else (missing, null, wrong type) is null. */
export function toStringOrNull(x: unknown): string | null {
	return typeof x === "string" ? x : null;
}

/** Non-negative integer count; missing or unusable values become 0. */
export function toCount(x: unknown): number {
	if (typeof x !== "number" || !Number.isFinite(x) || x < 0) return 0;
	return Math.floor(x);
}

/** Keep only the string items of an array, in order. */
export function toStringArray(x: unknown): string[] {
	return Array.isArray(x)
		? x.filter((s): s is string => typeof s === "string")
		: [];
}

const NUMBER_FMT = new Intl.NumberFormat("en");

/** 12345 -> "12,345" */
export function formatCount(n: number | null | undefined): string {
	return NUMBER_FMT.format(Number(n ?? 0));
}

/** Plain code-unit ordering (no locale collation), for reproducible sorts. */
export function compareCodeUnits(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}
