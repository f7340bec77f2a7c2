// src/lib/width.ts
// Terminal column measurement for the boxed report.

import { eastAsianWidthType } from "get-east-asian-width";

const ZWJ = 0x200d;
const VS_START = 0xfe00;
const VS_END = 0xfe0f;
/** Code points above this are treated as emoji-range symbols. */
const EMOJI_FLOOR = 0x1f300;

function codePointWidth(cp: number): 0 | 1 | 2 {
	if (cp >= VS_START && cp <= VS_END) return 0;
	if (cp === ZWJ) return 0;
	const eaw = eastAsianWidthType(cp);
	if (eaw === "wide" || eaw === "fullwidth") return 2;
	if (cp > EMOJI_FLOOR) return 2;
	return 1;
}

/**
 * Columns a string occupies, per code point.
 *
 * This is a heuristic, not grapheme-aware: combining marks count as 1,
 * ZWJ sequences count each visible part, and anything above U+1F300 is
 * assumed to be a double-width emoji. Report alignment depends on exactly
 * this behaviour.
 */
export function displayWidth(s: string): number {
	let width = 0;
	for (const ch of s) {
		const cp = ch.codePointAt(0);
		if (cp !== undefined) width += codePointWidth(cp);
	}
	return width;
}

/**
 * Right-pad `content` with spaces to `width` display columns.
 *
 * Precondition: `displayWidth(content) <= width`. Wider content is returned
 * unchanged and will push the panel border out; truncate before calling.
 */
export function padLine(content: string, width: number): string {
	const missing = width - displayWidth(content);
	return missing > 0 ? content + " ".repeat(missing) : content;
}

/** First `n` code points (astral characters are never split). */
export function truncateChars(s: string, n: number): string {
	return Array.from(s).slice(0, n).join("");
}

/** Length in code points. */
export function charLength(s: string): number {
	return Array.from(s).length;
}

/** Left-justify to `n` code points, like a printf `%-Ns` field. */
export function padEndChars(s: string, n: number): string {
	const missing = n - charLength(s);
	return missing > 0 ? s + " ".repeat(missing) : s;
}
