// src/features/report/panels.ts
// Box primitives: `+----+` borders and `|content  |` rows padded by display width.

import { padLine } from "@lib/width";

export type BorderFill = "=" | "-";

/** Interior widths, in display columns. */
export const PANEL_WIDTH = {
	header: 70,
	wide: 70,
	narrow: 50,
	stats: 40,
	listing: 78,
} as const;

export function border(width: number, fill: BorderFill = "-"): string {
	return `+${fill.repeat(width)}+`;
}

export function row(content: string, width: number): string {
	return `|${padLine(content, width)}|`;
}

/**
 * Title box followed by body rows:
 *
 *   +-----+
 *   |title|
 *   +-----+
 *   |row  |
 *   +-----+
 */
export function panel(
	title: string,
	width: number,
	body: string[],
	fill: BorderFill = "-",
): string[] {
	return [
		border(width, fill),
		row(title, width),
		border(width, fill),
		...body.map((content) => row(content, width)),
		border(width, fill),
	];
}

/** Title-only box, for sections whose entries are not boxed. */
export function titleBox(
	title: string,
	width: number,
	fill: BorderFill = "=",
): string[] {
	return [border(width, fill), row(title, width), border(width, fill)];
}
