// src/__test__/helpers/log.ts
import type { LoggerLike, Spinner } from "@src/api/types";
import { vi } from "vitest";

export type Captured = {
	info: string[];
	success: string[];
	debug: string[];
	line: string[];
	json: unknown[];
	spinnerStarts: string[];
	spinnerSucceeds: string[];
	spinnerFails: string[];
	/** Every value assigned to spinner.text, in order. */
	spinnerTexts: string[];
};

/** Structural logger that records everything the CLI cores emit. */
export function makeCaptureLog(): { log: LoggerLike; captured: Captured } {
	const captured: Captured = {
		info: [],
		success: [],
		debug: [],
		line: [],
		json: [],
		spinnerStarts: [],
		spinnerSucceeds: [],
		spinnerFails: [],
		spinnerTexts: [],
	};

	function makeSpinner(initial: string): Spinner {
		let text = initial;
		return {
			get text() {
				return text;
			},
			set text(v: string) {
				text = v;
				captured.spinnerTexts.push(v);
			},
			succeed: vi.fn((m: string) => {
				captured.spinnerSucceeds.push(m);
			}),
			fail: vi.fn((m: string) => {
				captured.spinnerFails.push(m);
			}),
		};
	}

	const log: LoggerLike = {
		info: (...args) => {
			captured.info.push(args.map(String).join(" "));
		},
		success: (msg) => {
			captured.success.push(msg);
		},
		debug: (...args) => {
			captured.debug.push(args.map(String).join(" "));
		},
		line: (msg) => {
			captured.line.push(msg ?? "");
		},
		json: (v) => {
			captured.json.push(v);
		},
		spinner: (text) => ({
			start() {
				captured.spinnerStarts.push(text);
				return makeSpinner(text);
			},
		}),
	};

	return { log, captured };
}
