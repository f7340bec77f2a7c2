// src/lib/logger.ts

import type { ConsolaReporter, LogObject } from "consola";
import { createConsola } from "consola";
import ora, { type Ora } from "ora";

type Variadic = [unknown?, ...unknown[]];

const ANSI = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	gray: "\x1b[90m",
	cyan: "\x1b[36m",
};
const ICON: Record<string, string> = {
	info: "ℹ",
	success: "✔",
	warn: "⚠",
	error: "✖",
	debug: "·",
};

const reporter: ConsolaReporter = {
	log(obj: LogObject) {
		// Build a clean, timestamp-free line
		const icon = ICON[obj.type] ?? "•";
		const parts = [obj.message, ...(obj.args || [])]
			.filter((v) => v !== undefined)
			.map((v) => (typeof v === "string" ? v : JSON.stringify(v)));
		const line = `${icon} ${parts.join(" ")}`;
		const dest = obj.type === "error" ? process.stderr : process.stdout;
		dest.write(`${line}\n`);
	},
};

function divider(width = Math.min(process.stdout.columns ?? 80, 100)) {
	return "─".repeat(Math.max(16, Math.min(width - 2, 80)));
}

export function createLogger(opts?: { debug?: boolean }) {
	// Always at debug (4); DEBUG is checked per call since `.env` loads after import
	const c = createConsola({ level: 4, reporters: [reporter] });
	const debugOn = () => opts?.debug ?? !!process.env.DEBUG;

	return {
		info: (...args: Variadic) => c.info(...args),
		success: (...args: Variadic) => c.success(...args),
		warn: (...args: Variadic) => c.warn(...args),
		error: (...args: Variadic) => c.error(...args),
		debug: (...args: Variadic) => {
			if (debugOn()) c.debug(...args);
		},
		/** Bare JSON on stdout so `--json` output can be piped. */
		json: (obj: unknown) =>
			process.stdout.write(`${JSON.stringify(obj, null, 2)}\n`),
		header: (title: string) => {
			const line = divider();
			process.stdout.write(
				`\n${ANSI.bold}${ANSI.cyan}${title}${ANSI.reset}\n${ANSI.gray}${line}${ANSI.reset}\n`,
			);
		},

		subheader: (title: string) => {
			process.stdout.write(`${ANSI.bold}${title}${ANSI.reset}\n`);
		},

		list: (items: string[]) => {
			for (const it of items) process.stdout.write(`  • ${it}\n`);
		},

		/** Verbatim line, no icon; report output goes through here. */
		line: (s = "") => process.stdout.write(`${s}\n`),
		spinner: (text: string): Ora => ora({ text }),
	} as const;
}
