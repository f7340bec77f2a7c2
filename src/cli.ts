#!/usr/bin/env tsx
// src/cli.ts
// Unified CLI entry with subcommands: recap, report, help

import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { initBootstrap, log } from "@lib/bootstrap";
import { parseRecapArgs } from "@lib/cli";
import { errorMessage } from "@lib/errors";
import { runRecapCore, runReportCore } from "@src/api/recap";

type CliDeps = {
	runRecap: typeof runRecapCore;
	runReport: typeof runReportCore;
};

const defaultDeps: CliDeps = {
	runRecap: runRecapCore,
	runReport: runReportCore,
};

const cliDeps: CliDeps = { ...defaultDeps };

export function _setCliDeps(overrides: Partial<CliDeps>): void {
	Object.assign(cliDeps, overrides);
}

export function _resetCliDeps(): void {
	Object.assign(cliDeps, defaultDeps);
}

/* ----------------------------- Usage banner ----------------------------- */

function usage(): void {
	log.header("star-recap");

	log.subheader("Usage");
	log.line("  star-recap <command> [options]");
	log.line("");

	log.subheader("Commands");
	log.list([
		"recap                 Fetch stars, write the JSON snapshot, print the recap (default)",
		"report                Print the recap from an existing snapshot (no network)",
		"help                  Show this message",
	]);
	log.line("");

	log.subheader("Options");
	log.list([
		"--user, -u <login>    GitHub login (overrides GITHUB_USERNAME)",
		"--out, -o <file>      Snapshot destination (default STARS_OUT_FILE or starred_repos.json)",
		"--in, -i <file>       Snapshot to read for `report`",
		"--json                Print aggregated stats as JSON instead of the boxed report",
	]);
	log.line("");

	log.subheader("Environment");
	log.list([
		"GITHUB_USERNAME       Whose stars to export",
		"GITHUB_TOKEN          Optional; higher rate limit and private stars",
		"DEBUG                 Verbose logging",
	]);
	log.line("");
}

/* -------------------------- Command handlers --------------------------- */

async function handleRecap(args: string[]): Promise<void> {
	const a = parseRecapArgs(args);
	await cliDeps.runRecap({ user: a.user, out: a.out, json: a.json }, log);
}

async function handleReport(args: string[]): Promise<void> {
	const a = parseRecapArgs(args);
	await cliDeps.runReport({ in: a.in, json: a.json }, log);
}

/* --------------------------------- Main CLI -------------------------------- */

async function main(argv: string[]): Promise<void> {
	const args = argv.slice(2);
	const cmd = args[0] ?? "recap";

	switch (cmd) {
		case "help":
		case "--help":
		case "-h":
			return usage();

		case "recap":
			return handleRecap(args);

		case "report":
			return handleReport(args);

		default:
			// Bare flags (`star-recap --user x`) run the default command
			if (cmd.startsWith("-")) return handleRecap(["recap", ...args]);
			log.error(`Unknown command: ${cmd}`);
			usage();
			process.exitCode = 1;
	}
}

function isEntrypoint(): boolean {
	const entry = process.argv[1];
	if (!entry || !existsSync(entry)) return false;
	return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntrypoint()) {
	initBootstrap();
	await main(process.argv).catch((e) => {
		log.error(errorMessage(e));
		process.exit(1);
	});
}
// For tests: allow calling the router without executing as main
export { main as _testMain };
