// src/lib/cli.ts
// Minimal, shared CLI helpers.

export type RecapArgs = {
	user?: string; // overrides GITHUB_USERNAME
	out?: string; // snapshot destination for `recap`
	in?: string; // snapshot source for `report`
	json: boolean; // print stats as JSON instead of the boxed report
};

/** Parse flags after the subcommand (`args[0]` is the command itself). */
export function parseRecapArgs(args: string[]): RecapArgs {
	const parsed: RecapArgs = { json: false };

	for (let i = 1; i < args.length; i++) {
		const a = args[i];
		const next = args[i + 1];
		if (a === "--json") {
			parsed.json = true;
			continue;
		}
		if ((a === "--user" || a === "-u") && next) {
			i += 1;
			parsed.user = next;
			continue;
		}
		if ((a === "--out" || a === "-o") && next) {
			i += 1;
			parsed.out = next;
			continue;
		}
		if ((a === "--in" || a === "-i") && next) {
			i += 1;
			parsed.in = next;
		}
	}

	return parsed;
}

