// src/lib/config.ts
import { ConfigError } from "./errors";

export const DEFAULT_OUT_FILE = "starred_repos.json";

/** Built once at startup and handed to every stage explicitly. */
export type RecapConfig = {
	username: string;
	/** Optional; unauthenticated requests are allowed but rate-limited. */
	token: string | null;
	/** Snapshot destination, overwritten on each run. */
	outFile: string;
};

export type RecapConfigOverrides = {
	username?: string;
	token?: string;
	outFile?: string;
};

function nonEmpty(v: string | undefined): string | undefined {
	const t = v?.trim();
	return t ? t : undefined;
}

/**
 * Resolve configuration. Precedence: explicit overrides > env > defaults.
 * Throws ConfigError when no username can be found.
 */
export function resolveRecapConfig(
	overrides: RecapConfigOverrides = {},
	env: Record<string, string | undefined> = process.env,
): RecapConfig {
	const username =
		nonEmpty(overrides.username) ?? nonEmpty(env.GITHUB_USERNAME);
	if (!username) {
		throw new ConfigError(
			"GITHUB_USERNAME missing. Add it to .env or pass --user <login>.",
		);
	}
	return {
		username,
		token: nonEmpty(overrides.token) ?? nonEmpty(env.GITHUB_TOKEN) ?? null,
		outFile:
			nonEmpty(overrides.outFile) ??
			nonEmpty(env.STARS_OUT_FILE) ??
			DEFAULT_OUT_FILE,
	};
}

/** Snapshot to re-render: explicit path > STARS_OUT_FILE > default. */
export function resolveSnapshotPath(
	inFile?: string,
	env: Record<string, string | undefined> = process.env,
): string {
	return nonEmpty(inFile) ?? nonEmpty(env.STARS_OUT_FILE) ?? DEFAULT_OUT_FILE;
}
