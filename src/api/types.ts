// ./api/types.ts

/* -------------------------------------------------------------------------- */
/*  SPINNER                                                                   */
/* -------------------------------------------------------------------------- */

/** Canonical spinner instance. */
export type Spinner = {
	/** Current status text (mutable by caller). */
	text: string;
	/** Mark success and freeze this spinner line. */
	succeed(msg: string): void;
	/** Mark failure (optional on some loggers; keep optional). */
	fail?(msg: string): void;
};

/** Factory returned by logger.spinner(text). */
export type SpinnerFactory = { start(): Spinner };

/* -------------------------------------------------------------------------- */
/*  LOGGER                                                                    */
/* -------------------------------------------------------------------------- */

/**
 * Canonical logger contract used by the CLI cores.
 * The shared `log` from bootstrap satisfies it; tests pass a structural fake.
 */
export type LoggerLike = {
	info(...args: unknown[]): void;
	success(msg: string): void;
	debug(...args: unknown[]): void;

	/* Verbatim line; the report is printed through this */
	line(msg?: string): void;

	json?(v: unknown): void;

	spinner(text: string): SpinnerFactory;
};

/* -------------------------------------------------------------------------- */
/*  CLI OPTIONS                                                               */
/* -------------------------------------------------------------------------- */

export type RecapCliOptions = {
	user?: string;
	out?: string;
	json: boolean;
};

export type ReportCliOptions = {
	in?: string;
	json: boolean;
};
