// src/lib/errors.ts

/**
 * Non-success response (or unusable body) from the GitHub REST API.
 * Fatal: the fetch loop stops and nothing is exported.
 */
export class TransportError extends Error {
	readonly status: number;
	readonly url: string;

	constructor(message: string, status: number, url: string) {
		super(message);
		this.name = "TransportError";
		this.status = status;
		this.url = url;
	}
}

/** Reading or writing the snapshot file failed. */
export class SerializationError extends Error {
	readonly op: "read" | "write";
	readonly path: string;

	constructor(
		message: string,
		op: "read" | "write",
		path: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "SerializationError";
		this.op = op;
		this.path = path;
	}
}

/**
 * Thrown instead of exiting the process when required configuration (username) is missing.
 * Test via `instanceof ConfigError` to provide user-facing guidance.
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export function errorMessage(e: unknown): string {
	return e instanceof Error ? e.message : String(e);
}
