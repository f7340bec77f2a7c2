// src/lib/bootstrap.ts
import dotenv from "dotenv";
import { createLogger } from "@lib/logger";

/** Call once at process startup (e.g. in CLI main): loads `.env` into process.env. */
export function initBootstrap(path?: string): void {
	dotenv.config(path ? { path } : undefined);
}

// Shared logger for CLIs (pure; no side effects)
export const log = createLogger();
