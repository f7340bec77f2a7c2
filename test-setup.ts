// test-setup.ts
// Centralised hooks to isolate tests when running the full suite together.

import { afterEach, beforeEach, vi } from "vitest";

const originalEnv = new Map(Object.entries(process.env));
const originalCwd = process.cwd();

beforeEach(() => {
	vi.clearAllMocks();
});

afterEach(() => {
	for (const key of Object.keys(process.env)) {
		if (!originalEnv.has(key)) {
			Reflect.deleteProperty(process.env, key);
		}
	}

	for (const [key, value] of originalEnv) {
		if (value === undefined) {
			Reflect.deleteProperty(process.env, key);
		} else {
			Reflect.set(process.env, key, value);
		}
	}

	if (process.cwd() !== originalCwd) {
		process.chdir(originalCwd);
	}

	vi.restoreAllMocks();
});
