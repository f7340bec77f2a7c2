import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/** Create a temp dir, run `fn` with its path, always clean up. */
export async function inTempDir<T>(
	fn: (dir: string) => Promise<T> | T,
): Promise<T> {
	const dir = mkdtempSync(join(tmpdir(), ".star-recap-test-"));
	try {
		return await fn(dir);
	} finally {
		rmSync(dir, { recursive: true, force: true });
	}
}
