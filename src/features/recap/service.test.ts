import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import { makeFakeStarsFetch, makeRepo, makeStarred } from "@src/__test__/github-fakes";
import { inTempDir } from "@src/__test__/helpers/fs";
import { TransportError } from "@lib/errors";
import type { RecapConfig } from "@lib/config";
import { renderFromSnapshot, runRecap } from "./service";

const NOW = new Date("2024-05-06T07:08:09.123Z");

const config = (outFile: string): RecapConfig => ({
	username: "octocat",
	token: null,
	outFile,
});

describe("runRecap", () => {
	it("fetches, exports and renders in one pass", async () => {
		await inTempDir(async (dir) => {
			const file = join(dir, "stars.json");
			const { fetch } = makeFakeStarsFetch([
				[
					makeStarred({ full_name: "b/two", language: "Go" }),
					makeRepo({ full_name: "a/one", language: "Go" }),
				],
			]);

			const result = await runRecap(config(file), {
				fetchImpl: fetch,
				now: () => NOW,
			});

			expect(result.snapshot.total_count).toBe(2);
			expect(result.snapshot.repositories.map((r) => r.name)).toEqual([
				"b/two",
				"a/one",
			]);
			expect(result.snapshot.repositories[0].starred_at).toBe(
				"2024-01-01T00:00:00Z",
			);
			expect(result.snapshot.repositories[1].starred_at).toBeNull();
			expect(result.stats.languages).toEqual([{ name: "Go", count: 2 }]);
			expect(result.lines).toEqual(renderFromSnapshot(result.snapshot).lines);

			const saved: unknown = JSON.parse(readFileSync(file, "utf8"));
			expect(saved).toEqual(JSON.parse(JSON.stringify(result.snapshot)));
		});
	});

	it("reports the export once the file is written", async () => {
		await inTempDir(async (dir) => {
			const file = join(dir, "stars.json");
			const { fetch } = makeFakeStarsFetch([[makeStarred()]]);
			const exported = vi.fn((path: string) => {
				expect(existsSync(path)).toBe(true);
			});
			const page = vi.fn();

			await runRecap(config(file), { fetchImpl: fetch }, {
				debug: () => {},
				page,
				exported,
			});

			expect(page).toHaveBeenCalledWith(1, 1);
			expect(exported).toHaveBeenCalledWith(file, 1);
		});
	});

	it("writes nothing when a later page fails", async () => {
		await inTempDir(async (dir) => {
			const file = join(dir, "stars.json");
			const { fetch } = makeFakeStarsFetch(
				[[makeStarred()], [makeStarred()]],
				{ failOnPage: 2 },
			);

			await expect(
				runRecap(config(file), { fetchImpl: fetch }),
			).rejects.toBeInstanceOf(TransportError);
			expect(existsSync(file)).toBe(false);
		});
	});

	it("leaves a previous snapshot untouched on failure", async () => {
		await inTempDir(async (dir) => {
			const file = join(dir, "stars.json");
			writeFileSync(file, "previous run");
			const { fetch } = makeFakeStarsFetch([], { failOnPage: 1 });

			await expect(runRecap(config(file), { fetchImpl: fetch })).rejects.toThrow();
			expect(readFileSync(file, "utf8")).toBe("previous run");
		});
	});

	it("uses an injected fetcher instead of the network", async () => {
		await inTempDir(async (dir) => {
			const getAllStars = vi.fn(async () => [makeRepo({ full_name: "x/y" })]);
			const result = await runRecap(config(join(dir, "s.json")), {
				getAllStars,
			});
			expect(getAllStars).toHaveBeenCalledWith(
				"octocat",
				null,
				undefined,
				expect.anything(),
			);
			expect(result.snapshot.repositories[0].name).toBe("x/y");
		});
	});
});

describe("renderFromSnapshot", () => {
	it("renders an empty snapshot", () => {
		const { stats, lines } = renderFromSnapshot({
			exported_at: "2024-05-06T07:08:09.123Z",
			total_count: 0,
			repositories: [],
		});
		expect(stats.quick.total).toBe(0);
		expect(lines.at(-2)).toBe("⭐ Total: 0 starred repositories");
	});
});
