import { describe, expect, it } from "vitest";
import { makeRepo, makeStarred } from "@src/__test__/github-fakes";
import {
	classifyStarEntry,
	mapStarEntryToRecord,
	normaliseRepo,
	toCanonicalRecord,
} from "./mapper";
import type { CanonicalRecord } from "./types";

const BLANK: CanonicalRecord = {
	name: "",
	description: null,
	url: "",
	language: null,
	stars: 0,
	forks: 0,
	open_issues: 0,
	topics: [],
	created_at: null,
	updated_at: null,
	starred_at: null,
	archived: false,
	owner: null,
	owner_type: null,
	license: null,
	homepage: null,
};

describe("classifyStarEntry", () => {
	it("detects the timestamped wrapper by its repo key", () => {
		const entry = classifyStarEntry(makeStarred({}, "2024-02-02T00:00:00Z"));
		expect(entry.kind).toBe("starred");
		expect(entry.starredAt).toBe("2024-02-02T00:00:00Z");
		expect(entry.repo.full_name).toBe("o/r");
	});

	it("treats anything without the wrapper key as a plain repository", () => {
		const entry = classifyStarEntry(makeRepo());
		expect(entry.kind).toBe("plain");
		expect(entry.starredAt).toBeNull();
	});

	it("keeps a wrapper with a missing timestamp as starred", () => {
		const entry = classifyStarEntry({ repo: { full_name: "a/b" } });
		expect(entry).toEqual({
			kind: "starred",
			repo: { full_name: "a/b" },
			starredAt: null,
		});
	});

	it("classifies non-objects as an empty plain entry", () => {
		for (const raw of [null, undefined, 42, "a/b", true]) {
			expect(classifyStarEntry(raw)).toEqual({
				kind: "plain",
				repo: {},
				starredAt: null,
			});
		}
	});
});

describe("mapStarEntryToRecord", () => {
	it("normalises both API shapes into the same record type", () => {
		const raw: unknown[] = [
			{
				repo: {
					full_name: "a/b",
					html_url: "https://x",
					stargazers_count: 5,
				},
				starred_at: "2024-01-01T00:00:00Z",
			},
			{ full_name: "c/d", html_url: "https://y" },
		];

		const [first, second] = raw.map(mapStarEntryToRecord);

		expect(first).toEqual({
			...BLANK,
			name: "a/b",
			url: "https://x",
			stars: 5,
			starred_at: "2024-01-01T00:00:00Z",
		});
		expect(second).toEqual({
			...BLANK,
			name: "c/d",
			url: "https://y",
		});
	});

	it("copies every field of a full repository payload", () => {
		const rec = mapStarEntryToRecord(
			makeStarred({ archived: true, homepage: "https://o.dev" }),
		);
		expect(rec).toEqual({
			name: "o/r",
			description: "d",
			url: "https://github.com/o/r",
			language: "TypeScript",
			stars: 10,
			forks: 2,
			open_issues: 3,
			topics: ["x", "y"],
			created_at: "2023-01-01T00:00:00Z",
			updated_at: "2024-01-04T00:00:00Z",
			starred_at: "2024-01-01T00:00:00Z",
			archived: true,
			owner: "o",
			owner_type: "User",
			license: "MIT License",
			homepage: "https://o.dev",
		});
	});

	it("defaults fields that are present but null", () => {
		const rec = mapStarEntryToRecord({
			full_name: "n/n",
			html_url: "https://n",
			description: null,
			language: null,
			stargazers_count: null,
			forks_count: null,
			open_issues_count: null,
			topics: null,
			archived: null,
			owner: null,
			license: null,
		});
		expect(rec).toEqual({ ...BLANK, name: "n/n", url: "https://n" });
	});

	it("defaults fields of the wrong type", () => {
		const rec = mapStarEntryToRecord({
			full_name: 7,
			stargazers_count: "5",
			forks_count: -3,
			open_issues_count: Number.NaN,
			topics: ["ok", 1, null, "fine"],
			archived: "yes",
			owner: "octocat",
			license: { name: 3 },
		});
		expect(rec.name).toBe("");
		expect(rec.stars).toBe(0);
		expect(rec.forks).toBe(0);
		expect(rec.open_issues).toBe(0);
		expect(rec.topics).toEqual(["ok", "fine"]);
		expect(rec.archived).toBe(false);
		expect(rec.owner).toBeNull();
		expect(rec.license).toBeNull();
	});

	it("floors fractional counts", () => {
		expect(mapStarEntryToRecord({ stargazers_count: 4.7 }).stars).toBe(4);
	});

	it("unwraps owner and license objects", () => {
		const rec = mapStarEntryToRecord(
			makeRepo({
				owner: { login: "acme", type: "Organization" },
				license: { key: "apache-2.0", name: "Apache License 2.0" },
			}),
		);
		expect(rec.owner).toBe("acme");
		expect(rec.owner_type).toBe("Organization");
		expect(rec.license).toBe("Apache License 2.0");
	});

	it("never reads starred_at from a plain repository", () => {
		const rec = mapStarEntryToRecord({
			full_name: "p/q",
			starred_at: "2024-01-01T00:00:00Z",
		});
		expect(rec.starred_at).toBeNull();
	});

	it("is deterministic and returns frozen records", () => {
		const raw = makeStarred({ topics: ["a"] });
		const a = mapStarEntryToRecord(raw);
		const b = mapStarEntryToRecord(raw);
		expect(a).toEqual(b);
		expect(Object.isFrozen(a)).toBe(true);
		expect(Object.isFrozen(a.topics)).toBe(true);
	});

	it("never throws on empty input", () => {
		expect(mapStarEntryToRecord({})).toEqual(BLANK);
		expect(mapStarEntryToRecord({ repo: null })).toEqual(BLANK);
	});
});

describe("normaliseRepo", () => {
	it("takes starred_at from the entry, not the repository", () => {
		const rec = normaliseRepo({
			kind: "starred",
			repo: { full_name: "x/y", starred_at: "ignored" },
			starredAt: "2024-03-03T00:00:00Z",
		});
		expect(rec.starred_at).toBe("2024-03-03T00:00:00Z");
	});
});

describe("toCanonicalRecord", () => {
	it("returns an equal record for a stored canonical record", () => {
		const rec = mapStarEntryToRecord(makeStarred());
		const stored: unknown = JSON.parse(JSON.stringify(rec));
		expect(toCanonicalRecord(stored)).toEqual(rec);
	});

	it("re-applies defaults to damaged stored records", () => {
		expect(toCanonicalRecord({ name: "a/b", stars: "many" })).toEqual({
			...BLANK,
			name: "a/b",
		});
		expect(toCanonicalRecord(null)).toEqual(BLANK);
	});
});
