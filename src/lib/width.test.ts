import { describe, expect, it } from "vitest";
import {
	charLength,
	displayWidth,
	padEndChars,
	padLine,
	truncateChars,
} from "./width";

describe("displayWidth", () => {
	it("counts ASCII letters one column each", () => {
		expect(displayWidth("")).toBe(0);
		expect(displayWidth("abcXYZ")).toBe(6);
		expect(displayWidth("  Total: 3 repositories")).toBe(23);
	});

	it("gives variation selectors and ZWJ zero width", () => {
		expect(displayWidth("\uFE00\uFE0E\uFE0F")).toBe(0);
		expect(displayWidth("\u200D")).toBe(0);
		// man + ZWJ + laptop: each visible part counts
		expect(displayWidth("\u{1F468}\u200D\u{1F4BB}")).toBe(4);
	});

	it("counts East Asian wide and fullwidth characters as two", () => {
		expect(displayWidth("中文")).toBe(4);
		expect(displayWidth("Ａ")).toBe(2);
		expect(displayWidth("⭐")).toBe(2);
		expect(displayWidth("한국어")).toBe(6);
	});

	it("treats code points above U+1F300 as double width", () => {
		expect(displayWidth("😀")).toBe(2);
		// thermometer is not East Asian wide; only the threshold makes it 2
		expect(displayWidth("\u{1F321}")).toBe(2);
		expect(displayWidth("⭐\uFE0F")).toBe(2);
	});

	it("keeps the heuristic's narrow defaults", () => {
		expect(displayWidth("█")).toBe(1);
		expect(displayWidth("☀")).toBe(1);
		// combining acute accent is not special-cased
		expect(displayWidth("e\u0301")).toBe(2);
	});
});

describe("padLine", () => {
	it("pads ASCII to the requested width", () => {
		expect(padLine("AB", 5)).toBe("AB   ");
	});

	it("pads by display width, not by length", () => {
		expect(padLine("⭐ x", 5)).toBe("⭐ x ");
		expect(padLine("中", 4)).toBe("中  ");
		expect(padLine("\uFE0F", 2)).toBe("\uFE0F  ");
	});

	it("always reaches the exact width when content fits", () => {
		const samples = [
			"",
			"plain",
			"  📊 TOP LANGUAGES",
			"日本語のリポジトリ",
			"mixed 中 ⭐ 😀 text",
			"a\u200Db\uFE0Fc",
		];
		for (const s of samples) {
			expect(displayWidth(padLine(s, 40))).toBe(40);
		}
	});

	it("returns content wider than the target unchanged", () => {
		expect(padLine("abcdef", 3)).toBe("abcdef");
		expect(padLine("中中", 3)).toBe("中中");
	});
});

describe("code point helpers", () => {
	it("truncates without splitting astral characters", () => {
		expect(truncateChars("a😀b", 2)).toBe("a😀");
		expect(truncateChars("short", 10)).toBe("short");
	});

	it("measures and pads by code point", () => {
		expect(charLength("a😀b")).toBe(3);
		expect(padEndChars("a😀", 4)).toBe("a😀  ");
		expect(padEndChars("toolong", 3)).toBe("toolong");
	});
});
