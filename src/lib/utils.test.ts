import { describe, expect, it } from "vitest";
import {
	compareCodeUnits,
	formatCount,
	isObject,
	toCount,
	toStringArray,
	toStringOrNull,
} from "./utils";

describe("value coercion", () => {
	it("isObject excludes null", () => {
		expect(isObject({})).toBe(true);
		expect(isObject([])).toBe(true);
		expect(isObject(null)).toBe(false);
		expect(isObject("x")).toBe(false);
	});

	it("toStringOrNull keeps strings only", () => {
		expect(toStringOrNull("")).toBe("");
		expect(toStringOrNull(0)).toBeNull();
		expect(toStringOrNull(undefined)).toBeNull();
	});

	it("toCount accepts finite non-negative numbers", () => {
		expect(toCount(12)).toBe(12);
		expect(toCount(0)).toBe(0);
		expect(toCount(2.9)).toBe(2);
		expect(toCount(-1)).toBe(0);
		expect(toCount(Number.POSITIVE_INFINITY)).toBe(0);
		expect(toCount("12")).toBe(0);
	});

	it("toStringArray drops non-strings", () => {
		expect(toStringArray(["a", 1, "b"])).toEqual(["a", "b"]);
		expect(toStringArray("a")).toEqual([]);
	});
});

describe("formatCount", () => {
	it("groups thousands with commas", () => {
		expect(formatCount(0)).toBe("0");
		expect(formatCount(999)).toBe("999");
		expect(formatCount(1234567)).toBe("1,234,567");
		expect(formatCount(null)).toBe("0");
	});
});

describe("compareCodeUnits", () => {
	it("orders by UTF-16 code unit, not locale", () => {
		expect(compareCodeUnits("B", "a")).toBe(-1);
		expect(compareCodeUnits("a", "B")).toBe(1);
		expect(compareCodeUnits("x", "x")).toBe(0);
		expect(["b", "a", "C"].sort(compareCodeUnits)).toEqual(["C", "a", "b"]);
	});
});
