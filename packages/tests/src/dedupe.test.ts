import { describe, it, expect } from "vitest";
import { DedupCache } from "@lsnp/core";

describe("Dedup cache", () => {
    it("reports an id as new once, then as seen", () => {
        const cache = new DedupCache(8);
        expect(cache.check("aa11bb22")).toBe(false);
        expect(cache.check("aa11bb22")).toBe(true);
        expect(cache.size).toBe(1);
    });

    it("evicts the oldest ids beyond capacity", () => {
        const cache = new DedupCache(3);
        for (const id of ["a", "b", "c", "d"]) cache.check(id);

        expect(cache.size).toBe(3);
        expect(cache.has("a")).toBe(false);
        expect(cache.has("b")).toBe(true);
        expect(cache.has("d")).toBe(true);
    });

    it("stays bounded over many insertions", () => {
        const cache = new DedupCache(100);
        for (let i = 0; i < 10_000; i++) cache.check(`id-${i}`);

        expect(cache.size).toBe(100);
        expect(cache.has("id-9999")).toBe(true);
        expect(cache.has("id-9900")).toBe(true);
        expect(cache.has("id-9899")).toBe(false);
    });

    it("rejects a non-positive capacity", () => {
        expect(() => new DedupCache(0)).toThrow(RangeError);
    });
});
