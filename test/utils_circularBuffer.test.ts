import { describe, it, expect } from "vitest";
import { CircularBuffer } from "../src/utils/circularBuffer.js";

describe("utils/CircularBuffer", () => {
    it("keeps insertion order and evicts the oldest entry when full", () => {
        const buffer = new CircularBuffer<number>(3);
        expect(buffer.add(1)).toBeUndefined();
        expect(buffer.add(2)).toBeUndefined();
        expect(buffer.add(3)).toBeUndefined();
        expect(buffer.add(4)).toBe(1);
        expect(buffer.toArray()).toEqual([2, 3, 4]);
        expect(buffer.length).toBe(3);
        expect(buffer.maxLength).toBe(3);
    });

    it("indexes from the oldest entry", () => {
        const buffer = new CircularBuffer<string>(2);
        buffer.add("a");
        buffer.add("b");
        buffer.add("c");
        expect(buffer.at(0)).toBe("b");
        expect(buffer.at(1)).toBe("c");
        expect(buffer.at(2)).toBeUndefined();
        expect(buffer.at(-1)).toBeUndefined();
    });

    it("filters and iterates", () => {
        const buffer = new CircularBuffer<number>(5);
        for (const value of [5, 6, 7, 8]) buffer.add(value);
        expect(buffer.filter((value) => value % 2 === 0)).toEqual([6, 8]);
        expect([...buffer]).toEqual([5, 6, 7, 8]);
    });

    it("rejects a capacity that is not a positive integer", () => {
        expect(() => new CircularBuffer<number>(0)).toThrow(RangeError);
        expect(() => new CircularBuffer<number>(1.5)).toThrow(RangeError);
    });
});
