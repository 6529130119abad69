import { describe, it, expect, afterEach } from "vitest";
import {
  IdGenerator,
  generateId,
  getGlobalIdGenerator,
  resetGlobalIdGenerator,
} from "../../src/identity/idGenerator.js";
import { MAX_ID } from "../../src/identity/ids.js";

describe("IdGenerator", () => {
  afterEach(() => {
    resetGlobalIdGenerator();
  });

  it("should produce ids within [1, MAX_ID]", () => {
    const gen = new IdGenerator(12345);
    for (let i = 0; i < 1000; i++) {
      const id = gen.next();
      expect(Number.isInteger(id)).toBe(true);
      expect(id).toBeGreaterThanOrEqual(1);
      expect(id).toBeLessThanOrEqual(MAX_ID);
    }
  });

  it("should be reproducible for the same seed", () => {
    const a = new IdGenerator(7);
    const b = new IdGenerator(7);
    const seqA = Array.from({ length: 20 }, () => a.next());
    const seqB = Array.from({ length: 20 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("should cover every value of a small range", () => {
    const gen = new IdGenerator(99, 3);
    const seen = new Set<number>();
    for (let i = 0; i < 300; i++) {
      seen.add(gen.next());
    }
    expect([...seen].sort()).toEqual([1, 2, 3]);
    expect(gen.max).toBe(3);
  });

  it("should reject a max below one", () => {
    expect(() => new IdGenerator(1, 0)).toThrow(RangeError);
    expect(() => new IdGenerator(1, -3)).toThrow("IdGenerator max must be a positive integer, got -3");
    expect(() => new IdGenerator(1, 2.5)).toThrow(RangeError);
    expect(new IdGenerator(1, 1).next()).toBe(1);
  });

  it("should return raw values as unsigned 32-bit integers", () => {
    const gen = new IdGenerator(1);
    for (let i = 0; i < 100; i++) {
      const x = gen.nextUint32();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(2 ** 32);
    }
  });

  describe("global generator", () => {
    it("should reuse one instance across calls", () => {
      const first = getGlobalIdGenerator();
      generateId();
      generateId();
      expect(getGlobalIdGenerator()).toBe(first);
    });

    it("should follow a fixed sequence after a seeded reset", () => {
      resetGlobalIdGenerator(2024);
      const fromGlobal = [generateId(), generateId(), generateId()];

      const reference = new IdGenerator(2024);
      expect(fromGlobal).toEqual([reference.next(), reference.next(), reference.next()]);
    });

    it("should create a fresh generator after an unseeded reset", () => {
      const before = getGlobalIdGenerator();
      resetGlobalIdGenerator();
      expect(getGlobalIdGenerator()).not.toBe(before);
    });
  });
});
