import { describe, it, expect } from "vitest";
import {
  bindingsToObject,
  emptyBindings,
  mergeBindings,
  singleBinding,
} from "../../../src/core/match/bindings";
import { scalar } from "../../../src/core/value/value";

describe("binding environments", () => {
  const one = scalar(1);
  const two = scalar(2);

  it("concatenates disjoint environments in order", () => {
    const merged = mergeBindings(singleBinding("a", one), singleBinding("b", two));
    expect(merged.tag).toBe("Done");
    if (merged.tag === "Done") {
      expect([...merged.value.entries()]).toEqual([
        ["a", one],
        ["b", two],
      ]);
    }
  });

  it("treats the empty environment as identity", () => {
    const a = singleBinding("a", one);
    const left = mergeBindings(emptyBindings(), a);
    const right = mergeBindings(a, emptyBindings());
    expect(left.tag === "Done" && left.value).toBe(a);
    expect(right.tag === "Done" && right.value).toBe(a);
  });

  it("rejects a shared name by default", () => {
    const merged = mergeBindings(singleBinding("a", one), singleBinding("a", two));
    expect(merged.tag).toBe("Fail");
    if (merged.tag === "Fail") {
      expect(merged.failure.reason).toBe("conflicting-binding");
      expect(merged.failure.message).toBe("Name bound more than once: a");
      expect(merged.failure.context).toEqual({ name: "a" });
    }
  });

  it("lets the right side win when shadowing", () => {
    const left = new Map([
      ["a", one],
      ["b", one],
    ]);
    const merged = mergeBindings(left, singleBinding("a", two), "shadow");
    expect(merged.tag).toBe("Done");
    if (merged.tag === "Done") {
      expect([...merged.value.entries()]).toEqual([
        ["b", one],
        ["a", two],
      ]);
    }
  });

  it("does not mutate its inputs", () => {
    const a = singleBinding("a", one);
    mergeBindings(a, singleBinding("b", two));
    expect([...a.keys()]).toEqual(["a"]);
  });

  it("converts to a plain object", () => {
    expect(bindingsToObject(singleBinding("x", one))).toEqual({ x: one });
  });
});
