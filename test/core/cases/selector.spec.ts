// test/core/cases/selector.spec.ts
// Tests for first-match case selection with guards

import { describe, it, expect, vi } from "vitest";
import { CaseSelector, select, selectCovered, TracingSelector } from "../../../src/core/cases/selector";
import { arm, type Case } from "../../../src/core/cases/types";
import type { Bindings } from "../../../src/core/match/bindings";
import { mergeConfigs } from "../../../src/core/config/config";
import { P, type Pattern } from "../../../src/core/pattern/pattern";
import { scalar, type MappingValue } from "../../../src/core/value/value";
import { closedType, recordVariant } from "../../../src/lint/analysis/exhaustiveness";
import { MalformedPatternError, MatchFallthroughError, PatternError } from "../../../src/outcome/errors";
import { memoryLog } from "../../../src/ports/log";
import { Circle, hostBindings, num, Point, point, Square, v } from "../../fixtures/values";

describe("select", () => {
  it("continues past an arm whose guard rejects", () => {
    const cases = [arm(P.cap("x"), "guarded", b => num(b, "x") > 10), arm(P.wild(), "fallback")];
    const selection = select(scalar(3), cases);
    expect(selection?.action).toBe("fallback");
    expect(selection?.index).toBe(1);
  });

  it("takes the guarded arm when its guard passes", () => {
    const cases = [arm(P.cap("x"), "guarded", b => num(b, "x") > 10), arm(P.wild(), "fallback")];
    const selection = select(scalar(30), cases);
    expect(selection?.action).toBe("guarded");
    expect(selection && hostBindings(selection.bindings)).toEqual({ x: 30 });
  });

  it("picks the first matching arm regardless of specificity", () => {
    const cases = [arm(P.cap("any"), "general"), arm(P.lit(1), "specific")];
    expect(select(scalar(1), cases)?.action).toBe("general");
  });

  it("runs a guard only after its pattern matched, with that arm's bindings", () => {
    const guard = vi.fn((b: Bindings) => num(b, "a") === 1);
    const cases = [arm(P.lit("never"), "a", guard), arm(P.seq([P.cap("a"), P.wild()]), "b", guard)];

    const selection = select(v([1, 2]), cases);
    expect(selection?.action).toBe("b");
    expect(guard).toHaveBeenCalledTimes(1);
    const seen = guard.mock.calls[0]?.[0];
    expect(seen && hostBindings(seen)).toEqual({ a: 1 });
  });

  it("backtracks at the case level, not inside the pattern", () => {
    // Both alternatives could match 5 structurally; the guard sees only the first.
    const pattern = P.or(P.as(P.lit(5), "x"), P.cap("x"));
    const guard = vi.fn(() => false);
    const cases: Case<string>[] = [arm(pattern, "or", guard), arm(P.wild(), "rest")];

    expect(select(scalar(5), cases)?.action).toBe("rest");
    expect(guard).toHaveBeenCalledTimes(1);
  });

  it("returns undefined when nothing matches", () => {
    expect(select(scalar(1), [arm(P.lit(2), "two")])).toBeUndefined();
    expect(select(scalar(1), [])).toBeUndefined();
  });

  it("propagates errors thrown by guards", () => {
    const cases = [
      arm(P.wild(), "boom", () => {
        throw new Error("guard failed");
      }),
    ];
    expect(() => select(scalar(1), cases)).toThrow("guard failed");
  });

  it("raises conflicting bindings instead of skipping the arm", () => {
    const cases = [arm(P.seq([P.cap("x"), P.cap("x")]), "dup"), arm(P.wild(), "fallback")];
    try {
      select(v([1, 2]), cases);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(PatternError);
      if (e instanceof PatternError) {
        expect(e.code).toBe("CONFLICTING_BINDING");
        expect(e.failure?.reason).toBe("conflicting-binding");
        expect(e.message).toBe("Case 0 ([x, x]) is ill-formed: Name bound more than once: x");
      }
    }
  });

  it("traces each decision through the log port", () => {
    const log = memoryLog();
    const cases = [arm(P.lit(2), "two"), arm(P.cap("x"), "big", b => num(b, "x") > 5), arm(P.wild(), "other")];
    select(scalar(1), cases, { log });
    expect(log.entries.map(e => e.msg)).toEqual([
      "case 0: no match",
      "case 1: guard rejected",
      "case 2: selected",
    ]);
    expect(log.entries[0]?.data).toEqual({ reason: "expected 2, got 1" });
    expect(log.entries[1]?.data).toEqual({ bindings: { x: "1" } });
  });

  it("renders trace data only when a log port is installed", () => {
    let reads = 0;
    const subject: MappingValue = {
      tag: "Mapping",
      get entries() {
        reads++;
        return [];
      },
    };
    const cases = [arm(P.lit(1), "one")];

    expect(select(subject, cases)).toBeUndefined();
    expect(reads).toBe(0);

    const log = memoryLog();
    select(subject, cases, { log });
    expect(reads).toBe(1);
    expect(log.entries).toEqual([
      { msg: "case 0: no match", data: { reason: "expected 1, got a mapping" } },
      { msg: "no case matched", data: { subject: "{}" } },
    ]);
  });
});

describe("selectCovered", () => {
  it("returns the selection when an arm matches", () => {
    expect(selectCovered(scalar(2), [arm(P.lit(2), "two")]).action).toBe("two");
  });

  it("throws MatchFallthroughError when nothing matches", () => {
    expect(() => selectCovered(v([1]), [arm(P.lit(2), "two")])).toThrow(MatchFallthroughError);
    expect(() => selectCovered(v([1]), [arm(P.lit(2), "two")])).toThrow("No case matched [1]");
  });
});

describe("CaseSelector", () => {
  it("rejects malformed patterns when built", () => {
    const overfull: Pattern = { kind: "Object", type: Point, positional: [P.wild(), P.wild(), P.wild()], named: [] };
    const build = () => new CaseSelector([arm(overfull, "three")]);
    expect(build).toThrow(MalformedPatternError);
    try {
      build();
    } catch (e) {
      if (e instanceof MalformedPatternError) {
        expect(e.diagnostics).toEqual([
          expect.objectContaining({ code: "E0702", path: "cases[0].pattern" }),
        ]);
      }
    }
  });

  it("selects like select", () => {
    const selector = new CaseSelector([arm(P.obj(Point, [P.cap("a"), P.lit(2)]), "point")]);
    const selection = selector.select(point(1, 2));
    expect(selection?.action).toBe("point");
    expect(selection && hostBindings(selection.bindings)).toEqual({ a: 1 });
    expect(selector.select(point(1, 3))).toBeUndefined();
    expect(() => selector.selectCovered(point(1, 3))).toThrow(MatchFallthroughError);
  });

  it("dispatches handler actions with the winning bindings", () => {
    const selector = new CaseSelector<(b: Bindings) => number>([
      arm(P.list(P.cap("head"), P.rest()), (b: Bindings) => num(b, "head") * 10),
      arm(P.wild(), () => -1),
    ]);
    expect(selector.dispatch(v([4, 5]))).toBe(40);
    expect(selector.dispatch(v("text"))).toBe(-1);
  });

  it("accepts repeated names when the config allows shadowing", () => {
    const config = mergeConfigs({ match: { allowShadowing: true, maxDepth: 100 } });
    const selector = new CaseSelector([arm(P.seq([P.cap("x"), P.cap("x")]), "pair")], { config });
    const selection = selector.select(v([1, 2]));
    expect(selection && hostBindings(selection.bindings)).toEqual({ x: 2 });
  });

  it("checks exhaustiveness over its own arms", () => {
    const Shape = closedType("Shape", [recordVariant(Circle), recordVariant(Square)]);
    const selector = new CaseSelector([arm(P.obj(Circle, [P.cap("r")]), "circle")]);
    expect(selector.check(Shape)).toEqual(new Set(["Square"]));
    expect(selector.lint(Shape).map(d => d.code)).toEqual(["W0701"]);
  });

  it("logs through an injected port", () => {
    const log = memoryLog();
    const selector = new CaseSelector([arm(P.wild(), "any")], { log });
    selector.select(scalar(null));
    expect(log.entries.map(e => e.msg)).toEqual(["case 0: selected"]);
  });
});

describe("TracingSelector", () => {
  it("logs the subject and the outcome of each selection", () => {
    const log = vi.fn();
    const tracing = new TracingSelector(new CaseSelector([arm(P.lit(1), "one")]), log);

    expect(tracing.select(scalar(1))?.action).toBe("one");
    expect(tracing.select(scalar(2))).toBeUndefined();
    expect(log.mock.calls).toEqual([
      ["select", { subject: "1" }],
      ["selected case 0", { bindings: {} }],
      ["select", { subject: "2" }],
      ["fell through"],
    ]);
  });
});
