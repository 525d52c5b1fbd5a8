import { describe, it, expect } from "vitest";
import { arm } from "../../src/core/cases/types";
import { P } from "../../src/core/pattern/pattern";
import { closedType, recordVariant } from "../../src/lint/analysis/exhaustiveness";
import { createDefaultRunner, lintCases, LintRunner } from "../../src/lint/runner";
import { unreachableArmPass } from "../../src/lint/passes/unreachableArm";
import type { Pass } from "../../src/lint/types";
import { Circle, Square } from "../fixtures/values";

const Shape = closedType("Shape", [recordVariant(Circle), recordVariant(Square)]);

function stubPass(id: string, dependencies?: string[]): Pass {
  return { id, name: id, phase: "analyze", dependencies, run: () => ({ diagnostics: [] }) };
}

describe("default lint passes", () => {
  it("runs passes by phase, then id", () => {
    const report = createDefaultRunner().run({ cases: [] });
    expect([...report.passResults.keys()]).toEqual([
      "validate/well-formed",
      "analyze/exhaustiveness",
      "analyze/unreachable-arm",
    ]);
  });

  it("reports malformed patterns with their case path", () => {
    const report = lintCases({ cases: [arm(P.lit(1), 0), arm(P.cap("_"), 1)] });
    expect(report.diagnostics).toEqual([
      expect.objectContaining({ code: "E0707", severity: "error", path: "cases[1].pattern" }),
    ]);
  });

  it("flags arms after an unguarded catch-all", () => {
    const cases = [arm(P.lit(1), 0), arm(P.cap("x"), 1), arm(P.lit(2), 2), arm(P.wild(), 3)];
    const result = unreachableArmPass.run({ cases });
    expect(result.diagnostics.map(d => d.path)).toEqual(["cases[2]", "cases[3]"]);
    expect(result.diagnostics[0]?.message).toBe("Unreachable case: arm 1 already matches every value");
  });

  it("ignores a guarded catch-all", () => {
    const cases = [arm(P.wild(), 0, () => false), arm(P.lit(2), 1)];
    expect(unreachableArmPass.run({ cases }).diagnostics).toEqual([]);
  });

  it("reports missing variants when a subject type is given", () => {
    const report = lintCases({ cases: [arm(P.obj(Circle, []), 0)], subject: Shape });
    expect(report.diagnostics).toEqual([
      expect.objectContaining({
        code: "W0701",
        severity: "warning",
        message: "Non-exhaustive match on Shape: missing Square",
      }),
    ]);
    expect(report.passResults.get("analyze/exhaustiveness")?.metadata).toEqual({ uncovered: ["Square"] });
  });

  it("skips exhaustiveness without a subject type", () => {
    expect(lintCases({ cases: [arm(P.obj(Circle, []), 0)] }).diagnostics).toEqual([]);
  });
});

describe("LintRunner config", () => {
  it("applies severity overrides", () => {
    const report = lintCases(
      { cases: [arm(P.obj(Circle, []), 0)], subject: Shape },
      { passes: { "analyze/exhaustiveness": { enabled: true, severityOverride: "error" } } }
    );
    expect(report.diagnostics.map(d => d.severity)).toEqual(["error"]);
  });

  it("skips disabled passes and passes turned off", () => {
    const report = lintCases(
      { cases: [arm(P.wild(), 0), arm(P.lit(1), 1)], subject: Shape },
      {
        passes: {
          "analyze/unreachable-arm": { enabled: false },
          "validate/well-formed": { enabled: true, severityOverride: "off" },
        },
      }
    );
    expect([...report.passResults.keys()]).toEqual(["analyze/exhaustiveness"]);
    expect(report.diagnostics).toEqual([]);
  });

  it("orders dependencies within a phase", () => {
    const runner = new LintRunner();
    runner.register(stubPass("a", ["b"]));
    runner.register(stubPass("b"));
    expect([...runner.run({ cases: [] }).passResults.keys()]).toEqual(["b", "a"]);
  });

  it("rejects unregistered dependencies and cycles", () => {
    const missing = new LintRunner();
    missing.register(stubPass("a", ["ghost"]));
    expect(() => missing.run({ cases: [] })).toThrow("Pass dependency not registered: ghost");

    const cyclic = new LintRunner();
    cyclic.register(stubPass("a", ["b"]));
    cyclic.register(stubPass("b", ["a"]));
    expect(() => cyclic.run({ cases: [] })).toThrow("Pass dependency cycle detected in phase analyze");
  });

  it("reports whether any diagnostic is an error", () => {
    const runner = createDefaultRunner();
    const { diagnostics } = runner.run({ cases: [arm(P.or(), 0)] });
    expect(runner.hasErrors(diagnostics)).toBe(true);
  });
});
