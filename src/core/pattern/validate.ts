// src/core/pattern/validate.ts
// Construction-time checks that keep malformed patterns away from the matcher

import { makeDiagnostic } from "../../outcome/codes";
import { hasErrors, type Diagnostic, type PatternPath } from "../../outcome/diagnostic";
import { InvariantViolation, MalformedPatternError } from "../../outcome/errors";
import { showScalar } from "../value/show";
import { keyId } from "../value/value";
import { isIrrefutable } from "./names";
import type { Pattern } from "./pattern";

export interface ValidateOptions {
  /** Permit one name to be bound by several sub-patterns; the later one wins. */
  allowShadowing?: boolean;
  /** Prefix used for diagnostic paths. */
  path?: PatternPath;
}

export function validatePattern(pattern: Pattern, options: ValidateOptions = {}): Diagnostic[] {
  const v = new Validator(options.allowShadowing ?? false);
  v.names(pattern, options.path ?? "pattern", new Set());
  return v.diagnostics;
}

/** Throws `MalformedPatternError` when validation reports any error. */
export function assertWellFormed(pattern: Pattern, options: ValidateOptions = {}): void {
  const diagnostics = validatePattern(pattern, options);
  if (hasErrors(diagnostics)) {
    const first = diagnostics.find(d => d.severity === "error");
    throw new MalformedPatternError(`Malformed pattern: ${first?.message ?? "unknown error"}`, diagnostics);
  }
}

class Validator {
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly allowShadowing: boolean) {}

  /** Returns the distinct names bound by `p`, reporting problems on the way. */
  names(p: Pattern, path: PatternPath, ancestors: Set<Pattern>): string[] {
    if (ancestors.has(p)) {
      throw new InvariantViolation(`Pattern graph is cyclic at ${path}`, { path });
    }
    ancestors.add(p);
    try {
      return this.visit(p, path, ancestors);
    } finally {
      ancestors.delete(p);
    }
  }

  private visit(p: Pattern, path: PatternPath, ancestors: Set<Pattern>): string[] {
    switch (p.kind) {
      case "Literal":
      case "Wildcard":
        return [];

      case "Capture":
        this.checkName(p.name, path);
        return [p.name];

      case "As": {
        const inner = this.names(p.inner, `${path}.inner`, ancestors);
        this.checkName(p.name, path);
        return this.combine([inner, [p.name]], path);
      }

      case "Or": {
        if (p.alternatives.length === 0) {
          this.diagnostics.push(makeDiagnostic("E0708", undefined, path));
          return [];
        }
        const sets = p.alternatives.map((alt, i) => this.names(alt, `${path}.alternatives[${i}]`, ancestors));
        const expected = sets[0] ?? [];
        sets.forEach((names, i) => {
          if (i > 0 && !sameSet(expected, names)) {
            this.diagnostics.push(
              makeDiagnostic(
                "E0700",
                { expected: formatNames(expected), actual: formatNames(names) },
                `${path}.alternatives[${i}]`
              )
            );
          }
        });
        const last = p.alternatives.length - 1;
        p.alternatives.forEach((alt, i) => {
          if (i < last && isIrrefutable(alt)) {
            this.diagnostics.push(makeDiagnostic("E0706", undefined, `${path}.alternatives[${i}]`));
          }
        });
        return expected;
      }

      case "Sequence": {
        const groups = p.elements.map((el, i) => this.names(el, `${path}.elements[${i}]`, ancestors));
        const star = p.star;
        if (star) {
          if (!Number.isInteger(star.index) || star.index < 0 || star.index > p.elements.length) {
            this.diagnostics.push(
              makeDiagnostic("E0705", { index: star.index, max: p.elements.length }, `${path}.star`)
            );
          } else if (star.name !== undefined) {
            this.checkName(star.name, `${path}.star`);
            groups.splice(star.index, 0, [star.name]);
          }
        }
        return this.combine(groups, path);
      }

      case "Mapping": {
        const seen = new Set<string>();
        const groups: string[][] = [];
        for (const [key, sub] of p.entries) {
          const id = keyId(key);
          if (seen.has(id)) {
            this.diagnostics.push(makeDiagnostic("E0704", { key: showScalar(key) }, path));
          }
          seen.add(id);
          groups.push(this.names(sub, `${path}.entries[${showScalar(key)}]`, ancestors));
        }
        if (p.rest !== undefined) {
          this.checkName(p.rest, `${path}.rest`);
          groups.push([p.rest]);
        }
        return this.combine(groups, path);
      }

      case "Object": {
        const matchArgs = p.type.matchArgs;
        if (p.positional.length > matchArgs.length) {
          this.diagnostics.push(
            makeDiagnostic(
              "E0702",
              { type: p.type.name, expected: matchArgs.length, actual: p.positional.length },
              path
            )
          );
        }
        const targeted = new Set<string>();
        const target = (field: string) => {
          if (targeted.has(field)) {
            this.diagnostics.push(makeDiagnostic("E0703", { field }, path));
          }
          targeted.add(field);
        };
        const groups: string[][] = [];
        p.positional.forEach((sub, i) => {
          const field = matchArgs[i];
          if (field !== undefined) target(field);
          groups.push(this.names(sub, `${path}.positional[${i}]`, ancestors));
        });
        for (const [field, sub] of p.named) {
          target(field);
          groups.push(this.names(sub, `${path}.named.${field}`, ancestors));
        }
        return this.combine(groups, path);
      }
    }
  }

  /** Joins names from independently reachable sub-patterns. */
  private combine(groups: string[][], path: PatternPath): string[] {
    const out: string[] = [];
    for (const name of groups.flat()) {
      if (out.includes(name)) {
        if (!this.allowShadowing) {
          this.diagnostics.push(makeDiagnostic("E0701", { name }, path));
        }
        continue;
      }
      out.push(name);
    }
    return out;
  }

  private checkName(name: string, path: PatternPath): void {
    if (name === "" || name === "_") {
      this.diagnostics.push(makeDiagnostic("E0707", { name: JSON.stringify(name) }, path));
    }
  }
}

function sameSet(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every(name => b.includes(name));
}

function formatNames(names: readonly string[]): string {
  return `{${[...names].sort().join(", ")}}`;
}
