// src/core/cases/selector.ts
// First-match case selection: structural match, then guard, then the next arm

import { isDone } from "../../outcome/outcome";
import { MatchFallthroughError, PatternError, errorCodeFor } from "../../outcome/errors";
import { wrapFailure } from "../../outcome/failure";
import type { Diagnostic } from "../../outcome/diagnostic";
import { consoleLog, type LogPort } from "../../ports/log";
import { checkExhaustiveness, type ClosedType, type VariantId } from "../../lint/analysis/exhaustiveness";
import { lintCases } from "../../lint/runner";
import { DEFAULT_CONFIG, type EngineConfig } from "../config/config";
import type { Bindings } from "../match/bindings";
import { match, type MatchOptions } from "../match/matcher";
import { assertWellFormed } from "../pattern/validate";
import { showPattern } from "../pattern/show";
import { showValue } from "../value/show";
import type { Value } from "../value/value";
import type { Case, Selection } from "./types";

export interface SelectOptions extends MatchOptions {
  log?: LogPort;
}

/**
 * Returns the first arm whose pattern matches `value` and whose guard, if it
 * has one, accepts the bindings. A rejected guard moves on to the next arm;
 * the same pattern is never retried. `undefined` means nothing matched.
 *
 * Throws `PatternError` when an arm's pattern is ill-formed in a way only
 * matching reveals (a conflicting binding). Errors thrown by guards propagate.
 */
export function select<T>(value: Value, cases: readonly Case<T>[], options: SelectOptions = {}): Selection<T> | undefined {
  // without a log port the trace data is never rendered
  const log = options.log;

  for (const [index, c] of cases.entries()) {
    const r = match(c.pattern, value, options);
    if (!isDone(r)) {
      if (r.failure.reason !== "no-match") {
        const wrapped = wrapFailure(
          r.failure,
          `Case ${index} (${showPattern(c.pattern)}) is ill-formed: ${r.failure.message}`,
          { arm: index }
        );
        throw new PatternError(wrapped.message, errorCodeFor(wrapped.reason), wrapped);
      }
      log?.(`case ${index}: no match`, { reason: r.failure.message });
      continue;
    }

    if (c.guard && !c.guard(r.value)) {
      log?.(`case ${index}: guard rejected`, { bindings: showBindings(r.value) });
      continue;
    }

    log?.(`case ${index}: selected`, { bindings: showBindings(r.value) });
    return { bindings: r.value, action: c.action, index };
  }

  log?.("no case matched", { subject: showValue(value) });
  return undefined;
}

/** Like `select`, but falling through every arm throws `MatchFallthroughError`. */
export function selectCovered<T>(value: Value, cases: readonly Case<T>[], options: SelectOptions = {}): Selection<T> {
  const selection = select(value, cases, options);
  if (!selection) {
    throw new MatchFallthroughError(`No case matched ${showValue(value)}`, value);
  }
  return selection;
}

export interface Selector<T> {
  select(value: Value): Selection<T> | undefined;
}

export interface CaseSelectorOptions {
  config?: EngineConfig;
  log?: LogPort;
}

/**
 * A validated case list. Every arm's pattern is checked when the selector is
 * built, so malformed patterns never reach the matcher.
 */
export class CaseSelector<T> implements Selector<T> {
  readonly cases: readonly Case<T>[];
  private readonly config: EngineConfig;
  private readonly options: SelectOptions;

  constructor(cases: readonly Case<T>[], opts: CaseSelectorOptions = {}) {
    this.config = opts.config ?? DEFAULT_CONFIG;
    const allowShadowing = this.config.match.allowShadowing;
    cases.forEach((c, i) => assertWellFormed(c.pattern, { allowShadowing, path: `cases[${i}].pattern` }));

    this.cases = [...cases];
    this.options = {
      policy: allowShadowing ? "shadow" : "reject",
      maxDepth: this.config.match.maxDepth,
      log: opts.log ?? (this.config.trace ? consoleLog : undefined),
    };
  }

  select(value: Value): Selection<T> | undefined {
    return select(value, this.cases, this.options);
  }

  selectCovered(value: Value): Selection<T> {
    return selectCovered(value, this.cases, this.options);
  }

  /** For case lists whose actions are handlers: run the winner with its bindings. */
  dispatch<R>(this: CaseSelector<(bindings: Bindings) => R>, value: Value): R | undefined {
    const selection = this.select(value);
    return selection ? selection.action(selection.bindings) : undefined;
  }

  check(subject: ClosedType): Set<VariantId> {
    return checkExhaustiveness(subject, this.cases);
  }

  lint(subject?: ClosedType): Diagnostic[] {
    return lintCases(
      { cases: this.cases, subject, allowShadowing: this.config.match.allowShadowing },
      this.config.lint
    ).diagnostics;
  }
}

/**
 * Logging wrapper for debugging.
 */
export class TracingSelector<T> implements Selector<T> {
  constructor(
    private inner: Selector<T>,
    private log: LogPort = console.log
  ) {}

  select(value: Value): Selection<T> | undefined {
    this.log("select", { subject: showValue(value) });
    const selection = this.inner.select(value);
    if (selection) {
      this.log(`selected case ${selection.index}`, { bindings: showBindings(selection.bindings) });
    } else {
      this.log("fell through");
    }
    return selection;
  }
}

function showBindings(b: Bindings): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, v] of b) out[name] = showValue(v);
  return out;
}
