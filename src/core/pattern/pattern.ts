// src/core/pattern/pattern.ts
// The closed set of pattern kinds, and helpers to build them

import { makeDiagnostic } from "../../outcome/codes";
import { MalformedPatternError } from "../../outcome/errors";
import type { RecordType, ScalarLiteral } from "../value/value";

export type Pattern =
  | LiteralPattern
  | WildcardPattern
  | CapturePattern
  | OrPattern
  | AsPattern
  | SequencePattern
  | MappingPattern
  | ObjectPattern;

export interface LiteralPattern {
  readonly kind: "Literal";
  readonly value: ScalarLiteral;
}

export interface WildcardPattern {
  readonly kind: "Wildcard";
}

export interface CapturePattern {
  readonly kind: "Capture";
  readonly name: string;
}

export interface OrPattern {
  readonly kind: "Or";
  readonly alternatives: readonly Pattern[];
}

export interface AsPattern {
  readonly kind: "As";
  readonly inner: Pattern;
  readonly name: string;
}

/**
 * `star.index` is where the variadic slot sits among `elements`: elements
 * before it match the prefix, elements from it on match the suffix.
 * A star without a name matches the middle slice without binding it.
 */
export interface StarSlot {
  readonly index: number;
  readonly name?: string;
}

export interface SequencePattern {
  readonly kind: "Sequence";
  readonly elements: readonly Pattern[];
  readonly star?: StarSlot;
}

export interface MappingPattern {
  readonly kind: "Mapping";
  readonly entries: readonly (readonly [ScalarLiteral, Pattern])[];
  readonly rest?: string;
}

export interface ObjectPattern {
  readonly kind: "Object";
  readonly type: RecordType;
  readonly positional: readonly Pattern[];
  readonly named: readonly (readonly [string, Pattern])[];
}

export type PatternKind = Pattern["kind"];

const WILDCARD: WildcardPattern = { kind: "Wildcard" };

/** Pattern constructors. */
export const P = {
  lit: (value: ScalarLiteral): LiteralPattern => ({ kind: "Literal", value }),
  wild: (): WildcardPattern => WILDCARD,
  cap: (name: string): CapturePattern => ({ kind: "Capture", name }),
  or: (...alternatives: Pattern[]): OrPattern => ({ kind: "Or", alternatives }),
  as: (inner: Pattern, name: string): AsPattern => ({ kind: "As", inner, name }),

  seq: (elements: Pattern[], star?: StarSlot): SequencePattern =>
    star ? { kind: "Sequence", elements, star } : { kind: "Sequence", elements },

  /**
   * Sequence with a variadic slot written inline, e.g.
   * `P.list(P.cap("head"), P.rest("tail"))`.
   */
  list: (...items: (Pattern | RestMarker)[]): SequencePattern => {
    const elements: Pattern[] = [];
    let star: StarSlot | undefined;
    for (const item of items) {
      if (isRestMarker(item)) {
        if (star) throw new Error("A sequence pattern takes at most one rest slot");
        star = item.name === undefined ? { index: elements.length } : { index: elements.length, name: item.name };
      } else {
        elements.push(item);
      }
    }
    return star ? { kind: "Sequence", elements, star } : { kind: "Sequence", elements };
  },
  rest: (name?: string): RestMarker => ({ kind: "Rest", name }),

  map: (entries: Iterable<readonly [ScalarLiteral, Pattern]>, rest?: string): MappingPattern =>
    rest === undefined
      ? { kind: "Mapping", entries: [...entries] }
      : { kind: "Mapping", entries: [...entries], rest },

  /** Throws `MalformedPatternError` when `positional` is longer than `type.matchArgs`. */
  obj: (
    type: RecordType,
    positional: Pattern[] = [],
    named: Record<string, Pattern> | Iterable<readonly [string, Pattern]> = []
  ): ObjectPattern => {
    if (positional.length > type.matchArgs.length) {
      const diagnostic = makeDiagnostic(
        "E0702",
        { type: type.name, expected: type.matchArgs.length, actual: positional.length },
        "pattern"
      );
      throw new MalformedPatternError(`Malformed pattern: ${diagnostic.message}`, [diagnostic]);
    }
    return {
      kind: "Object",
      type,
      positional,
      named: isIterable<readonly [string, Pattern]>(named) ? [...named] : Object.entries(named),
    };
  },
};

export interface RestMarker {
  readonly kind: "Rest";
  readonly name?: string;
}

function isRestMarker(item: Pattern | RestMarker): item is RestMarker {
  return item.kind === "Rest";
}

function isIterable<T>(x: object): x is Iterable<T> {
  return Symbol.iterator in x;
}
