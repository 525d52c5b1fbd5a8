import type { Pattern } from "./pattern";

/**
 * Names a pattern binds, in binding order. An or-pattern reports the names of
 * its first alternative; well-formed alternatives all bind the same set.
 */
export function boundNames(p: Pattern): string[] {
  switch (p.kind) {
    case "Literal":
    case "Wildcard":
      return [];
    case "Capture":
      return [p.name];
    case "Or": {
      const first = p.alternatives[0];
      return first ? boundNames(first) : [];
    }
    case "As":
      return [...boundNames(p.inner), p.name];
    case "Sequence": {
      const names: string[] = [];
      const star = p.star;
      p.elements.forEach((el, i) => {
        if (star?.index === i && star.name !== undefined) names.push(star.name);
        names.push(...boundNames(el));
      });
      if (star && star.index >= p.elements.length && star.name !== undefined) {
        names.push(star.name);
      }
      return names;
    }
    case "Mapping": {
      const names = p.entries.flatMap(([, sub]) => boundNames(sub));
      if (p.rest !== undefined) names.push(p.rest);
      return names;
    }
    case "Object":
      return [...p.positional, ...p.named.map(([, sub]) => sub)].flatMap(boundNames);
  }
}

/** True when the pattern matches every value. */
export function isIrrefutable(p: Pattern): boolean {
  switch (p.kind) {
    case "Wildcard":
    case "Capture":
      return true;
    case "As":
      return isIrrefutable(p.inner);
    case "Or":
      return p.alternatives.some(isIrrefutable);
    default:
      return false;
  }
}
