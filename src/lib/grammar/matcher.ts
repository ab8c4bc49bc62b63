/**
 * Prefix matchers for fixed, non-recursive grammars.
 *
 * A matcher looks at `text` from `offset` and returns the offset just past the
 * recognised span, or null. Combinators follow PEG rules: repetition is greedy,
 * alternation is ordered, and nothing backtracks into a repetition once it has
 * stopped.
 */

import { GrammarError } from "../errors.js";

export interface Matcher {
  /** Short human-readable form of the grammar. */
  readonly description: string;
  match(text: string, offset: number): number | null;
}

function matcher(description: string, match: Matcher["match"]): Matcher {
  return Object.freeze({ description, match });
}

/**
 * Returns the length of the prefix of `text` recognised by `m`, or null.
 */
export function matchPrefix(m: Matcher, text: string): number | null {
  return m.match(text, 0);
}

// ============================================================================
// Terminals
// ============================================================================

export function literal(value: string): Matcher {
  if (value.length === 0) {
    throw new GrammarError("literal() needs a non-empty string");
  }
  return matcher(JSON.stringify(value), (text, offset) =>
    text.startsWith(value, offset) ? offset + value.length : null
  );
}

export function char(c: string): Matcher {
  if (c.length !== 1) {
    throw new GrammarError(`char() needs exactly one character, got ${JSON.stringify(c)}`);
  }
  return literal(c);
}

export function anyOf(set: string): Matcher {
  if (set.length === 0) {
    throw new GrammarError("anyOf() needs at least one character");
  }
  return matcher(`[${set}]`, (text, offset) =>
    offset < text.length && set.includes(text[offset]) ? offset + 1 : null
  );
}

export function noneOf(set: string): Matcher {
  if (set.length === 0) {
    throw new GrammarError("noneOf() needs at least one character");
  }
  return matcher(`[^${set}]`, (text, offset) =>
    offset < text.length && !set.includes(text[offset]) ? offset + 1 : null
  );
}

// ============================================================================
// Repetition
// ============================================================================

function repeat(m: Matcher, min: number, max: number, suffix: string): Matcher {
  return matcher(`(${m.description})${suffix}`, (text, offset) => {
    let position = offset;
    let count = 0;
    while (count < max) {
      const next = m.match(text, position);
      // An empty match would repeat forever
      if (next === null || next === position) break;
      position = next;
      count++;
    }
    return count >= min ? position : null;
  });
}

export function star(m: Matcher): Matcher {
  return repeat(m, 0, Infinity, "*");
}

export function plus(m: Matcher): Matcher {
  return repeat(m, 1, Infinity, "+");
}

export function optional(m: Matcher): Matcher {
  return repeat(m, 0, 1, "?");
}

// ============================================================================
// Composition
// ============================================================================

export function seq(...parts: Matcher[]): Matcher {
  if (parts.length === 0) {
    throw new GrammarError("seq() needs at least one matcher");
  }
  return matcher(parts.map((p) => p.description).join(" "), (text, offset) => {
    let position = offset;
    for (const part of parts) {
      const next = part.match(text, position);
      if (next === null) return null;
      position = next;
    }
    return position;
  });
}

export function oneOf(...alternatives: Matcher[]): Matcher {
  if (alternatives.length === 0) {
    throw new GrammarError("oneOf() needs at least one alternative");
  }
  return matcher(`(${alternatives.map((a) => a.description).join(" | ")})`, (text, offset) => {
    for (const alternative of alternatives) {
      const next = alternative.match(text, offset);
      if (next !== null) return next;
    }
    return null;
  });
}
