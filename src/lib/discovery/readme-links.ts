/**
 * Link extraction for "awesome list" style READMEs.
 *
 * The README declares its categories as links in a `Contents` list; every
 * other heading must be one of those categories, and each top-level item of
 * the list under it starts with a link to a project.
 */

import { ReadmeFormatError } from "../errors.js";

export const CONTENTS_HEADING = "Contents";

const HEADING = /^#{1,6}\s+(.*?)(?:\s+#+)?\s*$/;
const TOP_LEVEL_ITEM = /^(?:[-*+]|\d+[.)])\s+(.*)$/;
const FENCE = /^\s*(```|~~~)/;

export interface MarkdownLink {
  text: string;
  dest: string;
}

const TITLE_CLOSERS: Record<string, string> = { '"': '"', "'": "'", "(": ")" };

function isSpace(c: string | undefined): boolean {
  return c === " " || c === "\t";
}

/** Index of the `]` closing the bracket opened at `open`, or -1. Nested brackets must balance. */
function closingBracket(s: string, open: number): number {
  let depth = 0;
  for (let i = open; i < s.length; i++) {
    const c = s[i];
    if (c === "\\") {
      i++;
    } else if (c === "[") {
      depth++;
    } else if (c === "]" && --depth === 0) {
      return i;
    }
  }
  return -1;
}

/**
 * Reads a link destination starting at `start`: either `<...>` or a run of
 * non-space characters whose parentheses balance.
 */
function readDestination(s: string, start: number): { dest: string; end: number } | null {
  let dest = "";

  if (s[start] === "<") {
    for (let i = start + 1; i < s.length; i++) {
      const c = s[i];
      if (c === ">") return { dest, end: i + 1 };
      if (c === "<") return null;
      if (c === "\\" && i + 1 < s.length) {
        dest += s[++i];
      } else {
        dest += c;
      }
    }
    return null;
  }

  let depth = 0;
  let i = start;
  for (; i < s.length; i++) {
    const c = s[i];
    if (isSpace(c)) break;
    if (c === "\\" && i + 1 < s.length) {
      dest += s[++i];
      continue;
    }
    if (c === "(") {
      depth++;
    } else if (c === ")") {
      if (depth === 0) break;
      depth--;
    }
    dest += c;
  }
  return depth === 0 && dest.length > 0 ? { dest, end: i } : null;
}

/** Index just past an optional link title at `start`, or -1 if one is opened but never closed. */
function skipTitle(s: string, start: number): number {
  const closer = TITLE_CLOSERS[s[start]];
  if (closer === undefined) return start;
  for (let i = start + 1; i < s.length; i++) {
    if (s[i] === "\\") {
      i++;
    } else if (s[i] === closer) {
      return i + 1;
    }
  }
  return -1;
}

function skipSpaces(s: string, i: number): number {
  while (isSpace(s[i])) i++;
  return i;
}

/**
 * Parses the inline link an item starts with, or null if it starts with
 * anything else. Link text may hold balanced brackets and a bare destination
 * balanced parentheses, as in CommonMark.
 */
export function parseLeadingLink(item: string): MarkdownLink | null {
  const s = item.trim();
  if (s[0] !== "[") return null;

  const textEnd = closingBracket(s, 0);
  if (textEnd < 0 || s[textEnd + 1] !== "(") return null;

  const destination = readDestination(s, skipSpaces(s, textEnd + 2));
  if (!destination) return null;

  let i = skipSpaces(s, destination.end);
  if (i > destination.end) {
    i = skipTitle(s, i);
    if (i < 0) return null;
    i = skipSpaces(s, i);
  }
  if (s[i] !== ")") return null;

  return { text: s.slice(1, textEnd).trim(), dest: destination.dest };
}

/**
 * Returns the destination of every project link, in document order.
 *
 * Only unindented list items count; nested items and fenced code are skipped.
 * Lists that appear before the first heading are ignored.
 */
export function extractRepositoryLinks(markdown: string): string[] {
  const links: string[] = [];
  const sections = new Set<string>();
  let currentSection: string | null = null;
  let inFence = false;

  for (const [index, line] of markdown.split(/\r?\n/).entries()) {
    if (FENCE.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const heading = HEADING.exec(line);
    if (heading) {
      currentSection = heading[1];
      continue;
    }

    const item = TOP_LEVEL_ITEM.exec(line);
    if (!item || !currentSection) continue;

    const link = parseLeadingLink(item[1]);
    if (!link) {
      throw new ReadmeFormatError(`Line ${index + 1}: list item under "${currentSection}" does not start with a link`);
    }

    if (currentSection === CONTENTS_HEADING) {
      sections.add(link.text.toLowerCase());
      continue;
    }

    if (!sections.has(currentSection.toLowerCase())) {
      throw new ReadmeFormatError(`Invalid section: ${currentSection}`);
    }
    links.push(link.dest);
  }

  return links;
}
