import type { SectionDescriptor, SectionRegistry } from "./sections.js";

export interface ScanResult {
  /** Section ids in the order they were stripped from the text. */
  matched: string[];
  /** Every required, non-persistent section was matched. */
  complete: boolean;
  /** Characters stripped from the front of the text. */
  consumed: number;
  /** Matcher invocations made during the scan. */
  attempts: number;
}

function isOutstanding(descriptor: SectionDescriptor, matched: ReadonlySet<string>): boolean {
  return !descriptor.isPersistent && descriptor.isRequired && !matched.has(descriptor.id);
}

/**
 * Greedily strips known sections from the front of `text`.
 *
 * After every match the registry is tried again from the top, so persistent
 * sections can interleave with the others. The first pass always runs; after
 * that the scan stops as soon as no required section is outstanding, or when
 * no section matches the remaining text. A non-persistent section is matched
 * at most once, and empty matches are ignored so the text always shrinks.
 */
export function scanSections(registry: SectionRegistry, text: string): ScanResult {
  const matched: string[] = [];
  const matchedIds = new Set<string>();
  let offset = 0;
  let attempts = 0;

  while (matched.length === 0 || registry.some((d) => isOutstanding(d, matchedIds))) {
    let found = false;

    for (const descriptor of registry) {
      if (!descriptor.isPersistent && matchedIds.has(descriptor.id)) continue;

      attempts++;
      const end = descriptor.matcher.match(text, offset);
      if (end === null || end === offset) continue;

      offset = end;
      matched.push(descriptor.id);
      matchedIds.add(descriptor.id);
      found = true;
      break;
    }

    if (!found) break;
  }

  return {
    matched,
    complete: !registry.some((d) => isOutstanding(d, matchedIds)),
    consumed: offset,
    attempts,
  };
}
