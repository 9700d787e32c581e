import type { KeywordTable } from "./types.ts";

/**
 * Keyword classifier.
 *
 * Every tag family follows the same rule: start from the caller's tags, then append each candidate key that
 * passes its test and is not already present. `appendUnique` is that rule; `classify` applies it to a keyword
 * table. Nothing here mutates its inputs.
 */
export function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

/**
 * Copy `orderedSet`, dropping repeats, then append each candidate for which `predicate` holds and which is
 * not yet in the result. Candidates are visited in order.
 */
export function appendUnique<K extends string>(
  orderedSet: readonly K[],
  candidateKeys: readonly K[],
  predicate: (key: K) => boolean,
): K[] {
  const result: K[] = [];
  const seen = new Set<K>();
  for (const key of orderedSet) {
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(key);
  }
  for (const key of candidateKeys) {
    if (seen.has(key) || !predicate(key)) continue;
    seen.add(key);
    result.push(key);
  }
  return result;
}

/**
 * A key decided by more than keyword presence. It is scanned right after the table entry named by `after`
 * (or first when `after` is null), so its position in the result matches the form order. A derived key that
 * also has a table entry is added when either test holds.
 */
export interface DerivedRule<K extends string> {
  key: K;
  after: K | null;
  applies: () => boolean;
}

function scanOrder<K extends string>(tableKeys: readonly K[], derived: readonly DerivedRule<K>[]): K[] {
  const order = [...tableKeys];
  for (const rule of derived) {
    if (order.includes(rule.key)) continue;
    if (rule.after === null) {
      order.unshift(rule.key);
      continue;
    }
    const anchor = order.indexOf(rule.after);
    // Anchor missing from a custom table: scan the derived key last.
    order.splice(anchor === -1 ? order.length : anchor + 1, 0, rule.key);
  }
  return order;
}

/**
 * Table pass: a key is added when any of its keywords occurs in `text` (already lowercased). Derived rules
 * are folded into the same pass at their scan position.
 */
export function classify<K extends string>(
  table: KeywordTable<K>,
  text: string,
  seed: readonly K[] = [],
  derived: readonly DerivedRule<K>[] = [],
): K[] {
  const keywordsByKey = new Map(table.map((entry) => [entry.key, entry.keywords] as const));
  const order = scanOrder(
    table.map((entry) => entry.key),
    derived,
  );
  return appendUnique(seed, order, (key) => {
    if (containsAny(text, keywordsByKey.get(key) ?? [])) return true;
    return derived.some((rule) => rule.key === key && rule.applies());
  });
}
