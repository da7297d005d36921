import { ValidationError } from '../errors/index';

export interface SubstitutionRule {
  from: string;
  to: string;
}

/**
 * Rules in application order: longest `from` first, ties in lexicographic
 * order. Rules are indexed by the first code unit of `from`.
 */
export interface SubstitutionTable {
  readonly rules: readonly SubstitutionRule[];
  readonly byFirstChar: ReadonlyMap<string, readonly SubstitutionRule[]>;
}

export const EMPTY_SUBSTITUTION_TABLE: SubstitutionTable = {
  rules: [],
  byFirstChar: new Map(),
};

function compareRules(a: SubstitutionRule, b: SubstitutionRule): number {
  if (a.from.length !== b.from.length) return b.from.length - a.from.length;
  if (a.from < b.from) return -1;
  return a.from > b.from ? 1 : 0;
}

/**
 * Builds a table from rules. A repeated `from` keeps its last `to`.
 * Throws ValidationError for an empty `from`.
 */
export function buildSubstitutionTable(rules: Iterable<SubstitutionRule>): SubstitutionTable {
  const unique = new Map<string, string>();
  for (const rule of rules) {
    if (rule.from.length === 0) {
      throw new ValidationError(`Substitution rule has an empty "from" value (to: "${rule.to}")`);
    }
    unique.set(rule.from, rule.to);
  }

  const ordered = [...unique].map(([from, to]) => ({ from, to })).sort(compareRules);
  const byFirstChar = new Map<string, SubstitutionRule[]>();
  for (const rule of ordered) {
    const key = rule.from.charAt(0);
    const bucket = byFirstChar.get(key) ?? [];
    bucket.push(rule);
    byFirstChar.set(key, bucket);
  }

  return { rules: ordered, byFirstChar };
}

/**
 * Replaces every occurrence of each rule's `from` in a single left-to-right
 * pass. At each position the longest matching `from` wins; replaced text
 * is not scanned again.
 */
export function applySubstitutions(text: string, table: SubstitutionTable): string {
  if (table.rules.length === 0) return text;

  let result = '';
  let copyFrom = 0;
  let pos = 0;

  while (pos < text.length) {
    const candidates = table.byFirstChar.get(text.charAt(pos));
    const match = candidates?.find((rule) => text.startsWith(rule.from, pos));
    if (!match) {
      pos++;
      continue;
    }
    result += text.slice(copyFrom, pos) + match.to;
    pos += match.from.length;
    copyFrom = pos;
  }

  return result + text.slice(copyFrom);
}
