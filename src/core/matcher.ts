import type { FilterSet, KeywordGroup, MatchedItem, RawItem } from "../types/pipeline.js";
import { foldText } from "./text.js";

interface CompiledGroup {
  label: string;
  needles: string[];
}

function foldTerms(terms: readonly string[]): string[] {
  return terms.map((term) => foldText(term.trim())).filter((term) => term.length > 0);
}

function compileGroups(groups: readonly KeywordGroup[]): CompiledGroup[] {
  return groups.map((group) => ({
    label: group.label,
    needles: foldTerms(group.expand ? [...group.terms, ...group.expansions] : group.terms),
  }));
}

/**
 * Substring matching, no tokenisation: CJK titles have no word boundaries.
 * Filters are evaluated first and win over any keyword group.
 */
export function matchItems(
  items: readonly RawItem[],
  groups: readonly KeywordGroup[],
  filters: FilterSet,
): MatchedItem[] {
  const compiled = compileGroups(groups);
  const filterTerms = foldTerms(filters);
  const matched: MatchedItem[] = [];

  for (const item of items) {
    const haystack = foldText(item.title);
    if (filterTerms.some((term) => haystack.includes(term))) continue;

    const group = compiled.find((candidate) => candidate.needles.some((needle) => haystack.includes(needle)));
    if (!group) continue;

    matched.push({ ...item, keyword: group.label });
  }

  return matched;
}
