import type { LookupStore } from '../domain/lookup-store.js';
import type { IssueClassification } from '../domain/types.js';

/**
 * Keyword classification over the store's ordered rules. The first rule whose
 * keyword appears anywhere in the lowercased text wins, even when a later rule
 * would be a longer or closer match. Matching is plain substring search, so
 * "broken" also hits "unbroken".
 */
export function classifyIssue(ticketText: string, store: LookupStore): IssueClassification {
  const text = ticketText.toLowerCase();
  const rule = store.matchIssue(text);

  if (rule) {
    return {
      issueType: rule.issueType,
      evidence: `Matched keyword '${rule.keyword}' in ticket text`,
    };
  }

  return { issueType: 'unknown', evidence: 'No matching keywords found in ticket text' };
}
