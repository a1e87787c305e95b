import { describe, expect, it } from 'vitest';
import { classifyIssue } from '../src/services/intent.js';
import { makeStore } from './fixtures.js';

describe('classifyIssue', () => {
  const store = makeStore();

  it('reports the matched keyword as evidence', () => {
    expect(classifyIssue('Hi, my order arrived broken.', store)).toEqual({
      issueType: 'damaged_item',
      evidence: "Matched keyword 'broken' in ticket text",
    });
  });

  it('matches case-insensitively', () => {
    expect(classifyIssue('IT IS BROKEN', store).issueType).toBe('damaged_item');
  });

  it('prefers the earlier rule when one keyword contains another', () => {
    expect(classifyIssue('It broke. Well, it is broken now.', store)).toEqual({
      issueType: 'damaged_item',
      evidence: "Matched keyword 'broken' in ticket text",
    });
    expect(classifyIssue('The zipper broke', store).issueType).toBe('defective_product');
  });

  it('orders by rule position, not by position in the text', () => {
    expect(classifyIssue('I want a refund because it came late', store)).toEqual({
      issueType: 'late_delivery',
      evidence: "Matched keyword 'late' in ticket text",
    });
  });

  it('falls back to unknown when nothing matches', () => {
    expect(classifyIssue('Need help', store)).toEqual({
      issueType: 'unknown',
      evidence: 'No matching keywords found in ticket text',
    });
  });

  it('matches inside longer words (known false positive)', () => {
    expect(classifyIssue('The seal was unbroken', store).issueType).toBe('damaged_item');
    expect(classifyIssue('I ordered chocolate', store).issueType).toBe('late_delivery');
  });
});
