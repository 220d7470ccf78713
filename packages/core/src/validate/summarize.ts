import type { FindingSeverity, ValidationFindings } from './validator.js';

export type SeverityCounts = Record<FindingSeverity, number>;

/** Tally per rule name, e.g. `{ 'No changed types': { info: 0, warning: 2, ... } }`. */
export type FindingSummary = Record<string, SeverityCounts>;

export function emptyCounts(): SeverityCounts {
  return { info: 0, warning: 0, error: 0, fatal: 0 };
}

export function countSeverity<C>(
  findings: ValidationFindings<C>,
  severity: FindingSeverity
): number {
  let count = 0;
  for (const ruleFindings of findings.values()) {
    count += ruleFindings.filter((finding) => finding.severity === severity).length;
  }
  return count;
}

export function summarizeFindings<C>(findings: ValidationFindings<C>): FindingSummary {
  const summary: FindingSummary = {};
  for (const [rule, ruleFindings] of findings) {
    const counts = emptyCounts();
    for (const finding of ruleFindings) counts[finding.severity] += 1;
    summary[rule.metadata.name] = counts;
  }
  return summary;
}

/** Whether any finding blocks: an error or a fatal one. */
export function hasBlockingFindings<C>(findings: ValidationFindings<C>): boolean {
  return countSeverity(findings, 'error') > 0 || countSeverity(findings, 'fatal') > 0;
}
