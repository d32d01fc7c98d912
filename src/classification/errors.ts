import { AppError } from '../utils/AppError';
import type { RuleTableIssue } from './types';

/**
 * Raised when a rule table cannot be compiled. Carries every issue found so a
 * curator can fix the whole table in one pass.
 */
export class RuleTableError extends AppError {
  public readonly issues: RuleTableIssue[];

  constructor(issues: RuleTableIssue[]) {
    const first = issues[0];
    const summary = first ? describeIssue(first) : 'unknown problem';
    const more = issues.length > 1 ? ` (+${issues.length - 1} more)` : '';
    super(`Invalid rule table: ${summary}${more}`, 422, true, issues);
    this.issues = issues;
  }
}

export function describeIssue(issue: RuleTableIssue): string {
  const position = issue.index === undefined ? '' : `[${issue.index}]`;
  const path = issue.path ? `.${issue.path}` : '';
  return `${issue.table}${position}${path}: ${issue.message}`;
}
