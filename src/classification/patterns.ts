/**
 * Pattern compilation shared by the alias and charge tables.
 */

import type { ZodIssue } from 'zod';
import type { RuleTableIssue } from './types';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a table-supplied expression. Matching is always case-insensitive
 * and never global, so a compiled expression holds no state between calls.
 */
export function compilePattern(source: string): RegExp | string {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    return error instanceof Error ? error.message : 'invalid regular expression';
  }
}

/**
 * Number of capture groups in an expression.
 */
export function countCaptureGroups(expression: RegExp): number {
  const probe = new RegExp(`${expression.source}|`);
  const match = probe.exec('');
  return match ? match.length - 1 : 0;
}

/**
 * Turns zod issues for an array-shaped table into rule table issues.
 */
export function toTableIssues(table: string, issues: ZodIssue[]): RuleTableIssue[] {
  return issues.map((issue) => {
    const [head, ...rest] = issue.path;
    return {
      table,
      index: typeof head === 'number' ? head : undefined,
      path: (typeof head === 'number' ? rest : issue.path).join('.') || undefined,
      message: issue.message,
    };
  });
}
