/**
 * Equipment and material alias tables.
 *
 * Order is the precedence: narrower, multi-word patterns come before the broad
 * ones ("SPLIT BODY 28YD" before "28YD").
 */

import { z } from 'zod';
import { UNCLASSIFIED } from './constants';
import { RuleTableError } from './errors';
import { normalizeText, toLookupKey } from './normalizeText';
import { compilePattern, countCaptureGroups, escapeRegExp, toTableIssues } from './patterns';
import type { CompiledAliasRule, CompiledAliasTable, RawAliasRule, RuleTableIssue } from './types';

const aliasPatternSchema = z.union([
  z.object({ contains: z.string().trim().min(1, 'contains must not be empty') }).strict(),
  z.object({ regex: z.string().min(1, 'regex must not be empty') }).strict(),
]);

const aliasRuleSchema = z.object({
  label: z.string().trim().min(1, 'label is required'),
  patterns: z.array(aliasPatternSchema).min(1, 'at least one pattern is required'),
});

export const aliasTableSchema = z.array(aliasRuleSchema);

const PLACEHOLDER = /\{(\d+)\}/g;

function highestPlaceholder(label: string): number {
  let highest = 0;
  for (const match of label.matchAll(PLACEHOLDER)) {
    highest = Math.max(highest, Number(match[1]));
  }
  return highest;
}

function compileRule(
  table: string,
  index: number,
  rule: RawAliasRule,
  issues: RuleTableIssue[]
): CompiledAliasRule {
  const placeholders = highestPlaceholder(rule.label);
  const expressions: RegExp[] = [];

  rule.patterns.forEach((pattern, patternIndex) => {
    const path = `patterns.${patternIndex}`;

    if ('contains' in pattern) {
      const needle = normalizeText(pattern.contains);
      if (!needle) {
        issues.push({ table, index, path, message: 'contains is empty after normalization' });
        return;
      }
      if (placeholders > 0) {
        issues.push({ table, index, path, message: 'label placeholders need a regex pattern' });
        return;
      }
      expressions.push(new RegExp(escapeRegExp(needle), 'i'));
      return;
    }

    const compiled = compilePattern(pattern.regex);
    if (typeof compiled === 'string') {
      issues.push({ table, index, path, message: `invalid regex: ${compiled}` });
      return;
    }
    if (countCaptureGroups(compiled) < placeholders) {
      issues.push({
        table,
        index,
        path,
        message: `label uses {${placeholders}} but the regex has fewer capture groups`,
      });
      return;
    }
    expressions.push(compiled);
  });

  return { label: rule.label, expressions };
}

/**
 * Validates and compiles an alias table.
 *
 * @throws RuleTableError listing every malformed entry
 */
export function compileAliasTable(name: string, raw: unknown): CompiledAliasTable {
  const parsed = aliasTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RuleTableError(toTableIssues(name, parsed.error.issues));
  }

  const issues: RuleTableIssue[] = [];
  const seenLabels = new Map<string, number>();

  const rules = parsed.data.map((rule, index) => {
    const key = toLookupKey(rule.label);
    if (key === UNCLASSIFIED) {
      issues.push({ table: name, index, path: 'label', message: `${UNCLASSIFIED} is reserved` });
    }
    const previous = seenLabels.get(key);
    if (previous !== undefined) {
      issues.push({
        table: name,
        index,
        path: 'label',
        message: `duplicate label "${rule.label}" (first declared at ${previous})`,
      });
    } else {
      seenLabels.set(key, index);
    }
    return compileRule(name, index, rule, issues);
  });

  if (issues.length > 0) {
    throw new RuleTableError(issues);
  }

  return Object.freeze({ name, rules: Object.freeze(rules) });
}
