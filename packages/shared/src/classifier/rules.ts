/**
 * Rule catalog
 *
 * Classifier rules are declarative JSON documents validated with zod and
 * compiled once. Updated rules are picked up without code changes.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { createLogger } from '../logger/index';
import { InvalidInputError } from '../errors/index';
import { formatIssues, severitySchema } from '../ledger/schemas';
import type { Severity } from '../types/index';

const log = createLogger({ name: 'changegate:rules' });

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../rules/default-rules.json', import.meta.url));

export const ruleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  flags: z
    .string()
    .regex(/^[dgimsuvy]*$/, 'flags may only contain d, g, i, m, s, u, v, y')
    .optional(),
  category: z.string().min(1),
  severity: severitySchema,
  description: z.string(),
  recommendedFix: z.string(),
  /** Suppresses the match when this pattern also matches the line */
  unless: z.string().min(1).optional(),
  /** Rule is skipped for artifacts whose locationRef contains any of these */
  excludePaths: z.array(z.string().min(1)).optional(),
});

export const ruleSetSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String),
  rules: z.array(ruleSchema),
});

export type Rule = z.infer<typeof ruleSchema>;

export interface CompiledRule {
  id: string;
  category: string;
  severity: Severity;
  description: string;
  recommendedFix: string;
  excludePaths: string[];
  regex: RegExp;
  unless: RegExp | null;
}

export interface RuleSet {
  version: string;
  rules: CompiledRule[];
}

function compilePattern(pattern: string, flags: string): RegExp | string {
  try {
    return new RegExp(pattern, flags);
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Validate and compile a rule set document. Rule order is preserved; it
 * breaks severity ties in the classifier.
 */
export function compileRuleSet(input: unknown, source = 'rule set'): RuleSet {
  const parsed = ruleSetSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid ${source}`, formatIssues(parsed.error));
  }

  const issues: string[] = [];
  const seen = new Set<string>();
  const rules: CompiledRule[] = [];

  parsed.data.rules.forEach((rule, index) => {
    if (seen.has(rule.id)) {
      issues.push(`rules.${index}.id: duplicate rule id ${rule.id}`);
    }
    seen.add(rule.id);

    // g and y would carry lastIndex from one test() call to the next
    const flags = (rule.flags ?? '').replace(/[gy]/g, '');
    const regex = compilePattern(rule.pattern, flags);
    const unless = rule.unless === undefined ? null : compilePattern(rule.unless, flags);

    if (typeof regex === 'string') {
      issues.push(`rules.${index}.pattern: ${regex}`);
      return;
    }
    if (typeof unless === 'string') {
      issues.push(`rules.${index}.unless: ${unless}`);
      return;
    }

    rules.push({
      id: rule.id,
      category: rule.category,
      severity: rule.severity,
      description: rule.description,
      recommendedFix: rule.recommendedFix,
      excludePaths: rule.excludePaths ?? [],
      regex,
      unless,
    });
  });

  if (issues.length > 0) {
    throw new InvalidInputError(`Invalid ${source}`, issues);
  }

  return { version: parsed.data.version, rules };
}

/**
 * Load and compile a rule set from a JSON file.
 */
export function loadRuleSet(path: string): RuleSet {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    throw new InvalidInputError(`Cannot read rule set ${path}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (err) {
    throw new InvalidInputError(`Rule set ${path} is not valid JSON`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  const ruleSet = compileRuleSet(document, `rule set ${path}`);
  log.debug({ path, version: ruleSet.version, rules: ruleSet.rules.length }, 'Rule set loaded');
  return ruleSet;
}

let defaultRuleSet: RuleSet | null = null;

/**
 * The bundled default catalog.
 */
export function loadDefaultRuleSet(): RuleSet {
  if (defaultRuleSet === null) {
    defaultRuleSet = loadRuleSet(DEFAULT_RULES_PATH);
  }
  return defaultRuleSet;
}
