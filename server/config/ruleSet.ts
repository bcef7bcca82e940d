/**
 * Rule-Set Document Loading
 *
 * The rule set lives in a JSON document (RULES_FILE). It is validated with
 * zod and compiled into the tagged ValidationRule variants: required rules
 * first, then date rules, then numeric rules, each in document order.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { isCanonicalField, type CanonicalField } from '../../shared/canonicalSchema';
import { Severity } from '../../shared/schema';
import { ConfigurationError } from '../lib/errors';
import { createLogger } from '../lib/logger';
import type { RuleSet, ValidationRule } from '../services/validationEngine';

const log = createLogger({ module: 'rule-set' });

export const REQUIRED_FIELD_RULE_NAME = 'required_field';
export const REQUIRED_FIELD_MESSAGE = "Required field '{field}' is missing or empty";

const canonicalFieldName = z.string().refine(isCanonicalField, (value) => ({
  message: `Unknown canonical field '${value}'`,
}));

const severitySchema = z.nativeEnum(Severity).default(Severity.ERROR);

const dateRuleSchema = z.object({
  name: z.string().min(1),
  inception_field: canonicalFieldName,
  expiry_field: canonicalFieldName,
  message: z.string().min(1),
  severity: severitySchema,
  optional: z.boolean().default(false),
});

const numericRuleSchema = z
  .object({
    name: z.string().min(1),
    field: canonicalFieldName,
    min_value: z.number().finite().optional(),
    max_value: z.number().finite().optional(),
    message: z.string().min(1),
    severity: severitySchema,
    optional: z.boolean().default(false),
  })
  .refine((rule) => rule.min_value !== undefined || rule.max_value !== undefined, {
    message: 'A numeric rule needs min_value, max_value or both',
  })
  .refine((rule) => rule.min_value === undefined || rule.max_value === undefined || rule.min_value <= rule.max_value, {
    message: 'min_value must not exceed max_value',
  });

export const ruleSetDocumentSchema = z.object({
  required_fields: z.array(canonicalFieldName).default([]),
  date_rules: z.array(dateRuleSchema).default([]),
  numeric_rules: z.array(numericRuleSchema).default([]),
});

export type RuleSetDocument = z.input<typeof ruleSetDocumentSchema>;

export const DEFAULT_RULE_SET_DOCUMENT: RuleSetDocument = {
  required_fields: ['policy_number'],
  date_rules: [
    {
      name: 'inception_before_expiry',
      inception_field: 'inception_date',
      expiry_field: 'expiry_date',
      message: '{start_field} must be on or before {end_field}',
    },
  ],
  numeric_rules: [
    { name: 'premium_non_negative', field: 'premium_amount', min_value: 0, message: '{field} must be at least {min} (got {value})', optional: true },
    { name: 'claim_non_negative', field: 'claim_amount', min_value: 0, message: '{field} must be at least {min} (got {value})', optional: true },
    { name: 'commission_non_negative', field: 'commission_amount', min_value: 0, message: '{field} must be at least {min} (got {value})', optional: true },
    { name: 'net_premium_non_negative', field: 'net_premium', min_value: 0, message: '{field} must be at least {min} (got {value})', optional: true },
  ],
};

function asCanonical(field: string): CanonicalField {
  if (!isCanonicalField(field)) {
    throw new ConfigurationError(`Unknown canonical field '${field}'`);
  }
  return field;
}

/**
 * Validates a parsed rule-set document and compiles it into rules.
 */
export function compileRuleSet(document: unknown): RuleSet {
  const parsed = ruleSetDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid rule set: ${issues.join('; ')}`, { issues });
  }

  const { required_fields, date_rules, numeric_rules } = parsed.data;
  const rules: ValidationRule[] = [];

  for (const field of required_fields) {
    rules.push({
      kind: 'required',
      name: REQUIRED_FIELD_RULE_NAME,
      field: asCanonical(field),
      severity: Severity.ERROR,
      message: REQUIRED_FIELD_MESSAGE,
    });
  }

  for (const rule of date_rules) {
    rules.push({
      kind: 'date_order',
      name: rule.name,
      startField: asCanonical(rule.inception_field),
      endField: asCanonical(rule.expiry_field),
      severity: rule.severity,
      message: rule.message,
      optional: rule.optional,
    });
  }

  for (const rule of numeric_rules) {
    rules.push({
      kind: 'numeric_range',
      name: rule.name,
      field: asCanonical(rule.field),
      min: rule.min_value,
      max: rule.max_value,
      severity: rule.severity,
      message: rule.message,
      optional: rule.optional,
    });
  }

  return rules;
}

/**
 * Loads RULES_FILE. A missing file falls back to the built-in defaults;
 * an unreadable or invalid one is a ConfigurationError.
 */
export async function loadRuleSet(filePath: string): Promise<RuleSet> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn({ filePath }, 'Rule set file not found, using default rules');
      return compileRuleSet(DEFAULT_RULE_SET_DOCUMENT);
    }
    throw new ConfigurationError(`Could not read rule set file ${filePath}`, { filePath });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch {
    throw new ConfigurationError(`Rule set file ${filePath} is not valid JSON`, { filePath });
  }

  const rules = compileRuleSet(document);
  log.info({ filePath, ruleCount: rules.length }, 'Rule set loaded');
  return rules;
}
