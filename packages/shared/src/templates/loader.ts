/**
 * Template Loader
 *
 * Turns template documents into frozen InvoiceTemplate values. All checks run
 * here, at load time: a template that fails any of them is never compiled and
 * so can never be selected by the registry.
 */

import fs from 'fs';
import path from 'path';
import { validateTemplateDocument, isTemplateDocument } from '../schemas';
import { InvalidTemplateError } from '../errors';
import { logger } from '../logger';
import { translateDateFormat } from './date-format';
import type {
  FieldPatternDocument,
  FieldRule,
  FieldSpec,
  InvoiceTemplate,
  TemplateDocument,
  TemplateInfo,
} from './types';

export const PATTERN_FLAGS = 'im';

const DEFAULT_OUTPUT_DATE_FORMAT = '%Y-%m-%d';

/** Normalize provider names so hints like "Sydney_Water" match "Sydney Water". */
export function normalizeProviderName(name: string): string {
  return name.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

export function templateKey(provider: string, serviceType: string): string {
  return `${normalizeProviderName(provider)}::${serviceType}`;
}

/**
 * Accept the pattern dialect template authors write in: Python-style named
 * groups and a leading inline case-insensitive flag.
 */
export function toJsPatternSource(pattern: string): string {
  return pattern
    .replace(/^\(\?i\)/, '')
    .replace(/\(\?P<([A-Za-z_][A-Za-z0-9_]*)>/g, '(?<$1>')
    .replace(/\(\?P=([A-Za-z_][A-Za-z0-9_]*)\)/g, '\\k<$1>');
}

function countCaptureGroups(regex: RegExp): number {
  const probe = new RegExp(`${regex.source}|`, regex.flags).exec('');
  return probe ? probe.length - 1 : 0;
}

function compilePatterns(name: string, doc: FieldPatternDocument, problems: string[]): RegExp[] {
  const compiled: RegExp[] = [];
  doc.regex.forEach((pattern, i) => {
    let regex: RegExp;
    try {
      regex = new RegExp(toJsPatternSource(pattern), PATTERN_FLAGS);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`${name}.regex[${i}] does not compile: ${reason}`);
      return;
    }
    if (countCaptureGroups(regex) < 1) {
      problems.push(`${name}.regex[${i}] has no capture group`);
      return;
    }
    compiled.push(regex);
  });
  return compiled;
}

function buildRule(name: string, doc: FieldPatternDocument, problems: string[]): FieldRule | null {
  if (doc.type === 'date') {
    if (!doc.format) {
      problems.push(`${name} is a date field without a format`);
      return null;
    }
    if (translateDateFormat(doc.format, 'parse') === null) {
      problems.push(`${name}.format "${doc.format}" uses an unsupported directive`);
      return null;
    }
    if (doc.validation) {
      problems.push(`${name} is a date field; numeric validation does not apply`);
    }
    return { kind: 'date_format', format: doc.format };
  }

  if (!doc.validation) return null;

  if (doc.type === 'string') {
    problems.push(`${name} is a string field; numeric validation does not apply`);
    return null;
  }

  const min = doc.validation.min ?? null;
  const max = doc.validation.max ?? null;
  if (min === null && max === null) {
    problems.push(`${name}.validation declares neither min nor max`);
    return null;
  }
  if (min !== null && max !== null && min > max) {
    problems.push(`${name}.validation min ${min} exceeds max ${max}`);
    return null;
  }
  return { kind: 'range', min, max };
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      if (!(child instanceof RegExp)) deepFreeze(child);
    }
  }
  return value;
}

/**
 * Compile and validate a template document.
 *
 * @param data - Parsed JSON of one template file
 * @param origin - File name or label used in diagnostics
 * @throws InvalidTemplateError listing every problem found
 */
export function compileTemplate(data: unknown, origin = 'template'): InvoiceTemplate {
  const structural = validateTemplateDocument(data);
  if (!structural.valid || !isTemplateDocument(data)) {
    throw new InvalidTemplateError(origin, structural.errors ?? ['schema validation failed']);
  }

  const doc: TemplateDocument = structuredClone(data);
  const problems: string[] = [];

  const fields: FieldSpec[] = Object.entries(doc.patterns).map(([name, fieldDoc]) => ({
    name,
    type: fieldDoc.type,
    required: fieldDoc.required ?? false,
    patterns: compilePatterns(name, fieldDoc, problems),
    rule: buildRule(name, fieldDoc, problems),
    inputFormat: fieldDoc.type === 'date' ? fieldDoc.format ?? null : null,
    multiplier: fieldDoc.multiplier ?? 1,
  }));

  const post = doc.post_processing ?? {};
  const outputDateFormat = post.date_format ?? DEFAULT_OUTPUT_DATE_FORMAT;
  if (translateDateFormat(outputDateFormat, 'format') === null) {
    problems.push(`post_processing.date_format "${outputDateFormat}" uses an unsupported directive`);
  }

  if (problems.length > 0) {
    throw new InvalidTemplateError(`${origin} (${doc.provider}/${doc.service_type})`, problems);
  }

  const rules = post.validation_rules ?? {};

  return deepFreeze({
    key: templateKey(doc.provider, doc.service_type),
    provider: doc.provider,
    serviceType: doc.service_type,
    version: doc.version ?? '1.0',
    aliases: doc.aliases ?? [],
    fields,
    amountMultiplier: post.amount_multiplier ?? 1,
    roundDecimals: post.round_decimals ?? 2,
    outputDateFormat,
    validationRules: {
      amount_usage_correlation: rules.amount_usage_correlation ?? false,
      date_sequence_check: rules.date_sequence_check ?? false,
      reasonable_rates_check: rules.reasonable_rates_check ?? false,
    },
    source: doc,
  });
}

export interface DirectoryLoadResult {
  templates: InvoiceTemplate[];
  rejected: Array<{ file: string; problems: string[] }>;
}

/**
 * Load every *.json template in a directory. Malformed files are reported and skipped.
 */
export function loadTemplatesFromDirectory(dir: string): DirectoryLoadResult {
  const result: DirectoryLoadResult = { templates: [], rejected: [] };

  if (!fs.existsSync(dir)) {
    logger.error('Templates directory not found', undefined, { dir });
    return result;
  }

  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .sort();

  for (const file of files) {
    try {
      const content = fs.readFileSync(path.join(dir, file), 'utf-8');
      const template = compileTemplate(JSON.parse(content), file);
      result.templates.push(template);
      logger.debug('Loaded template', { file, key: template.key, version: template.version });
    } catch (error) {
      const problems =
        error instanceof InvalidTemplateError
          ? error.problems
          : [error instanceof Error ? error.message : String(error)];
      result.rejected.push({ file, problems });
      logger.warn('Rejected template', { file, problems });
    }
  }

  logger.info('Templates loaded', {
    dir,
    loaded: result.templates.length,
    rejected: result.rejected.length,
  });

  return result;
}

export function describeTemplate(template: InvoiceTemplate): TemplateInfo {
  return {
    key: template.key,
    provider: template.provider,
    service_type: template.serviceType,
    version: template.version,
    fields: template.fields.map((f) => f.name),
    required_fields: template.fields.filter((f) => f.required).map((f) => f.name),
    optional_fields: template.fields.filter((f) => !f.required).map((f) => f.name),
    has_validation: Object.values(template.validationRules).some(Boolean),
  };
}
