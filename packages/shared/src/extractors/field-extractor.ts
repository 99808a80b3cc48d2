/**
 * Field Extractor
 *
 * Runs each template field's patterns over the document text. Fields are
 * independent: every field searches the whole text, and a miss on one
 * never affects another.
 */

import { logger } from '../logger';
import { fieldGapsCounter } from '../metrics';
import type { FieldSpec, InvoiceTemplate } from '../templates/types';
import type { FieldIssue, RawField } from '../types';
import { cleanCapture } from './clean';
import { FUZZY_PATTERNS, hasFuzzyPattern } from './fuzzy';

export interface ExtractionResult {
  templateKey: string;
  templateVersion: string;
  fields: RawField[];
  issues: FieldIssue[];
}

export interface FieldExtractorOptions {
  /** Try generic patterns for required fields the template missed */
  fuzzyFallback?: boolean;
}

interface Candidate {
  offset: number;
  matchedText: string;
  cleaned: string;
}

function firstCapture(match: RegExpMatchArray): string | undefined {
  return match.slice(1).find((group) => group !== undefined);
}

/**
 * Earliest non-empty capture across `patterns`. Ties on offset go to the
 * pattern listed first.
 */
function findEarliest(
  text: string,
  patterns: readonly RegExp[],
  spec: FieldSpec
): Candidate | null {
  let best: Candidate | null = null;

  for (const pattern of patterns) {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    const global = new RegExp(pattern.source, flags);
    for (const match of text.matchAll(global)) {
      const offset = match.index ?? 0;
      if (best && offset >= best.offset) break;

      const captured = firstCapture(match);
      if (captured === undefined) continue;
      const cleaned = cleanCapture(captured, spec.type);
      if (cleaned.length === 0) continue;

      best = { offset, matchedText: captured, cleaned };
      break;
    }
  }

  return best;
}

export function extractFields(
  text: string,
  template: InvoiceTemplate,
  options: FieldExtractorOptions = {}
): ExtractionResult {
  const fields: RawField[] = [];
  const issues: FieldIssue[] = [];

  for (const spec of template.fields) {
    let method: RawField['method'] = 'pattern';
    let candidate = findEarliest(text, spec.patterns, spec);

    if (!candidate && options.fuzzyFallback && spec.required && hasFuzzyPattern(spec.name)) {
      candidate = findEarliest(text, FUZZY_PATTERNS[spec.name], spec);
      if (candidate) {
        method = 'fuzzy';
        logger.warn('Field recovered by fuzzy fallback', {
          field: spec.name,
          template: template.key,
          matched_text: candidate.matchedText,
        });
      }
    }

    if (!candidate) {
      fields.push({ field: spec.name, matched_text: null, raw: null, method: 'none', offset: null });
      issues.push({
        code: 'FieldExtractionGap',
        field: spec.name,
        message: `No pattern for ${spec.name} matched the document text`,
      });
      fieldGapsCounter.inc({ field: spec.name });
      continue;
    }

    fields.push({
      field: spec.name,
      matched_text: candidate.matchedText,
      raw: candidate.cleaned,
      method,
      offset: candidate.offset,
    });
  }

  logger.debug('Fields extracted', {
    template: template.key,
    matched: fields.filter((f) => f.raw !== null).length,
    gaps: issues.length,
  });

  return { templateKey: template.key, templateVersion: template.version, fields, issues };
}
