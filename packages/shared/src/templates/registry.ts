/**
 * Template Registry
 *
 * Holds compiled templates keyed by (provider, service type). The backing map
 * is never mutated: every update builds a new map and swaps the
 * reference, so a lookup in flight keeps the template it already resolved.
 */

import { NoTemplateFoundError } from '../errors';
import { logger } from '../logger';
import { templateReloadsCounter } from '../metrics';
import type { ServiceType } from '../types';
import {
  describeTemplate,
  loadTemplatesFromDirectory,
  normalizeProviderName,
  templateKey,
  type DirectoryLoadResult,
} from './loader';
import type { InvoiceTemplate, TemplateInfo } from './types';

type TemplateMap = ReadonlyMap<string, InvoiceTemplate>;

function toSnapshot(entries: Iterable<[string, InvoiceTemplate]>): TemplateMap {
  return new Map(entries);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word match, so a short alias never hits inside a longer word. */
function mentions(text: string, name: string): boolean {
  const needle = normalizeProviderName(name);
  if (needle.length === 0) return false;
  return new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(needle)}(?:$|[^a-z0-9])`).test(
    normalizeProviderName(text)
  );
}

function namesProvider(template: InvoiceTemplate, provider: string): boolean {
  return (
    normalizeProviderName(template.provider) === provider ||
    template.aliases.some((a) => normalizeProviderName(a) === provider)
  );
}

function requiredPatternHits(template: InvoiceTemplate, text: string): number {
  return template.fields.filter((f) => f.required && f.patterns.some((p) => p.test(text))).length;
}

export class TemplateRegistry {
  private templates: TemplateMap;

  constructor(templates: Iterable<InvoiceTemplate> = []) {
    this.templates = toSnapshot(Array.from(templates, (t): [string, InvoiceTemplate] => [t.key, t]));
  }

  /**
   * Build a registry from every valid template in a directory.
   */
  static fromDirectory(dir: string): TemplateRegistry {
    return new TemplateRegistry(loadTemplatesFromDirectory(dir).templates);
  }

  get size(): number {
    return this.templates.size;
  }

  /**
   * Resolve the template for a provider hint and optional service type. The
   * hint may be the provider name or any of its aliases.
   *
   * Without a service type, a provider with exactly one template resolves to
   * it; a provider with several needs `text` to break the tie.
   *
   * @throws NoTemplateFoundError
   */
  lookup(providerHint: string, serviceType?: ServiceType, text?: string): InvoiceTemplate {
    const provider = normalizeProviderName(providerHint);
    const candidates = Array.from(this.templates.values()).filter((t) => namesProvider(t, provider));

    if (serviceType) {
      const template = candidates.find((t) => t.serviceType === serviceType);
      if (!template) {
        throw new NoTemplateFoundError(
          `No template for provider "${providerHint}" and service type ${serviceType}`
        );
      }
      return template;
    }

    if (candidates.length === 0) {
      throw new NoTemplateFoundError(`No template for provider "${providerHint}"`);
    }
    if (candidates.length === 1) {
      return candidates[0];
    }
    if (text !== undefined) {
      const best = this.pickBest(candidates, text);
      if (best) return best;
    }
    throw new NoTemplateFoundError(
      `Provider "${providerHint}" has ${candidates.length} templates and no service type was given`
    );
  }

  /**
   * Pick a template for text with no provider hint: the provider (or an
   * alias) must be named in the text.
   *
   * @throws NoTemplateFoundError
   */
  detect(text: string, serviceType?: ServiceType): InvoiceTemplate {
    const candidates = Array.from(this.templates.values()).filter(
      (t) =>
        (!serviceType || t.serviceType === serviceType) &&
        (mentions(text, t.provider) || t.aliases.some((a) => mentions(text, a)))
    );

    const best = this.pickBest(candidates, text);
    if (!best) {
      throw new NoTemplateFoundError('No template provider is named in the document text');
    }
    return best;
  }

  private pickBest(candidates: InvoiceTemplate[], text: string): InvoiceTemplate | null {
    let best: InvoiceTemplate | null = null;
    let bestHits = -1;
    let tied = false;

    for (const candidate of candidates) {
      const hits = requiredPatternHits(candidate, text);
      if (hits > bestHits) {
        best = candidate;
        bestHits = hits;
        tied = false;
      } else if (hits === bestHits) {
        tied = true;
      }
    }

    return tied ? null : best;
  }

  has(provider: string, serviceType: ServiceType): boolean {
    return this.templates.has(templateKey(provider, serviceType));
  }

  /**
   * Add or replace one template. Other templates are untouched.
   */
  replace(template: InvoiceTemplate): void {
    const next = new Map(this.templates);
    const previous = next.get(template.key);
    next.set(template.key, template);
    this.templates = toSnapshot(next);

    logger.info('Template replaced', {
      key: template.key,
      version: template.version,
      previous_version: previous?.version,
    });
  }

  remove(provider: string, serviceType: ServiceType): boolean {
    const key = templateKey(provider, serviceType);
    if (!this.templates.has(key)) return false;
    const next = new Map(this.templates);
    next.delete(key);
    this.templates = toSnapshot(next);
    return true;
  }

  /**
   * Reload from a directory and swap the whole set at once. Templates that
   * fail validation are left out; the previous set stays live if nothing loads.
   */
  reloadFromDirectory(dir: string): DirectoryLoadResult {
    const result = loadTemplatesFromDirectory(dir);
    if (result.templates.length === 0) {
      logger.warn('Template reload produced no templates, keeping current set', { dir });
      templateReloadsCounter.inc({ result: 'kept' });
      return result;
    }
    this.templates = toSnapshot(result.templates.map((t): [string, InvoiceTemplate] => [t.key, t]));
    templateReloadsCounter.inc({ result: result.rejected.length > 0 ? 'partial' : 'ok' });
    return result;
  }

  list(): TemplateInfo[] {
    return Array.from(this.templates.values()).map(describeTemplate);
  }
}
