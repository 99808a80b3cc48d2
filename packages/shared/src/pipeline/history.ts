/**
 * Processing history
 *
 * Turns pipeline results into history entries and answers the failure and
 * per-provider questions over a list of entries. The Postgres store answers
 * the same questions in SQL.
 */

import { normalizeProviderName } from '../templates/loader';
import type {
  HistoryOutcome,
  ProcessingHistoryEntry,
  ProviderStats,
  ServiceType,
} from '../types';
import type { PipelineResult } from './pipeline';
import type { FailedSourceQuery } from './stores';

export function isFailureOutcome(outcome: HistoryOutcome): boolean {
  return outcome === 'failed' || outcome === 'rejected';
}

export interface RunFacts {
  providerHint: string | null;
  serviceType: ServiceType | null;
  reprocess: boolean;
  recordedAt: string;
}

export function historyEntryFor(result: PipelineResult, facts: RunFacts): ProcessingHistoryEntry {
  if (result.kind === 'rejection') {
    return {
      source_reference: result.source_reference,
      provider_name: facts.providerHint,
      service_type: facts.serviceType,
      outcome: 'rejected',
      stage: result.stage,
      reason: result.reason,
      message: result.message,
      confidence_score: null,
      text_backend: null,
      text_reliability: null,
      template_version: null,
      reprocess: facts.reprocess,
      recorded_at: facts.recordedAt,
    };
  }

  const { record } = result;
  return {
    source_reference: record.source_reference,
    provider_name: record.provider_name,
    service_type: record.service_type,
    outcome: result.duplicate ? 'duplicate' : result.scored_status,
    stage: null,
    reason: result.duplicate?.code ?? null,
    message: result.duplicate?.message ?? null,
    confidence_score: record.confidence_score,
    text_backend: record.text_backend,
    text_reliability: record.text_reliability,
    template_version: record.template_version,
    reprocess: facts.reprocess,
    recorded_at: facts.recordedAt,
  };
}

/**
 * Latest entry per source reference, in the order those entries were
 * recorded. Entries are expected in append order.
 */
export function latestRuns(entries: readonly ProcessingHistoryEntry[]): ProcessingHistoryEntry[] {
  const latest = new Map<string, ProcessingHistoryEntry>();
  for (const entry of entries) {
    latest.delete(entry.source_reference);
    latest.set(entry.source_reference, entry);
  }
  return Array.from(latest.values());
}

export function failedSourcesOf(
  entries: readonly ProcessingHistoryEntry[],
  query: FailedSourceQuery = {}
): string[] {
  const provider = query.provider === undefined ? null : normalizeProviderName(query.provider);

  const failed = latestRuns(entries)
    .filter((e) => isFailureOutcome(e.outcome))
    .filter(
      (e) =>
        provider === null ||
        (e.provider_name !== null && normalizeProviderName(e.provider_name) === provider)
    )
    .map((e) => e.source_reference);

  return query.limit === undefined ? failed : failed.slice(0, query.limit);
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Per-provider totals, sorted by provider name. Runs with no provider
 * (no hint and no template) are left out.
 */
export function providerStatsOf(entries: readonly ProcessingHistoryEntry[]): ProviderStats[] {
  const groups = new Map<string, ProcessingHistoryEntry[]>();
  for (const entry of latestRuns(entries)) {
    if (entry.provider_name === null) continue;
    const group = groups.get(entry.provider_name) ?? [];
    group.push(entry);
    groups.set(entry.provider_name, group);
  }

  return Array.from(groups, ([providerName, group]): ProviderStats => {
    const successful = group.filter((e) => !isFailureOutcome(e.outcome)).length;
    const scores = group.flatMap((e) => (e.confidence_score === null ? [] : [e.confidence_score]));
    return {
      provider_name: providerName,
      total: group.length,
      successful,
      success_rate: round4(successful / group.length),
      avg_confidence:
        scores.length === 0 ? null : round4(scores.reduce((sum, s) => sum + s, 0) / scores.length),
    };
  }).sort((a, b) => a.provider_name.localeCompare(b.provider_name));
}
