/**
 * Per-run state machine. States only move forward along the allowed edges;
 * nothing is revisited.
 */

import type { RunState } from '../types';

const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  pending: ['text_extracted'],
  text_extracted: ['fields_extracted'],
  fields_extracted: ['validated', 'needs_review', 'failed'],
  validated: ['ready_to_persist', 'duplicate'],
  needs_review: ['ready_to_persist', 'duplicate'],
  failed: [],
  ready_to_persist: ['persisted', 'duplicate'],
  duplicate: [],
  persisted: [],
};

export class InvalidTransitionError extends Error {
  constructor(from: RunState, to: RunState) {
    super(`Invalid run transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: RunState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class PipelineRun {
  private current: RunState = 'pending';
  private readonly visited: RunState[] = ['pending'];

  constructor(readonly sourceReference: string) {}

  get state(): RunState {
    return this.current;
  }

  get history(): readonly RunState[] {
    return this.visited;
  }

  /**
   * @throws InvalidTransitionError when `next` is not reachable from the current state
   */
  advance(next: RunState): void {
    if (!canTransition(this.current, next)) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
  }
}
