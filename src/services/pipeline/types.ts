import type { CountyCatalog, PipelineState } from '../../domain/types.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';

export interface PipelineDeps {
  llm: LLMProvider;
  catalog: CountyCatalog;
}

const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set(['accepted', 'rejected']);

export function isTerminalState(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state);
}

/**
 * Strictly linear: every state moves forward one step or drops to rejected.
 * Key = from state, Value = set of allowed target states.
 */
export const PIPELINE_TRANSITIONS: Record<PipelineState, ReadonlySet<PipelineState>> = {
  received: new Set<PipelineState>(['coerced', 'rejected']),
  coerced: new Set<PipelineState>(['validated', 'rejected']),
  validated: new Set<PipelineState>(['enriched', 'rejected']),
  enriched: new Set<PipelineState>(['accepted']),
  accepted: new Set<PipelineState>(),
  rejected: new Set<PipelineState>(),
};
