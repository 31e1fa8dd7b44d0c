// Orchestrator Module - Main exports

export {
  Orchestrator,
  DEFAULT_MAX_TURNS,
  DEFAULT_REASONING_TIMEOUT_MS,
  EMPTY_OUTPUT_FALLBACK,
  INITIAL_THINKING,
  SYSTEM_PROMPT,
} from './orchestrator.js';
export type { OrchestratorDeps } from './orchestrator.js';
export type { OrchestratorOptions, OrchestratorPhase, RunSummary, TerminalPhase } from './types.js';
