// Orchestrator types

import type { ToolCallResult } from '../tools/types.js';

export type OrchestratorPhase =
  | 'Admitted'
  | 'Reasoning'
  | 'Dispatching'
  | 'Finalizing'
  | 'Done'
  | 'Error'
  | 'Cancelled';

export type TerminalPhase = Extract<OrchestratorPhase, 'Done' | 'Error' | 'Cancelled'>;

export interface OrchestratorOptions {
  /** Deadline for each fragment fetched from the Reasoning Backend. */
  reasoningTimeoutMs?: number;
  maxTurns?: number;
  systemPrompt?: string;
  now?: () => number;
}

export interface RunSummary {
  phase: TerminalPhase;
  finalOutput: string;
  toolsCalled: string[];
  toolResults: ToolCallResult[];
  turns: number;
  durationMs: number;
}
