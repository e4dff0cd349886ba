/**
 * Per-run state machine
 * Idle → Extracted → Validated → Enriched → AnomalyChecked → Loaded → Done,
 * with Failed reachable from every non-terminal state
 */

import type {
  FatalError,
  PipelineState,
  QualityFinding,
  StateTransition,
} from "../../types/data-model.js";
import type { EstateEtlError } from "../../utils/errors.js";

const NEXT_STATE: Partial<Record<PipelineState, PipelineState>> = {
  Idle: "Extracted",
  Extracted: "Validated",
  Validated: "Enriched",
  Enriched: "AnomalyChecked",
  AnomalyChecked: "Loaded",
  Loaded: "Done",
};

export function isTerminal(state: PipelineState): boolean {
  return state === "Done" || state === "Failed";
}

export class RunState {
  private current: PipelineState = "Idle";
  readonly transitions: StateTransition[] = [];
  readonly findings: QualityFinding[] = [];
  readonly fatalErrors: FatalError[] = [];

  get state(): PipelineState {
    return this.current;
  }

  /**
   * Move to the next state in sequence; anything else is a programming error
   */
  advance(to: PipelineState, recordCount: number): void {
    if (NEXT_STATE[this.current] !== to) {
      throw new Error(`Invalid pipeline transition: ${this.current} → ${to}`);
    }
    this.record(to, recordCount);
  }

  fail(error: EstateEtlError, recordCount: number): void {
    if (isTerminal(this.current)) {
      throw new Error(`Cannot fail a finished pipeline (state: ${this.current})`);
    }
    this.fatalErrors.push({ state: this.current, code: error.code, message: error.message });
    this.record("Failed", recordCount);
  }

  private record(to: PipelineState, recordCount: number): void {
    this.transitions.push({ from: this.current, to, recordCount });
    this.current = to;
  }
}
