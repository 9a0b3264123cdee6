import type { Decision, PitchState } from "../types";

export type PolicyAction = "AUTO_REFINE" | "SUSPEND_FOR_APPROVAL" | "TERMINATE_MAX_ITER";

export interface IterationLimits {
  autoRefineMax: number;
  totalIterationMax: number;
}

export const DEFAULT_ITERATION_LIMITS: IterationLimits = {
  autoRefineMax: 3,
  totalIterationMax: 10
};

type CounterState = Pick<PitchState, "autoRefineCount" | "totalIterationCount">;

export class IterationPolicy {
  constructor(readonly limits: IterationLimits = DEFAULT_ITERATION_LIMITS) {}

  /**
   * Decides what follows a critique. The cap check comes first so a session
   * at the total limit terminates regardless of the decision.
   */
  nextAction(state: CounterState & { critique?: { decision: Decision } }): PolicyAction {
    if (state.totalIterationCount >= this.limits.totalIterationMax) {
      return "TERMINATE_MAX_ITER";
    }
    if (state.critique?.decision === "FAIL" && state.autoRefineCount < this.limits.autoRefineMax) {
      return "AUTO_REFINE";
    }
    return "SUSPEND_FOR_APPROVAL";
  }

  canAcceptHumanRefinement(state: CounterState): boolean {
    return state.totalIterationCount < this.limits.totalIterationMax;
  }

  countAutoRefinement<T extends CounterState>(state: T): T {
    return {
      ...state,
      autoRefineCount: state.autoRefineCount + 1,
      totalIterationCount: state.totalIterationCount + 1
    };
  }

  countHumanRefinement<T extends CounterState>(state: T): T {
    return {
      ...state,
      totalIterationCount: state.totalIterationCount + 1
    };
  }
}
