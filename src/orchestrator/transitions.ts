import { InvalidTransitionError } from "../errors";
import type { PitchState, PitchStateField, PitchStateWith, TerminalPhase, WorkflowEvent, WorkflowPhase } from "../types";

type TransitionRow = Partial<Record<WorkflowEvent, WorkflowPhase>>;

/** The whole workflow graph: phase × event → next phase. */
export const TRANSITIONS = {
  START: { context_gathered: "CONTEXT_DONE" },
  CONTEXT_DONE: { pitch_generated: "GENERATED" },
  GENERATED: { critique_completed: "CRITIQUED" },
  CRITIQUED: { auto_refine: "AUTO_REFINING", suspend: "AWAITING_APPROVAL", cap_reached: "CAPPED" },
  AUTO_REFINING: { critique_completed: "CRITIQUED" },
  AWAITING_APPROVAL: { approved: "READY_FOR_FINAL", rejected: "REFINING", cap_reached: "CAPPED" },
  REFINING: { critique_completed: "CRITIQUED" },
  READY_FOR_FINAL: { package_ready: "DONE" },
  DONE: {},
  CAPPED: {}
} as const satisfies Record<WorkflowPhase, TransitionRow>;

export const isTerminalPhase = (phase: WorkflowPhase): phase is TerminalPhase =>
  phase === "DONE" || phase === "CAPPED";

export const resolveTransition = (from: WorkflowPhase, event: WorkflowEvent): WorkflowPhase => {
  const row: TransitionRow = TRANSITIONS[from];
  const next = row[event];
  if (!next) {
    throw new InvalidTransitionError(`Event "${event}" is not allowed in phase ${from}.`, from);
  }
  return next;
};

export const advance = <S extends PitchState>(state: S, event: WorkflowEvent): S => ({
  ...state,
  phase: resolveTransition(state.phase, event)
});

export const hasStateFields = <K extends PitchStateField>(state: PitchState, fields: readonly K[]): state is PitchStateWith<K> =>
  fields.every((field) => state[field] !== undefined);
