import { describe, expect, it } from "vitest";
import { InvalidTransitionError } from "../../src/errors";
import { advance, hasStateFields, isTerminalPhase, resolveTransition, TRANSITIONS } from "../../src/orchestrator/transitions";
import type { PitchState, WorkflowEvent, WorkflowPhase } from "../../src/types";

const baseState: PitchState = {
  description: "Pantry tracker",
  pitchType: "elevator",
  phase: "START",
  autoRefineCount: 0,
  totalIterationCount: 0
};

describe("transitions", () => {
  it("follows the happy path from START to DONE", () => {
    const events: WorkflowEvent[] = ["context_gathered", "pitch_generated", "critique_completed", "suspend", "approved", "package_ready"];
    const phases = events.reduce<WorkflowPhase[]>((visited, event) => [...visited, resolveTransition(visited[visited.length - 1] ?? "START", event)], ["START"]);
    expect(phases).toEqual(["START", "CONTEXT_DONE", "GENERATED", "CRITIQUED", "AWAITING_APPROVAL", "READY_FOR_FINAL", "DONE"]);
  });

  it("routes refinement and cap events", () => {
    expect(resolveTransition("CRITIQUED", "auto_refine")).toBe("AUTO_REFINING");
    expect(resolveTransition("AUTO_REFINING", "critique_completed")).toBe("CRITIQUED");
    expect(resolveTransition("AWAITING_APPROVAL", "rejected")).toBe("REFINING");
    expect(resolveTransition("REFINING", "critique_completed")).toBe("CRITIQUED");
    expect(resolveTransition("CRITIQUED", "cap_reached")).toBe("CAPPED");
    expect(resolveTransition("AWAITING_APPROVAL", "cap_reached")).toBe("CAPPED");
  });

  it("rejects events outside the table", () => {
    expect(() => resolveTransition("START", "approved")).toThrow(InvalidTransitionError);
    expect(() => resolveTransition("GENERATED", "suspend")).toThrow('Event "suspend" is not allowed in phase GENERATED.');
  });

  it("leaves no way out of terminal phases", () => {
    expect(TRANSITIONS.DONE).toEqual({});
    expect(TRANSITIONS.CAPPED).toEqual({});
    expect(isTerminalPhase("DONE")).toBe(true);
    expect(isTerminalPhase("CAPPED")).toBe(true);
    expect(isTerminalPhase("AWAITING_APPROVAL")).toBe(false);
  });

  it("returns a new state and keeps the input untouched", () => {
    const next = advance(baseState, "context_gathered");
    expect(next.phase).toBe("CONTEXT_DONE");
    expect(baseState.phase).toBe("START");
    expect(() => advance(baseState, "package_ready")).toThrow(InvalidTransitionError);
  });

  it("narrows states by populated fields", () => {
    expect(hasStateFields(baseState, ["context"])).toBe(false);
    expect(hasStateFields({ ...baseState, context: "ctx", pitch: "draft" }, ["context", "pitch"])).toBe(true);
  });
});
