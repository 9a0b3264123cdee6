import { describe, expect, it, vi } from "vitest";
import { ReadinessAgentStep } from "../../src/agents/readinessAgent";
import { buildFallbackCritique } from "../../src/schemas/critique";
import { NOT_PROVIDED } from "../../src/schemas/finalPackage";
import type { ReviewedState } from "../../src/types";
import { packageBody } from "../helpers/fakeLlm";

const ready: ReviewedState = {
  description: "Pantry tracker for families",
  pitchType: "elevator",
  phase: "READY_FOR_FINAL",
  context: "Food waste is rising.",
  pitch: "Shelfie helps families stop wasting food.",
  critique: buildFallbackCritique("test"),
  autoRefineCount: 0,
  totalIterationCount: 0
};

const createLlm = (reply: () => Promise<string>) => ({
  complete: vi.fn(async () => "unused"),
  completeJsonObject: vi.fn(reply)
});

describe("ReadinessAgentStep", () => {
  it("packages an approved pitch", async () => {
    const llm = createLlm(async () => JSON.stringify(packageBody));
    const result = await new ReadinessAgentStep(llm, { timeoutMs: 1000 }).execute(ready);

    expect(result.state.finalPackage.status).toBe("approved");
    expect(result.state.finalPackage.elevator_pitch).toBe(packageBody.elevator_pitch);
    expect(result.warnings).toEqual([]);
    expect(result.prompt?.temperature).toBe(0.5);
    expect(result.prompt?.user.startsWith("Approved pitch:\nShelfie helps families stop wasting food.")).toBe(true);
  });

  it("labels the package capped and passes reviewer notes", async () => {
    const llm = createLlm(async () => JSON.stringify(packageBody));
    const result = await new ReadinessAgentStep(llm, { timeoutMs: 1000 }).execute({
      ...ready,
      phase: "CAPPED",
      humanFeedback: "Keep it short"
    });

    expect(result.state.finalPackage.status).toBe("capped");
    expect(result.prompt?.user).toContain("Best available pitch (iteration limit reached):");
    expect(result.prompt?.user).toContain("Reviewer notes:\nKeep it short");
  });

  it("reports the fields it had to fill", async () => {
    const { team_highlights: _team, ...partial } = packageBody;
    const llm = createLlm(async () => JSON.stringify(partial));
    const result = await new ReadinessAgentStep(llm, { timeoutMs: 1000 }).execute(ready);

    expect(result.state.finalPackage.team_highlights).toBe(NOT_PROVIDED);
    expect(result.warnings).toEqual([
      { kind: "malformed_response", detail: "readiness: filled 1 missing field(s): team_highlights" }
    ]);
  });

  it("builds a package from the pitch when the backend fails", async () => {
    const llm = createLlm(async (): Promise<string> => Promise.reject(new Error("down")));
    const result = await new ReadinessAgentStep(llm, { timeoutMs: 1000 }).execute(ready);

    expect(result.state.finalPackage.elevator_pitch).toBe("Shelfie helps families stop wasting food.");
    expect(result.state.finalPackage.executive_summary).toBe("Shelfie helps families stop wasting food.");
    expect(result.state.finalPackage.status).toBe("approved");
    expect(result.warnings).toEqual([{ kind: "backend_unavailable", detail: "readiness: down" }]);
  });
});
