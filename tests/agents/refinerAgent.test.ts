import { describe, expect, it, vi } from "vitest";
import { RefinerAgentStep } from "../../src/agents/refinerAgent";
import { buildFallbackCritique } from "../../src/schemas/critique";
import type { ReviewedState } from "../../src/types";

const reviewed: ReviewedState = {
  description: "Pantry tracker for families",
  pitchType: "elevator",
  phase: "AUTO_REFINING",
  context: "Food waste is rising.",
  pitch: "Old pitch",
  critique: { ...buildFallbackCritique("test"), feedback: "Needs numbers.", weaknesses: ["vague", "long"] },
  autoRefineCount: 1,
  totalIterationCount: 1
};

describe("RefinerAgentStep", () => {
  it("replaces the pitch with the refined draft", async () => {
    const llm = { complete: vi.fn(async () => "New pitch"), completeJsonObject: vi.fn(async () => "{}") };
    const result = await new RefinerAgentStep(llm, { timeoutMs: 1000 }).execute(reviewed);

    expect(result.state.pitch).toBe("New pitch");
    expect(result.state.critique).toEqual(reviewed.critique);
    expect(result.prompt?.user).toContain("Critique feedback (overall 0/10):\nNeeds numbers.");
    expect(result.prompt?.user).toContain("Weaknesses to address:\nvague, long");
    expect(result.prompt?.user).not.toContain("Reviewer feedback");
  });

  it("puts reviewer feedback in the prompt when present", async () => {
    const llm = { complete: vi.fn(async () => "New pitch"), completeJsonObject: vi.fn(async () => "{}") };
    const result = await new RefinerAgentStep(llm, { timeoutMs: 1000 }).execute({ ...reviewed, humanFeedback: " Mention pricing " });

    expect(result.prompt?.user).toContain("Reviewer feedback (highest priority):\nMention pricing\n\nCreate a substantially improved version.");
  });

  it("keeps the previous draft when the backend fails", async () => {
    const llm = { complete: vi.fn(async (): Promise<string> => Promise.reject(new Error("rate limited"))), completeJsonObject: vi.fn(async () => "{}") };
    const result = await new RefinerAgentStep(llm, { timeoutMs: 1000 }).execute(reviewed);

    expect(result.state.pitch).toBe("Old pitch");
    expect(result.warnings).toEqual([{ kind: "backend_unavailable", detail: "refiner: rate limited" }]);
  });
});
