import { describe, expect, it, vi } from "vitest";
import { GeneratorAgentStep } from "../../src/agents/generatorAgent";
import type { ResearchedState } from "../../src/types";

const researched: ResearchedState = {
  description: "Pantry tracker for families",
  pitchType: "elevator",
  phase: "CONTEXT_DONE",
  context: "Food waste is rising.",
  autoRefineCount: 0,
  totalIterationCount: 0
};

describe("GeneratorAgentStep", () => {
  it("drafts a pitch from the description and context", async () => {
    const llm = { complete: vi.fn(async () => "  Stop wasting groceries.  "), completeJsonObject: vi.fn(async () => "{}") };
    const result = await new GeneratorAgentStep(llm, { timeoutMs: 1000 }).execute(researched);

    expect(result.state.pitch).toBe("Stop wasting groceries.");
    expect(result.state.context).toBe("Food waste is rising.");
    expect(result.prompt?.temperature).toBe(0.8);
    expect(result.prompt?.user).toBe(
      "Product description:\nPantry tracker for families\n\nResearch context:\nFood waste is rising.\n\nGenerate a compelling pitch."
    );
  });

  it("uses the description as the pitch when the backend is unavailable", async () => {
    const llm = { complete: vi.fn(async () => "   "), completeJsonObject: vi.fn(async () => "{}") };
    const result = await new GeneratorAgentStep(llm, { timeoutMs: 1000 }).execute(researched);

    expect(result.state.pitch).toBe("Pantry tracker for families");
    expect(result.warnings).toEqual([{ kind: "backend_unavailable", detail: "generator: empty output" }]);
  });
});
