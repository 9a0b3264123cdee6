import type { DraftedState, ResearchedState } from "../types";
import { BackendAgentStep, type AgentStep, type AgentStepOptions, type StepResult, type TextGenerator } from "./agentStep";
import { GENERATOR_SYSTEM_PROMPT } from "./prompts";

export class GeneratorAgentStep extends BackendAgentStep implements AgentStep<ResearchedState, DraftedState> {
  readonly name = "generator" as const;

  constructor(llm: TextGenerator, options?: AgentStepOptions) {
    super(llm, 0.8, options);
  }

  // First pass only: the prompt is built from the description and context, never from a critique.
  async execute(state: ResearchedState): Promise<StepResult<DraftedState>> {
    const user = [
      `Product description:\n${state.description}`,
      `Research context:\n${state.context || "(none)"}`,
      "Generate a compelling pitch."
    ].join("\n\n");

    const reply = await this.ask(GENERATOR_SYSTEM_PROMPT, user, "text");

    return {
      state: { ...state, pitch: reply.ok ? reply.text : state.description.trim() },
      warnings: reply.ok ? [] : [reply.warning],
      prompt: this.trace(GENERATOR_SYSTEM_PROMPT, user)
    };
  }
}
