import type { ReviewedState } from "../types";
import { BackendAgentStep, type AgentStep, type AgentStepOptions, type StepResult, type TextGenerator } from "./agentStep";
import { REFINER_SYSTEM_PROMPT } from "./prompts";

export class RefinerAgentStep extends BackendAgentStep implements AgentStep<ReviewedState, ReviewedState> {
  readonly name = "refiner" as const;

  constructor(llm: TextGenerator, options?: AgentStepOptions) {
    super(llm, 0.7, options);
  }

  async execute(state: ReviewedState): Promise<StepResult<ReviewedState>> {
    const { critique } = state;
    const sections = [
      `Original pitch:\n${state.pitch}`,
      `Research context:\n${state.context || "(none)"}`,
      `Critique feedback (overall ${critique.overall}/10):\n${critique.feedback}`,
      `Weaknesses to address:\n${critique.weaknesses.join(", ") || "(none listed)"}`
    ];
    if (state.humanFeedback?.trim()) {
      sections.push(`Reviewer feedback (highest priority):\n${state.humanFeedback.trim()}`);
    }
    sections.push("Create a substantially improved version.");
    const user = sections.join("\n\n");

    const reply = await this.ask(REFINER_SYSTEM_PROMPT, user, "text");

    // The new draft replaces the old one; on failure the previous draft stays as is.
    return {
      state: { ...state, pitch: reply.ok ? reply.text : state.pitch },
      warnings: reply.ok ? [] : [reply.warning],
      prompt: this.trace(REFINER_SYSTEM_PROMPT, user)
    };
  }
}
