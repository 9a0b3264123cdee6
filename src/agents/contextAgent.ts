import type { PitchState, ResearchedState } from "../types";
import { errorMessage } from "../utils/timeout";
import {
  BackendAgentStep,
  type AgentStep,
  type AgentStepOptions,
  type StepResult,
  type StepWarning,
  type TextGenerator,
  type WebSearchLike
} from "./agentStep";
import { buildSearchQuery, CONTEXT_SYSTEM_PROMPT, PITCH_TEMPLATES } from "./prompts";

export class ContextAgentStep extends BackendAgentStep implements AgentStep<PitchState, ResearchedState> {
  readonly name = "context" as const;

  constructor(
    llm: TextGenerator,
    private readonly search: WebSearchLike,
    options?: AgentStepOptions
  ) {
    super(llm, 0.7, options);
  }

  async execute(state: PitchState): Promise<StepResult<ResearchedState>> {
    const warnings: StepWarning[] = [];
    const query = buildSearchQuery(state.description);

    let snippets: string[] = [];
    try {
      snippets = await this.search.search(query);
    } catch (error: unknown) {
      warnings.push({ kind: "backend_unavailable", detail: `search: ${errorMessage(error)}` });
    }

    const research = snippets.length > 0 ? snippets.map((snippet) => `- ${snippet}`).join("\n") : "(no market research available)";
    const user = [
      `Product description:\n${state.description}`,
      `Market research results:\n${research}`,
      `Pitch structure to follow:\n${PITCH_TEMPLATES[state.pitchType]}`,
      "Provide comprehensive context for creating a compelling pitch."
    ].join("\n\n");

    const reply = await this.ask(CONTEXT_SYSTEM_PROMPT, user, "text");
    if (!reply.ok) {
      warnings.push(reply.warning);
    }

    return {
      state: { ...state, context: reply.ok ? reply.text : snippets.join("\n") },
      warnings,
      prompt: this.trace(CONTEXT_SYSTEM_PROMPT, user)
    };
  }
}
