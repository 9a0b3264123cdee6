import type { ScoreGate } from "../orchestrator/scoreGate";
import { buildFallbackCritique, normalizeCritique } from "../schemas/critique";
import type { Critique, DraftedState, ReviewedState } from "../types";
import { parseJsonObject } from "../utils/json";
import { errorMessage } from "../utils/timeout";
import {
  BackendAgentStep,
  type AgentStep,
  type AgentStepOptions,
  type StepResult,
  type StepWarning,
  type TextGenerator
} from "./agentStep";
import { analyzePitch, describeAnalysis } from "./pitchAnalyzer";
import { CRITIC_SYSTEM_PROMPT } from "./prompts";

export class CriticAgentStep extends BackendAgentStep implements AgentStep<DraftedState, ReviewedState> {
  readonly name = "critic" as const;

  constructor(
    llm: TextGenerator,
    private readonly gate: ScoreGate,
    options?: AgentStepOptions
  ) {
    super(llm, 0.3, options);
  }

  async execute(state: DraftedState): Promise<StepResult<ReviewedState>> {
    const user = [
      `Critique this pitch:\n\n${state.pitch}`,
      `Structural metrics (hints only):\n${describeAnalysis(analyzePitch(state.pitch))}`
    ].join("\n\n");

    const reply = await this.ask(CRITIC_SYSTEM_PROMPT, user, "json");
    const warnings: StepWarning[] = [];
    let critique: Critique;

    if (!reply.ok) {
      warnings.push(reply.warning);
      critique = buildFallbackCritique("critic backend unavailable");
    } else {
      critique = this.interpret(reply.text, warnings);
    }

    return {
      state: { ...state, critique },
      warnings,
      prompt: this.trace(CRITIC_SYSTEM_PROMPT, user)
    };
  }

  private interpret(text: string, warnings: StepWarning[]): Critique {
    let raw: Record<string, unknown>;
    try {
      raw = parseJsonObject(text);
    } catch (error: unknown) {
      warnings.push({ kind: "malformed_response", detail: `critic: ${errorMessage(error)}` });
      return buildFallbackCritique("critic response was not JSON");
    }

    const result = normalizeCritique(raw, (overall) => this.gate.decideScore(overall));
    if (!result.ok) {
      warnings.push({ kind: "malformed_response", detail: `critic: ${result.reason}` });
      return buildFallbackCritique(`critic response invalid at ${result.reason}`);
    }
    return result.critique;
  }
}
