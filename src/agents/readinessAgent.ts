import { buildFallbackFinalPackage, listPlaceholderFields, normalizeFinalPackage } from "../schemas/finalPackage";
import type { FinalPackageBody } from "../schemas/finalPackage";
import type { PackagedState, ReviewedState } from "../types";
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
import { READINESS_SYSTEM_PROMPT } from "./prompts";

export class ReadinessAgentStep extends BackendAgentStep implements AgentStep<ReviewedState, PackagedState> {
  readonly name = "readiness" as const;

  constructor(llm: TextGenerator, options?: AgentStepOptions) {
    super(llm, 0.5, options);
  }

  async execute(state: ReviewedState): Promise<StepResult<PackagedState>> {
    const capped = state.phase === "CAPPED";
    const user = [
      `${capped ? "Best available pitch (iteration limit reached)" : "Approved pitch"}:\n${state.pitch}`,
      `Research context:\n${state.context || "(none)"}`,
      `Reviewer notes:\n${state.humanFeedback?.trim() || "(none)"}`,
      "Create the structured final pitch package."
    ].join("\n\n");

    const reply = await this.ask(READINESS_SYSTEM_PROMPT, user, "json");
    const warnings: StepWarning[] = [];
    let body: FinalPackageBody;

    if (!reply.ok) {
      warnings.push(reply.warning);
      body = buildFallbackFinalPackage(state.pitch);
    } else {
      body = this.interpret(reply.text, state.pitch, warnings);
    }

    return {
      state: { ...state, finalPackage: { ...body, status: capped ? "capped" : "approved" } },
      warnings,
      prompt: this.trace(READINESS_SYSTEM_PROMPT, user)
    };
  }

  private interpret(text: string, pitch: string, warnings: StepWarning[]): FinalPackageBody {
    let raw: Record<string, unknown>;
    try {
      raw = parseJsonObject(text);
    } catch (error: unknown) {
      warnings.push({ kind: "malformed_response", detail: `readiness: ${errorMessage(error)}` });
      return buildFallbackFinalPackage(pitch);
    }

    const body = normalizeFinalPackage(raw);
    const missing = listPlaceholderFields(body);
    if (missing.length > 0) {
      warnings.push({ kind: "malformed_response", detail: `readiness: filled ${missing.length} missing field(s): ${missing.join(", ")}` });
    }
    return body;
  }
}
