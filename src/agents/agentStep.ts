import type { CompletionOptions } from "../llm/openaiClient";
import type { PitchState } from "../types";
import { errorMessage, withSingleRetry } from "../utils/timeout";

export interface TextGenerator {
  complete(system: string, user: string, options?: CompletionOptions): Promise<string>;
  completeJsonObject(system: string, user: string, options?: CompletionOptions): Promise<string>;
}

export interface WebSearchLike {
  search(query: string): Promise<string[]>;
}

export type StepName = "context" | "generator" | "critic" | "refiner" | "readiness";

export type StepWarningKind = "backend_unavailable" | "malformed_response";

export interface StepWarning {
  kind: StepWarningKind;
  detail: string;
}

export interface PromptTrace {
  step: StepName;
  system: string;
  user: string;
  temperature: number;
}

/**
 * Outcome of one step. `state` is always usable: backend problems are
 * reported through `warnings`, never thrown.
 */
export interface StepResult<S extends PitchState> {
  state: S;
  warnings: StepWarning[];
  prompt?: PromptTrace;
}

export interface AgentStep<In extends PitchState, Out extends PitchState> {
  readonly name: StepName;
  execute(state: In): Promise<StepResult<Out>>;
}

export interface AgentStepOptions {
  timeoutMs?: number;
  temperature?: number;
}

type BackendReply = { ok: true; text: string } | { ok: false; warning: StepWarning };

const DEFAULT_STEP_TIMEOUT_MS = 45_000;

export abstract class BackendAgentStep {
  abstract readonly name: StepName;
  protected readonly timeoutMs: number;
  protected readonly temperature: number;

  constructor(
    protected readonly llm: TextGenerator,
    defaultTemperature: number,
    options: AgentStepOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.temperature = options.temperature ?? defaultTemperature;
  }

  protected trace(system: string, user: string): PromptTrace {
    return { step: this.name, system, user, temperature: this.temperature };
  }

  protected async ask(system: string, user: string, format: "text" | "json"): Promise<BackendReply> {
    const options = { temperature: this.temperature };
    try {
      const text = await withSingleRetry(
        () => (format === "json" ? this.llm.completeJsonObject(system, user, options) : this.llm.complete(system, user, options)),
        { timeoutMs: this.timeoutMs, label: `${this.name} llm call` }
      );
      if (!text.trim()) {
        return { ok: false, warning: { kind: "backend_unavailable", detail: `${this.name}: empty output` } };
      }
      return { ok: true, text: text.trim() };
    } catch (error: unknown) {
      return { ok: false, warning: { kind: "backend_unavailable", detail: `${this.name}: ${errorMessage(error)}` } };
    }
  }
}
