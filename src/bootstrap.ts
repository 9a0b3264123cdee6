import type { TextGenerator, WebSearchLike } from "./agents/agentStep";
import { ContextAgentStep } from "./agents/contextAgent";
import { CriticAgentStep } from "./agents/criticAgent";
import { GeneratorAgentStep } from "./agents/generatorAgent";
import { ReadinessAgentStep } from "./agents/readinessAgent";
import { RefinerAgentStep } from "./agents/refinerAgent";
import { config } from "./config";
import { IterationPolicy } from "./orchestrator/iterationPolicy";
import { ScoreGate } from "./orchestrator/scoreGate";
import { WorkflowEngine } from "./orchestrator/workflowEngine";
import { PitchWorkflowController } from "./pitch-workflow.controller";
import { InMemorySessionStore, type SessionStore } from "./services/sessionStore";

export interface PitchWorkflowDeps {
  llm: TextGenerator;
  search: WebSearchLike;
  store?: SessionStore;
  passThreshold?: number;
  autoRefineMax?: number;
  totalIterationMax?: number;
  stepTimeoutMs?: number;
  now?: () => Date;
}

export interface PitchWorkflow {
  store: SessionStore;
  engine: WorkflowEngine;
  controller: PitchWorkflowController;
}

export const createPitchWorkflow = (deps: PitchWorkflowDeps): PitchWorkflow => {
  const store = deps.store ?? new InMemorySessionStore(deps.now);
  const gate = new ScoreGate(deps.passThreshold ?? config.passThreshold);
  const policy = new IterationPolicy({
    autoRefineMax: deps.autoRefineMax ?? config.autoRefineMax,
    totalIterationMax: deps.totalIterationMax ?? config.totalIterationMax
  });
  const stepOptions = { timeoutMs: deps.stepTimeoutMs ?? config.llmTimeoutMs };

  const engine = new WorkflowEngine(
    store,
    {
      context: new ContextAgentStep(deps.llm, deps.search, stepOptions),
      generator: new GeneratorAgentStep(deps.llm, stepOptions),
      critic: new CriticAgentStep(deps.llm, gate, stepOptions),
      refiner: new RefinerAgentStep(deps.llm, stepOptions),
      readiness: new ReadinessAgentStep(deps.llm, stepOptions)
    },
    { policy, now: deps.now }
  );

  return { store, engine, controller: new PitchWorkflowController(engine) };
};
