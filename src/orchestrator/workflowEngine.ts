import { randomUUID } from "node:crypto";
import type { AgentStep } from "../agents/agentStep";
import { InvalidTransitionError, SessionConflictError, SessionNotFoundError, WorkflowError } from "../errors";
import { SessionLockManager } from "../services/sessionLockManager";
import type { SessionStore } from "../services/sessionStore";
import type {
  AgentRole,
  ApprovalInput,
  DraftedState,
  FinalPackage,
  PackagedState,
  PitchState,
  ResearchedState,
  ReviewedState,
  Session,
  SessionEvent,
  StartInput,
  WorkflowEvent
} from "../types";
import { IterationPolicy } from "./iterationPolicy";
import { advance, hasStateFields, isTerminalPhase } from "./transitions";

export interface WorkflowSteps {
  context: AgentStep<PitchState, ResearchedState>;
  generator: AgentStep<ResearchedState, DraftedState>;
  critic: AgentStep<DraftedState, ReviewedState>;
  refiner: AgentStep<ReviewedState, ReviewedState>;
  readiness: AgentStep<ReviewedState, PackagedState>;
}

export interface WorkflowEngineOptions {
  policy?: IterationPolicy;
  locks?: SessionLockManager;
  now?: () => Date;
}

const REVIEWED_FIELDS = ["context", "pitch", "critique"] as const;

const withoutHumanFeedback = <S extends PitchState>(state: S): S => ({ ...state, humanFeedback: undefined });

/**
 * Drives one session through the fixed pitch graph. Each public call runs
 * its whole step chain on a private copy of the state and persists the
 * result once, so a session is only ever stored at a checkpoint or a
 * terminal phase.
 */
export class WorkflowEngine {
  private readonly policy: IterationPolicy;
  private readonly locks: SessionLockManager;
  private readonly now: () => Date;

  constructor(
    private readonly store: SessionStore,
    private readonly steps: WorkflowSteps,
    options: WorkflowEngineOptions = {}
  ) {
    this.policy = options.policy ?? new IterationPolicy();
    this.locks = options.locks ?? new SessionLockManager();
    this.now = options.now ?? (() => new Date());
  }

  async start(input: StartInput): Promise<Session> {
    const description = input.description.trim();
    if (!description) {
      throw new WorkflowError("description must not be empty.", "INVALID_INPUT", 400);
    }

    const initial: PitchState = {
      description,
      pitchType: input.pitchType ?? "elevator",
      phase: "START",
      autoRefineCount: 0,
      totalIterationCount: 0
    };
    // Not stored until the first checkpoint; events buffer against the id meanwhile.
    const createdAt = this.now().toISOString();
    const session: Session = { id: randomUUID(), createdAt, updatedAt: createdAt, state: initial };
    const sessionId = session.id;
    this.log(sessionId, "engine", "session_started", `Workflow started (${initial.pitchType} pitch).`, initial);

    try {
      return await this.withLock(sessionId, async () => {
        const researched = this.transition(sessionId, await this.runStep(sessionId, this.steps.context, initial), "context_gathered");
        const drafted = this.transition(sessionId, await this.runStep(sessionId, this.steps.generator, researched), "pitch_generated");
        const settled = await this.critiqueAndRoute(sessionId, drafted);
        return this.commit(session, settled);
      });
    } catch (error: unknown) {
      this.store.delete(sessionId);
      throw error;
    }
  }

  async submitApproval(sessionId: string, input: ApprovalInput): Promise<Session> {
    return this.withLock(sessionId, async () => {
      const session = this.requireSession(sessionId);
      const state = session.state;
      if (state.phase !== "AWAITING_APPROVAL" || !hasStateFields(state, REVIEWED_FIELDS)) {
        throw new InvalidTransitionError(
          `Cannot approve or reject session ${sessionId}: current phase is ${state.phase}, expected AWAITING_APPROVAL.`,
          state.phase
        );
      }

      const feedback = input.feedback?.trim() || undefined;
      this.log(sessionId, "human", "approval_received", input.approved ? "Pitch approved." : "Pitch rejected.", state, {
        approved: input.approved,
        feedback: feedback ?? null
      });

      if (input.approved) {
        const ready = this.transition(sessionId, { ...state, humanFeedback: feedback ?? state.humanFeedback }, "approved");
        const packaged = await this.runStep(sessionId, this.steps.readiness, ready);
        const done = this.transition(sessionId, packaged, "package_ready");
        this.log(sessionId, "engine", "session_completed", "Final pitch package ready.", done);
        return this.commit(session, done);
      }

      if (!this.policy.canAcceptHumanRefinement(state)) {
        return this.commit(session, await this.finishCapped(sessionId, state));
      }

      const refining = this.transition(
        sessionId,
        this.policy.countHumanRefinement({ ...state, humanFeedback: feedback }),
        "rejected"
      );
      const refined = await this.runStep(sessionId, this.steps.refiner, refining);
      return this.commit(session, await this.critiqueAndRoute(sessionId, refined));
    });
  }

  status(sessionId: string): Session {
    return this.requireSession(sessionId);
  }

  list(): Session[] {
    return this.store.list();
  }

  events(sessionId: string): SessionEvent[] {
    this.requireSession(sessionId);
    return this.store.getEvents(sessionId);
  }

  finalPackage(sessionId: string): { session: Session; finalPackage: FinalPackage } {
    const session = this.requireSession(sessionId);
    const { phase, finalPackage } = session.state;
    if (!isTerminalPhase(phase) || !finalPackage) {
      throw new InvalidTransitionError(`Final package not ready. Current phase: ${phase}.`, phase);
    }
    return { session, finalPackage };
  }

  /** Idempotent: deleting an unknown id succeeds and reports `false`. */
  delete(sessionId: string): boolean {
    if (this.locks.isHeld(sessionId)) {
      throw new SessionConflictError(sessionId);
    }
    return this.store.delete(sessionId);
  }

  pruneIdle(maxIdleMs: number): string[] {
    return this.store.pruneIdle(maxIdleMs, {
      nowMs: this.now().getTime(),
      isBusy: (sessionId) => this.locks.isHeld(sessionId)
    });
  }

  private async critiqueAndRoute(sessionId: string, drafted: DraftedState): Promise<PitchState> {
    let current = drafted;

    for (;;) {
      const critiqued = this.transition(sessionId, await this.runStep(sessionId, this.steps.critic, current), "critique_completed");
      const action = this.policy.nextAction(critiqued);
      this.log(
        sessionId,
        "critic",
        "critique_completed",
        `Overall ${critiqued.critique.overall}/10 -> ${critiqued.critique.decision}; next: ${action}.`,
        critiqued,
        { overall: critiqued.critique.overall, decision: critiqued.critique.decision, action }
      );

      if (action === "TERMINATE_MAX_ITER") {
        return this.finishCapped(sessionId, critiqued);
      }
      if (action === "SUSPEND_FOR_APPROVAL") {
        return this.transition(sessionId, critiqued, "suspend");
      }

      const refining = this.transition(
        sessionId,
        this.policy.countAutoRefinement(withoutHumanFeedback(critiqued)),
        "auto_refine"
      );
      current = await this.runStep(sessionId, this.steps.refiner, refining);
    }
  }

  // Best-effort package from the last pitch; reaching the cap is an outcome, not an error.
  private async finishCapped(sessionId: string, state: ReviewedState): Promise<PackagedState> {
    const capped = this.transition(sessionId, state, "cap_reached");
    const packaged = await this.runStep(sessionId, this.steps.readiness, capped);
    this.log(
      sessionId,
      "engine",
      "session_capped",
      `Iteration limit reached after ${packaged.totalIterationCount} iterations; returning capped package.`,
      packaged
    );
    return packaged;
  }

  private async runStep<In extends PitchState, Out extends PitchState>(
    sessionId: string,
    step: AgentStep<In, Out>,
    state: In
  ): Promise<Out> {
    const result = await step.execute(state);

    if (result.prompt) {
      this.log(sessionId, step.name, "prompt_logged", `${step.name} prompt captured.`, state, {
        system: result.prompt.system,
        user: result.prompt.user,
        temperature: result.prompt.temperature
      });
    }
    for (const warning of result.warnings) {
      const type = warning.kind === "malformed_response" ? "malformed_response" : "step_degraded";
      this.log(sessionId, step.name, type, warning.detail, state);
    }

    return result.state;
  }

  private transition<S extends PitchState>(sessionId: string, state: S, event: WorkflowEvent): S {
    const next = advance(state, event);
    this.log(sessionId, "engine", "phase_transition", `${state.phase} -(${event})-> ${next.phase}`, next, {
      from: state.phase,
      to: next.phase,
      event
    });
    return next;
  }

  private commit(session: Session, state: PitchState): Session {
    const updated: Session = { ...session, state, updatedAt: this.now().toISOString() };
    this.store.put(updated);
    return updated;
  }

  private requireSession(sessionId: string): Session {
    const session = this.store.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private async withLock<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    if (!this.locks.tryAcquire(sessionId)) {
      throw new SessionConflictError(sessionId);
    }
    try {
      return await work();
    } finally {
      this.locks.release(sessionId);
    }
  }

  private log(
    sessionId: string,
    role: AgentRole,
    type: string,
    message: string,
    state: PitchState,
    data?: Record<string, unknown>
  ): void {
    this.store.pushEvent(sessionId, role, type, message, {
      phase: state.phase,
      iteration: state.totalIterationCount,
      data
    });
  }
}
