import type { WorkflowEngine } from "./orchestrator/workflowEngine";
import type {
  ApprovalInput,
  FinalPackage,
  Session,
  SessionEvent,
  SessionSnapshot,
  SessionSummary,
  StartInput
} from "./types";

export const toSnapshot = (session: Session): SessionSnapshot => {
  const { state } = session;
  return {
    sessionId: session.id,
    phase: state.phase,
    pitchType: state.pitchType,
    pitch: state.pitch ?? null,
    critique: state.critique ?? null,
    decision: state.critique?.decision ?? null,
    autoRefineCount: state.autoRefineCount,
    totalIterationCount: state.totalIterationCount,
    ...(state.humanFeedback ? { humanFeedback: state.humanFeedback } : {}),
    ...(state.finalPackage ? { finalPackage: state.finalPackage } : {}),
    createdAt: session.createdAt,
    updatedAt: session.updatedAt
  };
};

export const toSummary = (session: Session): SessionSummary => ({
  id: session.id,
  phase: session.state.phase,
  createdAt: session.createdAt,
  updatedAt: session.updatedAt
});

export interface FinalPackageView {
  sessionId: string;
  finalPackage: FinalPackage;
  totalIterations: number;
  metadata: {
    description: string;
    createdAt: string;
    finalCritiqueScore: number | null;
  };
}

/**
 * Transport-facing adapter: one method per external operation, each
 * returning plain data. Engine errors propagate unchanged for the
 * transport to map.
 */
export class PitchWorkflowController {
  constructor(private readonly engine: WorkflowEngine) {}

  async start(input: StartInput): Promise<SessionSnapshot> {
    return toSnapshot(await this.engine.start(input));
  }

  async decide(sessionId: string, input: ApprovalInput): Promise<SessionSnapshot> {
    return toSnapshot(await this.engine.submitApproval(sessionId, input));
  }

  status(sessionId: string): SessionSnapshot {
    return toSnapshot(this.engine.status(sessionId));
  }

  list(): { total: number; sessions: SessionSummary[] } {
    const sessions = this.engine.list().map(toSummary);
    return { total: sessions.length, sessions };
  }

  finalPackage(sessionId: string): FinalPackageView {
    const { session, finalPackage } = this.engine.finalPackage(sessionId);
    return {
      sessionId: session.id,
      finalPackage,
      totalIterations: session.state.totalIterationCount,
      metadata: {
        description: session.state.description,
        createdAt: session.createdAt,
        finalCritiqueScore: session.state.critique?.overall ?? null
      }
    };
  }

  events(sessionId: string): SessionEvent[] {
    return this.engine.events(sessionId);
  }

  delete(sessionId: string): { sessionId: string; deleted: boolean } {
    return { sessionId, deleted: this.engine.delete(sessionId) };
  }
}
