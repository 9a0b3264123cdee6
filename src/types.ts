import type { FinalPackageBody } from "./schemas/finalPackage";

export type AgentRole = "engine" | "context" | "generator" | "critic" | "refiner" | "readiness" | "human";

export type PitchType = "elevator" | "investor" | "demo_day";

export type Decision = "PASS" | "FAIL";

export const SCORE_CRITERIA = ["clarity", "problem", "solution", "uniqueness", "traction", "engagement"] as const;

export type ScoreCriterion = (typeof SCORE_CRITERIA)[number];

export type CritiqueScores = Record<ScoreCriterion, number>;

export interface Critique {
  scores: CritiqueScores;
  overall: number;
  feedback: string;
  strengths: string[];
  weaknesses: string[];
  decision: Decision;
  /** True when the critic response could not be used and the lowest band was assigned. */
  fallback: boolean;
}

export type WorkflowPhase =
  | "START"
  | "CONTEXT_DONE"
  | "GENERATED"
  | "CRITIQUED"
  | "AUTO_REFINING"
  | "AWAITING_APPROVAL"
  | "REFINING"
  | "READY_FOR_FINAL"
  | "DONE"
  | "CAPPED";

export type TerminalPhase = Extract<WorkflowPhase, "DONE" | "CAPPED">;

export type WorkflowEvent =
  | "context_gathered"
  | "pitch_generated"
  | "critique_completed"
  | "auto_refine"
  | "suspend"
  | "cap_reached"
  | "approved"
  | "rejected"
  | "package_ready";

export type PackageStatus = "approved" | "capped";

export type FinalPackage = FinalPackageBody & { status: PackageStatus };

export interface PitchState {
  readonly description: string;
  pitchType: PitchType;
  phase: WorkflowPhase;
  context?: string;
  pitch?: string;
  critique?: Critique;
  autoRefineCount: number;
  totalIterationCount: number;
  humanFeedback?: string;
  finalPackage?: FinalPackage;
}

export type PitchStateField = "context" | "pitch" | "critique" | "finalPackage";

/** A state whose listed optional fields are known to be populated. */
export type PitchStateWith<K extends PitchStateField> = PitchState & { [F in K]-?: NonNullable<PitchState[F]> };

export type ResearchedState = PitchStateWith<"context">;
export type DraftedState = PitchStateWith<"context" | "pitch">;
export type ReviewedState = PitchStateWith<"context" | "pitch" | "critique">;
export type PackagedState = PitchStateWith<"context" | "pitch" | "critique" | "finalPackage">;

export interface Session {
  id: string;
  createdAt: string;
  updatedAt: string;
  state: PitchState;
}

export interface SessionSummary {
  id: string;
  phase: WorkflowPhase;
  createdAt: string;
  updatedAt: string;
}

export interface SessionSnapshot {
  sessionId: string;
  phase: WorkflowPhase;
  pitchType: PitchType;
  pitch: string | null;
  critique: Critique | null;
  decision: Decision | null;
  autoRefineCount: number;
  totalIterationCount: number;
  humanFeedback?: string;
  finalPackage?: FinalPackage;
  createdAt: string;
  updatedAt: string;
}

export interface SessionEvent {
  id: string;
  sessionId: string;
  timestamp: string;
  role: AgentRole;
  type: string;
  message: string;
  phase?: WorkflowPhase;
  iteration?: number;
  data?: Record<string, unknown>;
}

export interface StartInput {
  description: string;
  pitchType?: PitchType;
}

export interface ApprovalInput {
  approved: boolean;
  feedback?: string;
}
