import type { Critique, Decision } from "../types";

export const DEFAULT_PASS_THRESHOLD = 7.5;

export class ScoreGate {
  constructor(readonly threshold = DEFAULT_PASS_THRESHOLD) {}

  // Inclusive lower bound: an overall of exactly the threshold passes.
  decideScore(overall: number): Decision {
    return overall >= this.threshold ? "PASS" : "FAIL";
  }

  decide(critique: Pick<Critique, "overall">): Decision {
    return this.decideScore(critique.overall);
  }
}
