import { z } from "zod";
import { SCORE_CRITERIA, type Critique, type CritiqueScores, type Decision } from "../types";
import { isJsonObject } from "../utils/json";

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;

const clampScore = (value: number): number => Math.min(MAX_SCORE, Math.max(MIN_SCORE, value));

export const roundToTenth = (value: number): number => Math.round(value * 10) / 10;

const scoreSchema = z
  .preprocess((value) => (typeof value === "string" ? Number.parseFloat(value) : value), z.number().finite())
  .transform(clampScore);

const lowercaseKeys = (value: unknown): unknown =>
  isJsonObject(value) ? Object.fromEntries(Object.entries(value).map(([key, item]) => [key.trim().toLowerCase(), item])) : value;

const scoresSchema = z.preprocess(
  lowercaseKeys,
  z.object({
    clarity: scoreSchema,
    problem: scoreSchema,
    solution: scoreSchema,
    uniqueness: scoreSchema,
    traction: scoreSchema,
    engagement: scoreSchema
  })
);

const noteListSchema = z
  .array(z.unknown())
  .transform((items) => items.filter((item): item is string => typeof item === "string").map((item) => item.trim()).filter(Boolean))
  .catch([]);

export const critiqueDraftSchema = z.object({
  scores: scoresSchema,
  feedback: z.string().trim().min(1).catch("No specific feedback provided."),
  strengths: noteListSchema,
  weaknesses: noteListSchema
});

export type CritiqueDraft = z.infer<typeof critiqueDraftSchema>;

export type CritiqueParseResult = { ok: true; critique: Critique } | { ok: false; reason: string };

export const averageScore = (scores: CritiqueScores): number =>
  roundToTenth(SCORE_CRITERIA.reduce((sum, criterion) => sum + scores[criterion], 0) / SCORE_CRITERIA.length);

/**
 * Validates a decoded critic response. The backend's own overall score and
 * decision are ignored: overall is the unweighted mean of the six criteria
 * and the decision comes from `decide`.
 */
export const normalizeCritique = (raw: unknown, decide: (overall: number) => Decision): CritiqueParseResult => {
  const parsed = critiqueDraftSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "response";
    return { ok: false, reason: `${where}: ${issue?.message ?? "invalid critique"}` };
  }

  const overall = averageScore(parsed.data.scores);
  return {
    ok: true,
    critique: {
      scores: parsed.data.scores,
      overall,
      feedback: parsed.data.feedback,
      strengths: parsed.data.strengths,
      weaknesses: parsed.data.weaknesses,
      decision: decide(overall),
      fallback: false
    }
  };
};

export const buildFallbackCritique = (reason: string): Critique => {
  const scores: CritiqueScores = {
    clarity: MIN_SCORE,
    problem: MIN_SCORE,
    solution: MIN_SCORE,
    uniqueness: MIN_SCORE,
    traction: MIN_SCORE,
    engagement: MIN_SCORE
  };
  return {
    scores,
    overall: MIN_SCORE,
    feedback: `Critique unavailable (${reason}); the lowest score band was assigned so the draft is reviewed again.`,
    strengths: [],
    weaknesses: ["Critique could not be evaluated"],
    decision: "FAIL",
    fallback: true
  };
};
