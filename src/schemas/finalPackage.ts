import { z } from "zod";
import { isJsonObject } from "../utils/json";

export const NOT_PROVIDED = "not provided";

const asObject = (value: unknown): Record<string, unknown> => (isJsonObject(value) ? value : {});

const textSchema = z
  .preprocess((value) => (typeof value === "number" || typeof value === "boolean" ? String(value) : value), z.string().trim().min(1))
  .catch(NOT_PROVIDED);

const textListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((items) => {
    const texts = items
      .map((item) => (typeof item === "number" ? String(item) : item))
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean);
    return texts.length > 0 ? texts : [NOT_PROVIDED];
  });

const section = <T extends z.ZodRawShape>(shape: T) => z.preprocess(asObject, z.object(shape));

const useOfFundsSchema = z.preprocess(
  asObject,
  z.record(z.unknown()).transform((entries): Record<string, string> => {
    const allocations = Object.entries(entries).flatMap(([category, share]) => {
      const label = category.trim();
      const value = typeof share === "number" ? `${share}%` : typeof share === "string" ? share.trim() : "";
      return label && value ? [[label, value] as const] : [];
    });
    return allocations.length > 0 ? Object.fromEntries(allocations) : { unallocated: NOT_PROVIDED };
  })
);

const questionSchema = section({ question: textSchema, answer: textSchema });

const questionListSchema = z
  .array(z.unknown())
  .catch([])
  .transform((items) => {
    const questions = items.filter(isJsonObject).map((item) => questionSchema.parse(item));
    return questions.length > 0 ? questions : [{ question: NOT_PROVIDED, answer: NOT_PROVIDED }];
  });

/**
 * Final pitch package as returned by the readiness agent. Every field is
 * mandatory; anything the backend omitted or mistyped is replaced with
 * `NOT_PROVIDED` so the shape never varies.
 */
export const finalPackageSchema = z.preprocess(
  asObject,
  z.object({
    elevator_pitch: textSchema,
    executive_summary: textSchema,
    problem_statement: textSchema,
    solution: textSchema,
    unique_value_proposition: textSchema,
    traction_metrics: section({
      users: textSchema,
      revenue: textSchema,
      growth: textSchema,
      other_metrics: textListSchema
    }),
    market_opportunity: section({
      tam: textSchema,
      sam: textSchema,
      target_segment: textSchema
    }),
    business_model: section({
      revenue_streams: textListSchema,
      pricing: textSchema,
      unit_economics: textSchema
    }),
    competitive_advantage: textListSchema,
    team_highlights: textSchema,
    funding_ask: section({
      amount: textSchema,
      use_of_funds: useOfFundsSchema,
      milestones: textListSchema
    }),
    key_talking_points: textListSchema,
    anticipated_questions: questionListSchema,
    delivery_tips: section({
      tone: textSchema,
      pacing: textSchema,
      emphasis_points: textListSchema
    })
  })
);

export type FinalPackageBody = z.infer<typeof finalPackageSchema>;

export const normalizeFinalPackage = (raw: unknown): FinalPackageBody => finalPackageSchema.parse(raw);

/** Package used when the readiness backend produced nothing usable. */
export const buildFallbackFinalPackage = (pitch: string): FinalPackageBody => {
  const filled = normalizeFinalPackage({});
  const trimmed = pitch.trim();
  return {
    ...filled,
    elevator_pitch: trimmed.slice(0, 200) || NOT_PROVIDED,
    executive_summary: trimmed || NOT_PROVIDED
  };
};

/** Names of leaf fields still holding the placeholder, e.g. `funding_ask.amount`. */
export const listPlaceholderFields = (value: unknown, prefix = ""): string[] => {
  if (value === NOT_PROVIDED) {
    return [prefix];
  }
  if (Array.isArray(value)) {
    if (value.length === 1 && value[0] === NOT_PROVIDED) {
      return [prefix];
    }
    return value.flatMap((item, index) => listPlaceholderFields(item, `${prefix}.${index}`));
  }
  if (isJsonObject(value)) {
    return Object.entries(value).flatMap(([key, item]) => listPlaceholderFields(item, prefix ? `${prefix}.${key}` : key));
  }
  return [];
};
