import { SCORE_CRITERIA, type PitchType } from "../types";

export const PITCH_TEMPLATES: Record<PitchType, string> = {
  elevator: [
    "ELEVATOR PITCH STRUCTURE:",
    "1. Hook (1 sentence): grab attention with the problem",
    "2. Solution (1-2 sentences): what you built",
    "3. Unique value (1 sentence): why you are different",
    "4. Traction (1 sentence): evidence it works",
    "5. Ask (1 sentence): what you need"
  ].join("\n"),
  investor: [
    "INVESTOR PITCH STRUCTURE:",
    "1. Problem: what pain point exists?",
    "2. Solution: the product",
    "3. Market size: TAM/SAM/SOM",
    "4. Business model: how you make money",
    "5. Traction: metrics, users, revenue",
    "6. Competition: landscape and differentiation",
    "7. Team: why you will win",
    "8. Ask: funding amount and use"
  ].join("\n"),
  demo_day: [
    "DEMO DAY PITCH STRUCTURE:",
    "1. Opening hook: surprising stat or story",
    "2. Problem: relatable pain point",
    "3. Solution demo: show the product",
    "4. Market opportunity: size and timing",
    "5. Traction: key metrics",
    "6. Vision: where you are headed",
    "7. Team: quick credibility",
    "8. The ask: clear and specific"
  ].join("\n")
};

export const CONTEXT_SYSTEM_PROMPT = [
  "You are a startup research expert.",
  "Analyze the product description and market research to give context for a compelling pitch.",
  "Cover key market insights, the competitive landscape, the target audience,",
  "the recommended pitch approach and the value propositions to emphasize."
].join(" ");

export const GENERATOR_SYSTEM_PROMPT = [
  "You are an expert pitch writer.",
  "Write a compelling, concise pitch (150-250 words) that clearly states the problem and solution,",
  "highlights the unique value proposition and includes specific, measurable outcomes.",
  "Avoid jargon. Return only the pitch text."
].join(" ");

export const CRITIC_SYSTEM_PROMPT = [
  "You are a tough but fair pitch critic (think accelerator partner or top VC).",
  `Score the pitch from 0 to 10 on each criterion: ${SCORE_CRITERIA.join(", ")}.`,
  "Return JSON only with keys: scores, feedback, strengths, weaknesses.",
  `scores must be an object with exactly these numeric keys: ${SCORE_CRITERIA.join(", ")}.`,
  "feedback is a string; strengths and weaknesses are arrays of short strings."
].join(" ");

export const REFINER_SYSTEM_PROMPT = [
  "You are a pitch refinement expert.",
  "Rewrite the pitch so it addresses every weakness, keeps its strengths and applies the feedback precisely.",
  "Make substantial improvements, stay concise, and return only the complete new pitch text."
].join(" ");

export const READINESS_SYSTEM_PROMPT = [
  "You are a pitch coach preparing the final deliverable.",
  "Return JSON only with keys: elevator_pitch, executive_summary, problem_statement, solution,",
  "unique_value_proposition, traction_metrics {users, revenue, growth, other_metrics[]},",
  "market_opportunity {tam, sam, target_segment}, business_model {revenue_streams[], pricing, unit_economics},",
  "competitive_advantage[], team_highlights, funding_ask {amount, use_of_funds {category: percentage}, milestones[]},",
  "key_talking_points[], anticipated_questions[{question, answer}], delivery_tips {tone, pacing, emphasis_points[]}.",
  "Use plain strings for every scalar value."
].join(" ");

export const buildSearchQuery = (description: string): string =>
  `${description.trim().replace(/\s+/g, " ").slice(0, 100)} market analysis competitors`;
