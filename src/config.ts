import dotenv from "dotenv";

dotenv.config();

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
};

const model = process.env.OPENAI_MODEL?.trim() || "gpt-4.1-mini";

export const config = {
  port: toInt(process.env.PORT, 3000),
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL?.trim() || "https://api.openai.com/v1",
  model,
  searchModel: process.env.SEARCH_MODEL?.trim() || model,
  llmTimeoutMs: toInt(process.env.LLM_TIMEOUT_MS, 45_000),
  searchTimeoutMs: toInt(process.env.SEARCH_TIMEOUT_MS, 20_000),
  passThreshold: toFloat(process.env.PASS_THRESHOLD, 7.5),
  autoRefineMax: toInt(process.env.AUTO_REFINE_MAX, 3),
  totalIterationMax: toInt(process.env.TOTAL_ITERATION_MAX, 10),
  sessionIdleTtlMs: toInt(process.env.SESSION_IDLE_TTL_MS, 60 * 60_000)
};

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env.");
  }
};
