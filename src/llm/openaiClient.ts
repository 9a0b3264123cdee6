import OpenAI from "openai";
import { config } from "../config";

export interface CompletionOptions {
  temperature?: number;
}

const statusOf = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) return undefined;
  return typeof error.status === "number" ? error.status : undefined;
};

const messageOf = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
};

export class OpenAiClient {
  private readonly client: OpenAI;
  private modelValidationPromise?: Promise<void>;

  constructor(client?: OpenAI) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl
      });
  }

  static isNotFoundError(error: unknown): boolean {
    return statusOf(error) === 404 || /not found/i.test(messageOf(error));
  }

  static isModelUnknownError(error: unknown): boolean {
    return /unknown model|invalid model|model .* does not exist|no such model|unsupported model/i.test(messageOf(error));
  }

  private async runModelValidation(): Promise<void> {
    let modelIds: string[];
    try {
      const response = await this.client.models.list();
      modelIds = response.data.map((item) => item.id.trim()).filter(Boolean);
    } catch (error: unknown) {
      // Some OpenAI-compatible providers do not expose /models; trust the configuration then.
      if (OpenAiClient.isNotFoundError(error)) return;
      throw error;
    }

    if (modelIds.length === 0 || modelIds.includes(config.model)) {
      return;
    }

    const sample = modelIds.slice(0, 8).join(", ");
    throw new Error(
      `Configured OPENAI_MODEL "${config.model}" is not available on ${config.openaiBaseUrl}. Available models (sample): ${sample}`
    );
  }

  async assertModelAvailable(): Promise<void> {
    if (!this.modelValidationPromise) {
      this.modelValidationPromise = this.runModelValidation();
    }
    return this.modelValidationPromise;
  }

  private async completeWithChat(
    system: string,
    user: string,
    options: CompletionOptions & { jsonObject?: boolean }
  ): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: config.model,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user }
      ],
      ...(typeof options.temperature === "number" ? { temperature: options.temperature } : {}),
      ...(options.jsonObject ? { response_format: { type: "json_object" as const } } : {})
    });

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }

  private async completeWithResponses(system: string, user: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.responses.create({
      model: config.model,
      instructions: system,
      input: user,
      ...(typeof options.temperature === "number" ? { temperature: options.temperature } : {})
    });

    const text = response.output_text.trim();
    if (!text) {
      throw new Error("LLM returned empty output.");
    }
    return text;
  }

  async complete(system: string, user: string, options: CompletionOptions = {}): Promise<string> {
    try {
      return await this.completeWithChat(system, user, options);
    } catch (error: unknown) {
      if (!OpenAiClient.isNotFoundError(error) || OpenAiClient.isModelUnknownError(error)) {
        throw error;
      }
    }

    return this.completeWithResponses(system, user, options);
  }

  async completeJsonObject(system: string, user: string, options: CompletionOptions = {}): Promise<string> {
    try {
      return await this.completeWithChat(system, user, { ...options, jsonObject: true });
    } catch (error: unknown) {
      if (!OpenAiClient.isNotFoundError(error) || OpenAiClient.isModelUnknownError(error)) {
        throw error;
      }
    }

    // The responses fallback has no JSON mode here; callers still extract the object from prose.
    return this.completeWithResponses(system, user, options);
  }
}
