import OpenAI from "openai";
import { config } from "../config";
import { errorMessage, withSingleRetry } from "../utils/timeout";

export interface WebSearchOptions {
  model?: string;
  timeoutMs?: number;
  maxSnippets?: number;
  onFailure?: (query: string, message: string) => void;
}

const MAX_SNIPPET_CHARS = 600;

/** Splits a search answer into trimmed paragraph snippets, dropping headings and blanks. */
export const toSnippets = (text: string, maxSnippets: number): string[] =>
  text
    .split(/\n\s*\n/)
    .map((block) => block.replace(/\s+/g, " ").trim())
    .filter((block) => block.length > 0 && !/^#+\s/.test(block))
    .map((block) => (block.length > MAX_SNIPPET_CHARS ? `${block.slice(0, MAX_SNIPPET_CHARS)}...` : block))
    .slice(0, maxSnippets);

/**
 * Market research through the Responses API web search tool. Never throws:
 * a failed or timed-out search yields an empty snippet list.
 */
export class OpenAiWebSearch {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly maxSnippets: number;

  constructor(
    private readonly options: WebSearchOptions = {},
    client?: OpenAI
  ) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl
      });
    this.model = options.model ?? config.searchModel;
    this.timeoutMs = options.timeoutMs ?? config.searchTimeoutMs;
    this.maxSnippets = options.maxSnippets ?? 8;
  }

  async search(query: string): Promise<string[]> {
    try {
      const response = await withSingleRetry(
        () =>
          this.client.responses.create({
            model: this.model,
            tools: [{ type: "web_search_preview" }],
            input: `Search the web and summarise the most relevant findings as short factual paragraphs.\n\nQuery: ${query}`
          }),
        { timeoutMs: this.timeoutMs, label: "web search" }
      );
      return toSnippets(response.output_text, this.maxSnippets);
    } catch (error: unknown) {
      this.options.onFailure?.(query, errorMessage(error));
      return [];
    }
  }
}
