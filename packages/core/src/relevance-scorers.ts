import { CohereClient } from "cohere-ai";
import { z } from "zod";
import type { IRelevanceScorer } from "@kindex/types";
import { AppError, ExternalServiceError, isCancellation, withRetry } from "@kindex/errors";
import { clampRelevance, NEUTRAL_RELEVANCE } from "./rerankers.js";

/** Sampling temperature for scoring requests; kept low so repeated calls agree. */
export const SCORING_TEMPERATURE = 0.1;

export function buildRelevancePrompt(query: string, text: string): string {
  return [
    "Rate how relevant the following text is to answering the query, on a scale from 0 to 10.",
    "Only respond with a single number.",
    "",
    `Query: ${query}`,
    "",
    `Text: ${text}`,
    "",
    "Relevance score (0-10):",
  ].join("\n");
}

/** First number in the reply, clamped to 0-10; neutral when there is none. */
export function parseRelevanceScore(reply: string): number {
  const match = /\d+(?:\.\d+)?/.exec(reply);
  if (!match) return NEUTRAL_RELEVANCE;
  return clampRelevance(Number(match[0]));
}

export interface CohereRelevanceScorerConfig {
  apiKey: string;
  model: string;
  maxRetries?: number;
}

export class CohereRelevanceScorer implements IRelevanceScorer {
  readonly name = "cohere";
  private readonly client: CohereClient;
  private readonly model: string;
  private readonly maxRetries: number;

  constructor(config: CohereRelevanceScorerConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model;
    this.maxRetries = config.maxRetries ?? 2;
  }

  async score(query: string, text: string, signal?: AbortSignal): Promise<number> {
    const reply = await withRetry(
      async () => {
        try {
          const response = await this.client.chat(
            {
              model: this.model,
              message: buildRelevancePrompt(query, text),
              temperature: SCORING_TEMPERATURE,
              maxTokens: 10,
            },
            { abortSignal: signal },
          );
          return response.text;
        } catch (err) {
          if (isCancellation(err)) throw err;
          throw new ExternalServiceError("Cohere relevance scoring failed", "cohere", {
            cause: err,
          });
        }
      },
      { maxRetries: this.maxRetries, baseDelayMs: 250, signal },
    );
    return parseRelevanceScore(reply);
  }
}

export interface HttpRelevanceScorerConfig {
  /** Server exposing a `POST /api/generate` completion endpoint. */
  baseUrl: string;
  model: string;
  maxRetries?: number;
}

const generateResponseSchema = z.object({
  response: z.string().nullish(),
});

export class HttpRelevanceScorer implements IRelevanceScorer {
  readonly name = "http";
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly maxRetries: number;

  constructor(config: HttpRelevanceScorerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.model = config.model;
    this.maxRetries = config.maxRetries ?? 2;
  }

  async score(query: string, text: string, signal?: AbortSignal): Promise<number> {
    const reply = await withRetry(() => this.generate(buildRelevancePrompt(query, text), signal), {
      maxRetries: this.maxRetries,
      baseDelayMs: 250,
      signal,
    });
    return reply === undefined ? NEUTRAL_RELEVANCE : parseRelevanceScore(reply);
  }

  private async generate(prompt: string, signal?: AbortSignal): Promise<string | undefined> {
    const response = await fetch(`${this.baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: this.model,
        prompt,
        stream: false,
        options: { temperature: SCORING_TEMPERATURE, num_predict: 10 },
      }),
      signal,
    });

    if (!response.ok) {
      const message = `Relevance scoring failed: ${response.status} ${response.statusText}`;
      if (response.status >= 400 && response.status < 500) {
        throw new AppError({ message, statusCode: response.status, code: "SCORING_REJECTED" });
      }
      throw new ExternalServiceError(message, "relevance-scorer");
    }

    const parsed = generateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError(
        "Relevance scorer returned a malformed response",
        "relevance-scorer",
        { cause: parsed.error },
      );
    }
    return parsed.data.response ?? undefined;
  }
}
