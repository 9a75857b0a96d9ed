import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import { GatewayError, toGatewayError } from "./errors.js";
import type { ClassificationGateway, ClassifyOptions } from "./gateway.js";
import { TRIAGE_SYSTEM_PROMPT } from "./prompt.js";
import { renderUserContent, type ClassificationRequest } from "./request.js";
import { triageCandidateSchema } from "./schema.js";

export interface OpenAIGatewayConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  modelVersion: string;
  /** Injected in tests. */
  client?: OpenAI;
}

const RESPONSE_FORMAT = zodResponseFormat(triageCandidateSchema, "triage_candidate");

/**
 * Chat-completions gateway with a strict JSON-schema response format. The
 * parsed JSON is returned untouched; the normalizer owns validation.
 */
export class OpenAIGateway implements ClassificationGateway {
  readonly name = "openai";
  readonly modelVersion: string;

  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(config: OpenAIGatewayConfig) {
    this.client =
      config.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        maxRetries: 0,
      });
    this.model = config.model;
    this.temperature = config.temperature;
    this.modelVersion = config.modelVersion;
  }

  async classify(request: ClassificationRequest, options: ClassifyOptions): Promise<unknown> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          temperature: this.temperature,
          response_format: RESPONSE_FORMAT,
          messages: [
            { role: "system", content: TRIAGE_SYSTEM_PROMPT },
            { role: "user", content: renderUserContent(request) },
          ],
        },
        { signal: options.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw toGatewayError(err, options.signal);
    }

    if (!content) {
      throw new GatewayError("invalid_response", "Empty completion content");
    }
    try {
      return JSON.parse(content);
    } catch (err) {
      throw new GatewayError("invalid_response", "Completion content is not JSON", { cause: err });
    }
  }
}
