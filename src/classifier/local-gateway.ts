import { GatewayError, toGatewayError } from "./errors.js";
import type { ClassificationGateway, ClassifyOptions } from "./gateway.js";
import { TRIAGE_SYSTEM_PROMPT } from "./prompt.js";
import { renderUserContent, type ClassificationRequest } from "./request.js";

export interface LocalGatewayConfig {
  url: string;
  modelVersion: string;
  fetch?: typeof fetch;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Gateway for a self-hosted model server. It receives `{ system, user }`
 * and answers with the candidate JSON, either bare or under `output`.
 */
export class LocalGateway implements ClassificationGateway {
  readonly name = "local";
  readonly modelVersion: string;

  private url: string;
  private fetchImpl: typeof fetch;

  constructor(config: LocalGatewayConfig) {
    this.url = config.url;
    this.modelVersion = config.modelVersion;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async classify(request: ClassificationRequest, options: ClassifyOptions): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ system: TRIAGE_SYSTEM_PROMPT, user: renderUserContent(request) }),
        signal: options.signal,
      });
    } catch (err) {
      throw toGatewayError(err, options.signal);
    }

    if (!response.ok) {
      throw new GatewayError("upstream", `Local model server responded ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      if (options.signal.aborted) throw toGatewayError(err, options.signal);
      throw new GatewayError("invalid_response", "Local model server returned invalid JSON", {
        cause: err,
      });
    }

    return isRecord(body) && "output" in body ? body.output : body;
  }
}
