import type { ClassificationRequest } from "./request.js";

export interface ClassifyOptions {
  signal: AbortSignal;
}

/**
 * Opaque classification step. Implementations return the model's raw
 * structured answer and throw `GatewayError` on failure.
 */
export interface ClassificationGateway {
  readonly name: string;
  readonly modelVersion: string;
  classify(request: ClassificationRequest, options: ClassifyOptions): Promise<unknown>;
}
