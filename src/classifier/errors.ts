export type GatewayErrorKind = "timeout" | "aborted" | "upstream" | "invalid_response";

export class GatewayError extends Error {
  constructor(
    readonly kind: GatewayErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GatewayError";
  }
}

export function toGatewayError(err: unknown, signal?: AbortSignal): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  if (signal?.aborted) {
    return new GatewayError("aborted", message, { cause: err });
  }
  return new GatewayError("upstream", message, { cause: err });
}
