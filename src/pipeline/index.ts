import {
  buildClassificationRequest,
  GatewayError,
  toGatewayError,
  type ClassificationGateway,
  type ClassificationRequest,
} from "../classifier/index.js";
import { componentLogger } from "../config/logger.js";
import { createNormalizer, type Normalizer } from "../normalizer/index.js";
import { decodeMessage, emptyMessage } from "../parser/index.js";
import { extractSignals } from "../signals/index.js";
import type { TriageStats } from "../stats/index.js";
import type { NormalizedMessage, RawMessage, TriageOutput, TriageSettings } from "../types/index.js";

const log = componentLogger("pipeline");

export type PipelineState =
  | "Received"
  | "Parsed"
  | "SignalsExtracted"
  | "Classified"
  | "ClassificationFailed"
  | "Normalized"
  | "Completed";

export interface RunOptions {
  signal?: AbortSignal;
  onTransition?: (state: PipelineState) => void;
}

export interface TriagePipelineOptions {
  gateway: ClassificationGateway;
  settings: TriageSettings;
  stats?: TriageStats;
  clock?: () => Date;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Sequences decode, signal extraction, classification and normalization for
 * one message. The gateway call is the only await; every failure past the
 * decoder ends in the fallback output rather than an exception.
 */
export class TriagePipeline {
  readonly settings: TriageSettings;

  private gateway: ClassificationGateway;
  private stats: TriageStats | undefined;
  private clock: () => Date;
  private normalizer: Normalizer;

  constructor(options: TriagePipelineOptions) {
    this.gateway = options.gateway;
    this.settings = options.settings;
    this.stats = options.stats;
    this.clock = options.clock ?? (() => new Date());
    this.normalizer = createNormalizer(options.settings);
  }

  get modelVersion(): string {
    return this.gateway.modelVersion;
  }

  async run(raw: RawMessage, options: RunOptions = {}): Promise<TriageOutput> {
    const transition = (state: PipelineState) => {
      log.debug({ messageId: raw.id, state }, "Pipeline transition");
      options.onTransition?.(state);
    };

    transition("Received");
    const message = this.decode(raw);
    transition("Parsed");

    const signals = extractSignals(message);
    transition("SignalsExtracted");

    const now = this.clock();
    const request = buildClassificationRequest(message, signals, this.settings.promptVersion);
    const context = {
      referenceTimestamp: message.sentAt ?? message.internalDate ?? now,
      generatedAt: now,
    };

    let output: TriageOutput;
    try {
      const candidate = await this.classify(request, options.signal);
      transition("Classified");
      output = this.normalizer.normalizeTriage(candidate, message, signals, context);
      this.stats?.recordOutcome("classified");
    } catch (err) {
      if (!(err instanceof GatewayError)) throw err;
      transition("ClassificationFailed");
      log.warn(
        { messageId: raw.id, gateway: this.gateway.name, kind: err.kind, error: err.message },
        "Classification failed, using fallback triage"
      );
      this.stats?.recordError("gateway", err);
      output = this.normalizer.buildFallbackTriage(message, signals, context);
      this.stats?.recordOutcome("fallback");
    }
    transition("Normalized");

    deepFreeze(output);
    transition("Completed");
    return output;
  }

  private decode(raw: RawMessage): NormalizedMessage {
    try {
      return decodeMessage(raw, { maxBodyChars: this.settings.maxBodyChars });
    } catch (err) {
      log.error({ messageId: raw.id, error: err }, "Message decode failed, continuing with empty body");
      this.stats?.recordError("triage", err);
      return emptyMessage(raw);
    }
  }

  /**
   * Call the gateway under the configured timeout. Both the timeout and the
   * caller's signal abort the gateway's signal and settle the race at once,
   * whether or not the gateway honours the abort.
   */
  private async classify(request: ClassificationRequest, callerSignal?: AbortSignal): Promise<unknown> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onCallerAbort: (() => void) | undefined;

    const interrupted = new Promise<never>((_, reject) => {
      const stop = (error: GatewayError) => {
        reject(error);
        controller.abort(error);
      };
      timer = setTimeout(() => {
        stop(new GatewayError("timeout", `Gateway did not answer within ${this.settings.gatewayTimeoutMs}ms`));
      }, this.settings.gatewayTimeoutMs);

      if (callerSignal) {
        onCallerAbort = () => stop(new GatewayError("aborted", "Request aborted by caller"));
        if (callerSignal.aborted) onCallerAbort();
        else callerSignal.addEventListener("abort", onCallerAbort, { once: true });
      }
    });

    try {
      return await Promise.race([
        this.gateway.classify(request, { signal: controller.signal }),
        interrupted,
      ]);
    } catch (err) {
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof GatewayError) throw reason;
      throw toGatewayError(err, controller.signal);
    } finally {
      clearTimeout(timer);
      if (callerSignal && onCallerAbort) callerSignal.removeEventListener("abort", onCallerAbort);
    }
  }
}
