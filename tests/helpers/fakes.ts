import type { ClassificationGateway, ClassificationRequest, ClassifyOptions } from "../../src/classifier/index.js";
import type { TriageSettings } from "../../src/types/index.js";

export const REFERENCE = new Date("2026-02-10T12:00:00Z");

export function testSettings(overrides: Partial<TriageSettings> = {}): TriageSettings {
  return {
    maxBodyChars: 2000,
    defaultTimezone: "UTC-8",
    defaultConfidence: 0.5,
    fallbackConfidence: 0,
    fallbackCategory: "other",
    fallbackActionKey: "OTHER",
    gatewayTimeoutMs: 200,
    modelVersion: "local:test-model",
    fallbackModelVersion: "fallback",
    promptVersion: "triage-test",
    verifyOutput: true,
    ...overrides,
  };
}

export interface FakeGateway extends ClassificationGateway {
  calls: Array<{ request: ClassificationRequest; signal: AbortSignal }>;
}

export function fakeGateway(
  answer: (request: ClassificationRequest, options: ClassifyOptions) => Promise<unknown>
): FakeGateway {
  const calls: FakeGateway["calls"] = [];
  return {
    name: "fake",
    modelVersion: "local:test-model",
    calls,
    classify(request, options) {
      calls.push({ request, signal: options.signal });
      return answer(request, options);
    },
  };
}

export function answering(candidate: unknown): FakeGateway {
  return fakeGateway(async () => candidate);
}

export function hanging(): FakeGateway {
  return fakeGateway(() => new Promise<never>(() => undefined));
}

export const SCHEDULE_CANDIDATE = {
  major_category: "schedule_and_time",
  sub_action_key: "SCHEDULE_PROPOSE_TIME",
  explicit_task: true,
  confidence: 0.82,
  suggested_reply_action: ["Confirm the slot", "Propose another time"],
  task_proposal: {
    type: "meeting",
    title: "Confirm budget sync",
    description: "Reply with availability",
    priority: "high",
    scheduled_for: "2026-02-12",
    due_at: null,
    waiting_on: null,
  },
  recommended_actions: [
    { key: "accept", label: "Accept", kind: "PRIMARY", rank: 1 },
    { key: "decline", label: "Decline", kind: "DANGER", rank: 2 },
  ],
  urgency_signals: {
    urgency: "high",
    deadline_detected: true,
    deadline_text: null,
    reply_by: "tomorrow 3pm",
    reason: "Meeting is tomorrow",
  },
  extracted_summary: {
    ask: "Confirm the meeting time",
    success_criteria: "A confirmed slot",
    missing_info: [],
  },
  entities: {
    people: [{ email: "bob@example.com", role: "attendee" }],
    dates: [{ text: "tomorrow 3pm", iso: null, type: "meeting_time" }],
    money: [],
    docs: [],
    meeting: null,
  },
  evidence: ["Can we meet tomorrow at 3pm?"],
};
