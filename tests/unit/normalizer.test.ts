import { describe, it, expect } from "vitest";
import {
  createNormalizer,
  MAX_EVIDENCE_CHARS,
  triageOutputSchema,
} from "../../src/normalizer/index.js";
import type { SignalsBundle } from "../../src/types/index.js";
import { REFERENCE, SCHEDULE_CANDIDATE, testSettings } from "../helpers/fakes.js";

const normalizer = createNormalizer(testSettings());
const message = { sender: { name: "Jane Doe", email: "jane@example.com" }, subject: "Re: Budget sync" };
const noSignals: SignalsBundle = { urls: [], moneyMentions: [], timePhrases: [] };
const generatedAt = new Date("2026-02-10T12:00:05Z");
const context = { referenceTimestamp: REFERENCE, generatedAt };

function normalize(candidate: unknown, signals: SignalsBundle = noSignals) {
  return normalizer.normalizeTriage(candidate, message, signals, context);
}

describe("normalizeTriage", () => {
  it.each([
    [Number.NaN, 0.5],
    [-3, 0],
    [7, 1],
    ["0.8", 0.8],
    [undefined, 0.5],
    ["high", 0.5],
    [Number.POSITIVE_INFINITY, 1],
  ])("clamps confidence %s to %s", (value, expected) => {
    expect(normalize({ confidence: value }).confidence).toBe(expected);
  });

  it("substitutes the fallback for unknown taxonomy values", () => {
    const output = normalize({ major_category: "urgent_stuff", sub_action_key: "DO_STUFF" });
    expect(output.major_category).toBe("other");
    expect(output.sub_action_key).toBe("OTHER");
  });

  it("accepts taxonomy values in loose casing", () => {
    const output = normalize({ major_category: "Schedule_And_Time", sub_action_key: "schedule propose time" });
    expect(output.major_category).toBe("schedule_and_time");
    expect(output.sub_action_key).toBe("SCHEDULE_PROPOSE_TIME");
  });

  it("resolves a relative reply-by phrase in the default zone", () => {
    const output = normalize({ urgency_signals: { deadline_detected: true, reply_by: "tomorrow 3pm" } });
    expect(output.urgency_signals).toEqual({
      urgency: "medium",
      deadline_detected: true,
      deadline_text: null,
      reply_by: "2026-02-11T15:00:00-08:00",
      reason: "",
    });
  });

  it("resolves deadline text when no reply-by is given", () => {
    const output = normalize({ urgency_signals: { deadline_text: "tomorrow 3pm" } });
    expect(output.urgency_signals.reply_by).toBe("2026-02-11T15:00:00-08:00");
    expect(output.urgency_signals.deadline_text).toBe("tomorrow 3pm");
    expect(output.urgency_signals.deadline_detected).toBe(true);
  });

  it("keeps unparseable deadline text for display", () => {
    const output = normalize({ urgency_signals: { reply_by: "whenever works" } });
    expect(output.urgency_signals.reply_by).toBeNull();
    expect(output.urgency_signals.deadline_text).toBe("whenever works");
    expect(output.urgency_signals.deadline_detected).toBe(true);
  });

  it("takes the deadline from a corroborating time phrase", () => {
    const signals: SignalsBundle = {
      urls: [],
      moneyMentions: [],
      timePhrases: [
        { rawText: "every Monday", approximateType: "recurring" },
        { rawText: "tomorrow at 3pm", approximateType: "relative" },
      ],
    };
    const output = normalize({ urgency_signals: { deadline_detected: true } }, signals);
    expect(output.urgency_signals.deadline_text).toBe("tomorrow at 3pm");
    expect(output.urgency_signals.reply_by).toBe("2026-02-11T15:00:00-08:00");
  });

  it("always includes the sender as a person", () => {
    expect(normalize({}).entities.people).toEqual([{ email: "jane@example.com", role: "sender" }]);
    const output = normalize({
      entities: {
        people: [
          { email: "bob@example.com", role: "cc" },
          { email: "JANE@example.com", role: "requester" },
          { email: "bob@example.com", role: "duplicate" },
        ],
      },
    });
    expect(output.entities.people).toEqual([
      { email: "bob@example.com", role: "cc" },
      { email: "JANE@example.com", role: "sender" },
    ]);
  });

  it("does not merge signal money into entities", () => {
    const signals: SignalsBundle = {
      urls: [],
      moneyMentions: [{ rawText: "$20", currency: null, amount: 20 }],
      timePhrases: [],
    };
    expect(normalize({}, signals).entities.money).toEqual([]);
  });

  it("re-ranks recommended actions and caps them at four", () => {
    const output = normalize({
      recommended_actions: [
        { key: "a", label: "A", kind: "primary", rank: 3 },
        { key: "b", rank: 1 },
        { key: "c" },
        { key: "d", kind: "DANGER", rank: 1 },
        { key: "a", rank: 0 },
        { label: "no key", rank: 0 },
        { key: "e", rank: "2" },
      ],
    });
    expect(output.recommended_actions).toEqual([
      { key: "b", label: "", kind: "SECONDARY", rank: 1 },
      { key: "d", label: "", kind: "DANGER", rank: 2 },
      { key: "e", label: "", kind: "SECONDARY", rank: 3 },
      { key: "a", label: "A", kind: "PRIMARY", rank: 4 },
    ]);
  });

  it("bounds reply suggestions and evidence", () => {
    const long = "x".repeat(300);
    const output = normalize({
      suggested_reply_action: ["Yes", " ", "No", 5, "Maybe", "Later"],
      evidence: ["  quote   one ", "Quote one", long, "two", "three"],
    });
    expect(output.suggested_reply_action).toEqual(["Yes", "No", "Maybe"]);
    expect(output.evidence).toEqual(["quote one", "x".repeat(MAX_EVIDENCE_CHARS), "two"]);
    expect(output.debug.flags).toEqual([]);
  });

  it("flags missing evidence instead of fabricating it", () => {
    const output = normalize({});
    expect(output.evidence).toEqual([]);
    expect(output.debug.flags).toEqual(["evidence_below_minimum"]);
  });

  it("injects debug metadata from configuration", () => {
    const output = normalize({ debug: { model_version: "spoofed", prompt_version: "spoofed" } });
    expect(output.debug).toEqual({
      timestamp: "2026-02-10T12:00:05.000Z",
      model_version: "local:test-model",
      prompt_version: "triage-test",
      flags: ["evidence_below_minimum"],
    });
  });

  it("fills task and meeting details from resolved dates", () => {
    const output = normalize(SCHEDULE_CANDIDATE);
    expect(output.task_proposal).toEqual({
      type: "meeting",
      title: "Confirm budget sync",
      description: "Reply with availability",
      priority: "high",
      status: "open",
      scheduled_for: "2026-02-12",
      due_at: "2026-02-11T15:00:00-08:00",
      waiting_on: null,
    });
    expect(output.entities.dates).toEqual([
      { text: "tomorrow 3pm", iso: "2026-02-11T15:00:00-08:00", type: "meeting_time" },
    ]);
    expect(output.entities.meeting).toEqual({
      topic: "Budget sync",
      start_at: "2026-02-11T15:00:00-08:00",
      tz: "UTC-8",
    });
  });

  it("resolves free-text candidate dates and drops ones that do not resolve", () => {
    const output = normalize({
      major_category: "schedule_and_time",
      entities: {
        dates: [
          { text: "the call", iso: "tomorrow 3pm", type: "meeting_time" },
          { text: "whenever works", iso: "whenever works", type: "other" },
        ],
        meeting: { start_at: "friday at 10am", tz: "Mars/Olympus" },
      },
    });
    expect(output.entities.dates).toEqual([
      { text: "the call", iso: "2026-02-11T15:00:00-08:00", type: "meeting_time" },
      { text: "whenever works", iso: null, type: "other" },
    ]);
    expect(output.entities.meeting).toEqual({
      topic: "Budget sync",
      start_at: "2026-02-13T10:00:00-08:00",
      tz: "UTC-8",
    });
    expect(normalize(output).entities).toEqual(output.entities);
  });

  it("keeps deadline text when the phrase resolves past year 9999", () => {
    const output = normalize({
      urgency_signals: { deadline_text: "in 9000 years" },
      task_proposal: { title: "Archive", due_at: "in 9000 years" },
    });
    expect(output.urgency_signals.deadline_text).toBe("in 9000 years");
    expect(output.urgency_signals.reply_by).toBeNull();
    expect(output.urgency_signals.deadline_detected).toBe(true);
    expect(output.task_proposal?.due_at).toBeNull();
  });

  it("leaves the meeting empty outside scheduling", () => {
    expect(normalize({ major_category: "financial_and_admin" }).entities.meeting).toBeNull();
  });

  it.each([["garbage"], [null], [[1, 2, 3]], [{ entities: "none", evidence: { a: 1 } }]])(
    "produces a valid output for malformed candidate %j",
    (candidate) => {
      const output = normalize(candidate);
      expect(triageOutputSchema.safeParse(output).success).toBe(true);
      expect(output.major_category).toBe("other");
      expect(output.confidence).toBe(0.5);
    }
  );

  it("is idempotent", () => {
    const first = normalize(SCHEDULE_CANDIDATE);
    const second = normalize(first);
    expect(second).toEqual(first);
  });

  it("omits the sender entity when the message has none", () => {
    const output = normalizer.normalizeTriage({}, { sender: null, subject: "" }, noSignals, context);
    expect(output.entities.people).toEqual([]);
  });
});

describe("buildFallbackTriage", () => {
  it("builds the minimal low-confidence output", () => {
    const output = normalizer.buildFallbackTriage(message, noSignals, context);
    expect(output.major_category).toBe("other");
    expect(output.sub_action_key).toBe("OTHER");
    expect(output.confidence).toBe(0);
    expect(output.recommended_actions).toEqual([]);
    expect(output.task_proposal).toBeNull();
    expect(output.entities.people).toEqual([{ email: "jane@example.com", role: "sender" }]);
    expect(output.debug.model_version).toBe("fallback");
    expect(output.debug.flags).toEqual(["classification_fallback", "evidence_below_minimum"]);
  });
});

describe("triageOutputSchema", () => {
  it("rejects ranks that skip", () => {
    const output = normalize({ recommended_actions: [{ key: "a", rank: 1 }] });
    const tampered = { ...output, recommended_actions: [{ ...output.recommended_actions[0], rank: 2 }] };
    expect(triageOutputSchema.safeParse(tampered).success).toBe(false);
  });
});
