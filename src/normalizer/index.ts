import { componentLogger } from "../config/logger.js";
import { isKnownSubActionKey, OTHER_ACTION_KEY } from "../classifier/taxonomy.js";
import { truncateText } from "../parser/index.js";
import {
  ACTION_KINDS,
  DATE_TYPES,
  MAJOR_CATEGORIES,
  PRIORITY_LEVELS,
  type DateRef,
  type DebugFlag,
  type DocRef,
  type Entities,
  type MajorCategory,
  type MeetingRef,
  type MoneyRef,
  type NormalizedMessage,
  type PersonRef,
  type RecommendedAction,
  type SignalsBundle,
  type TaskProposal,
  type TriageOutput,
  type TriageSettings,
  type UrgencySignals,
} from "../types/index.js";
import {
  asArray,
  asBoolean,
  asEnum,
  asNumber,
  asRecord,
  asStringList,
  asText,
  clamp01,
  isRecord,
  toUpperSnake,
} from "./coerce.js";
import { formatResolved, isValidZone, resolveDateText, type ResolvedTime } from "./deadline.js";
import { triageOutputSchema } from "./schema.js";

export { triageOutputSchema } from "./schema.js";
export { resolveDateText, resolvePhrase, resolveIso, formatResolved } from "./deadline.js";

const log = componentLogger("normalizer");

export const MAX_REPLY_ACTIONS = 3;
export const MAX_RECOMMENDED_ACTIONS = 4;
export const MAX_EVIDENCE = 3;
export const MAX_EVIDENCE_CHARS = 240;
export const MAX_MISSING_INFO = 3;

export interface NormalizeContext {
  referenceTimestamp: Date;
  generatedAt?: Date;
  fallback?: boolean;
}

export class NormalizationInvariantError extends Error {
  constructor(readonly issues: string[]) {
    super(`Normalized output violates the response contract: ${issues.join("; ")}`);
    this.name = "NormalizationInvariantError";
  }
}

type MessageView = Pick<NormalizedMessage, "sender" | "subject">;

export interface Normalizer {
  normalizeTriage(
    candidate: unknown,
    message: MessageView,
    signals: SignalsBundle,
    context: NormalizeContext
  ): TriageOutput;
  buildFallbackTriage(message: MessageView, signals: SignalsBundle, context: NormalizeContext): TriageOutput;
}

// --- scalar rules ---

function normalizeConfidence(value: unknown, fallback: number): number {
  const number = asNumber(value);
  return number === null ? fallback : clamp01(number);
}

function normalizeCategory(value: unknown): MajorCategory {
  return asEnum(value, MAJOR_CATEGORIES, "other");
}

function normalizeSubActionKey(value: unknown): string {
  const text = asText(value);
  if (text === null) return OTHER_ACTION_KEY;
  const key = toUpperSnake(text);
  return isKnownSubActionKey(key) ? key : OTHER_ACTION_KEY;
}

const upper = (raw: string) => raw.toUpperCase();

// --- lists ---

function normalizeActions(value: unknown): RecommendedAction[] {
  const seen = new Set<string>();
  const ranked: Array<{ action: Omit<RecommendedAction, "rank">; rank: number | null; order: number }> = [];

  asArray(value).forEach((item, order) => {
    const raw = asRecord(item);
    const key = asText(raw.key);
    if (key === null || seen.has(key)) return;
    seen.add(key);
    const rank = asNumber(raw.rank);
    ranked.push({
      action: {
        key,
        label: asText(raw.label) ?? "",
        kind: asEnum(raw.kind, ACTION_KINDS, "SECONDARY", upper),
      },
      rank: rank !== null && Number.isFinite(rank) ? rank : null,
      order,
    });
  });

  ranked.sort((a, b) => {
    if (a.rank === null || b.rank === null) {
      if (a.rank === b.rank) return a.order - b.order;
      return a.rank === null ? 1 : -1;
    }
    return a.rank - b.rank || a.order - b.order;
  });

  return ranked
    .slice(0, MAX_RECOMMENDED_ACTIONS)
    .map((entry, i) => ({ ...entry.action, rank: i + 1 }));
}

function normalizeEvidence(value: unknown): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const item of asArray(value)) {
    const text = asText(item);
    if (text === null) continue;
    const collapsed = truncateText(text.replace(/\s+/g, " "), MAX_EVIDENCE_CHARS).text.trimEnd();
    const key = collapsed.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(collapsed);
    if (out.length >= MAX_EVIDENCE) break;
  }
  return out;
}

// --- entities ---

function normalizePeople(value: unknown, sender: MessageView["sender"]): PersonRef[] {
  const people: PersonRef[] = [];
  const seen = new Set<string>();
  for (const item of asArray(value)) {
    const raw = asRecord(item);
    const email = asText(raw.email);
    if (email === null || seen.has(email.toLowerCase())) continue;
    seen.add(email.toLowerCase());
    people.push({ email, role: asText(raw.role) ?? "" });
  }

  if (sender) {
    const existing = people.find((p) => p.email.toLowerCase() === sender.email.toLowerCase());
    if (existing) {
      existing.role = "sender";
    } else {
      people.unshift({ email: sender.email, role: "sender" });
    }
  }
  return people;
}

function normalizeMoney(value: unknown): MoneyRef[] {
  const money: MoneyRef[] = [];
  for (const item of asArray(value)) {
    const raw = asRecord(item);
    const text = asText(raw.text);
    if (text === null) continue;
    const amount = asNumber(raw.amount);
    money.push({
      text,
      amount: amount !== null && Number.isFinite(amount) ? amount : null,
      currency: asText(raw.currency),
    });
  }
  return money;
}

function normalizeDocs(value: unknown): DocRef[] {
  const docs: DocRef[] = [];
  for (const item of asArray(value)) {
    const raw = asRecord(item);
    const doc = { title: asText(raw.title), url: asText(raw.url), type: asText(raw.type) };
    if (doc.title === null && doc.url === null && doc.type === null) continue;
    docs.push(doc);
  }
  return docs;
}

function subjectToTopic(subject: string): string {
  let topic = subject.trim();
  for (;;) {
    const stripped = topic.replace(/^\s*(?:re|fwd?)\s*:\s*/i, "");
    if (stripped === topic) break;
    topic = stripped;
  }
  return topic.trim();
}

/**
 * Stateless rules that turn an untrusted classification candidate into a
 * contract-conforming output. Time-dependent rules only read
 * `context.referenceTimestamp`.
 */
export function createNormalizer(settings: TriageSettings): Normalizer {
  const zone = settings.defaultTimezone;

  function resolve(text: string | null, reference: Date): ResolvedTime | null {
    return text === null ? null : resolveDateText(text, reference, zone);
  }

  function resolveToIso(text: string | null, reference: Date, dateOnly = false): string | null {
    const resolved = resolve(text, reference);
    return resolved ? formatResolved(resolved, dateOnly) : null;
  }

  function normalizeUrgency(
    value: unknown,
    signals: SignalsBundle,
    reference: Date
  ): UrgencySignals {
    const raw = asRecord(value);
    const candidateDetected = asBoolean(raw.deadline_detected);
    let deadlineText = asText(raw.deadline_text);
    let replyBy: string | null = null;

    const rawReplyBy = asText(raw.reply_by);
    if (rawReplyBy !== null) {
      replyBy = resolveToIso(rawReplyBy, reference);
      if (replyBy === null && deadlineText === null) deadlineText = rawReplyBy;
    }

    if (replyBy === null) {
      if (deadlineText === null && candidateDetected) {
        deadlineText =
          signals.timePhrases.find((p) => p.approximateType !== "recurring")?.rawText ?? null;
      }
      replyBy = resolveToIso(deadlineText, reference);
    }

    return {
      urgency: asEnum(raw.urgency, PRIORITY_LEVELS, "medium"),
      deadline_detected: candidateDetected || deadlineText !== null || replyBy !== null,
      deadline_text: deadlineText,
      reply_by: replyBy,
      reason: asText(raw.reason) ?? "",
    };
  }

  function normalizeTask(value: unknown, replyBy: string | null, reference: Date): TaskProposal | null {
    if (!isRecord(value)) return null;
    const dueAt = resolveToIso(asText(value.due_at), reference);
    return {
      type: asText(value.type),
      title: asText(value.title) ?? "",
      description: asText(value.description) ?? "",
      priority: asEnum(value.priority, PRIORITY_LEVELS, "medium"),
      status: "open",
      scheduled_for: resolveToIso(asText(value.scheduled_for), reference, true),
      due_at: dueAt ?? replyBy,
      waiting_on: asText(value.waiting_on),
    };
  }

  function normalizeDates(
    value: unknown,
    reference: Date
  ): { dates: DateRef[]; firstTimed: ResolvedTime | null } {
    const dates: DateRef[] = [];
    let firstTimed: ResolvedTime | null = null;

    for (const item of asArray(value)) {
      const raw = asRecord(item);
      const text = asText(raw.text);
      if (text === null) continue;
      // A candidate iso may be free text; it is kept only once it resolves
      const resolved = resolve(asText(raw.iso), reference) ?? resolve(text, reference);
      const iso = resolved ? formatResolved(resolved, true) : null;
      if (firstTimed === null && resolved?.hasTime) firstTimed = resolved;

      dates.push({ text, iso, type: asEnum(raw.type, DATE_TYPES, "other") });
    }
    return { dates, firstTimed };
  }

  function normalizeMeeting(
    value: unknown,
    wantsMeeting: boolean,
    subject: string,
    firstTimed: ResolvedTime | null,
    reference: Date
  ): MeetingRef | null {
    const raw = isRecord(value) ? value : null;
    if (raw === null && !wantsMeeting) return null;

    const start = resolve(asText(raw?.start_at), reference);
    const tz = asText(raw?.tz);
    const meeting: MeetingRef = {
      topic: asText(raw?.topic),
      start_at: start ? formatResolved(start) : null,
      tz: tz !== null && isValidZone(tz) ? tz : null,
    };
    if (!wantsMeeting) return meeting;

    meeting.topic ??= subjectToTopic(subject) || null;
    const timed = start ?? firstTimed;
    if (timed) {
      meeting.start_at ??= formatResolved(timed);
      meeting.tz ??= timed.zone;
    }
    return meeting;
  }

  function verify(output: TriageOutput): void {
    const result = triageOutputSchema.safeParse(output);
    if (result.success) return;
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    if (settings.verifyOutput) {
      throw new NormalizationInvariantError(issues);
    }
    log.error({ issues }, "Normalized output violates the response contract");
  }

  function normalizeTriage(
    candidate: unknown,
    message: MessageView,
    signals: SignalsBundle,
    context: NormalizeContext
  ): TriageOutput {
    const raw = asRecord(candidate);
    const reference = context.referenceTimestamp;

    const majorCategory = normalizeCategory(raw.major_category);
    const subActionKey = normalizeSubActionKey(raw.sub_action_key);
    const urgency = normalizeUrgency(raw.urgency_signals, signals, reference);

    const rawEntities = asRecord(raw.entities);
    const { dates, firstTimed } = normalizeDates(rawEntities.dates, reference);
    const wantsMeeting =
      majorCategory === "schedule_and_time" || subActionKey.startsWith("SCHEDULE_");
    const entities: Entities = {
      people: normalizePeople(rawEntities.people, message.sender),
      dates,
      money: normalizeMoney(rawEntities.money),
      docs: normalizeDocs(rawEntities.docs),
      meeting: normalizeMeeting(rawEntities.meeting, wantsMeeting, message.subject, firstTimed, reference),
    };

    const summary = asRecord(raw.extracted_summary);
    const evidence = normalizeEvidence(raw.evidence);

    const flags: DebugFlag[] = [];
    if (context.fallback) flags.push("classification_fallback");
    if (evidence.length === 0) flags.push("evidence_below_minimum");

    const output: TriageOutput = {
      major_category: majorCategory,
      sub_action_key: subActionKey,
      explicit_task: asBoolean(raw.explicit_task),
      confidence: normalizeConfidence(raw.confidence, settings.defaultConfidence),
      suggested_reply_action: asStringList(raw.suggested_reply_action, MAX_REPLY_ACTIONS),
      task_proposal: normalizeTask(raw.task_proposal, urgency.reply_by, reference),
      recommended_actions: normalizeActions(raw.recommended_actions),
      urgency_signals: urgency,
      extracted_summary: {
        ask: asText(summary.ask) ?? "",
        success_criteria: asText(summary.success_criteria) ?? "",
        missing_info: asStringList(summary.missing_info, MAX_MISSING_INFO),
      },
      entities,
      evidence,
      debug: {
        timestamp: (context.generatedAt ?? reference).toISOString(),
        model_version: context.fallback ? settings.fallbackModelVersion : settings.modelVersion,
        prompt_version: settings.promptVersion,
        flags,
      },
    };

    verify(output);
    return output;
  }

  function buildFallbackTriage(
    message: MessageView,
    signals: SignalsBundle,
    context: NormalizeContext
  ): TriageOutput {
    return normalizeTriage(
      {
        major_category: settings.fallbackCategory,
        sub_action_key: settings.fallbackActionKey,
        confidence: settings.fallbackConfidence,
      },
      message,
      signals,
      { ...context, fallback: true }
    );
  }

  return { normalizeTriage, buildFallbackTriage };
}
