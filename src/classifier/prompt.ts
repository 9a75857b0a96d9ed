import { MAJOR_CATEGORIES } from "../types/index.js";
import { OTHER_ACTION_KEY, SUB_ACTION_KEYS_BY_CATEGORY } from "./taxonomy.js";

const CATEGORY_DESCRIPTIONS: Record<(typeof MAJOR_CATEGORIES)[number], string> = {
  core_communication: "a person writes to you and expects a reply, acknowledgement or clarification",
  decisions_and_approvals: "you have to approve, reject, choose or grant permission",
  schedule_and_time: "coordinating a date or time: proposing, confirming or moving meetings and deadlines",
  documents_and_review: "the main action is reviewing, commenting on or editing a document",
  financial_and_admin: "invoices, payments, billing, subscriptions, receipts and admin records",
  people_and_process: "ownership, roles, handoffs and changes to how work gets done",
  information_and_org: "updates, announcements and status reports to read, usually without replying",
  learning_and_awareness: "articles, reports, webinars and courses to read or attend later",
  social_and_people: "introductions, networking, invitations and congratulations",
  meta_and_systems: "automated alerts, notifications and security messages",
  other: "nothing above fits",
};

function categoryGuide(): string {
  const lines = MAJOR_CATEGORIES.map((c) => `- ${c}: ${CATEGORY_DESCRIPTIONS[c]}.`);
  return [
    "Pick exactly one major_category:",
    ...lines,
    "When several fit, choose the one that describes the action blocking the recipient.",
  ].join("\n");
}

function subActionGuide(): string {
  const groups = MAJOR_CATEGORIES.filter((c) => SUB_ACTION_KEYS_BY_CATEGORY[c].length > 0).map(
    (c) => `${c}: ${SUB_ACTION_KEYS_BY_CATEGORY[c].join(", ")}`
  );
  return [
    "Pick exactly one sub_action_key in SCREAMING_SNAKE_CASE from the keys below.",
    ...groups,
    `Use ${OTHER_ACTION_KEY} when none of them fit.`,
  ].join("\n");
}

export const TRIAGE_SYSTEM_PROMPT = `You triage a single email for a busy professional.
The user message is a JSON object describing the email and a few signals detected in its body.
Answer with one JSON object that matches the provided schema exactly. No markdown, no extra keys.

${categoryGuide()}

${subActionGuide()}

Fields:
- explicit_task: true when the email implies concrete work beyond reading it.
- confidence: a calibrated probability between 0 and 1 for the classification.
- suggested_reply_action: up to 3 short quick-reply options; empty when no reply is needed.
- task_proposal: the trackable task implied by the email (type in snake_case, title, description,
  priority low|medium|high|critical, status "open", scheduled_for, due_at, waiting_on), or null.
- recommended_actions: 1 to 4 ranked UI actions {key, label, kind PRIMARY|SECONDARY|DANGER, rank from 1}.
- urgency_signals: urgency, deadline_detected, deadline_text as written in the email,
  reply_by as an ISO-8601 datetime with offset when it can be inferred, and a one-sentence reason.
- extracted_summary: ask, success_criteria and up to 3 missing_info items.
- entities: people {email, role}, dates {text, iso, type meeting_time|deadline|event_time|other},
  money {text, amount, currency}, docs {title, url, type} and meeting {topic, start_at, tz} or null.
- evidence: 1 to 3 short snippets copied verbatim from the email. Never invent evidence.`;
