import { z } from "zod";
import { ACTION_KINDS, DATE_TYPES, MAJOR_CATEGORIES, PRIORITY_LEVELS } from "../types/index.js";

// Structured-output schemas need every key present, so absent values are nullable rather than optional.

const priority = z.enum(PRIORITY_LEVELS);

export const triageCandidateSchema = z.object({
  major_category: z.enum(MAJOR_CATEGORIES),
  sub_action_key: z.string(),
  explicit_task: z.boolean(),
  confidence: z.number(),
  suggested_reply_action: z.array(z.string()),
  task_proposal: z
    .object({
      type: z.string().nullable(),
      title: z.string(),
      description: z.string(),
      priority,
      status: z.literal("open"),
      scheduled_for: z.string().nullable(),
      due_at: z.string().nullable(),
      waiting_on: z.string().nullable(),
    })
    .nullable(),
  recommended_actions: z.array(
    z.object({
      key: z.string(),
      label: z.string(),
      kind: z.enum(ACTION_KINDS),
      rank: z.number().int(),
    })
  ),
  urgency_signals: z.object({
    urgency: priority,
    deadline_detected: z.boolean(),
    deadline_text: z.string().nullable(),
    reply_by: z.string().nullable(),
    reason: z.string(),
  }),
  extracted_summary: z.object({
    ask: z.string(),
    success_criteria: z.string(),
    missing_info: z.array(z.string()),
  }),
  entities: z.object({
    people: z.array(z.object({ email: z.string(), role: z.string() })),
    dates: z.array(
      z.object({ text: z.string(), iso: z.string().nullable(), type: z.enum(DATE_TYPES) })
    ),
    money: z.array(
      z.object({
        text: z.string(),
        amount: z.number().nullable(),
        currency: z.string().nullable(),
      })
    ),
    docs: z.array(
      z.object({
        title: z.string().nullable(),
        url: z.string().nullable(),
        type: z.string().nullable(),
      })
    ),
    meeting: z
      .object({
        topic: z.string().nullable(),
        start_at: z.string().nullable(),
        tz: z.string().nullable(),
      })
      .nullable(),
  }),
  evidence: z.array(z.string()),
});
