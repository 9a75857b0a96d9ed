import { z } from "zod";
import {
  ACTION_KINDS,
  DATE_TYPES,
  MAJOR_CATEGORIES,
  PRIORITY_LEVELS,
  type TriageOutput,
} from "../types/index.js";

const isoWithOffset = z.string().datetime({ offset: true });

const taskProposalSchema = z
  .object({
    type: z.string().min(1).nullable(),
    title: z.string(),
    description: z.string(),
    priority: z.enum(PRIORITY_LEVELS),
    status: z.literal("open"),
    scheduled_for: z.string().nullable(),
    due_at: isoWithOffset.nullable(),
    waiting_on: z.string().nullable(),
  })
  .strict();

const recommendedActionSchema = z
  .object({
    key: z.string().min(1),
    label: z.string(),
    kind: z.enum(ACTION_KINDS),
    rank: z.number().int().min(1),
  })
  .strict();

const entitiesSchema = z
  .object({
    people: z.array(z.object({ email: z.string().min(1), role: z.string() }).strict()),
    dates: z.array(
      z
        .object({ text: z.string(), iso: z.string().nullable(), type: z.enum(DATE_TYPES) })
        .strict()
    ),
    money: z.array(
      z
        .object({
          text: z.string(),
          amount: z.number().finite().nullable(),
          currency: z.string().nullable(),
        })
        .strict()
    ),
    docs: z.array(
      z
        .object({
          title: z.string().nullable(),
          url: z.string().nullable(),
          type: z.string().nullable(),
        })
        .strict()
    ),
    meeting: z
      .object({
        topic: z.string().nullable(),
        start_at: z.string().nullable(),
        tz: z.string().nullable(),
      })
      .strict()
      .nullable(),
  })
  .strict();

/** The response contract. Every normalized output must satisfy it. */
export const triageOutputSchema = z
  .object({
    major_category: z.enum(MAJOR_CATEGORIES),
    sub_action_key: z.string().min(1),
    explicit_task: z.boolean(),
    confidence: z.number().min(0).max(1),
    suggested_reply_action: z.array(z.string().min(1)).max(3),
    task_proposal: taskProposalSchema.nullable(),
    recommended_actions: z
      .array(recommendedActionSchema)
      .max(4)
      .refine((actions) => actions.every((action, i) => action.rank === i + 1), {
        message: "ranks must run 1..n in order",
      }),
    urgency_signals: z
      .object({
        urgency: z.enum(PRIORITY_LEVELS),
        deadline_detected: z.boolean(),
        deadline_text: z.string().nullable(),
        reply_by: isoWithOffset.nullable(),
        reason: z.string(),
      })
      .strict(),
    extracted_summary: z
      .object({
        ask: z.string(),
        success_criteria: z.string(),
        missing_info: z.array(z.string()).max(3),
      })
      .strict(),
    entities: entitiesSchema,
    evidence: z.array(z.string().min(1).max(240)).max(3),
    debug: z
      .object({
        timestamp: isoWithOffset,
        model_version: z.string().min(1),
        prompt_version: z.string().min(1),
        flags: z.array(z.enum(["classification_fallback", "evidence_below_minimum"])),
      })
      .strict(),
  })
  .strict() satisfies z.ZodType<TriageOutput>;
