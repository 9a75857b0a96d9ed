import { z } from "zod";
import type { RawPart } from "../types/index.js";

const rawHeaderSchema = z.object({
  name: z.string(),
  value: z.string(),
});

const rawPartBodySchema = z.object({
  size: z.number().nullish(),
  data: z.string().nullish(),
  attachmentId: z.string().nullish(),
  encoding: z.string().nullish(),
});

const partNodeSchema = z.object({
  partId: z.string().nullish(),
  mimeType: z.string(),
  filename: z.string().nullish(),
  headers: z.array(rawHeaderSchema).nullish(),
  body: rawPartBodySchema.nullish(),
  parts: z.array(z.unknown()).nullish(),
});

interface PendingPart {
  value: unknown;
  index: number;
  up: PendingPart | null;
  siblings: RawPart[] | null;
}

function pathOf(pending: PendingPart): (string | number)[] {
  const path: (string | number)[] = [];
  for (let node: PendingPart | null = pending; node?.up; node = node.up) {
    path.unshift("parts", node.index);
  }
  return path;
}

/**
 * Validate a part tree one node at a time from an explicit stack, so
 * nesting depth is bounded by memory rather than the call stack.
 */
function parsePartTree(input: unknown, ctx: z.RefinementCtx): RawPart {
  let root: RawPart | undefined;
  const stack: PendingPart[] = [{ value: input, index: 0, up: null, siblings: null }];

  for (let pending = stack.pop(); pending; pending = stack.pop()) {
    const result = partNodeSchema.safeParse(pending.value);
    if (!result.success) {
      const path = pathOf(pending);
      for (const issue of result.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [...path, ...issue.path],
          message: issue.message,
        });
      }
      continue;
    }

    const { parts, ...fields } = result.data;
    const children: RawPart[] = [];
    const part: RawPart = { ...fields, parts: parts ? children : parts };
    if (pending.siblings) pending.siblings.push(part);
    else root = part;

    for (let i = (parts?.length ?? 0) - 1; i >= 0; i--) {
      stack.push({ value: parts?.[i], index: i, up: pending, siblings: children });
    }
  }

  return root ?? z.NEVER;
}

export const rawPartSchema: z.ZodType<RawPart, z.ZodTypeDef, unknown> = z
  .unknown()
  .transform(parsePartTree);

/** Gmail `Message` resource as accepted at the HTTP and queue boundaries. */
export const rawMessageSchema = z.object({
  provider: z.string().nullish(),
  id: z.string().min(1),
  threadId: z.string().nullish(),
  labelIds: z.array(z.string()).nullish(),
  snippet: z.string().nullish(),
  historyId: z.string().nullish(),
  internalDate: z.string().nullish(),
  sizeEstimate: z.number().nullish(),
  payload: rawPartSchema,
});
