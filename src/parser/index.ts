import { DateTime } from "luxon";
import type { NormalizedMessage, RawMessage } from "../types/index.js";
import { decodeEncodedWords, parseAddressList, toHeaderMap } from "./headers.js";
import { htmlToText } from "./html.js";
import { collectContent, toPartNode, type TextSegment } from "./part-tree.js";

export { rawMessageSchema, rawPartSchema } from "./schema.js";
export { htmlToText } from "./html.js";
export { decodeEncodedWords, parseAddressList } from "./headers.js";

export interface DecodeOptions {
  maxBodyChars: number;
}

const HEADERS_OF_INTEREST = [
  "from",
  "to",
  "cc",
  "subject",
  "date",
  "reply-to",
  "message-id",
  "in-reply-to",
  "references",
  "list-unsubscribe",
] as const;

/**
 * Cut `text` to at most `maxChars` UTF-16 units without splitting a
 * surrogate pair.
 */
export function truncateText(text: string, maxChars: number): { text: string; truncated: boolean } {
  if (text.length <= maxChars) return { text, truncated: false };
  let cut = Math.max(0, maxChars);
  const last = text.charCodeAt(cut - 1);
  if (cut > 0 && last >= 0xd800 && last <= 0xdbff) cut -= 1;
  return { text: text.slice(0, cut), truncated: true };
}

export function parseMessageDate(value: string | undefined): Date | null {
  if (!value) return null;
  let parsed = DateTime.fromRFC2822(value);
  if (!parsed.isValid) parsed = DateTime.fromISO(value, { setZone: true });
  return parsed.isValid ? parsed.toJSDate() : null;
}

export function parseInternalDate(value: string | null | undefined): Date | null {
  if (!value || !/^\d+$/.test(value.trim())) return null;
  const date = new Date(Number(value.trim()));
  return Number.isNaN(date.getTime()) ? null : date;
}

function renderSegment(segment: TextSegment): string {
  return segment.kind === "html"
    ? htmlToText(segment.text)
    : segment.text.replace(/\r\n?/g, "\n").trim();
}

function uniqueEmails(lists: string[][]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const email of lists.flat()) {
    const key = email.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(email);
  }
  return out;
}

/**
 * Normalize a provider message: decode the MIME tree into a single text
 * body, parse addressing headers and dates, and collect attachment metadata.
 */
export function decodeMessage(raw: RawMessage, options: DecodeOptions): NormalizedMessage {
  const headers = toHeaderMap(raw.payload.headers);
  const content = collectContent(toPartNode(raw.payload));

  const body = content.segments
    .map(renderSegment)
    .filter((text) => text.length > 0)
    .join("\n\n");
  const { text: bodyText, truncated } = truncateText(body, options.maxBodyChars);

  const to = parseAddressList(headers.get("to")).map((a) => a.email);
  const cc = parseAddressList(headers.get("cc")).map((a) => a.email);

  const interesting: Record<string, string> = {};
  for (const name of HEADERS_OF_INTEREST) {
    const value = headers.get(name);
    if (value !== undefined) interesting[name] = value;
  }

  return {
    ...emptyMessage(raw),
    subject: decodeEncodedWords(headers.get("subject") ?? "").trim(),
    sender: parseAddressList(headers.get("from"))[0] ?? null,
    to,
    cc,
    recipients: uniqueEmails([to, cc]),
    sentAt: parseMessageDate(headers.get("date")),
    bodyText,
    bodyTruncated: truncated,
    bodyHtmlPresent: content.htmlPresent,
    attachments: content.attachments,
    headers: interesting,
  };
}

/** A message carrying only the provider identifiers, with no body. */
export function emptyMessage(raw: RawMessage): NormalizedMessage {
  return {
    provider: raw.provider || "gmail",
    messageId: raw.id,
    threadId: raw.threadId ?? null,
    labelIds: raw.labelIds ?? [],
    subject: "",
    sender: null,
    to: [],
    cc: [],
    recipients: [],
    sentAt: null,
    internalDate: parseInternalDate(raw.internalDate),
    snippet: raw.snippet ?? "",
    bodyText: "",
    bodyTruncated: false,
    bodyHtmlPresent: false,
    attachments: [],
    headers: {},
  };
}
