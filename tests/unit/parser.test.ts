import { describe, it, expect } from "vitest";
import {
  decodeMessage,
  emptyMessage,
  parseInternalDate,
  parseMessageDate,
  rawMessageSchema,
  truncateText,
} from "../../src/parser/index.js";
import {
  attachmentPart,
  buildMessage,
  multipart,
  plainMessage,
  textPart,
} from "../helpers/messages.js";
import type { RawMessage, RawPart } from "../../src/types/index.js";

const options = { maxBodyChars: 2000 };

function nestedMessage(depth: number): RawMessage {
  let part: RawPart = textPart("text/plain", "deep body");
  for (let i = 0; i < depth; i++) part = multipart("mixed", [part]);
  return buildMessage(part);
}

describe("decodeMessage", () => {
  it("selects the plain-text alternative verbatim", () => {
    const raw = buildMessage(
      multipart("alternative", [
        textPart("text/plain", "Plain body\r\nsecond line"),
        textPart("text/html", "<p>Html body</p>"),
      ])
    );
    const message = decodeMessage(raw, options);
    expect(message.bodyText).toBe("Plain body\nsecond line");
    expect(message.bodyHtmlPresent).toBe(true);
  });

  it("reduces an html-only body to text", () => {
    const message = decodeMessage(buildMessage(textPart("text/html", "<p>Hi</p><p>There</p>")), options);
    expect(message.bodyText).toBe("Hi\nThere");
  });

  it("falls back to the html alternative when no plain text is offered", () => {
    const raw = buildMessage(
      multipart("alternative", [textPart("text/html", "<p>Only html</p>"), textPart("text/plain", "   ")])
    );
    expect(decodeMessage(raw, options).bodyText).toBe("Only html");
  });

  it("concatenates mixed parts and records attachments", () => {
    const raw = buildMessage(
      multipart("mixed", [
        multipart("alternative", [textPart("text/plain", "First"), textPart("text/html", "<p>First</p>")]),
        attachmentPart("report.pdf", "application/pdf", "att-1", 2048),
        textPart("text/plain", "Second"),
      ])
    );
    const message = decodeMessage(raw, options);
    expect(message.bodyText).toBe("First\n\nSecond");
    expect(message.attachments).toEqual([
      { filename: "report.pdf", mimeType: "application/pdf", size: 2048, attachmentId: "att-1" },
    ]);
  });

  it("reads an RFC 2231 attachment filename", () => {
    const raw = buildMessage(
      multipart("mixed", [
        textPart("text/plain", "CV attached"),
        {
          mimeType: "application/pdf",
          headers: [{ name: "Content-Disposition", value: "attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf" }],
          body: { size: 512, attachmentId: "att-2" },
        },
      ])
    );
    expect(decodeMessage(raw, options).attachments).toEqual([
      { filename: "r\u00e9sum\u00e9.pdf", mimeType: "application/pdf", size: 512, attachmentId: "att-2" },
    ]);
  });

  it("decodes a tree thousands of levels deep", () => {
    expect(decodeMessage(nestedMessage(5000), options).bodyText).toBe("deep body");
  });

  it("yields an empty body for a leaf with invalid base64url padding", () => {
    const raw = buildMessage({ mimeType: "text/plain", headers: [], body: { size: 4, data: "aGVsbA=" } });
    expect(decodeMessage(raw, options).bodyText).toBe("");
  });

  it("keeps the readable leaves when another leaf is corrupt", () => {
    const raw = buildMessage(
      multipart("mixed", [
        { mimeType: "text/plain", headers: [], body: { size: 4, data: "aGVsbA=" } },
        textPart("text/plain", "Still here"),
      ])
    );
    expect(decodeMessage(raw, options).bodyText).toBe("Still here");
  });

  it("uses the declared charset", () => {
    const raw = buildMessage(textPart("text/plain", "Café", { charset: "iso-8859-1" }));
    expect(decodeMessage(raw, options).bodyText).toBe("Café");
  });

  it("parses addressing headers and dates", () => {
    const raw = plainMessage("Body", {
      headers: [
        { name: "From", value: '"Jane Doe" <jane@example.com>' },
        { name: "To", value: "a@example.com, B@example.com" },
        { name: "Cc", value: "b@example.com, c@example.com" },
        { name: "Subject", value: "=?UTF-8?Q?Budget_r=C3=A9view?=" },
        { name: "Date", value: "Tue, 10 Feb 2026 12:00:00 +0000" },
      ],
    });
    const message = decodeMessage(raw, options);
    expect(message.subject).toBe("Budget réview");
    expect(message.sender).toEqual({ name: "Jane Doe", email: "jane@example.com" });
    expect(message.to).toEqual(["a@example.com", "B@example.com"]);
    expect(message.recipients).toEqual(["a@example.com", "B@example.com", "c@example.com"]);
    expect(message.sentAt?.toISOString()).toBe("2026-02-10T12:00:00.000Z");
    expect(message.internalDate?.toISOString()).toBe("2026-02-10T12:00:00.000Z");
    expect(message.headers.subject).toBe("=?UTF-8?Q?Budget_r=C3=A9view?=");
  });

  it("caps the body without splitting a surrogate pair", () => {
    const raw = plainMessage("ab\u{1F600}cd");
    const message = decodeMessage(raw, { maxBodyChars: 3 });
    expect(message.bodyText).toBe("ab");
    expect(message.bodyTruncated).toBe(true);
  });
});

describe("truncateText", () => {
  it("leaves short text alone", () => {
    expect(truncateText("short", 10)).toEqual({ text: "short", truncated: false });
  });

  it("keeps a complete pair that ends at the boundary", () => {
    expect(truncateText("ab\u{1F600}cd", 4)).toEqual({ text: "ab\u{1F600}", truncated: true });
  });
});

describe("dates", () => {
  it("reads RFC 2822 and ISO dates", () => {
    expect(parseMessageDate("Tue, 10 Feb 2026 07:00:00 -0500")?.toISOString()).toBe("2026-02-10T12:00:00.000Z");
    expect(parseMessageDate("2026-02-10T12:00:00Z")?.toISOString()).toBe("2026-02-10T12:00:00.000Z");
    expect(parseMessageDate("not a date")).toBeNull();
  });

  it("reads epoch milliseconds only", () => {
    expect(parseInternalDate("0")?.toISOString()).toBe("1970-01-01T00:00:00.000Z");
    expect(parseInternalDate("12abc")).toBeNull();
    expect(parseInternalDate(null)).toBeNull();
  });
});

describe("emptyMessage", () => {
  it("keeps provider identifiers", () => {
    const message = emptyMessage(plainMessage("ignored", { id: "abc" }));
    expect(message.provider).toBe("gmail");
    expect(message.messageId).toBe("abc");
    expect(message.threadId).toBe("thread-1");
    expect(message.bodyText).toBe("");
  });
});

describe("rawMessageSchema", () => {
  it("accepts nested parts and rejects a missing id", () => {
    const raw = buildMessage(multipart("mixed", [multipart("alternative", [textPart("text/plain", "x")])]));
    expect(rawMessageSchema.safeParse(raw).success).toBe(true);
    expect(rawMessageSchema.safeParse({ ...raw, id: "" }).success).toBe(false);
  });

  it("accepts a tree thousands of levels deep", () => {
    const parsed = rawMessageSchema.safeParse(nestedMessage(5000));
    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(decodeMessage(parsed.data, options).bodyText).toBe("deep body");
    }
  });

  it("reports the path of an invalid nested part", () => {
    const parsed = rawMessageSchema.safeParse({
      id: "msg-1",
      payload: {
        mimeType: "multipart/mixed",
        parts: [textPart("text/plain", "ok"), { mimeType: "multipart/alternative", parts: [{ headers: [] }] }],
      },
    });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues).toEqual([
        expect.objectContaining({
          path: ["payload", "parts", 1, "parts", 0, "mimeType"],
          message: "Required",
        }),
      ]);
    }
  });
});
