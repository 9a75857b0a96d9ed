import { describe, it, expect } from "vitest";
import {
  BodyDecodeError,
  decodeBase64Url,
  decodeBodyBytes,
  decodeBytes,
  decodeQuotedPrintable,
  normalizeCharset,
} from "../../src/parser/body.js";

describe("decodeBase64Url", () => {
  it("decodes url-safe base64 with or without padding", () => {
    expect(decodeBase64Url("aGVsbG8").toString("utf8")).toBe("hello");
    expect(decodeBase64Url("aGVsbG8=").toString("utf8")).toBe("hello");
    expect(decodeBase64Url("_-8").equals(Buffer.from([0xff, 0xef]))).toBe(true);
  });

  it("rejects incomplete padding", () => {
    expect(() => decodeBase64Url("aGVsbA=")).toThrow(BodyDecodeError);
  });

  it("rejects characters outside the url-safe alphabet", () => {
    expect(() => decodeBase64Url("ab+/")).toThrow("Invalid base64url alphabet");
  });

  it("rejects a dangling single character group", () => {
    expect(() => decodeBase64Url("abcde")).toThrow("Invalid base64url length");
  });
});

describe("decodeQuotedPrintable", () => {
  it("decodes escapes and removes soft line breaks", () => {
    expect(decodeQuotedPrintable("caf=C3=A9 =\r\nbar").toString("utf8")).toBe("café bar");
  });

  it("keeps malformed escapes as literal text", () => {
    expect(decodeQuotedPrintable("100=ZZ").toString("utf8")).toBe("100=ZZ");
  });

  it("carries unicode text through as UTF-8", () => {
    expect(decodeQuotedPrintable("naïve =C3=A9").toString("utf8")).toBe("naïve é");
  });
});

describe("decodeBodyBytes", () => {
  it("defaults to base64url", () => {
    expect(decodeBodyBytes("aGk", undefined)).toEqual({ bytes: Buffer.from("hi"), lossy: false });
  });

  it("passes 7bit text through and marks already-decoded unicode", () => {
    const decoded = decodeBodyBytes("naïve", "7bit");
    expect(decoded.charset).toBe("utf8");
    expect(decoded.bytes.toString("utf8")).toBe("naïve");
  });

  it("flags unknown transfer encodings as lossy", () => {
    const decoded = decodeBodyBytes("plain text", "x-uuencode");
    expect(decoded.lossy).toBe(true);
    expect(decoded.bytes.toString("latin1")).toBe("plain text");
  });
});

describe("charsets", () => {
  it("normalizes labels", () => {
    expect(normalizeCharset(' "UTF-8" ')).toBe("utf-8");
    expect(normalizeCharset("utf-8*en")).toBe("utf-8");
    expect(normalizeCharset("")).toBeUndefined();
  });

  it("decodes with the declared charset", () => {
    expect(decodeBytes(Buffer.from([0x43, 0x61, 0x66, 0xe9]), "iso-8859-1")).toBe("Café");
  });

  it("falls back to utf-8 with replacement characters", () => {
    expect(decodeBytes(Buffer.from([0x6f, 0x6b, 0xff]), "x-unknown")).toBe("ok\ufffd");
  });
});
