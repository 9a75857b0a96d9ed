import iconv from "iconv-lite";
import libqp from "libqp";
import type { BodyEncoding } from "../types/index.js";

const BASE64URL_BODY = /^[A-Za-z0-9_-]*={0,2}$/;

export class BodyDecodeError extends Error {
  constructor(
    message: string,
    readonly encoding: string
  ) {
    super(message);
    this.name = "BodyDecodeError";
  }
}

export interface DecodedBody {
  bytes: Buffer;
  /** True when the declared encoding was not one we understand and the bytes are a best guess. */
  lossy: boolean;
  /** Set when the data was already unicode text, overriding the declared charset. */
  charset?: "utf8";
}

const DEFAULT_ENCODING: BodyEncoding = "base64url";

export function normalizeEncoding(encoding: string | null | undefined): string {
  const value = (encoding ?? "").trim().toLowerCase();
  return value === "" ? DEFAULT_ENCODING : value;
}

/**
 * Strict url-safe base64 as Gmail sends it: padding is optional, but when
 * present it must complete a 4-character group.
 */
export function decodeBase64Url(data: string): Buffer {
  const compact = data.replace(/\s+/g, "");
  if (!BASE64URL_BODY.test(compact)) {
    throw new BodyDecodeError("Invalid base64url alphabet", "base64url");
  }
  if (compact.includes("=") && compact.length % 4 !== 0) {
    throw new BodyDecodeError("Invalid base64url padding", "base64url");
  }
  if (compact.replace(/=+$/, "").length % 4 === 1) {
    throw new BodyDecodeError("Invalid base64url length", "base64url");
  }
  return Buffer.from(compact, "base64url");
}

/**
 * Decode quoted-printable text to raw bytes. Soft line breaks are removed;
 * escapes that are not two hex digits are kept as literal text.
 */
export function decodeQuotedPrintable(data: string): Buffer {
  // Unicode already in the transport string is carried through as its UTF-8 bytes
  return libqp.decode(Buffer.from(data, "utf8").toString("latin1"));
}

function isAscii(data: string): boolean {
  return !/[^\u0000-\u007f]/.test(data);
}

function rawString(data: string, lossy: boolean): DecodedBody {
  // Non-ASCII characters in a transport string mean the text was decoded upstream
  return isAscii(data)
    ? { bytes: Buffer.from(data, "latin1"), lossy }
    : { bytes: Buffer.from(data, "utf8"), lossy, charset: "utf8" };
}

export function decodeBodyBytes(
  data: string,
  encoding: string | null | undefined
): DecodedBody {
  const normalized = normalizeEncoding(encoding);
  switch (normalized) {
    case "base64url":
      return { bytes: decodeBase64Url(data), lossy: false };
    case "quoted-printable":
      return { bytes: decodeQuotedPrintable(data), lossy: false };
    case "7bit":
    case "8bit":
    case "binary":
      return rawString(data, false);
    default:
      return rawString(data, true);
  }
}

export function normalizeCharset(charset: string | null | undefined): string | undefined {
  if (!charset) return undefined;
  // RFC 2231 language suffix: utf-8*en
  const label = charset.trim().replace(/^["']|["']$/g, "").split("*")[0].toLowerCase();
  return label || undefined;
}

/**
 * Decode bytes using the declared charset when iconv-lite knows it, UTF-8
 * otherwise. Invalid sequences come out as U+FFFD.
 */
export function decodeBytes(bytes: Buffer, charset?: string | null): string {
  const label = normalizeCharset(charset);
  if (label && iconv.encodingExists(label)) {
    return iconv.decode(bytes, label);
  }
  return iconv.decode(bytes, "utf8");
}
