import libmime from "libmime";
import addressparser from "nodemailer/lib/addressparser/index.js";
import type { EmailAddress, RawHeader } from "../types/index.js";

export type HeaderMap = ReadonlyMap<string, string>;

/**
 * Case-insensitive header lookup. Repeated headers keep the first value,
 * matching how Gmail orders the copies it received.
 */
export function toHeaderMap(headers: readonly RawHeader[] | null | undefined): HeaderMap {
  const map = new Map<string, string>();
  for (const header of headers ?? []) {
    const key = header.name.trim().toLowerCase();
    if (key && !map.has(key)) {
      map.set(key, header.value.trim());
    }
  }
  return map;
}

export interface StructuredHeader {
  value: string;
  params: Record<string, string>;
}

/**
 * Split a structured header such as Content-Type or Content-Disposition
 * into its lower-cased value and its decoded parameters. RFC 2231
 * continuations and charset-tagged values are merged by libmime.
 */
export function parseStructuredHeader(raw: string | undefined): StructuredHeader {
  if (!raw) return { value: "", params: {} };
  const parsed = libmime.parseHeaderValue(raw);
  const params: Record<string, string> = {};
  for (const [key, paramValue] of Object.entries(parsed.params)) {
    const name = key.toLowerCase();
    if (!(name in params)) params[name] = decodeEncodedWords(paramValue);
  }
  return { value: (parsed.value || "").trim().toLowerCase(), params };
}

/**
 * Decode RFC 2047 encoded words into unicode. Adjacent words sharing a
 * charset are joined before decoding.
 */
export function decodeEncodedWords(value: string): string {
  if (!value.includes("=?")) return value;
  return libmime.decodeWords(value);
}

type ParsedAddress = ReturnType<typeof addressparser>[number];

function collectAddresses(entries: readonly ParsedAddress[], out: EmailAddress[]): void {
  for (const entry of entries) {
    if ("group" in entry) {
      collectAddresses(entry.group, out);
      continue;
    }
    const email = entry.address.trim();
    if (!email) continue;
    const name = decodeEncodedWords(entry.name).trim();
    out.push({ name: name || null, email });
  }
}

/**
 * Parse an address header (From, To, Cc) into name/email pairs. Group
 * syntax is flattened; display names are decoded after parsing so encoded
 * commas cannot split an address.
 */
export function parseAddressList(value: string | undefined): EmailAddress[] {
  if (!value) return [];
  const out: EmailAddress[] = [];
  collectAddresses(addressparser(value), out);
  return out;
}
