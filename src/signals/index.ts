import type {
  MoneyMention,
  NormalizedMessage,
  SignalsBundle,
  TimePhrase,
  TimePhraseType,
} from "../types/index.js";

export const MAX_URLS = 20;
export const MAX_MONEY_MENTIONS = 10;
export const MAX_TIME_PHRASES = 10;

// --- URLs ---

const URL_RE = /\bhttps?:\/\/[^\s<>()[\]{}"']+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

function normalizeUrl(url: string): string {
  const match = /^(https?:\/\/)([^/?#]*)(.*)$/i.exec(url);
  if (!match) return url;
  return match[1].toLowerCase() + match[2].toLowerCase() + match[3];
}

export function extractUrls(text: string, limit = MAX_URLS): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(URL_RE)) {
    const url = normalizeUrl(match[0].replace(TRAILING_PUNCTUATION, ""));
    if (url.length <= "https://".length) continue;
    seen.add(url);
    if (seen.size >= limit) break;
  }
  return [...seen];
}

// --- Money ---

const AMOUNT = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d{1,2})?(?!\d)|\d+(?:\.\d{1,2})?(?!\d)`;
const CURRENCY_CODES = ["USD", "EUR", "GBP", "JPY", "INR", "CAD", "AUD", "CHF", "CNY", "KRW"];
const CODE = CURRENCY_CODES.join("|");

const MONEY_PATTERNS: RegExp[] = [
  new RegExp(String.raw`(?:(?<![A-Za-z])(?:US|C|A)\$|[$€£¥₹])\s?(?:${AMOUNT})`, "g"),
  new RegExp(String.raw`\b(?:${CODE})\s?(?:${AMOUNT})`, "gi"),
  new RegExp(String.raw`(?<![\d.,])(?:${AMOUNT})\s?(?:${CODE}|dollars?|euros?|pounds?)\b`, "gi"),
];

const SYMBOL_CURRENCY: Record<string, string | null> = {
  "US$": "USD",
  "C$": "CAD",
  "A$": "AUD",
  "€": "EUR",
  "£": "GBP",
  "₹": "INR",
  $: null,
  "¥": null,
};

const WORD_CURRENCY: Record<string, string | null> = {
  dollar: null,
  dollars: null,
  euro: "EUR",
  euros: "EUR",
  pound: "GBP",
  pounds: "GBP",
};

function resolveCurrency(raw: string): string | null {
  const symbol = /^(US\$|C\$|A\$|[$€£¥₹])/i.exec(raw);
  if (symbol) return SYMBOL_CURRENCY[symbol[1].toUpperCase()] ?? null;

  const word = /([A-Za-z]+)$/.exec(raw) ?? /^([A-Za-z]+)/.exec(raw);
  if (!word) return null;
  const label = word[1];
  if (CURRENCY_CODES.includes(label.toUpperCase())) return label.toUpperCase();
  return WORD_CURRENCY[label.toLowerCase()] ?? null;
}

interface Span {
  start: number;
  end: number;
  text: string;
}

/**
 * Run every pattern, then keep the earliest-starting and, on ties, the
 * longest span among overlapping matches.
 */
function selectSpans(text: string, patterns: readonly RegExp[]): Span[] {
  const spans: Span[] = [];
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      spans.push({ start, end: start + match[0].length, text: match[0] });
    }
  }
  spans.sort((a, b) => a.start - b.start || b.end - a.end);

  const selected: Span[] = [];
  let lastEnd = -1;
  for (const span of spans) {
    if (span.start < lastEnd) continue;
    selected.push(span);
    lastEnd = span.end;
  }
  return selected;
}

export function extractMoney(text: string, limit = MAX_MONEY_MENTIONS): MoneyMention[] {
  const mentions: MoneyMention[] = [];
  const seen = new Set<string>();
  for (const span of selectSpans(text, MONEY_PATTERNS)) {
    const rawText = span.text.trim();
    if (seen.has(rawText)) continue;
    const digits = /\d[\d,]*(?:\.\d+)?/.exec(rawText);
    if (!digits) continue;
    const amount = Number.parseFloat(digits[0].replace(/,/g, ""));
    if (!Number.isFinite(amount)) continue;
    seen.add(rawText);
    mentions.push({ rawText, currency: resolveCurrency(rawText), amount });
    if (mentions.length >= limit) break;
  }
  return mentions;
}

// --- Time phrases ---

const WEEKDAY = "(?:monday|tuesday|wednesday|thursday|friday|saturday|sunday)";
const MONTH =
  "(?:january|february|march|april|may|june|july|august|september|october|november|december|" +
  "jan|feb|mar|apr|jun|jul|aug|sept|sep|oct|nov|dec)";
const CLOCK = String.raw`(?:\d{1,2}(?::\d{2})?\s?(?:am|pm)|\d{1,2}:\d{2}|noon|midnight)`;
const ZONE = String.raw`(?:\s+(?:pst|pdt|pt|mst|mdt|mt|cst|cdt|ct|est|edt|et|utc|gmt))?`;
const AT_CLOCK = String.raw`(?:\s+(?:at\s+)?${CLOCK}${ZONE})?`;

const TIME_PATTERNS: ReadonlyArray<[TimePhraseType, RegExp]> = [
  [
    "recurring",
    new RegExp(
      String.raw`\b(?:every\s+(?:other\s+)?(?:day|week|month|year|quarter|weekday|morning|afternoon|evening|night|${WEEKDAY})|daily|weekly|monthly|annually|bi-?weekly)\b`,
      "gi"
    ),
  ],
  [
    "relative",
    new RegExp(
      String.raw`\b(?:asap|eod|end\s+of\s+(?:the\s+)?(?:day|week|month)|(?:by\s+)?(?:today|tonight|tomorrow)${AT_CLOCK}|(?:this|next)\s+(?:week|month)|(?:in|within)\s+\d+\s+(?:minutes?|hours?|days?|weeks?)|(?:(?:by|on|next|this)\s+)?${WEEKDAY}${AT_CLOCK})\b`,
      "gi"
    ),
  ],
  [
    "absolute",
    new RegExp(
      String.raw`\b(?:\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2})?)?|\d{1,2}/\d{1,2}/\d{2,4}|${MONTH}\.?\s+\d{1,2}(?:st|nd|rd|th)?(?:,?\s+\d{4})?|\d{1,2}(?:st|nd|rd|th)?\s+${MONTH}(?:,?\s+\d{4})?|${CLOCK}${ZONE})\b`,
      "gi"
    ),
  ],
];

interface TypedSpan extends Span {
  type: TimePhraseType;
}

export function extractTimePhrases(text: string, limit = MAX_TIME_PHRASES): TimePhrase[] {
  const accepted: TypedSpan[] = [];
  for (const [type, pattern] of TIME_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (accepted.some((span) => start < span.end && span.start < end)) continue;
      accepted.push({ start, end, text: match[0], type });
    }
  }
  accepted.sort((a, b) => a.start - b.start);

  const phrases: TimePhrase[] = [];
  const seen = new Set<string>();
  for (const span of accepted) {
    const rawText = span.text.replace(/\s+/g, " ").trim();
    const key = rawText.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    phrases.push({ rawText, approximateType: span.type });
    if (phrases.length >= limit) break;
  }
  return phrases;
}

/** Deterministic, observable signals from the message body. Never throws. */
export function extractSignals(message: Pick<NormalizedMessage, "bodyText">): SignalsBundle {
  const text = message.bodyText;
  return {
    urls: extractUrls(text),
    moneyMentions: extractMoney(text),
    timePhrases: extractTimePhrases(text),
  };
}
