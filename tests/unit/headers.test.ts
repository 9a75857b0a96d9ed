import { describe, it, expect } from "vitest";
import {
  decodeEncodedWords,
  parseAddressList,
  parseStructuredHeader,
  toHeaderMap,
} from "../../src/parser/headers.js";

describe("toHeaderMap", () => {
  it("is case-insensitive and keeps the first copy", () => {
    const map = toHeaderMap([
      { name: "Received", value: "first" },
      { name: "RECEIVED", value: "second" },
      { name: "Subject", value: "  Hi  " },
    ]);
    expect(map.get("received")).toBe("first");
    expect(map.get("subject")).toBe("Hi");
  });
});

describe("parseStructuredHeader", () => {
  it("splits value and parameters", () => {
    expect(parseStructuredHeader('Text/Plain; charset="UTF-8"; format=flowed')).toEqual({
      value: "text/plain",
      params: { charset: "UTF-8", format: "flowed" },
    });
  });

  it("merges RFC 2231 charset values and continuations", () => {
    expect(parseStructuredHeader("attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf")).toEqual({
      value: "attachment",
      params: { filename: "résumé.pdf" },
    });
    expect(
      parseStructuredHeader('attachment; filename*0="quarterly-"; filename*1="report.pdf"').params.filename
    ).toBe("quarterly-report.pdf");
  });

  it("decodes encoded-word parameters", () => {
    expect(parseStructuredHeader('application/pdf; name="=?UTF-8?Q?r=C3=A9sum=C3=A9.pdf?="').params.name).toBe(
      "résumé.pdf"
    );
  });

  it("handles a missing header", () => {
    expect(parseStructuredHeader(undefined)).toEqual({ value: "", params: {} });
  });
});

describe("decodeEncodedWords", () => {
  it("decodes B and Q words", () => {
    expect(decodeEncodedWords("=?UTF-8?B?SGVsbG8gV29ybGQ=?=")).toBe("Hello World");
    expect(decodeEncodedWords("=?ISO-8859-1?Q?Caf=E9_au_lait?=")).toBe("Café au lait");
  });

  it("keeps surrounding plain text", () => {
    expect(decodeEncodedWords("Re: =?UTF-8?Q?r=C3=A9union?= today")).toBe("Re: réunion today");
  });

  it("drops whitespace between adjacent words", () => {
    expect(decodeEncodedWords("=?UTF-8?Q?Hello?= =?UTF-8?Q?_World?=")).toBe("Hello World");
  });

  it("joins a character split across two words", () => {
    expect(decodeEncodedWords("=?UTF-8?Q?caf=C3?= =?UTF-8?Q?=A9?=")).toBe("café");
  });

  it("returns plain values untouched", () => {
    expect(decodeEncodedWords("Quarterly report")).toBe("Quarterly report");
  });
});

describe("parseAddressList", () => {
  it("parses quoted names and bare addresses", () => {
    expect(parseAddressList('"Doe, Jane" <jane@example.com>, bob@example.com')).toEqual([
      { name: "Doe, Jane", email: "jane@example.com" },
      { name: null, email: "bob@example.com" },
    ]);
  });

  it("decodes encoded display names", () => {
    expect(parseAddressList("=?UTF-8?B?Sm9zw6k=?= <jose@example.com>")).toEqual([
      { name: "José", email: "jose@example.com" },
    ]);
  });

  it("flattens groups", () => {
    expect(parseAddressList("Team: a@example.com, b@example.com;").map((a) => a.email)).toEqual([
      "a@example.com",
      "b@example.com",
    ]);
  });

  it("returns an empty list for a missing header", () => {
    expect(parseAddressList(undefined)).toEqual([]);
  });
});
