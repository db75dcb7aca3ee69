import { describe, it, expect } from "vitest";
import { escapeJson, isNumericLiteral, jsonPair, JsonObjectBuilder } from "./json.js";

describe("isNumericLiteral", () => {
  it("writes a lone zero bare", () => {
    expect(isNumericLiteral("0")).toBe(true);
  });

  it("quotes multi-digit values ending in zero", () => {
    expect(isNumericLiteral("10")).toBe(false);
    expect(isNumericLiteral("1.50")).toBe(false);
  });

  it("writes decimals bare", () => {
    expect(isNumericLiteral("3.5")).toBe(true);
    expect(isNumericLiteral("-7")).toBe(true);
    expect(isNumericLiteral("2e5")).toBe(true);
  });

  it("quotes non-numeric text", () => {
    expect(isNumericLiteral("abc")).toBe(false);
    expect(isNumericLiteral("")).toBe(false);
    expect(isNumericLiteral("NaN")).toBe(false);
    expect(isNumericLiteral("1.2.3")).toBe(false);
  });

  it("quotes text that is not a plain JSON number", () => {
    expect(isNumericLiteral(" 5")).toBe(false);
    expect(isNumericLiteral("1f")).toBe(false);
    expect(isNumericLiteral("1d")).toBe(false);
    expect(isNumericLiteral("Infinity")).toBe(false);
    expect(isNumericLiteral("0x1F")).toBe(false);
    expect(jsonPair("v", "1f")).toBe('"v":"1f"');
  });
});

describe("escapeJson", () => {
  it("escapes quotes and newlines", () => {
    expect(escapeJson('he said "hi"\n')).toBe('"he said \\"hi\\"\\n"');
  });

  it("escapes backslash, backspace, tab and carriage return", () => {
    expect(escapeJson("a\\b\bc\td\re")).toBe('"a\\\\b\\bc\\td\\re"');
  });

  it("writes other control characters as unicode escapes", () => {
    expect(escapeJson("\u0001\u001f")).toBe('"\\u0001\\u001f"');
  });

  it("passes non-ASCII through unchanged", () => {
    expect(escapeJson("héllo ✓")).toBe('"héllo ✓"');
  });

  it("produces text JSON.parse reads back", () => {
    const input = 'tab\tquote"slash\\\u0002';
    expect(JSON.parse(escapeJson(input))).toBe(input);
  });
});

describe("jsonPair", () => {
  it("encodes P4 inputs", () => {
    expect(jsonPair("v", "0")).toBe('"v":0');
    expect(jsonPair("v", "10")).toBe('"v":"10"');
    expect(jsonPair("v", "3.5")).toBe('"v":3.5');
    expect(jsonPair("v", "abc")).toBe('"v":"abc"');
  });
});

describe("JsonObjectBuilder", () => {
  it("joins members in insertion order", () => {
    const json = new JsonObjectBuilder()
      .pair("a", "1")
      .pair("b", "x")
      .raw("c", "{}")
      .toString();
    expect(json).toBe('{"a":1,"b":"x","c":{}}');
  });

  it("renders an empty object", () => {
    const builder = new JsonObjectBuilder();
    expect(builder.isEmpty).toBe(true);
    expect(builder.toString()).toBe("{}");
  });
});
