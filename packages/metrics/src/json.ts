/**
 * Hand-assembled JSON for the report document.
 *
 * The collection service parses values by their textual form, so the
 * bare-versus-quoted decision below is part of the wire format and must not
 * be replaced by JSON.stringify.
 */

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Whether `value` is written as a bare number.
 *
 * Values ending in `0` other than `"0"` itself are always quoted, so `"10"`
 * goes out as a string while `"3.5"` goes out as a number.
 *
 * Only plain decimal literals count. Padded text (`" 5"`), type suffixes
 * (`"1f"`, `"1d"`), `Infinity`, `NaN` and hex are quoted, so a bare value is
 * always a valid JSON number.
 */
export function isNumericLiteral(value: string): boolean {
  if (value !== "0" && value.endsWith("0")) {
    return false;
  }
  return DECIMAL_LITERAL.test(value);
}

/** Quote `text` as a JSON string. Only control characters are escaped; other code points pass through. */
export function escapeJson(text: string): string {
  let out = '"';
  for (let index = 0; index < text.length; index++) {
    const chr = text[index];
    switch (chr) {
      case '"':
      case "\\":
        out += "\\" + chr;
        break;
      case "\b":
        out += "\\b";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\n":
        out += "\\n";
        break;
      case "\r":
        out += "\\r";
        break;
      default: {
        const code = text.charCodeAt(index);
        if (code < 0x20) {
          out += "\\u" + code.toString(16).padStart(4, "0");
        } else {
          out += chr;
        }
      }
    }
  }
  return out + '"';
}

/** One `"key":value` member, with the value bare or quoted per {@link isNumericLiteral}. */
export function jsonPair(key: string, value: string): string {
  return `${escapeJson(key)}:${isNumericLiteral(value) ? value : escapeJson(value)}`;
}

/** Accumulates object members in insertion order. */
export class JsonObjectBuilder {
  private readonly members: string[] = [];

  get isEmpty(): boolean {
    return this.members.length === 0;
  }

  pair(key: string, value: string): this {
    this.members.push(jsonPair(key, value));
    return this;
  }

  /** Add a member whose value is already serialized JSON. */
  raw(key: string, json: string): this {
    this.members.push(`${escapeJson(key)}:${json}`);
    return this;
  }

  toString(): string {
    return `{${this.members.join(",")}}`;
  }
}
