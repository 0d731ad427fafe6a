import { parseNumber } from "../../utils";

export type LiteralValue = string | number | boolean | null | LiteralValue[] | LiteralMapping;

export class LiteralMapping {
  readonly entries: Array<[LiteralValue, LiteralValue]>;

  constructor(entries: Array<[LiteralValue, LiteralValue]>) {
    this.entries = entries;
  }

  keys(): LiteralValue[] {
    return this.entries.map(([key]) => key);
  }
}

class LiteralSyntaxError extends Error {
  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = "LiteralSyntaxError";
  }
}

export const MAX_NESTING_DEPTH = 1000;

const NUMBER_TOKEN = /[+-]?(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?/y;
const WORD_TOKEN = /[A-Za-z_][A-Za-z0-9_]*/y;

const KEYWORDS: Record<string, boolean | null> = {
  True: true,
  False: false,
  None: null,
  true: true,
  false: false,
  null: null,
};

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  "/": "/",
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  v: "\v",
  a: "\u0007",
  "0": "\0",
};

class LiteralParser {
  private position = 0;
  private depth = 0;

  constructor(private readonly text: string) {}

  parse(): LiteralValue {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.position !== this.text.length) {
      throw new LiteralSyntaxError("Unexpected trailing input", this.position);
    }
    return value;
  }

  private parseValue(): LiteralValue {
    if (this.depth >= MAX_NESTING_DEPTH) {
      throw new LiteralSyntaxError("Nesting too deep", this.position);
    }
    this.depth += 1;
    try {
      return this.parseValueAtPosition();
    } finally {
      this.depth -= 1;
    }
  }

  private parseValueAtPosition(): LiteralValue {
    this.skipWhitespace();
    const char = this.text[this.position];

    if (char === undefined) {
      throw new LiteralSyntaxError("Unexpected end of input", this.position);
    }
    if (char === "[") {
      this.position += 1;
      return this.parseSequence("]");
    }
    if (char === "(") {
      return this.parseParenthesized();
    }
    if (char === "{") {
      return this.parseBraced();
    }
    if (char === "'" || char === '"') {
      return this.parseString(char);
    }
    if (/[\d+\-.]/.test(char)) {
      return this.parseNumberToken();
    }
    return this.parseKeyword();
  }

  private parseSequence(closing: "]" | ")"): LiteralValue[] {
    const items: LiteralValue[] = [];
    this.skipWhitespace();
    if (this.consume(closing)) {
      return items;
    }

    while (true) {
      items.push(this.parseValue());
      this.skipWhitespace();
      if (this.consume(closing)) {
        return items;
      }
      this.expect(",");
      this.skipWhitespace();
      if (this.consume(closing)) {
        return items;
      }
    }
  }

  private parseParenthesized(): LiteralValue {
    this.position += 1;
    this.skipWhitespace();
    if (this.consume(")")) {
      return [];
    }

    const first = this.parseValue();
    this.skipWhitespace();
    if (this.consume(")")) {
      return first;
    }
    this.expect(",");
    const rest = this.parseSequence(")");
    return [first, ...rest];
  }

  private parseBraced(): LiteralValue {
    this.position += 1;
    this.skipWhitespace();
    if (this.consume("}")) {
      return new LiteralMapping([]);
    }

    const first = this.parseValue();
    this.skipWhitespace();
    if (this.text[this.position] === ":") {
      return this.parseMappingFrom(first);
    }
    return this.parseSetFrom(first);
  }

  private parseMappingFrom(firstKey: LiteralValue): LiteralMapping {
    const entries = new Map<string, [LiteralValue, LiteralValue]>();
    let key = firstKey;

    while (true) {
      this.expect(":");
      const value = this.parseValue();
      const token = literalToken(key);
      const existing = entries.get(token);
      if (existing) {
        existing[1] = value;
      } else {
        entries.set(token, [key, value]);
      }

      this.skipWhitespace();
      if (this.consume("}")) {
        return new LiteralMapping([...entries.values()]);
      }
      this.expect(",");
      this.skipWhitespace();
      if (this.consume("}")) {
        return new LiteralMapping([...entries.values()]);
      }
      key = this.parseValue();
      this.skipWhitespace();
    }
  }

  private parseSetFrom(first: LiteralValue): LiteralValue[] {
    const members = new Map<string, LiteralValue>([[literalToken(first), first]]);

    while (true) {
      this.skipWhitespace();
      if (this.consume("}")) {
        return [...members.values()];
      }
      this.expect(",");
      this.skipWhitespace();
      if (this.consume("}")) {
        return [...members.values()];
      }
      const member = this.parseValue();
      const token = literalToken(member);
      if (!members.has(token)) {
        members.set(token, member);
      }
    }
  }

  private parseString(quote: "'" | '"'): string {
    const start = this.position;
    this.position += 1;
    let out = "";

    while (this.position < this.text.length) {
      const char = this.text[this.position];
      this.position += 1;

      if (char === quote) {
        return out;
      }
      if (char === "\n") {
        throw new LiteralSyntaxError("Unterminated string", start);
      }
      if (char !== "\\") {
        out += char;
        continue;
      }

      out += this.readEscape();
    }

    throw new LiteralSyntaxError("Unterminated string", start);
  }

  private readEscape(): string {
    const char = this.text[this.position];
    if (char === undefined) {
      throw new LiteralSyntaxError("Unterminated escape", this.position);
    }
    this.position += 1;

    if (char === "\n") {
      return "";
    }
    const simple = SIMPLE_ESCAPES[char];
    if (simple !== undefined) {
      return simple;
    }
    if (char === "x") {
      return this.readCodePoint(2);
    }
    if (char === "u") {
      return this.readCodePoint(4);
    }
    if (char === "U") {
      return this.readCodePoint(8);
    }
    return `\\${char}`;
  }

  private readCodePoint(length: number): string {
    const digits = this.text.slice(this.position, this.position + length);
    if (digits.length !== length || !/^[0-9a-fA-F]+$/.test(digits)) {
      throw new LiteralSyntaxError("Invalid escape sequence", this.position);
    }
    this.position += length;
    const codePoint = Number.parseInt(digits, 16);
    if (codePoint > 0x10ffff) {
      throw new LiteralSyntaxError("Invalid code point", this.position);
    }
    return String.fromCodePoint(codePoint);
  }

  private parseNumberToken(): number {
    NUMBER_TOKEN.lastIndex = this.position;
    const match = NUMBER_TOKEN.exec(this.text);
    const parsed = match ? parseNumber(match[0]) : null;
    if (!match || parsed === null) {
      throw new LiteralSyntaxError("Invalid number", this.position);
    }
    this.position += match[0].length;
    return parsed;
  }

  private parseKeyword(): boolean | null {
    WORD_TOKEN.lastIndex = this.position;
    const match = WORD_TOKEN.exec(this.text);
    const word = match?.[0];
    if (word === undefined || !Object.prototype.hasOwnProperty.call(KEYWORDS, word)) {
      throw new LiteralSyntaxError("Unexpected token", this.position);
    }
    this.position += word.length;
    return KEYWORDS[word] ?? null;
  }

  private skipWhitespace(): void {
    while (this.position < this.text.length && /\s/.test(this.text[this.position] ?? "")) {
      this.position += 1;
    }
  }

  private consume(char: string): boolean {
    if (this.text[this.position] === char) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private expect(char: string): void {
    this.skipWhitespace();
    if (!this.consume(char)) {
      throw new LiteralSyntaxError(`Expected '${char}'`, this.position);
    }
  }
}

export function parseLiteral(text: string): LiteralValue | undefined {
  try {
    return new LiteralParser(text).parse();
  } catch (error) {
    if (error instanceof LiteralSyntaxError) {
      return undefined;
    }
    throw error;
  }
}

export function isBracketedLiteral(text: string): boolean {
  return (
    (text.startsWith("[") && text.endsWith("]")) ||
    (text.startsWith("{") && text.endsWith("}"))
  );
}

export function explodeLiteral(raw: string): string[] | null {
  const trimmed = raw.trim();
  if (!isBracketedLiteral(trimmed)) {
    return null;
  }

  const parsed = parseLiteral(trimmed);
  if (parsed instanceof LiteralMapping) {
    return parsed.keys().map(literalToken);
  }
  if (Array.isArray(parsed)) {
    return parsed.map(literalToken);
  }
  return null;
}

export function literalToken(value: LiteralValue): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(toJsonValue(value));
}

function toJsonValue(value: LiteralValue): unknown {
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (value instanceof LiteralMapping) {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of value.entries) {
      out[literalToken(key)] = toJsonValue(entry);
    }
    return out;
  }
  return value;
}
