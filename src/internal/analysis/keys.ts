export function keyFragment(value: string): string {
  return `s${value.length}:${value};`;
}

export function keyForValues(values: readonly string[]): string {
  let key = "";
  for (const value of values) {
    key += keyFragment(value);
  }
  return key;
}

export function format_group_key(values: readonly string[]): string {
  if (values.length === 1) {
    return `(${reprString(values[0] ?? "")},)`;
  }
  return `(${values.map(reprString).join(", ")})`;
}

const NON_PRINTABLE = /^[\p{Cc}\p{Cf}\p{Cs}\p{Co}\p{Cn}\p{Zl}\p{Zp}\p{Zs}]$/u;

function escapeCodePoint(code: number): string {
  if (code < 0x100) {
    return `\\x${code.toString(16).padStart(2, "0")}`;
  }
  if (code < 0x10000) {
    return `\\u${code.toString(16).padStart(4, "0")}`;
  }
  return `\\U${code.toString(16).padStart(8, "0")}`;
}

function reprString(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = quote;

  for (const char of value) {
    const code = char.codePointAt(0) ?? 0;
    if (char === quote || char === "\\") {
      out += `\\${char}`;
    } else if (char === "\n") {
      out += "\\n";
    } else if (char === "\r") {
      out += "\\r";
    } else if (char === "\t") {
      out += "\\t";
    } else if (char !== " " && NON_PRINTABLE.test(char)) {
      out += escapeCodePoint(code);
    } else {
      out += char;
    }
  }

  return out + quote;
}
