const NUMERIC_PATTERN =
  /^[+-]?(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?$/;

const SPECIAL_NUMERIC_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

export function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed.length === 0) {
    return null;
  }

  if (NUMERIC_PATTERN.test(trimmed)) {
    return Number(trimmed.replace(/_/g, ""));
  }

  const special = SPECIAL_NUMERIC_PATTERN.exec(trimmed);
  if (!special) {
    return null;
  }
  if (special[2]?.toLowerCase() === "nan") {
    return Number.NaN;
  }
  return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

export function isNumericText(raw: string): boolean {
  return parseNumber(raw) !== null;
}

export function isMissingRaw(value: string | undefined, naValues: ReadonlySet<string>): boolean {
  return value === undefined || naValues.has(value);
}

export function cellToRaw(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("utf8");
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "" : value.toISOString();
  }
  return JSON.stringify(value) ?? "";
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
