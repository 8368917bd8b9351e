import { CoercionError } from "../errors";
import { FieldType, JsonScalar, TypedValue } from "../types/ingest";

// ============================================================================
// SHAPES
// ============================================================================

export const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Date, optionally followed by a time and an offset
export const ISO_DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export type CoercionResult =
  | { ok: true; value: TypedValue }
  | { ok: false; error: CoercionError };

export function isJsonScalar(value: unknown): value is JsonScalar {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

export function parseNumericString(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseBooleanString(raw: string): boolean | null {
  const lowered = raw.trim().toLowerCase();
  if (lowered === "true") return true;
  if (lowered === "false") return false;
  return null;
}

/**
 * ISO-8601 string → normalized UTC ISO string, or null when not a real date.
 * Times without an offset are read as UTC.
 */
export function parseIsoDatetime(raw: string): string | null {
  const match = ISO_DATETIME_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", offset = "Z"] = match;
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = Number(second);

  if (mo < 1 || mo > 12 || d < 1 || d > daysInMonth(y, mo)) return null;
  if (h > 23 || mi > 59 || s > 59) return null;

  const offsetMinutes = parseOffset(offset);
  if (offsetMinutes === null) return null;

  const date = new Date(0);
  date.setUTCFullYear(y, mo - 1, d);
  date.setUTCHours(h, mi, s, Number(fraction.slice(0, 3).padEnd(3, "0")));
  return new Date(date.getTime() - offsetMinutes * 60_000).toISOString();
}

function daysInMonth(year: number, month: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month, 0);
  return date.getUTCDate();
}

// "Z", "+02:00", "-0530" → minutes east of UTC
function parseOffset(offset: string): number | null {
  if (offset === "Z") return 0;
  const digits = offset.slice(1).replace(":", "");
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2));
  if (hours > 23 || minutes > 59) return null;
  return (offset.startsWith("-") ? -1 : 1) * (hours * 60 + minutes);
}

// ============================================================================
// COERCION
// ============================================================================

/**
 * Validate one raw payload value against a declared field type.
 * null passes through as null for every type.
 */
export function coerceValue(field: string, raw: unknown, declaredType: FieldType): CoercionResult {
  const fail = (): CoercionResult => ({
    ok: false,
    error: new CoercionError(field, declaredType, raw),
  });
  const ok = (value: TypedValue): CoercionResult => ({ ok: true, value });

  if (!isJsonScalar(raw)) return fail();
  if (raw === null) return ok({ kind: "null", value: null });

  switch (declaredType) {
    case "string":
      return ok({ kind: "string", value: String(raw) });

    case "number": {
      if (typeof raw === "number") return ok({ kind: "number", value: raw });
      if (typeof raw !== "string") return fail();
      const parsed = parseNumericString(raw);
      return parsed === null ? fail() : ok({ kind: "number", value: parsed });
    }

    case "boolean": {
      if (typeof raw === "boolean") return ok({ kind: "boolean", value: raw });
      if (typeof raw !== "string") return fail();
      const parsed = parseBooleanString(raw);
      return parsed === null ? fail() : ok({ kind: "boolean", value: parsed });
    }

    case "datetime": {
      if (typeof raw !== "string") return fail();
      const parsed = parseIsoDatetime(raw);
      return parsed === null ? fail() : ok({ kind: "datetime", value: parsed });
    }

    case "email": {
      if (typeof raw !== "string") return fail();
      const trimmed = raw.trim();
      // Blank emails are common in CRM exports
      if (trimmed === "") return ok({ kind: "null", value: null });
      return EMAIL_PATTERN.test(trimmed) ? ok({ kind: "string", value: trimmed }) : fail();
    }

    case "phone": {
      if (typeof raw !== "string") return fail();
      return ok({ kind: "string", value: raw.replace(/\s+/g, "") });
    }
  }
}

/**
 * Value written to Lead.data for a coerced field
 */
export function toLeadValue(typed: TypedValue): JsonScalar {
  return typed.value;
}
